// src/core/eval/values.ts
// Runtime values manipulated by the query VM and stored in records

// ─────────────────────────────────────────────────────────────────
// Value union
// ─────────────────────────────────────────────────────────────────

/**
 * Identity of a record: the table it lives in and its row number.
 * `row` is an unsigned 64-bit integer.
 */
export type RecordIdentity = {
  table: string;
  row: bigint;
};

export type IdentityVal = { tag: "Identity"; id: RecordIdentity };
export type IntegerVal = { tag: "Integer"; n: bigint };
export type FloatVal = { tag: "Float"; n: number };
export type TextVal = { tag: "Text"; s: string };

export type Value = IdentityVal | IntegerVal | FloatVal | TextVal;

export type ValueTag = Value["tag"];

export const U64_MAX = (1n << 64n) - 1n;
export const I64_MIN = -(1n << 63n);
export const I64_MAX = (1n << 63n) - 1n;

// ─────────────────────────────────────────────────────────────────
// Constructors
// ─────────────────────────────────────────────────────────────────

export function identity(table: string, row: bigint): RecordIdentity {
  return { table, row };
}

export function VIdentity(id: RecordIdentity): IdentityVal {
  return { tag: "Identity", id };
}

/** Integer value, wrapped to the signed 64-bit range. */
export function VInteger(n: bigint): IntegerVal {
  return { tag: "Integer", n: BigInt.asIntN(64, n) };
}

export function VFloat(n: number): FloatVal {
  return { tag: "Float", n };
}

export function VText(s: string): TextVal {
  return { tag: "Text", s };
}

// ─────────────────────────────────────────────────────────────────
// Comparison
// ─────────────────────────────────────────────────────────────────

type Scalar = bigint | number | string;

function compareScalars(a: Scalar, b: Scalar): number | undefined {
  if (a < b) return -1;
  if (a > b) return 1;
  if (a === b) return 0;
  // NaN
  return undefined;
}

/**
 * Three-way comparison of two values.
 *
 * Returns a negative number, zero or a positive number when both values have
 * the same variant, and `undefined` when they are incomparable: values of
 * different variants never compare, and neither does a NaN float.
 * Identities order by table name, then row.
 */
export function compareValues(a: Value, b: Value): number | undefined {
  switch (a.tag) {
    case "Identity": {
      if (b.tag !== "Identity") return undefined;
      const byTable = compareScalars(a.id.table, b.id.table);
      return byTable === 0 ? compareScalars(a.id.row, b.id.row) : byTable;
    }
    case "Integer":
      return b.tag === "Integer" ? compareScalars(a.n, b.n) : undefined;
    case "Float":
      return b.tag === "Float" ? compareScalars(a.n, b.n) : undefined;
    case "Text":
      return b.tag === "Text" ? compareScalars(a.s, b.s) : undefined;
  }
}

export function valueEquals(a: Value, b: Value): boolean {
  return compareValues(a, b) === 0;
}

// ─────────────────────────────────────────────────────────────────
// Formatting
// ─────────────────────────────────────────────────────────────────

export function formatIdentity(id: RecordIdentity): string {
  return `${id.table}:${id.row}`;
}

/**
 * Render a value the way it is written in a query, for listings and
 * diagnostics.
 */
export function showValue(v: Value): string {
  switch (v.tag) {
    case "Identity":
      return `@${formatIdentity(v.id)}`;
    case "Integer":
      return v.n.toString();
    case "Float":
      return Number.isInteger(v.n) ? v.n.toFixed(1) : String(v.n);
    case "Text":
      return `"${v.s}"`;
  }
}
