// src/core/store/database.ts
// In-memory tables of records, keyed by table name and row

import type { RecordIdentity, Value } from "../eval/values";
import { VIdentity, compareValues, identity } from "../eval/values";

/**
 * A stored record. `fields` always holds `"id"` mapped to the record's own
 * identity; keys are lowercase.
 */
export type DbRecord = {
  readonly id: RecordIdentity;
  readonly fields: Map<string, Value>;
};

export type Table = Map<bigint, DbRecord>;

export const ID_FIELD = "id";

// ─────────────────────────────────────────────────────────────────
// Filter predicates
// ─────────────────────────────────────────────────────────────────

/** Applied as `predicate(fieldValue, operand)`. */
export type Predicate = (fieldValue: Value, operand: Value) => boolean;

const cmp = (test: (c: number) => boolean): Predicate => (a, b) => {
  const c = compareValues(a, b);
  return c !== undefined && test(c);
};

const PREDICATES: ReadonlyMap<string, Predicate> = new Map([
  ["==", cmp((c) => c === 0)],
  ["<", cmp((c) => c < 0)],
  ["<=", cmp((c) => c <= 0)],
  [">", cmp((c) => c > 0)],
  [">=", cmp((c) => c >= 0)],
]);

export const PREDICATE_NAMES: readonly string[] = [...PREDICATES.keys()];

export function lookupPredicate(name: string): Predicate | undefined {
  return PREDICATES.get(name);
}

// ─────────────────────────────────────────────────────────────────
// Database
// ─────────────────────────────────────────────────────────────────

export type DatabaseStats = {
  tables: number;
  records: number;
};

/**
 * Table/record storage mutated by the VM. Callers hold the database lock
 * around every use.
 */
export interface Database {
  getTable(name: string): Table | undefined;

  getRecord(id: RecordIdentity): DbRecord | undefined;

  /**
   * Write `value` under the lowercased `key` of the record at `id`, creating
   * the table and record when absent. A write to `"id"` leaves the identity
   * field untouched.
   */
  upsert(id: RecordIdentity, key: string, value: Value): DbRecord;

  /**
   * Rows of `table` whose field `key` satisfies `predicate(field, value)`.
   * Linear scan; there are no indexes.
   */
  scanFilter(table: string, key: string, predicate: Predicate, value: Value): bigint[];

  stats(): DatabaseStats;
}

export class InMemoryDatabase implements Database {
  private readonly tables = new Map<string, Table>();

  getTable(name: string): Table | undefined {
    return this.tables.get(name);
  }

  getRecord(id: RecordIdentity): DbRecord | undefined {
    return this.tables.get(id.table)?.get(id.row);
  }

  upsert(id: RecordIdentity, key: string, value: Value): DbRecord {
    const field = key.toLowerCase();

    let table = this.tables.get(id.table);
    if (!table) {
      table = new Map();
      this.tables.set(id.table, table);
    }

    let record = table.get(id.row);
    if (!record) {
      const own = identity(id.table, id.row);
      record = { id: own, fields: new Map([[ID_FIELD, VIdentity(own)]]) };
      table.set(id.row, record);
    }

    if (field !== ID_FIELD) {
      record.fields.set(field, value);
    }
    return record;
  }

  scanFilter(table: string, key: string, predicate: Predicate, value: Value): bigint[] {
    const rows: bigint[] = [];
    const field = key.toLowerCase();

    for (const [row, record] of this.tables.get(table) ?? []) {
      for (const [fieldKey, fieldValue] of record.fields) {
        if (fieldKey === field && predicate(fieldValue, value)) {
          rows.push(row);
          break;
        }
      }
    }
    return rows;
  }

  stats(): DatabaseStats {
    let records = 0;
    for (const table of this.tables.values()) {
      records += table.size;
    }
    return { tables: this.tables.size, records };
  }
}
