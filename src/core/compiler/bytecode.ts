// src/core/compiler/bytecode.ts
// Bytecode generation from the token stream, with loop scope resolution

import type { Token } from "../reader/tokenize";
import { tokenize } from "../reader/tokenize";
import type { RecordIdentity } from "../eval/values";
import { U64_MAX, VFloat, VIdentity, VInteger, VText, identity } from "../eval/values";
import type { RowIdPort } from "../../ports/rng";
import { CompileError } from "../errors";
import type { Instr, Program, SourceLocation } from "./types";

// ─────────────────────────────────────────────────────────────────
// Bytecode Generation Context
// ─────────────────────────────────────────────────────────────────

type BytecodeContext = {
  code: Instr[];
  locations: Array<SourceLocation | undefined>;
  /** Indices of the `Range` instructions whose `end` is still open */
  scopes: number[];
  rows: RowIdPort;
};

function emit(ctx: BytecodeContext, instr: Instr, loc?: SourceLocation): void {
  ctx.code.push(instr);
  ctx.locations.push(loc);
}

function currentIP(ctx: BytecodeContext): number {
  return ctx.code.length;
}

function locOf(t: Token): SourceLocation {
  return { line: t.line, column: t.column };
}

function at(loc: SourceLocation): string {
  return `line ${loc.line}:${loc.column}`;
}

// ─────────────────────────────────────────────────────────────────
// Literals
// ─────────────────────────────────────────────────────────────────

const ROW_RE = /^\d+$/;

/**
 * Resolve an `@table:row` literal. A row of `_` draws a fresh row number.
 */
function parseIdentity(t: Token, rows: RowIdPort): RecordIdentity {
  const loc = locOf(t);
  const parts = t.word.slice(1).split(":");
  if (parts.length !== 2) {
    throw new CompileError(
      `malformed identity \`${t.word}\` at ${at(loc)}: expected exactly one ':' between table and row`,
      loc
    );
  }

  const [table, row] = parts;
  if (table.length === 0) {
    throw new CompileError(`malformed identity \`${t.word}\` at ${at(loc)}: empty table name`, loc);
  }
  if (row === "_") {
    return identity(table, rows.nextRow());
  }
  if (ROW_RE.test(row)) {
    const n = BigInt(row);
    if (n <= U64_MAX) return identity(table, n);
  }
  throw new CompileError(
    `malformed identity \`${t.word}\` at ${at(loc)}: row must be an unsigned 64-bit number or _`,
    loc
  );
}

// ─────────────────────────────────────────────────────────────────
// Compilation
// ─────────────────────────────────────────────────────────────────

type SimpleKind = "Set" | "Select" | "SelectAll" | "Filter" | "Drop" | "Add" | "Subtract";

const SIMPLE_OPS: Readonly<Record<SimpleKind, Instr>> = {
  Set: { op: "Set" },
  Select: { op: "Select" },
  SelectAll: { op: "SelectAll" },
  Filter: { op: "Filter" },
  Drop: { op: "Drop" },
  Add: { op: "Add" },
  Subtract: { op: "Subtract" },
};

/**
 * Compile a token stream into a flat program.
 *
 * `range N do ... end` becomes `Range{count: N, end}` followed by the body and
 * a `Jump` back to the `Range`; `end` points one past that `Jump`.
 */
export function compile(tokens: readonly Token[], rows: RowIdPort): Program {
  const ctx: BytecodeContext = { code: [], locations: [], scopes: [], rows };

  emit(ctx, { op: "Start" });

  for (let i = 0; i < tokens.length; i++) {
    const t = tokens[i];
    const loc = locOf(t);

    switch (t.kind) {
      case "String":
        emit(ctx, { op: "Push", value: VText(t.word.slice(1, -1)) }, loc);
        break;
      case "Int":
        emit(ctx, { op: "Push", value: VInteger(BigInt(t.word)) }, loc);
        break;
      case "Float": {
        const n = Number(t.word);
        if (!Number.isFinite(n)) {
          throw new CompileError(`float literal \`${t.word}\` at ${at(loc)} is out of range`, loc);
        }
        emit(ctx, { op: "Push", value: VFloat(n) }, loc);
        break;
      }
      case "Identity":
        emit(ctx, { op: "Push", value: VIdentity(parseIdentity(t, ctx.rows)) }, loc);
        break;

      case "Set":
      case "Select":
      case "SelectAll":
      case "Filter":
      case "Drop":
      case "Add":
      case "Subtract":
        emit(ctx, SIMPLE_OPS[t.kind], loc);
        break;

      case "It":
        if (ctx.scopes.length === 0) {
          throw new CompileError(`\`it\` used outside of a range block at ${at(loc)}`, loc);
        }
        emit(ctx, { op: "It" }, loc);
        break;

      case "Range": {
        const bound = tokens[i + 1];
        if (bound === undefined || bound.kind !== "Int") {
          const found = bound === undefined ? "end of input" : `\`${bound.word}\``;
          throw new CompileError(
            `\`range\` at ${at(loc)} must be followed by an integer bound, found ${found}`,
            loc
          );
        }
        ctx.scopes.push(currentIP(ctx));
        emit(ctx, { op: "Range", count: BigInt(bound.word), end: 0 }, loc);
        i++;
        break;
      }

      case "Do":
        break;

      case "End": {
        const start = ctx.scopes.pop();
        if (start === undefined) {
          throw new CompileError(`unmatched \`end\` at ${at(loc)}`, loc);
        }
        const range = ctx.code[start];
        if (range.op !== "Range") {
          throw new Error("compile: scope does not point at a range");
        }
        ctx.code[start] = { ...range, end: currentIP(ctx) + 1 };
        emit(ctx, { op: "Jump", target: start }, loc);
        break;
      }

      case "Word":
        if (t.word.startsWith("@")) {
          throw new CompileError(
            `malformed identity \`${t.word}\` at ${at(loc)}: expected exactly one ':' between table and row`,
            loc
          );
        }
        throw new CompileError(`unknown word \`${t.word}\` at ${at(loc)}`, loc);
    }
  }

  const open = ctx.scopes.pop();
  if (open !== undefined) {
    const loc = ctx.locations[open];
    const where = loc ? ` opened at ${at(loc)}` : "";
    throw new CompileError(`unclosed \`range\` block${where}: missing \`end\``, loc);
  }

  emit(ctx, { op: "End" });

  return { code: ctx.code, locations: ctx.locations };
}

/**
 * Tokenize and compile query text.
 */
export function compileText(src: string, rows: RowIdPort): Program {
  return compile(tokenize(src), rows);
}
