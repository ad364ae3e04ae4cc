// src/core/compiler/types.ts
// Bytecode instruction set and program representation

import type { Value } from "../eval/values";

// ─────────────────────────────────────────────────────────────────
// Source Location
// ─────────────────────────────────────────────────────────────────

/**
 * Source location in the query text.
 */
export type SourceLocation = {
  /** Line number (1-based) */
  line: number;
  /** Column number (1-based) */
  column: number;
};

// ─────────────────────────────────────────────────────────────────
// Instructions
// ─────────────────────────────────────────────────────────────────

/**
 * One VM instruction.
 *
 * `Range.count` is the iteration count written in the query; the VM keeps the
 * remaining count in its own loop-state table, so a program is never mutated
 * by running it. `Range.end` is the index execution continues at once the
 * loop is exhausted.
 */
export type Instr =
  | { op: "Start" }
  | { op: "End" }
  | { op: "Push"; value: Value }
  | { op: "Set" }
  | { op: "Select" }
  | { op: "SelectAll" }
  | { op: "Filter" }
  | { op: "Drop" }
  | { op: "Add" }
  | { op: "Subtract" }
  | { op: "It" }
  | { op: "Range"; count: bigint; end: number }
  | { op: "Jump"; target: number };

export type Opcode = Instr["op"];

/**
 * A compiled query.
 */
export type Program = {
  readonly code: readonly Instr[];
  /** Source position of each instruction; absent for the sentinels */
  readonly locations: ReadonlyArray<SourceLocation | undefined>;
};
