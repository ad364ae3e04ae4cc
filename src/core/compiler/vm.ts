// src/core/compiler/vm.ts
// Stack VM executing compiled queries against the record store

import type { RecordIdentity, Value, ValueTag } from "../eval/values";
import { VIdentity, VInteger, formatIdentity, showValue } from "../eval/values";
import type { Database } from "../store/database";
import { PREDICATE_NAMES, lookupPredicate } from "../store/database";
import { ExecutionError } from "../errors";
import type { Instr, Opcode, Program } from "./types";

// ─────────────────────────────────────────────────────────────────
// VM State
// ─────────────────────────────────────────────────────────────────

export type VMState = {
  /** Operand stack, top at the end */
  stack: Value[];
  /** Index of the next instruction */
  ip: number;
  /** Iterator register; one for the whole program, shared by nested ranges */
  it: bigint;
  /** Remaining iterations per `Range`, keyed by instruction index */
  loops: Map<number, bigint>;
  /** Identities selected so far, in selection order */
  result: RecordIdentity[];
};

export function createVMState(): VMState {
  return {
    stack: [],
    ip: 0,
    it: 0n,
    loops: new Map(),
    result: [],
  };
}

/** Keyword each instruction is written as, for error messages. */
const KEYWORD: Record<Opcode, string> = {
  Start: "start",
  End: "end",
  Push: "push",
  Set: "set",
  Select: "select",
  SelectAll: "select_all",
  Filter: "filter",
  Drop: "drop",
  Add: "+",
  Subtract: "-",
  It: "it",
  Range: "range",
  Jump: "jump",
};

// ─────────────────────────────────────────────────────────────────
// Stack helpers
// ─────────────────────────────────────────────────────────────────

function formatStack(stack: readonly Value[]): string {
  return `[${stack.map(showValue).join(", ")}]`;
}

function requireStack(state: VMState, instr: Instr, n: number): void {
  if (state.stack.length < n) {
    throw new ExecutionError(
      `stack underflow: \`${KEYWORD[instr.op]}\` needs at least ${n} value(s), stack is ${formatStack(state.stack)}`,
      state.ip
    );
  }
}

function pop(state: VMState): Value {
  const v = state.stack.pop();
  if (v === undefined) {
    throw new ExecutionError("stack underflow", state.ip);
  }
  return v;
}

function typeError(state: VMState, instr: Instr, v: Value, expected: ValueTag, what: string): ExecutionError {
  return new ExecutionError(
    `\`${KEYWORD[instr.op]}\`: ${what} must be ${expected}, got ${v.tag} ${showValue(v)}`,
    state.ip
  );
}

function expectIdentity(state: VMState, instr: Instr, v: Value): RecordIdentity {
  if (v.tag === "Identity") return v.id;
  throw typeError(state, instr, v, "Identity", "record id");
}

function expectText(state: VMState, instr: Instr, v: Value, what: string): string {
  if (v.tag === "Text") return v.s;
  throw typeError(state, instr, v, "Text", what);
}

function expectInteger(state: VMState, instr: Instr, v: Value, what: string): bigint {
  if (v.tag === "Integer") return v.n;
  throw typeError(state, instr, v, "Integer", what);
}

// ─────────────────────────────────────────────────────────────────
// VM Execution
// ─────────────────────────────────────────────────────────────────

function requireTable(state: VMState, db: Database, instr: Instr, table: string): void {
  if (!db.getTable(table)) {
    throw new ExecutionError(`\`${KEYWORD[instr.op]}\`: table \`${table}\` not found`, state.ip);
  }
}

/**
 * Execute the instruction at `state.ip`. Returns false once the program has
 * run off its end.
 */
export function step(state: VMState, program: Program, db: Database): boolean {
  const instr = program.code[state.ip];
  if (instr === undefined) {
    return false;
  }

  switch (instr.op) {
    case "Start":
    case "End":
      state.ip++;
      break;

    case "Push":
      state.stack.push(instr.value);
      state.ip++;
      break;

    case "Set": {
      requireStack(state, instr, 3);
      const value = pop(state);
      const key = expectText(state, instr, pop(state), "key");
      const id = expectIdentity(state, instr, pop(state));
      db.upsert(id, key, value);
      state.stack.push(VIdentity(id));
      state.ip++;
      break;
    }

    case "Select": {
      requireStack(state, instr, 1);
      const id = expectIdentity(state, instr, pop(state));
      requireTable(state, db, instr, id.table);
      const record = db.getRecord(id);
      if (!record) {
        throw new ExecutionError(`\`select\`: record \`${formatIdentity(id)}\` not found`, state.ip);
      }
      state.result.push(record.id);
      state.ip++;
      break;
    }

    case "SelectAll": {
      requireStack(state, instr, 1);
      const id = expectIdentity(state, instr, pop(state));
      requireTable(state, db, instr, id.table);
      for (const record of db.getTable(id.table)?.values() ?? []) {
        state.result.push(record.id);
      }
      state.ip++;
      break;
    }

    case "Filter": {
      requireStack(state, instr, 4);
      const name = expectText(state, instr, pop(state), "predicate");
      const value = pop(state);
      const key = expectText(state, instr, pop(state), "key");
      const id = expectIdentity(state, instr, pop(state));

      const predicate = lookupPredicate(name);
      if (!predicate) {
        throw new ExecutionError(
          `\`filter\`: unknown predicate \`${name}\`, expected one of ${PREDICATE_NAMES.join(" ")}`,
          state.ip
        );
      }
      requireTable(state, db, instr, id.table);

      for (const row of db.scanFilter(id.table, key, predicate, value)) {
        const record = db.getRecord({ table: id.table, row });
        if (record) state.result.push(record.id);
      }
      state.ip++;
      break;
    }

    case "Drop":
      requireStack(state, instr, 1);
      pop(state);
      state.ip++;
      break;

    case "Add":
    case "Subtract": {
      requireStack(state, instr, 2);
      const b = expectInteger(state, instr, pop(state), "right operand");
      const a = expectInteger(state, instr, pop(state), "left operand");
      state.stack.push(VInteger(instr.op === "Add" ? a + b : a - b));
      state.ip++;
      break;
    }

    case "It":
      state.stack.push(VInteger(state.it));
      state.ip++;
      break;

    case "Range": {
      const remaining = state.loops.get(state.ip) ?? instr.count;
      if (remaining > 0n) {
        state.it = remaining;
        state.loops.set(state.ip, remaining - 1n);
        state.ip++;
      } else {
        state.ip = instr.end;
      }
      break;
    }

    case "Jump":
      state.ip = instr.target;
      break;
  }

  return true;
}

/**
 * Run a program to completion and return the selected identities.
 *
 * The first failing instruction aborts the run; writes made before it stay
 * in the database.
 */
export function execute(db: Database, program: Program, state: VMState = createVMState()): RecordIdentity[] {
  while (step(state, program, db)) {
    // keep stepping
  }
  return state.result;
}

