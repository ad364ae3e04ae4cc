// src/index.ts
// stackdb - Public API
//
// Embeddable engine, compiler pieces, and the network front end.

// ═══════════════════════════════════════════════════════════════════════════════
// ENGINE
// ═══════════════════════════════════════════════════════════════════════════════

export {
  QueryEngine,
  type QueryEngineOptions,
  type QueryResponse,
  type QueryDone,
  type QueryFail,
  type EngineStats,
} from "./core/engine/engine";
export { renderOk, renderError, renderRecord, renderValue } from "./core/engine/render";

// ═══════════════════════════════════════════════════════════════════════════════
// VALUES
// ═══════════════════════════════════════════════════════════════════════════════

export type { Value, RecordIdentity, ValueTag } from "./core/eval/values";
export {
  VIdentity,
  VInteger,
  VFloat,
  VText,
  identity,
  compareValues,
  valueEquals,
  formatIdentity,
  showValue,
} from "./core/eval/values";

// ═══════════════════════════════════════════════════════════════════════════════
// LEXER / COMPILER / VM
// ═══════════════════════════════════════════════════════════════════════════════

export { tokenize, classifyWord, type Token, type TokenKind } from "./core/reader/tokenize";
export { compile, compileText } from "./core/compiler/bytecode";
export { execute, step, createVMState, type VMState } from "./core/compiler/vm";
export { formatProgram, formatInstr } from "./core/compiler/listing";
export type { Instr, Opcode, Program, SourceLocation } from "./core/compiler/types";

// ═══════════════════════════════════════════════════════════════════════════════
// STORAGE
// ═══════════════════════════════════════════════════════════════════════════════

export {
  InMemoryDatabase,
  lookupPredicate,
  PREDICATE_NAMES,
  type Database,
  type DatabaseStats,
  type DbRecord,
  type Table,
  type Predicate,
} from "./core/store/database";
export { Mutex, type Release, type MutexStats } from "./core/concurrency/mutex";
export { SeededRowIdSource, SequentialRowIdSource, type RowIdPort } from "./ports/rng";

// ═══════════════════════════════════════════════════════════════════════════════
// ERRORS & CONFIG
// ═══════════════════════════════════════════════════════════════════════════════

export { QueryError, CompileError, ExecutionError, isQueryError, errorMessage } from "./core/errors";
export * from "./core/config";

// ═══════════════════════════════════════════════════════════════════════════════
// SERVER
// ═══════════════════════════════════════════════════════════════════════════════

export { QueryServer, startQueryServer, type IQueryService, type HealthReport } from "./server";
