// src/core/errors.ts
// Error classes raised while compiling or executing a query

import type { SourceLocation } from "./compiler/types";

export class QueryError extends Error {
  constructor(message: string, public readonly code: string) {
    super(message);
    this.name = "QueryError";
  }
}

/**
 * Raised by the compiler. `loc` points at the offending token when there is
 * one; errors detected at end of input carry no location.
 */
export class CompileError extends QueryError {
  constructor(
    message: string,
    public readonly loc?: SourceLocation
  ) {
    super(message, "COMPILE_ERROR");
    this.name = "CompileError";
  }
}

/**
 * Raised by the VM. `ip` is the index of the instruction that failed.
 */
export class ExecutionError extends QueryError {
  constructor(
    message: string,
    public readonly ip: number
  ) {
    super(message, "EXECUTION_ERROR");
    this.name = "ExecutionError";
  }
}

export function isQueryError(e: unknown): e is QueryError {
  return e instanceof QueryError;
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
