// src/core/engine/engine.ts
// Query engine: compile outside the lock, execute and render inside it

import { compileText } from "../compiler/bytecode";
import { execute } from "../compiler/vm";
import type { Program } from "../compiler/types";
import type { MutexStats } from "../concurrency/mutex";
import { Mutex } from "../concurrency/mutex";
import { errorMessage, isQueryError } from "../errors";
import type { Database, DatabaseStats, DbRecord } from "../store/database";
import { InMemoryDatabase } from "../store/database";
import type { RowIdPort } from "../../ports/rng";
import { SeededRowIdSource } from "../../ports/rng";
import { renderError, renderOk } from "./render";

// ─────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────

export type QueryDone = {
  readonly tag: "Done";
  /** Response JSON */
  readonly body: string;
  readonly records: number;
  readonly durationMs: number;
};

export type QueryFail = {
  readonly tag: "Fail";
  /** Response JSON */
  readonly body: string;
  readonly message: string;
  /** True when the failure is not a compile or execution error */
  readonly internal: boolean;
  readonly cause: unknown;
  readonly durationMs: number;
};

export type QueryResponse = QueryDone | QueryFail;

export type QueryEngineOptions = {
  db?: Database;
  rows?: RowIdPort;
  lock?: Mutex;
};

export type EngineStats = DatabaseStats & {
  lock: MutexStats;
};

// ─────────────────────────────────────────────────────────────────
// Engine
// ─────────────────────────────────────────────────────────────────

/**
 * Owns the process-wide database, its lock and the row-id generator.
 *
 * Every program holds the lock from the start of execution until its
 * response has been rendered, so programs never interleave.
 */
export class QueryEngine {
  readonly db: Database;
  private readonly rows: RowIdPort;
  private readonly lock: Mutex;

  constructor(options: QueryEngineOptions = {}) {
    this.db = options.db ?? new InMemoryDatabase();
    this.rows = options.rows ?? new SeededRowIdSource();
    this.lock = options.lock ?? new Mutex("database");
  }

  /**
   * Compile query text. Does not touch the database.
   */
  compile(text: string): Program {
    return compileText(text, this.rows);
  }

  async run(text: string): Promise<QueryResponse> {
    const startedAt = Date.now();

    let program: Program;
    try {
      program = this.compile(text);
    } catch (e) {
      return fail(e, startedAt);
    }

    return this.lock.runExclusive<QueryResponse>(() => {
      try {
        const ids = execute(this.db, program);
        const records = ids.flatMap((id): DbRecord[] => {
          const record = this.db.getRecord(id);
          return record ? [record] : [];
        });
        return {
          tag: "Done",
          body: renderOk(records),
          records: records.length,
          durationMs: Date.now() - startedAt,
        };
      } catch (e) {
        return fail(e, startedAt);
      }
    });
  }

  async stats(): Promise<EngineStats> {
    const lock = this.lock.stats();
    const db = await this.lock.runExclusive(() => this.db.stats());
    return { ...db, lock };
  }
}

function fail(e: unknown, startedAt: number): QueryFail {
  const internal = !isQueryError(e);
  const reason = errorMessage(e);
  const message = internal ? `internal error: ${reason}` : reason;
  return {
    tag: "Fail",
    body: renderError(message),
    message,
    internal,
    cause: e,
    durationMs: Date.now() - startedAt,
  };
}
