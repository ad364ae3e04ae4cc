/**
 * Query Service - contract between the network transports and the engine
 *
 * Every transport (HTTP, WebSocket, REPL) turns its input into one line of
 * query text, runs it through `execute`, and writes back the rendered body.
 * Logical failures never change the transport status; they live in the
 * `message` field of the body.
 */

import type { QueryResponse } from '../core/engine/engine';

// ============================================================
// SERVICE TYPES
// ============================================================

/**
 * Reply to GET /health
 */
export interface HealthReport {
  status: 'ok';
  tables: number;
  records: number;
  /** Programs waiting for the database lock */
  waiting: number;
}

// ============================================================
// SERVICE INTERFACE
// ============================================================

export interface IQueryService {
  /** Compile and run one program, holding the database lock while it executes */
  execute(query: string): Promise<QueryResponse>;

  health(): Promise<HealthReport>;
}
