/**
 * @package stackdb server
 *
 * PUBLIC API for the network front end.
 *
 * TYPES:
 *   - IQueryService   - The service interface contract
 *   - HealthReport    - Reply to GET /health
 *
 * IMPLEMENTATION:
 *   - QueryServer        - The HTTP/WebSocket server
 *   - startQueryServer() - Quick start function
 */

export type { IQueryService, HealthReport } from './queryService';

export { QueryServer, readQueryLine, queryFromBody, firstLine } from './queryServer';

import { QueryServer } from './queryServer';
import { QueryEngine } from '../core/engine/engine';
import { DEFAULT_CONFIG, type StackDbConfig } from '../core/config';

/**
 * Start a query server with a fresh, empty database.
 *
 * @example
 * ```typescript
 * const server = await startQueryServer(loadConfig());
 * // POST a query to http://127.0.0.1:6060/
 * // or send it as a message on ws://127.0.0.1:6060/ws
 * ```
 */
export async function startQueryServer(config: StackDbConfig = DEFAULT_CONFIG): Promise<QueryServer> {
  const server = new QueryServer(new QueryEngine(), config);
  await server.start();
  return server;
}

// ============================================================
// PROTOCOL
// ============================================================

/**
 * # stackdb wire protocol
 *
 * ## HTTP
 * - GET /health  - { status, tables, records, waiting }
 * - any other    - body's first line (at most maxQueryBytes bytes) is the query
 *
 * Replies always have status 200:
 * - {"message":"OK","data":[{"id":"users:1","name":"ada"}]}
 * - {"message":"unknown word `selec` at line 1:9"}
 *
 * ## WebSocket
 * Connect to ws://HOST:PORT/ws. Every message is one query; the reply is the
 * same JSON body.
 */
