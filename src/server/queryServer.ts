/**
 * Query Server - HTTP + WebSocket front end for the query engine
 *
 * - Any HTTP request except GET /health carries one query: the first line of
 *   at most `maxQueryBytes` of its body. The reply always has status 200.
 * - Each WebSocket text message on /ws is one query; the reply is the same
 *   JSON body the HTTP route sends.
 */

import express, { type Request, type Response, type NextFunction } from 'express';
import { WebSocketServer, WebSocket, type RawData } from 'ws';
import { createServer } from 'http';
import type { Readable } from 'stream';
import type { IQueryService, HealthReport } from './queryService';
import { QueryEngine, type QueryResponse } from '../core/engine/engine';
import { renderError } from '../core/engine/render';
import { errorMessage } from '../core/errors';
import { DEFAULT_CONFIG, type StackDbConfig } from '../core/config';

// ============================================================
// REQUEST FRAMING
// ============================================================

/**
 * First line of `text`, without its line terminator.
 */
export function firstLine(text: string): string {
  const nl = text.indexOf('\n');
  const line = nl < 0 ? text : text.slice(0, nl);
  return line.endsWith('\r') ? line.slice(0, -1) : line;
}

/**
 * Query text carried by a request body: the first line within the first
 * `maxBytes` bytes.
 */
export function queryFromBody(body: Buffer, maxBytes: number): string {
  return firstLine(body.subarray(0, maxBytes).toString('utf8'));
}

/**
 * Read at most `maxBytes` of a request body and return the query line.
 * Anything past the limit is drained and discarded.
 */
export function readQueryLine(stream: Readable, maxBytes: number): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;
    let settled = false;

    const finish = () => {
      if (settled) return;
      settled = true;
      stream.off('data', onData);
      stream.resume();
      resolve(queryFromBody(Buffer.concat(chunks), maxBytes));
    };

    const onData = (chunk: Buffer | string) => {
      const buf = typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : chunk;
      chunks.push(buf);
      size += buf.length;
      if (size >= maxBytes) finish();
    };

    stream.on('data', onData);
    stream.once('end', finish);
    stream.once('error', (e) => {
      if (settled) return;
      settled = true;
      reject(e);
    });
  });
}

function rawDataToBuffer(data: RawData): Buffer {
  if (Buffer.isBuffer(data)) return data;
  if (Array.isArray(data)) return Buffer.concat(data);
  return Buffer.from(data);
}

// ============================================================
// QUERY SERVER IMPLEMENTATION
// ============================================================

export class QueryServer implements IQueryService {
  private app: express.Application;
  private server: ReturnType<typeof createServer>;
  private wss: WebSocketServer;
  private readonly config: StackDbConfig;

  constructor(
    private readonly engine: QueryEngine = new QueryEngine(),
    config: StackDbConfig = DEFAULT_CONFIG
  ) {
    this.config = config;
    this.app = express();
    this.app.use(this.corsMiddleware);

    this.server = createServer(this.app);
    this.wss = new WebSocketServer({ server: this.server, path: '/ws' });

    this.setupRoutes();
    this.setupWebSocket();
  }

  // ─────────────────────────────────────────────────────────────
  // MIDDLEWARE
  // ─────────────────────────────────────────────────────────────

  private corsMiddleware = (req: Request, res: Response, next: NextFunction) => {
    res.header('Access-Control-Allow-Origin', '*');
    res.header('Access-Control-Allow-Methods', 'GET, POST, PUT, OPTIONS');
    res.header('Access-Control-Allow-Headers', 'Content-Type');
    if (req.method === 'OPTIONS') {
      res.sendStatus(200);
      return;
    }
    next();
  };

  // ─────────────────────────────────────────────────────────────
  // HTTP ROUTES
  // ─────────────────────────────────────────────────────────────

  private setupRoutes() {
    const app = this.app;

    app.get('/health', async (_req, res) => {
      try {
        res.json(await this.health());
      } catch (e) {
        console.error('health check failed:', e);
        res.status(500).json({ status: 'error', message: errorMessage(e) });
      }
    });

    // Everything else is a query.
    app.use(async (req, res) => {
      const body = await this.handleHttp(req);
      res.status(200).type('application/json').send(body);
    });
  }

  /**
   * Read the query out of a request body and produce the response body.
   */
  async handleHttp(req: Readable): Promise<string> {
    try {
      const query = await readQueryLine(req, this.config.server.maxQueryBytes);
      return (await this.execute(query)).body;
    } catch (e) {
      console.error('query request failed:', e);
      return renderError(`internal error: ${errorMessage(e)}`);
    }
  }

  // ─────────────────────────────────────────────────────────────
  // WEBSOCKET
  // ─────────────────────────────────────────────────────────────

  private setupWebSocket() {
    this.wss.on('connection', (ws: WebSocket) => {
      ws.on('message', async (data: RawData) => {
        const body = await this.handleMessage(data);
        if (ws.readyState === WebSocket.OPEN) {
          ws.send(body);
        }
      });
    });
  }

  /**
   * Produce the reply to one WebSocket message.
   */
  async handleMessage(data: RawData): Promise<string> {
    try {
      const query = queryFromBody(rawDataToBuffer(data), this.config.server.maxQueryBytes);
      return (await this.execute(query)).body;
    } catch (e) {
      console.error('websocket query failed:', e);
      return renderError(`internal error: ${errorMessage(e)}`);
    }
  }

  // ─────────────────────────────────────────────────────────────
  // SERVICE IMPLEMENTATION
  // ─────────────────────────────────────────────────────────────

  async execute(query: string): Promise<QueryResponse> {
    const response = await this.engine.run(query);

    if (response.tag === 'Fail' && response.internal) {
      console.error(`internal error running \`${query}\`:`, response.cause);
    }
    if (this.config.log.verbose) {
      const outcome = response.tag === 'Done' ? `OK ${response.records} record(s)` : `FAIL ${response.message}`;
      console.log(`[query] ${response.durationMs}ms ${outcome} :: ${query}`);
    }
    return response;
  }

  async health(): Promise<HealthReport> {
    const stats = await this.engine.stats();
    return { status: 'ok', tables: stats.tables, records: stats.records, waiting: stats.lock.waiting };
  }

  // ─────────────────────────────────────────────────────────────
  // SERVER LIFECYCLE
  // ─────────────────────────────────────────────────────────────

  start(): Promise<void> {
    const { host, port } = this.config.server;
    return new Promise((resolve, reject) => {
      this.server.once('error', reject);
      this.server.listen(port, host, () => {
        this.server.off('error', reject);
        console.log(`\nstackdb listening on http://${host}:${port}`);
        console.log(`   WebSocket: ws://${host}:${port}/ws`);
        console.log(`   Health: http://${host}:${port}/health\n`);
        resolve();
      });
    });
  }

  stop(): Promise<void> {
    return new Promise((resolve, reject) => {
      for (const client of this.wss.clients) {
        client.terminate();
      }
      this.wss.close();
      this.server.close((err) => (err ? reject(err) : resolve()));
    });
  }
}
