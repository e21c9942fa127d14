/**
 * Subscription Server
 *
 * HTTP server whose only real job is upgrading `GET /ws/matches/:id` to a
 * WebSocket and handing the socket to the hub. A rejected upgrade writes an
 * HTTP error and destroys the socket without touching the hub.
 */

import { createServer } from 'http';
import type { IncomingMessage, Server, ServerResponse } from 'http';
import type { Duplex } from 'stream';
import { WebSocketServer } from 'ws';
import type { Config } from '../core/config.js';
import { CLOSE_CODES } from '../core/constants.js';
import { moduleLogger } from '../core/logger.js';
import type { Logger } from '../core/logger.js';
import { ValidationError } from '../errors/index.js';
import type { MatchId } from '../models/messages.js';
import { parseMatchId } from '../util/validation.js';
import { Connection } from './connection.js';
import type { Transport } from './connection.js';
import type { Hub } from './hub.js';

export interface SubscriptionTarget {
  matchId: MatchId;
  userId?: number;
}

export type UpgradeRoute =
  | { ok: true; target: SubscriptionTarget }
  | { ok: false; status: 400 | 404; error: string };

const SUBSCRIPTION_PATH = /^\/ws\/matches\/([^/]+)\/?$/;

const STATUS_TEXT: Record<number, string> = {
  400: 'Bad Request',
  404: 'Not Found'
};

/**
 * Resolves a request URL to the match it subscribes to
 */
export function resolveUpgradeRoute(rawUrl: string): UpgradeRoute {
  const url = new URL(rawUrl, 'http://localhost');
  const m = SUBSCRIPTION_PATH.exec(url.pathname);
  if (!m) return { ok: false, status: 404, error: 'Not found' };

  let matchId: MatchId;
  try {
    matchId = parseMatchId(decodeURIComponent(m[1]));
  } catch (err) {
    if (err instanceof ValidationError || err instanceof URIError) {
      return { ok: false, status: 400, error: 'Invalid match ID' };
    }
    throw err;
  }

  const target: SubscriptionTarget = { matchId };
  const userId = url.searchParams.get('user_id');
  if (userId && /^\d+$/.test(userId) && Number(userId) > 0) {
    target.userId = Number(userId);
  }
  return { ok: true, target };
}

export interface SubscriptionServerOptions {
  hub: Hub;
  websocket: Config['websocket'];
  logger?: Logger;
}

export class SubscriptionServer {
  private readonly hub: Hub;
  private readonly websocket: Config['websocket'];
  private readonly log: Logger;
  private readonly wss: WebSocketServer;
  private readonly http: Server;

  constructor(opts: SubscriptionServerOptions) {
    this.hub = opts.hub;
    this.websocket = opts.websocket;
    this.log = opts.logger ?? moduleLogger('server');
    this.wss = new WebSocketServer({ noServer: true, maxPayload: opts.websocket.maxMessageSize });
    this.http = createServer((req, res) => this.handleRequest(req, res));
    this.http.on('upgrade', (req: IncomingMessage, socket: Duplex, head: Buffer) => this.handleUpgrade(req, socket, head));
  }

  listen(port: number, host: string): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      this.http.once('error', reject);
      this.http.listen(port, host, () => {
        this.http.off('error', reject);
        this.log.info({ host, port }, 'Subscription server listening');
        resolve();
      });
    });
  }

  /**
   * Stops accepting requests and tells open viewers the server is going away
   */
  close(): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      for (const ws of this.wss.clients) {
        ws.close(CLOSE_CODES.GOING_AWAY, 'Server shutting down');
      }
      this.wss.close();
      this.http.close((err) => {
        if (err) reject(err);
        else resolve();
      });
    });
  }

  handleUpgrade(req: IncomingMessage, socket: Duplex, head: Buffer): void {
    const route = resolveUpgradeRoute(req.url ?? '/');
    if (!route.ok) {
      this.log.debug({ url: req.url, status: route.status }, 'Rejected subscription upgrade');
      rejectUpgrade(socket, route.status, route.error);
      return;
    }
    this.wss.handleUpgrade(req, socket, head, (ws) => {
      this.accept(ws, route.target);
    });
  }

  /**
   * Wraps an upgraded socket in a connection, registers it and starts it
   */
  accept(transport: Transport, target: SubscriptionTarget): Connection {
    const conn = new Connection(transport, this.hub, {
      matchId: target.matchId,
      userId: target.userId,
      sendQueueSize: this.websocket.sendQueueSize,
      writeWaitMs: this.websocket.writeWaitMs,
      pongWaitMs: this.websocket.pongWaitMs,
      pingPeriodMs: this.websocket.pingPeriodMs,
      maxMessageSize: this.websocket.maxMessageSize
    });
    this.hub.register(conn);
    conn.start();
    return conn;
  }

  handleRequest(req: IncomingMessage, res: ServerResponse): void {
    const url = new URL(req.url ?? '/', 'http://localhost');
    if (req.method === 'GET' && url.pathname === '/health') {
      sendJson(res, 200, { status: 'ok', matches: this.hub.matchCount(), clients: this.hub.totalClients() });
      return;
    }
    const route = resolveUpgradeRoute(req.url ?? '/');
    if (route.ok) {
      sendJson(res, 426, { error: 'WebSocket upgrade required' });
      return;
    }
    sendJson(res, route.status, { error: route.error });
  }
}

function sendJson(res: ServerResponse, status: number, body: object): void {
  res.writeHead(status, { 'Content-Type': 'application/json' });
  res.end(JSON.stringify(body));
}

function rejectUpgrade(socket: Duplex, status: 400 | 404, error: string): void {
  const body = JSON.stringify({ error });
  socket.write(
    `HTTP/1.1 ${status} ${STATUS_TEXT[status]}\r\n` +
    'Connection: close\r\n' +
    'Content-Type: application/json\r\n' +
    `Content-Length: ${Buffer.byteLength(body)}\r\n` +
    '\r\n' +
    body
  );
  socket.destroy();
}
