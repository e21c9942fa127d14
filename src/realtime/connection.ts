/**
 * Viewer Connection
 *
 * Adapts one WebSocket into two independent loops:
 * - reader: only watches for liveness (pongs, small control frames) and
 *   enforces the inbound size limit and read deadline
 * - writer: drains the outbound queue to the socket and sends keepalive pings
 *
 * The two loops share nothing but the outbound queue. Any failure on either
 * side hands the connection back to its owner for unregistration.
 */

import { randomUUID } from 'crypto';
import { CLOSE_CODES } from '../core/constants.js';
import { moduleLogger } from '../core/logger.js';
import type { Logger } from '../core/logger.js';
import type { MatchId } from '../models/messages.js';
import { AsyncQueue } from '../util/asyncQueue.js';

/** Frame payload as delivered by `ws` */
export type RawFrame = Buffer | ArrayBuffer | Buffer[];

/**
 * The subset of a `ws` WebSocket a connection needs
 */
export interface Transport {
  send(data: string, cb?: (err?: Error) => void): void;
  ping(): void;
  close(code?: number, reason?: string): void;
  terminate(): void;
  on(event: 'message', listener: (data: RawFrame) => void): unknown;
  on(event: 'pong' | 'ping' | 'close', listener: () => void): unknown;
  on(event: 'error', listener: (err: Error) => void): unknown;
}

/**
 * Whoever owns the connection's registry membership (the hub)
 */
export interface ConnectionOwner {
  unregister(conn: Connection): void;
}

export interface ConnectionOptions {
  matchId: MatchId;
  userId?: number;
  sendQueueSize: number;
  writeWaitMs: number;
  pongWaitMs: number;
  pingPeriodMs: number;
  maxMessageSize: number;
  logger?: Logger;
}

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => { resolve = r; });
  return { promise, resolve };
}

function frameSize(data: RawFrame): number {
  if (Array.isArray(data)) return data.reduce((sum, chunk) => sum + chunk.length, 0);
  return data.byteLength;
}

export class Connection {
  readonly id = randomUUID();
  readonly matchId: MatchId;
  readonly userId?: number;
  lastActivity = Date.now();

  /** Settles once the reader and writer have both stopped */
  readonly done: Promise<void>;

  private readonly queue: AsyncQueue<string>;
  private readonly log: Logger;
  private readDeadline: NodeJS.Timeout | undefined;
  private pingTimer: NodeJS.Timeout | undefined;
  private readerStopped = false;
  private started = false;
  private readonly reader = deferred();
  private readonly writer = deferred();

  constructor(
    private readonly transport: Transport,
    private readonly owner: ConnectionOwner,
    private readonly opts: ConnectionOptions
  ) {
    if (opts.pingPeriodMs >= opts.pongWaitMs) {
      throw new RangeError('pingPeriodMs must be shorter than pongWaitMs');
    }
    this.matchId = opts.matchId;
    this.userId = opts.userId;
    this.queue = new AsyncQueue<string>(opts.sendQueueSize);
    this.log = (opts.logger ?? moduleLogger('connection')).child({ matchId: opts.matchId, connId: this.id });
    this.done = Promise.all([this.reader.promise, this.writer.promise]).then(() => undefined);
  }

  /** Messages waiting to be written */
  get pending(): number {
    return this.queue.size;
  }

  get queueClosed(): boolean {
    return this.queue.closed;
  }

  /**
   * Queues a serialized message without waiting
   *
   * @returns false when the queue is full (slow viewer) or already closed
   */
  enqueue(payload: string): boolean {
    return this.queue.offer(payload);
  }

  /**
   * Closes the outbound queue; the writer flushes what is buffered, then
   * sends a close frame
   *
   * @returns false if the queue was already closed
   */
  closeQueue(): boolean {
    return this.queue.close();
  }

  /**
   * Starts the reader and writer. Call once, after registering.
   */
  start(): void {
    if (this.started) return;
    this.started = true;
    this.startReader();
    this.runWriter().catch((err) => {
      this.log.error({ err }, 'Writer crashed');
    });
  }

  private startReader(): void {
    this.transport.on('pong', () => this.touch());
    this.transport.on('ping', () => this.touch());
    this.transport.on('message', (data) => {
      if (frameSize(data) > this.opts.maxMessageSize) {
        this.log.warn({ size: frameSize(data), limit: this.opts.maxMessageSize }, 'Inbound message too large');
        this.stopReader();
        this.owner.unregister(this);
        this.transport.terminate();
        return;
      }
      this.touch();
    });
    this.transport.on('error', (err) => {
      this.log.warn({ err }, 'Connection read error');
      this.stopReader();
      this.owner.unregister(this);
      this.transport.terminate();
    });
    this.transport.on('close', () => {
      this.log.debug('Connection closed by peer');
      this.stopReader();
      this.owner.unregister(this);
      // a connection that was never registered still needs its writer stopped
      this.queue.close();
    });
    this.armReadDeadline();
  }

  private touch(): void {
    if (this.readerStopped) return;
    this.lastActivity = Date.now();
    this.armReadDeadline();
  }

  private armReadDeadline(): void {
    clearTimeout(this.readDeadline);
    this.readDeadline = setTimeout(() => {
      this.log.info({ pongWaitMs: this.opts.pongWaitMs }, 'Read deadline exceeded');
      this.stopReader();
      this.owner.unregister(this);
      this.transport.terminate();
    }, this.opts.pongWaitMs);
  }

  private stopReader(): void {
    if (this.readerStopped) return;
    this.readerStopped = true;
    clearTimeout(this.readDeadline);
    this.reader.resolve();
  }

  private async runWriter(): Promise<void> {
    this.pingTimer = setInterval(() => this.sendPing(), this.opts.pingPeriodMs);
    try {
      for (;;) {
        const payload = await this.queue.take();
        if (payload === undefined) {
          this.transport.close(CLOSE_CODES.NORMAL);
          return;
        }
        await this.write(payload);
      }
    } catch (err) {
      this.log.warn({ err }, 'Connection write error');
      this.owner.unregister(this);
      this.transport.terminate();
    } finally {
      clearInterval(this.pingTimer);
      this.writer.resolve();
    }
  }

  private sendPing(): void {
    try {
      this.transport.ping();
    } catch (err) {
      this.log.warn({ err }, 'Keepalive ping failed');
      clearInterval(this.pingTimer);
      this.owner.unregister(this);
      this.transport.terminate();
    }
  }

  private write(payload: string): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const timer = setTimeout(() => {
        reject(new Error(`Write deadline of ${this.opts.writeWaitMs}ms exceeded`));
      }, this.opts.writeWaitMs);
      this.transport.send(payload, (err) => {
        clearTimeout(timer);
        if (err) reject(err);
        else resolve();
      });
    });
  }
}
