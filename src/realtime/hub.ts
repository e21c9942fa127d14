/**
 * Match Hub
 *
 * Single authority over which connections watch which match, and the
 * fan-out path that delivers each event to them.
 *
 * Registry mutations and fan-out reads run as synchronous critical
 * sections on the event loop, so register, unregister and broadcast are
 * mutually exclusive without a lock, and none of them ever awaits
 * connection I/O: delivery is a non-blocking enqueue, and a viewer whose
 * queue is full is evicted instead of waited on.
 */

import { moduleLogger } from '../core/logger.js';
import type { Logger } from '../core/logger.js';
import { toError } from '../errors/index.js';
import { createEnvelope } from '../models/messages.js';
import type { BroadcastMessage, MatchId, MessageDataMap, MessageType } from '../models/messages.js';
import { AsyncQueue } from '../util/asyncQueue.js';
import type { Connection, ConnectionOwner } from './connection.js';

export interface HubOptions {
  /** Events buffered between producers (the bridge) and the dispatch loop */
  intakeSize: number;
  logger?: Logger;
}

export interface BroadcastResult {
  /** Connections that received the payload */
  delivered: number;
  /** Connections evicted because their queue was full */
  evicted: number;
}

export class Hub implements ConnectionOwner {
  private readonly clients = new Map<MatchId, Set<Connection>>();
  private readonly intake: AsyncQueue<BroadcastMessage>;
  private readonly log: Logger;

  constructor(opts: HubOptions) {
    this.intake = new AsyncQueue<BroadcastMessage>(opts.intakeSize);
    this.log = opts.logger ?? moduleLogger('hub');
  }

  /**
   * Adds a connection to its match's set. Registering twice is a no-op, and
   * a connection whose queue is closed (already unregistered) is refused.
   */
  register(conn: Connection): void {
    if (conn.queueClosed) {
      this.log.warn({ matchId: conn.matchId, connId: conn.id }, 'Refusing to register closed connection');
      return;
    }
    let clients = this.clients.get(conn.matchId);
    if (!clients) {
      clients = new Set();
      this.clients.set(conn.matchId, clients);
    }
    if (clients.has(conn)) return;
    clients.add(conn);
    this.log.info({ matchId: conn.matchId, connId: conn.id, totalClients: clients.size }, 'Client registered');
  }

  /**
   * Removes a connection and closes its outbound queue. Safe to repeat:
   * only the first call for a registered connection has an effect.
   *
   * @returns true if the connection was registered
   */
  unregister(conn: Connection): boolean {
    const clients = this.clients.get(conn.matchId);
    if (!clients || !clients.delete(conn)) return false;
    conn.closeQueue();
    if (clients.size === 0) {
      this.clients.delete(conn.matchId);
    }
    this.log.info({ matchId: conn.matchId, connId: conn.id, totalClients: clients.size }, 'Client unregistered');
    return true;
  }

  /**
   * Serializes the message once and queues it on every connection watching
   * its match. Connections whose queue is full are evicted.
   */
  broadcast(message: BroadcastMessage): BroadcastResult {
    const result: BroadcastResult = { delivered: 0, evicted: 0 };
    const clients = this.clients.get(message.match_id);
    if (!clients) {
      this.log.debug({ matchId: message.match_id, type: message.type }, 'No subscribers, dropping message');
      return result;
    }

    const payload = JSON.stringify(message);
    // copy: evictions mutate the set
    for (const conn of [...clients]) {
      if (conn.enqueue(payload)) {
        result.delivered++;
        continue;
      }
      this.log.warn({ matchId: conn.matchId, connId: conn.id, pending: conn.pending }, 'Slow consumer evicted');
      this.unregister(conn);
      result.evicted++;
    }
    return result;
  }

  /**
   * Queues a message for the dispatch loop, waiting while the intake is full
   */
  submit(message: BroadcastMessage): Promise<void> {
    return this.intake.put(message);
  }

  /**
   * Stamps a payload with the current time and submits it. The stamp
   * replaces any timestamp already in `data`.
   */
  broadcastToMatch<K extends MessageType>(matchId: MatchId, type: K, data: MessageDataMap[K]): Promise<void> {
    const timestamp = new Date().toISOString();
    return this.submit(createEnvelope(type, matchId, timestamp, { ...data, timestamp }));
  }

  /**
   * Dispatch loop: drains the intake into `broadcast` until `signal` aborts
   */
  async run(signal: AbortSignal): Promise<void> {
    this.log.info('Hub dispatch started');
    while (!signal.aborted) {
      const message = await this.intake.take(signal);
      if (message === undefined) break;
      try {
        this.broadcast(message);
      } catch (err) {
        this.log.error({ err: toError(err), matchId: message.match_id }, 'Broadcast failed');
      }
    }
    this.intake.close();
    this.log.info('Hub shutting down');
  }

  clientCount(matchId: MatchId): number {
    return this.clients.get(matchId)?.size ?? 0;
  }

  matchCount(): number {
    return this.clients.size;
  }

  matchIds(): MatchId[] {
    return [...this.clients.keys()];
  }

  totalClients(): number {
    let total = 0;
    for (const clients of this.clients.values()) total += clients.size;
    return total;
  }
}
