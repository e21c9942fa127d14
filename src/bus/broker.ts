/**
 * Pub/Sub Broker Module
 *
 * Redis pub/sub carries live envelopes from publishers to every hub
 * instance. Publishing goes through the shared client; the pattern
 * subscription needs its own connection (a subscribed Redis connection
 * cannot run other commands).
 */

import { moduleLogger } from '../core/logger.js';
import type { Logger } from '../core/logger.js';
import { AsyncQueue } from '../util/asyncQueue.js';

/**
 * Publishing side of the broker (satisfied by an ioredis client)
 */
export interface PubSubBroker {
  /** @returns number of subscribers that received the message */
  publish(channel: string, message: string): Promise<number>;
}

export interface BrokerMessage {
  channel: string;
  payload: string;
}

/**
 * Receiving side of the broker, consumed one message at a time
 */
export interface BrokerSubscription {
  /**
   * Waits for the next message
   *
   * @returns undefined once the subscription is closed or `signal` aborts
   * @throws the transport error if the broker connection failed
   */
  next(signal?: AbortSignal): Promise<BrokerMessage | undefined>;
  close(): Promise<void>;
}

/**
 * The subset of an ioredis client used for a pattern subscription
 */
export interface PatternSubscriberClient {
  psubscribe(...patterns: string[]): Promise<unknown>;
  punsubscribe(...patterns: string[]): Promise<unknown>;
  on(event: 'pmessage', listener: (pattern: string, channel: string, message: string) => void): unknown;
  on(event: 'error', listener: (err: Error) => void): unknown;
  quit(): Promise<unknown>;
}

type Delivery =
  | { ok: true; message: BrokerMessage }
  | { ok: false; error: Error };

export interface SubscriptionOptions {
  /** Deliveries buffered between the Redis socket and the consumer */
  bufferSize: number;
  logger?: Logger;
}

/**
 * Pattern subscription over a dedicated ioredis connection
 *
 * `pmessage` and `error` events are buffered in arrival order, so a
 * transport error surfaces from `next` after the messages that preceded it.
 * ioredis emits an error per failed reconnect attempt; at most one of them
 * waits in the buffer at a time. ioredis reconnects and re-subscribes on
 * its own.
 */
export class RedisPatternSubscription implements BrokerSubscription {
  private readonly buffer: AsyncQueue<Delivery>;
  private readonly log: Logger;
  private opened = false;
  private errorQueued = false;
  dropped = 0;

  constructor(
    private readonly client: PatternSubscriberClient,
    readonly pattern: string,
    opts: SubscriptionOptions
  ) {
    this.buffer = new AsyncQueue<Delivery>(opts.bufferSize);
    this.log = opts.logger ?? moduleLogger('broker');
  }

  async open(): Promise<void> {
    if (this.opened) return;
    this.opened = true;
    this.client.on('pmessage', (_pattern, channel, payload) => {
      this.deliver({ ok: true, message: { channel, payload } });
    });
    this.client.on('error', (err) => {
      this.deliver({ ok: false, error: err });
    });
    await this.client.psubscribe(this.pattern);
    this.log.info({ pattern: this.pattern }, 'Subscribed to broker pattern');
  }

  async next(signal?: AbortSignal): Promise<BrokerMessage | undefined> {
    const delivery = await this.buffer.take(signal);
    if (!delivery) return undefined;
    if (!delivery.ok) {
      this.errorQueued = false;
      throw delivery.error;
    }
    return delivery.message;
  }

  async close(): Promise<void> {
    if (!this.buffer.close()) return;
    try {
      await this.client.punsubscribe(this.pattern);
      await this.client.quit();
    } catch (err) {
      this.log.warn({ err }, 'Error closing broker subscription');
    }
  }

  private deliver(delivery: Delivery): void {
    if (this.buffer.closed) return;
    // one pending error stands for a whole run of failed reconnects
    if (!delivery.ok && this.errorQueued) return;
    if (this.buffer.offer(delivery)) {
      if (!delivery.ok) this.errorQueued = true;
      return;
    }
    // pub/sub is at-most-once; a full buffer means the consumer is behind
    this.dropped++;
    this.log.warn({ pattern: this.pattern, dropped: this.dropped }, 'Subscription buffer full, dropping delivery');
  }
}

/**
 * Opens a pattern subscription on `client`
 */
export async function subscribePattern(
  client: PatternSubscriberClient,
  pattern: string,
  opts: SubscriptionOptions
): Promise<RedisPatternSubscription> {
  const subscription = new RedisPatternSubscription(client, pattern, opts);
  await subscription.open();
  return subscription;
}
