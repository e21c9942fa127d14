/**
 * In-process stand-ins for the WebSocket and Redis, so tests never touch
 * the network.
 */

import { EventEmitter } from 'events';
import type { Transport } from '../../src/realtime/connection.js';

/**
 * WebSocket stand-in. `send` completes synchronously unless told to fail
 * or hang.
 */
export class FakeSocket extends EventEmitter implements Transport {
  sent: string[] = [];
  pings = 0;
  closeCodes: Array<number | undefined> = [];
  terminated = false;
  sendMode: 'ok' | 'fail' | 'hang' = 'ok';
  failPing = false;

  send(data: string, cb?: (err?: Error) => void): void {
    if (this.sendMode === 'hang') return;
    if (this.sendMode === 'fail') {
      cb?.(new Error('socket not open'));
      return;
    }
    this.sent.push(data);
    cb?.();
  }

  ping(): void {
    if (this.failPing) throw new Error('socket not open');
    this.pings++;
  }

  close(code?: number): void {
    this.closeCodes.push(code);
  }

  terminate(): void {
    this.terminated = true;
  }

  /** Parsed JSON of every frame written so far */
  frames(): unknown[] {
    return this.sent.map(s => JSON.parse(s));
  }
}

function patternToRegExp(pattern: string): RegExp {
  const escaped = pattern.replace(/[.+?^${}()|[\]\\]/g, '\\$&').replace(/\*/g, '.*');
  return new RegExp(`^${escaped}$`);
}

/**
 * Shared Redis state: pub/sub fan-out, streams and plain keys
 */
export class FakeRedisServer {
  readonly subscribers = new Set<FakeRedisSubscriber>();
  readonly streams = new Map<string, Array<{ id: string; fields: string[] }>>();
  readonly keys = new Map<string, string>();
  readonly published: Array<{ channel: string; message: string }> = [];
  /** Command names in the order they ran */
  readonly calls: string[] = [];
  failXadd = false;
  failPublish = false;
  readonly failDel = new Set<string>();
  private seq = 0;

  async publish(channel: string, message: string): Promise<number> {
    this.calls.push('publish');
    if (this.failPublish) throw new Error('ECONNREFUSED');
    this.published.push({ channel, message });
    let receivers = 0;
    for (const sub of this.subscribers) receivers += sub.receive(channel, message);
    return receivers;
  }

  async xadd(key: string, id: string, ...fieldsAndValues: string[]): Promise<string | null> {
    this.calls.push('xadd');
    if (this.failXadd) throw new Error('ECONNREFUSED');
    const entryId = id === '*' ? `${++this.seq}-0` : id;
    const entries = this.streams.get(key) ?? [];
    entries.push({ id: entryId, fields: fieldsAndValues });
    this.streams.set(key, entries);
    return entryId;
  }

  async del(key: string): Promise<number> {
    this.calls.push('del');
    if (this.failDel.has(key)) throw new Error('READONLY');
    return this.keys.delete(key) ? 1 : 0;
  }
}

/**
 * Subscriber connection attached to a FakeRedisServer
 */
export class FakeRedisSubscriber extends EventEmitter {
  readonly patterns = new Set<string>();
  quitCalled = false;

  constructor(private readonly server: FakeRedisServer) {
    super();
  }

  async psubscribe(...patterns: string[]): Promise<number> {
    for (const p of patterns) this.patterns.add(p);
    this.server.subscribers.add(this);
    return this.patterns.size;
  }

  async punsubscribe(...patterns: string[]): Promise<number> {
    for (const p of patterns) this.patterns.delete(p);
    return this.patterns.size;
  }

  async quit(): Promise<'OK'> {
    this.quitCalled = true;
    this.server.subscribers.delete(this);
    return 'OK';
  }

  receive(channel: string, message: string): number {
    let receivers = 0;
    for (const pattern of this.patterns) {
      if (patternToRegExp(pattern).test(channel)) {
        this.emit('pmessage', pattern, channel, message);
        receivers++;
      }
    }
    return receivers;
  }
}
