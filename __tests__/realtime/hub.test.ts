import { describe, it, expect, vi } from 'vitest';
import { Connection } from '../../src/realtime/connection.js';
import { Hub } from '../../src/realtime/hub.js';
import { createEnvelope } from '../../src/models/messages.js';
import type { MatchId, MatchMessage } from '../../src/models/messages.js';
import { QueueClosedError } from '../../src/util/asyncQueue.js';
import { FakeSocket } from '../helpers/fakes.js';

const TIMESTAMP = '2024-05-01T18:30:00.000Z';

function goal(matchId: MatchId, minute = 10): MatchMessage {
  return createEnvelope('match_event', matchId, TIMESTAMP, {
    match_id: matchId,
    event_type: 'goal',
    minute,
    timestamp: TIMESTAMP
  });
}

function connection(hub: Hub, matchId: MatchId, sendQueueSize = 4): Connection {
  return new Connection(new FakeSocket(), hub, {
    matchId,
    sendQueueSize,
    writeWaitMs: 500,
    pongWaitMs: 1000,
    pingPeriodMs: 900,
    maxMessageSize: 512
  });
}

describe('Hub', () => {
  describe('register', () => {
    it('should add the connection to its match set', () => {
      const hub = new Hub({ intakeSize: 8 });
      const conn = connection(hub, 42);
      hub.register(conn);
      expect(hub.clientCount(42)).toBe(1);
      expect(hub.matchIds()).toEqual([42]);
    });

    it('should be idempotent', () => {
      const hub = new Hub({ intakeSize: 8 });
      const conn = connection(hub, 42);
      hub.register(conn);
      hub.register(conn);
      expect(hub.clientCount(42)).toBe(1);
      expect(hub.totalClients()).toBe(1);
    });
  });

  describe('unregister', () => {
    it('should remove the connection, close its queue and drop the empty set', () => {
      const hub = new Hub({ intakeSize: 8 });
      const conn = connection(hub, 42);
      hub.register(conn);

      expect(hub.unregister(conn)).toBe(true);
      expect(conn.queueClosed).toBe(true);
      expect(hub.clientCount(42)).toBe(0);
      expect(hub.matchCount()).toBe(0);
    });

    it('should be a no-op the second time', () => {
      const hub = new Hub({ intakeSize: 8 });
      const first = connection(hub, 42);
      const second = connection(hub, 42);
      hub.register(first);
      hub.register(second);

      expect(hub.unregister(first)).toBe(true);
      expect(hub.unregister(first)).toBe(false);
      expect(hub.clientCount(42)).toBe(1);
      expect(second.queueClosed).toBe(false);
    });

    it('should refuse to register a connection again once it was unregistered', () => {
      const hub = new Hub({ intakeSize: 8 });
      const conn = connection(hub, 42);
      hub.register(conn);
      hub.unregister(conn);

      hub.register(conn);
      expect(hub.clientCount(42)).toBe(0);
      expect(hub.matchCount()).toBe(0);
      expect(hub.broadcast(goal(42))).toEqual({ delivered: 0, evicted: 0 });
    });

    it('should ignore a connection that was never registered', () => {
      const hub = new Hub({ intakeSize: 8 });
      const conn = connection(hub, 42);
      expect(hub.unregister(conn)).toBe(false);
      expect(conn.queueClosed).toBe(false);
    });
  });

  describe('broadcast', () => {
    it('should deliver only to connections on the message match', () => {
      const hub = new Hub({ intakeSize: 8 });
      const c1 = connection(hub, 42);
      const c2 = connection(hub, 43);
      hub.register(c1);
      hub.register(c2);

      expect(hub.broadcast(goal(42))).toEqual({ delivered: 1, evicted: 0 });
      expect(c1.pending).toBe(1);
      expect(c2.pending).toBe(0);
    });

    it('should deliver to every viewer of the match', () => {
      const hub = new Hub({ intakeSize: 8 });
      const c1 = connection(hub, 42);
      const c2 = connection(hub, 42);
      hub.register(c1);
      hub.register(c2);

      expect(hub.broadcast(goal(42))).toEqual({ delivered: 2, evicted: 0 });
      expect(c1.pending).toBe(1);
      expect(c2.pending).toBe(1);
    });

    it('should do nothing when a match has no viewers', () => {
      const hub = new Hub({ intakeSize: 8 });
      expect(hub.broadcast(goal(99))).toEqual({ delivered: 0, evicted: 0 });
      expect(hub.matchCount()).toBe(0);
    });

    it('should evict a viewer whose queue is full without affecting others', () => {
      const hub = new Hub({ intakeSize: 8 });
      const slow = connection(hub, 42, 1);
      const fast = connection(hub, 42, 4);
      hub.register(slow);
      hub.register(fast);
      slow.enqueue('backlog');

      expect(hub.broadcast(goal(42))).toEqual({ delivered: 1, evicted: 1 });
      expect(slow.queueClosed).toBe(true);
      expect(fast.pending).toBe(1);
      expect(hub.clientCount(42)).toBe(1);
    });

    it('should drop the match set when its last viewer is evicted', () => {
      const hub = new Hub({ intakeSize: 8 });
      const slow = connection(hub, 42, 1);
      hub.register(slow);
      slow.enqueue('backlog');

      hub.broadcast(goal(42));
      expect(hub.matchCount()).toBe(0);
    });

    it('should keep per-match sets non-empty across any register/unregister sequence', () => {
      const hub = new Hub({ intakeSize: 8 });
      const pool = [42, 42, 43, 43, 44].map(matchId => connection(hub, matchId));
      let seed = 7;
      const nextIndex = () => {
        seed = (seed * 1103515245 + 12345) % 2147483648;
        return seed % pool.length;
      };

      for (let step = 0; step < 200; step++) {
        const index = nextIndex();
        if (step % 3 === 0) {
          hub.unregister(pool[index]);
        } else {
          // an unregistered connection is done; its viewer comes back as a new one
          if (pool[index].queueClosed) pool[index] = connection(hub, pool[index].matchId);
          hub.register(pool[index]);
        }
        for (const matchId of hub.matchIds()) {
          expect(hub.clientCount(matchId)).toBeGreaterThan(0);
        }
      }
    });
  });

  describe('run', () => {
    it('should dispatch submitted messages until aborted', async () => {
      const hub = new Hub({ intakeSize: 8 });
      const conn = connection(hub, 42);
      hub.register(conn);
      const controller = new AbortController();
      const running = hub.run(controller.signal);

      await hub.submit(goal(42, 10));
      await hub.submit(goal(42, 11));
      await vi.waitFor(() => expect(conn.pending).toBe(2));

      controller.abort();
      await running;
      await expect(hub.submit(goal(42))).rejects.toBeInstanceOf(QueueClosedError);
    });

    it('should stamp messages sent through broadcastToMatch with one timestamp', async () => {
      const hub = new Hub({ intakeSize: 8 });
      const conn = connection(hub, 7);
      hub.register(conn);
      const broadcast = vi.spyOn(hub, 'broadcast');
      const controller = new AbortController();
      const running = hub.run(controller.signal);

      await hub.broadcastToMatch(7, 'match_status', { match_id: 7, status: 'live', timestamp: '2020-01-01T00:00:00.000Z' });
      await vi.waitFor(() => expect(conn.pending).toBe(1));

      const message = broadcast.mock.calls[0][0];
      expect(message.timestamp).not.toBe('2020-01-01T00:00:00.000Z');
      expect(message.data.timestamp).toBe(message.timestamp);

      controller.abort();
      await running;
    });
  });
});
