import { describe, it, expect } from 'vitest';
import { KEYS, matchCacheKeys, matchIdFromChannel } from '../../src/cache/keys.js';

describe('keys', () => {
  it('should build per-match channel and stream names', () => {
    expect(KEYS.eventsChannel(42)).toBe('match:42:events');
    expect(KEYS.stream(42)).toBe('match:42:stream');
    expect(KEYS.eventsPattern).toBe('match:*:events');
  });

  it('should list every cached view of a match', () => {
    expect(matchCacheKeys(42)).toEqual(['match:42', 'match:42:events', 'match:42:stats']);
  });

  describe('matchIdFromChannel', () => {
    it('should extract the match id from an events channel', () => {
      expect(matchIdFromChannel('match:42:events')).toBe(42);
    });

    it('should return null for other channels', () => {
      expect(matchIdFromChannel('match:42:stream')).toBeNull();
      expect(matchIdFromChannel('match:abc:events')).toBeNull();
      expect(matchIdFromChannel('match:0:events')).toBeNull();
    });
  });
});
