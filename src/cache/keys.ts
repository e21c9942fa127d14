/**
 * Redis Key Generators
 *
 * Centralized key and channel naming for Redis.
 * Ensures consistent naming across the publisher, bridge and cache.
 */

import type { MatchId } from '../models/messages.js';

/**
 * Generates Redis keys and pub/sub channel names for match data
 */
export const KEYS = {
  /** Pub/sub channel carrying live envelopes for one match */
  eventsChannel: (matchId: MatchId) => `match:${matchId}:events`,

  /** Pattern covering every match's events channel (one PSUBSCRIBE) */
  eventsPattern: 'match:*:events',

  /** Append-only stream of a match's events, read by analytics */
  stream: (matchId: MatchId) => `match:${matchId}:stream`,

  /** Cached match summary */
  matchSummary: (matchId: MatchId) => `match:${matchId}`,

  /** Cached event list for a match */
  matchEvents: (matchId: MatchId) => `match:${matchId}:events`,

  /** Cached aggregated match statistics */
  matchStats: (matchId: MatchId) => `match:${matchId}:stats`,
};

/**
 * Every cached view derived from a match, in invalidation order
 */
export function matchCacheKeys(matchId: MatchId): string[] {
  return [KEYS.matchSummary(matchId), KEYS.matchEvents(matchId), KEYS.matchStats(matchId)];
}

/**
 * Extracts the match ID from an events channel name
 *
 * @returns The match ID, or null if the channel is not a match events channel
 */
export function matchIdFromChannel(channel: string): MatchId | null {
  const m = /^match:(\d+):events$/.exec(channel);
  if (!m) return null;
  const id = Number(m[1]);
  return Number.isSafeInteger(id) && id > 0 ? id : null;
}
