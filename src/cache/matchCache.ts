/**
 * Match Cache Invalidation
 *
 * Read paths elsewhere cache derived match views (summary, event list,
 * stats) in Redis. When a match changes, those keys are deleted on a
 * best-effort basis: one failing key never stops the others.
 */

import type { Logger } from '../core/logger.js';
import { CacheError, toError } from '../errors/index.js';
import type { MatchId } from '../models/messages.js';
import { matchCacheKeys } from './keys.js';

/**
 * Keyed delete (satisfied by an ioredis client)
 */
export interface CacheStore {
  /** @returns number of keys removed */
  del(key: string): Promise<number>;
}

export type InvalidationOutcome =
  | { key: string; ok: true; removed: boolean }
  | { key: string; ok: false; error: CacheError };

/**
 * Deletes every cached view of a match, reporting each key separately
 */
export async function invalidateMatchViews(
  store: CacheStore,
  matchId: MatchId,
  log: Logger
): Promise<InvalidationOutcome[]> {
  const outcomes: InvalidationOutcome[] = [];
  for (const key of matchCacheKeys(matchId)) {
    try {
      const removed = await store.del(key);
      outcomes.push({ key, ok: true, removed: removed > 0 });
    } catch (err) {
      const error = new CacheError(`Failed to invalidate ${key}`, 'del', toError(err));
      log.error({ err: error, key, matchId }, 'Failed to invalidate cache');
      outcomes.push({ key, ok: false, error });
    }
  }
  return outcomes;
}
