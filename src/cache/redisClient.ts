/**
 * Redis Client Module
 *
 * Creates and exports the shared Redis client, plus a factory for the
 * dedicated subscriber connection the broker bridge needs.
 */

import { Redis } from 'ioredis';
import { cfg } from '../core/config.js';
import { logger } from '../core/logger.js';

/**
 * Redis client instance
 *
 * Connects to Redis using the URL from configuration.
 * Used for:
 * - Publishing live envelopes on per-match channels
 * - Appending to per-match event streams
 * - Invalidating cached match views
 */
export const redis = new Redis(cfg.redis.url);

// Log connection events for monitoring
redis.on('connect', () => logger.info('Redis connected'));
redis.on('error', (err) => logger.error({ err }, 'Redis error'));

/**
 * Creates the connection used for the pattern subscription
 *
 * Reconnects at the bridge's fixed retry delay; ioredis re-subscribes on
 * reconnect.
 */
export function createSubscriber(): Redis {
  const subscriber = redis.duplicate({
    retryStrategy: () => cfg.bridge.retryDelayMs
  });
  subscriber.on('reconnecting', () => logger.warn({ delayMs: cfg.bridge.retryDelayMs }, 'Redis subscriber reconnecting'));
  return subscriber;
}

/**
 * Closes the shared client
 */
export async function closeRedis(): Promise<void> {
  await redis.quit();
  logger.info('Redis connection closed');
}
