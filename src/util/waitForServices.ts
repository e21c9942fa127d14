/**
 * Wait for Services Utility
 *
 * Waits for external services (Redis, and Kafka when it backs the event
 * log) to be ready before starting the application. Prevents startup errors
 * from connection failures.
 */

import { cfg } from '../core/config.js';
import { logger } from '../core/logger.js';
import { HEALTH_CHECK } from '../core/constants.js';
import { Redis } from 'ioredis';
import { Kafka } from 'kafkajs';
import { sleep } from './sleep.js';

const MAX_RETRIES = HEALTH_CHECK.MAX_RETRIES;
const RETRY_DELAY_MS = HEALTH_CHECK.RETRY_DELAY_MS;

/**
 * Wait for Redis to be available
 */
async function waitForRedis(): Promise<void> {
  logger.info('Waiting for Redis to be ready...');

  for (let i = 0; i < MAX_RETRIES; i++) {
    const testRedis = new Redis(cfg.redis.url, {
      maxRetriesPerRequest: 1,
      retryStrategy: () => null, // Don't retry, just test connection
      connectTimeout: HEALTH_CHECK.CONNECTION_TIMEOUT_MS,
      lazyConnect: true
    });
    try {
      await testRedis.connect();
      await testRedis.ping();
      await testRedis.quit();
      logger.info('✓ Redis is ready');
      return;
    } catch (err) {
      testRedis.disconnect();
      if (i < MAX_RETRIES - 1) {
        logger.debug({ attempt: i + 1, maxRetries: MAX_RETRIES }, 'Redis not ready, retrying...');
        await sleep(RETRY_DELAY_MS);
      } else {
        throw new Error(`Redis failed to become ready after ${MAX_RETRIES} attempts: ${err}`);
      }
    }
  }
}

/**
 * Wait for Kafka/Redpanda to be available
 */
async function waitForKafka(): Promise<void> {
  if (cfg.eventLog.backend !== 'kafka') {
    logger.info('Kafka event log not configured, skipping...');
    return;
  }

  logger.info('Waiting for Kafka to be ready...');

  const kafka = new Kafka({
    clientId: `${cfg.kafka.clientId}-health-check`,
    brokers: cfg.kafka.brokers,
    connectionTimeout: HEALTH_CHECK.CONNECTION_TIMEOUT_MS,
    requestTimeout: HEALTH_CHECK.CONNECTION_TIMEOUT_MS
  });

  const admin = kafka.admin();

  for (let i = 0; i < MAX_RETRIES; i++) {
    try {
      await admin.connect();
      await admin.listTopics();
      await admin.disconnect();
      logger.info('✓ Kafka is ready');
      return;
    } catch (err) {
      if (i < MAX_RETRIES - 1) {
        logger.debug({ attempt: i + 1, maxRetries: MAX_RETRIES }, 'Kafka not ready, retrying...');
        await sleep(RETRY_DELAY_MS);
      } else {
        throw new Error(`Kafka failed to become ready after ${MAX_RETRIES} attempts: ${err}`);
      }
    }
  }
}

/**
 * Wait for all required services to be ready
 *
 * @throws the first service's error if any service never became ready
 */
export async function waitForServices(): Promise<void> {
  logger.info('Checking service availability...');

  // Run checks in parallel for faster startup
  const results = await Promise.allSettled([waitForRedis(), waitForKafka()]);
  const failure = results.find((r): r is PromiseRejectedResult => r.status === 'rejected');
  if (failure) throw failure.reason;

  logger.info('Service availability check complete');
}
