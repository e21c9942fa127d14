/**
 * Application Service
 *
 * Main application orchestration logic.
 * Handles initialization, the realtime loops, and graceful shutdown.
 */

import { cfg } from '../core/config.js';
import { logger } from '../core/logger.js';
import { ValidationError } from '../errors/index.js';
import { KEYS } from '../cache/keys.js';
import { closeRedis, createSubscriber, redis } from '../cache/redisClient.js';
import { subscribePattern } from '../bus/broker.js';
import { BrokerBridge } from '../bus/brokerBridge.js';
import { EventPublisher } from '../bus/eventPublisher.js';
import { KafkaEventLog, RedisStreamLog } from '../bus/eventLog.js';
import type { DurableLog } from '../bus/eventLog.js';
import { producer, startProducer, stopProducer } from '../bus/kafkaProducer.js';
import { Hub } from '../realtime/hub.js';
import { SubscriptionServer } from '../realtime/server.js';
import { isValidUrl } from '../util/validation.js';
import { waitForServices } from '../util/waitForServices.js';

export interface RunningApp {
  hub: Hub;
  publisher: EventPublisher;
  server: SubscriptionServer;
  shutdown(signal: string): Promise<void>;
}

/**
 * Picks the durable log backend from configuration
 */
function createEventLog(): DurableLog {
  if (cfg.eventLog.backend === 'kafka') {
    return new KafkaEventLog(producer, cfg.kafka.topicEvents);
  }
  return new RedisStreamLog(redis);
}

/**
 * Sets up graceful shutdown handlers
 */
function setupShutdownHandlers(app: RunningApp): void {
  const onSignal = (signal: string) => {
    app.shutdown(signal).then(
      () => process.exit(0),
      (err) => {
        logger.error({ err }, 'Error during shutdown');
        process.exit(1);
      }
    );
  };

  process.once('SIGINT', () => onSignal('SIGINT'));
  process.once('SIGTERM', () => onSignal('SIGTERM'));
}

/**
 * Main application logic
 *
 * Initializes the service by:
 * 1. Waiting for Redis (and Kafka when it backs the event log)
 * 2. Subscribing to every match's events channel with one pattern
 * 3. Starting the hub dispatch loop and the broker bridge
 * 4. Accepting viewer subscriptions
 * 5. Setting up graceful shutdown handlers
 */
export async function startApp(): Promise<RunningApp> {
  if (!isValidUrl(cfg.redis.url)) {
    throw new ValidationError(`Invalid REDIS_URL: ${cfg.redis.url}`, 'REDIS_URL');
  }

  await waitForServices();

  const usesKafka = cfg.eventLog.backend === 'kafka';
  if (usesKafka) {
    await startProducer();
  }

  const hub = new Hub({ intakeSize: cfg.hub.intakeSize });
  const publisher = new EventPublisher({ eventLog: createEventLog(), broker: redis, cache: redis });

  const subscription = await subscribePattern(createSubscriber(), KEYS.eventsPattern, {
    bufferSize: cfg.bridge.bufferSize
  });
  const bridge = new BrokerBridge(subscription, hub, { retryDelayMs: cfg.bridge.retryDelayMs });

  // Single cancellation signal for the dispatch and receive loops
  const controller = new AbortController();
  const loops = Promise.all([hub.run(controller.signal), bridge.run(controller.signal)]);

  const server = new SubscriptionServer({ hub, websocket: cfg.websocket });
  await server.listen(cfg.server.port, cfg.server.host);

  let stopping: Promise<void> | undefined;
  const app: RunningApp = {
    hub,
    publisher,
    server,
    shutdown(signal: string) {
      stopping ??= (async () => {
        logger.info(`${signal} received, shutting down`);
        controller.abort();

        try {
          await server.close();
        } catch (err) {
          logger.warn({ err }, 'Error closing subscription server');
        }

        await loops;

        if (usesKafka) {
          try {
            await stopProducer();
          } catch (err) {
            logger.warn({ err }, 'Error disconnecting Kafka producer');
          }
        }

        await closeRedis();
      })();
      return stopping;
    }
  };

  setupShutdownHandlers(app);
  logger.info(
    { port: cfg.server.port, eventLog: cfg.eventLog.backend, pattern: KEYS.eventsPattern },
    'Live match feed started'
  );
  return app;
}
