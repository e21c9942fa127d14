/**
 * Kafka Producer Module
 *
 * Manages the Kafka producer used when the durable event log is backed by
 * Kafka. Uses KafkaJS, which is compatible with Kafka and Redpanda brokers.
 */

import { Kafka, logLevel } from 'kafkajs';
import { cfg } from '../core/config.js';
import { logger } from '../core/logger.js';
import { KafkaError, toError } from '../errors/index.js';

/**
 * Kafka client instance
 *
 * Log level set to ERROR to reduce noise from KafkaJS internal logs.
 */
const kafka = new Kafka({
  clientId: cfg.kafka.clientId,
  brokers: cfg.kafka.brokers,
  logLevel: logLevel.ERROR
});

/**
 * Kafka producer instance
 *
 * Idempotent so that a retried send cannot reorder or duplicate a match's
 * events within its partition.
 */
export const producer = kafka.producer({ idempotent: true, maxInFlightRequests: 1 });

/**
 * Connects the Kafka producer to the broker(s)
 *
 * Must be called before appending any events.
 */
export async function startProducer(): Promise<void> {
  logger.info({ brokers: cfg.kafka.brokers }, 'Connecting to Kafka brokers...');
  try {
    await producer.connect();
  } catch (err) {
    throw new KafkaError('Failed to connect Kafka producer', 'connect', toError(err));
  }
  logger.info({ brokers: cfg.kafka.brokers, topic: cfg.kafka.topicEvents }, 'Kafka producer connected');
}

/**
 * Disconnects the Kafka producer gracefully
 *
 * Should be called during shutdown to ensure all pending messages are sent.
 */
export async function stopProducer(): Promise<void> {
  await producer.disconnect();
}
