/**
 * Configuration Module
 *
 * Centralizes all application configuration from environment variables.
 * Loads .env file automatically via dotenv/config import.
 */

import 'dotenv/config';
import { ValidationError } from '../errors/index.js';
import { REALTIME_DEFAULTS } from './constants.js';

/**
 * Reads a positive integer from the environment, falling back to a default
 *
 * @throws ValidationError if the variable is set but not a positive integer
 */
export function positiveInt(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw === '') return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new ValidationError(`${name} must be a positive integer, got "${raw}"`, name);
  }
  return value;
}

export type EventLogBackend = 'redis' | 'kafka';

function eventLogBackend(): EventLogBackend {
  const raw = (process.env.EVENT_LOG_BACKEND || 'redis').toLowerCase();
  if (raw !== 'redis' && raw !== 'kafka') {
    throw new ValidationError(`EVENT_LOG_BACKEND must be "redis" or "kafka", got "${raw}"`, 'EVENT_LOG_BACKEND');
  }
  return raw;
}

const pongWaitMs = positiveInt('WS_PONG_WAIT_MS', REALTIME_DEFAULTS.PONG_WAIT_MS);

/**
 * Application configuration object
 *
 * All configuration values are read from environment variables with sensible defaults.
 */
export const cfg = {
  // HTTP listener that accepts WebSocket subscriptions
  server: {
    host: process.env.HOST || '0.0.0.0',
    port: positiveInt('PORT', 8080)
  },
  // Redis configuration (pub/sub broker, streams, cache)
  redis: {
    url: process.env.REDIS_URL || 'redis://localhost:6379' // Redis connection URL
  },
  // Durable per-match event log
  eventLog: {
    backend: eventLogBackend()
  },
  // Kafka/Redpanda configuration, used when the event log backend is kafka
  kafka: {
    brokers: (process.env.KAFKA_BROKERS || 'localhost:9092').split(',').map(b => b.trim()), // Comma-separated list of Kafka broker addresses
    clientId: process.env.KAFKA_CLIENT_ID || 'live-match-feed',
    topicEvents: process.env.KAFKA_TOPIC_EVENTS || 'match.events'
  },
  // Per-viewer WebSocket limits
  websocket: {
    writeWaitMs: positiveInt('WS_WRITE_WAIT_MS', REALTIME_DEFAULTS.WRITE_WAIT_MS),
    pongWaitMs,
    pingPeriodMs: Math.floor((pongWaitMs * 9) / 10), // must stay below pongWaitMs
    maxMessageSize: positiveInt('WS_MAX_MESSAGE_SIZE', REALTIME_DEFAULTS.MAX_MESSAGE_SIZE),
    sendQueueSize: positiveInt('WS_SEND_QUEUE_SIZE', REALTIME_DEFAULTS.SEND_QUEUE_SIZE)
  },
  hub: {
    intakeSize: positiveInt('HUB_INTAKE_SIZE', REALTIME_DEFAULTS.HUB_INTAKE_SIZE)
  },
  bridge: {
    retryDelayMs: positiveInt('BRIDGE_RETRY_DELAY_MS', REALTIME_DEFAULTS.BRIDGE_RETRY_DELAY_MS),
    bufferSize: positiveInt('BRIDGE_BUFFER_SIZE', REALTIME_DEFAULTS.BRIDGE_BUFFER_SIZE)
  },
  // Logging configuration
  logLevel: process.env.LOG_LEVEL || 'info' // Log level (trace, debug, info, warn, error, fatal)
};

export type Config = typeof cfg;
