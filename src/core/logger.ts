/**
 * Logger Module
 *
 * Configures structured logging using Pino.
 * In development, uses pino-pretty for human-readable colored output.
 * In production, outputs JSON logs for log aggregation systems.
 */

import { pino } from 'pino';
import type { Logger } from 'pino';
import { cfg } from './config.js';

export type { Logger };

/**
 * Pino logger instance
 *
 * - Development: Pretty-printed, colored output for easy reading
 * - Test: plain JSON, no transport worker
 * - Production: JSON output for structured log processing
 * - Log level controlled by LOG_LEVEL environment variable
 */
export const logger = pino({
  level: cfg.logLevel,
  transport: process.env.NODE_ENV !== 'production' && process.env.NODE_ENV !== 'test'
    ? { target: 'pino-pretty', options: { colorize: true } }
    : undefined
});

/**
 * Child logger tagged with the component name
 */
export function moduleLogger(module: string): Logger {
  return logger.child({ module });
}
