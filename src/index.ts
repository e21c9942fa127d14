/**
 * Live Match Feed - Main Entry Point
 *
 * This service fans live match events (goals, cards, score and status
 * changes) out to every WebSocket viewer of a match. Events arrive over
 * Redis pub/sub from the event publisher, which also records each one in a
 * durable per-match log for analytics.
 */

import { logger } from './core/logger.js';
import { startApp } from './services/app.js';

// Start the service and handle any startup errors
startApp().catch((err) => {
  logger.error({ err }, 'Fatal error occurred');
  process.exit(1);
});
