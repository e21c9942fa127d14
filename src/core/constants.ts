/**
 * Application Constants
 *
 * Centralized location for all magic numbers and configuration constants.
 */

/**
 * Defaults for the realtime path (overridable through config)
 */
export const REALTIME_DEFAULTS = {
  /** Time allowed to write one message to a viewer */
  WRITE_WAIT_MS: 10000,

  /** Time allowed between two pongs (or frames) from a viewer */
  PONG_WAIT_MS: 60000,

  /** Largest inbound frame a viewer may send, in bytes */
  MAX_MESSAGE_SIZE: 512,

  /** Outbound messages buffered per viewer before it counts as slow */
  SEND_QUEUE_SIZE: 256,

  /** Events buffered between the bridge and the hub dispatch loop */
  HUB_INTAKE_SIZE: 256,

  /** Pause before receiving again after a broker failure */
  BRIDGE_RETRY_DELAY_MS: 1000,

  /** Pub/sub messages buffered between the Redis socket and the bridge */
  BRIDGE_BUFFER_SIZE: 1024,
} as const;

/**
 * WebSocket close codes sent by the server
 */
export const CLOSE_CODES = {
  NORMAL: 1000,
  GOING_AWAY: 1001,
} as const;

/**
 * Service health check configuration
 */
export const HEALTH_CHECK = {
  /** Maximum retries for service health checks */
  MAX_RETRIES: 30,

  /** Delay between retries (2 seconds) */
  RETRY_DELAY_MS: 2000,

  /** Connection timeout for health checks (1 second) */
  CONNECTION_TIMEOUT_MS: 1000,
} as const;
