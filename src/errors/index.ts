/**
 * Custom Error Classes
 *
 * Standardized error types for better error handling and debugging.
 */

/**
 * Base error class for application errors
 */
export class AppError extends Error {
  constructor(
    message: string,
    public code: string,
    public statusCode: number = 500,
    public cause?: Error
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Error for validation failures
 */
export class ValidationError extends AppError {
  constructor(message: string, public field: string) {
    super(message, 'VALIDATION_ERROR', 400);
  }
}

/**
 * Error for a broker payload that is not a match message envelope
 */
export class DecodeError extends AppError {
  constructor(message: string, cause?: Error) {
    super(message, 'DECODE_ERROR', 400, cause);
  }
}

/**
 * Error for cache/Redis operations
 */
export class CacheError extends AppError {
  constructor(message: string, public operation: string, cause?: Error) {
    super(message, 'CACHE_ERROR', 500, cause);
  }
}

/**
 * Error for Kafka operations
 */
export class KafkaError extends AppError {
  constructor(message: string, public operation: string, cause?: Error) {
    super(message, 'KAFKA_ERROR', 500, cause);
  }
}

/**
 * Error for a failed append to the durable per-match log
 */
export class EventLogError extends AppError {
  constructor(message: string, public matchId: number, cause?: Error) {
    super(message, 'EVENT_LOG_ERROR', 503, cause);
  }
}

/**
 * Error for a failed publish on the pub/sub broker
 */
export class BrokerError extends AppError {
  constructor(message: string, public channel: string, cause?: Error) {
    super(message, 'BROKER_ERROR', 503, cause);
  }
}

/**
 * Normalizes an unknown thrown value into an Error
 */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
