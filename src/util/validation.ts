/**
 * Validation Utilities
 *
 * Functions for validating external inputs to prevent invalid data
 * from propagating through the system.
 */

import { ValidationError } from '../errors/index.js';
import type { MatchId } from '../models/messages.js';

export { ValidationError };

/** Match ids are stored as signed 32-bit integers */
export const MAX_MATCH_ID = 2147483647;

/**
 * Validates a match ID (positive 32-bit integer)
 *
 * @param value - Candidate match ID
 * @returns True if valid, false otherwise
 */
export function isValidMatchId(value: unknown): value is MatchId {
  return typeof value === 'number' && Number.isInteger(value) && value > 0 && value <= MAX_MATCH_ID;
}

/**
 * Parses a match ID from a path segment or query value
 *
 * @throws ValidationError if the text is not a valid match ID
 */
export function parseMatchId(text: string): MatchId {
  if (!/^\d{1,10}$/.test(text)) {
    throw new ValidationError(`Invalid match ID: ${text}`, 'matchId');
  }
  const value = Number(text);
  if (!isValidMatchId(value)) {
    throw new ValidationError(`Invalid match ID: ${text}`, 'matchId');
  }
  return value;
}

/**
 * Validates a URL string
 *
 * @param url - URL to validate
 * @returns True if valid URL, false otherwise
 */
export function isValidUrl(url: string): boolean {
  try {
    new URL(url);
    return true;
  } catch {
    return false;
  }
}
