/**
 * Message Models
 *
 * Defines the envelope that travels from the publisher, through the
 * pub/sub broker and the hub, to every viewer of a match.
 */

import { DecodeError, toError } from '../errors/index.js';
import { isValidMatchId } from '../util/validation.js';

/** Positive integer identifying a match; the fan-out partition key */
export type MatchId = number;

export type MessageType = 'match_event' | 'score_update' | 'match_status';

export const MESSAGE_TYPES: readonly MessageType[] = ['match_event', 'score_update', 'match_status'];

export type MatchStatus = 'scheduled' | 'live' | 'finished' | 'postponed' | 'canceled';

export const MATCH_STATUSES: readonly MatchStatus[] = ['scheduled', 'live', 'finished', 'postponed', 'canceled'];

/**
 * A single on-pitch event (goal, shot, card, substitution, ...)
 */
export type MatchEventData = {
  readonly id?: number;
  readonly match_id: MatchId;
  readonly team_id?: number;
  readonly player_id?: number;
  readonly secondary_player_id?: number;
  /** Normalized event type, e.g. "goal", "yellow_card" */
  readonly event_type: string;
  readonly minute: number;
  readonly extra_minute?: number;
  readonly second?: number;
  readonly period?: string;
  readonly position_x?: number;
  readonly position_y?: number;
  readonly description?: string;
  /** JSON string with provider extras (xG, pass completion, ...) */
  readonly metadata?: string;
  readonly timestamp: string;
};

export type ScoreUpdateData = {
  readonly match_id: MatchId;
  readonly home_team_score: number;
  readonly away_team_score: number;
  readonly timestamp: string;
};

export type MatchStatusData = {
  readonly match_id: MatchId;
  readonly status: MatchStatus;
  readonly timestamp: string;
};

export interface MessageDataMap {
  match_event: MatchEventData;
  score_update: ScoreUpdateData;
  match_status: MatchStatusData;
}

/**
 * Wire envelope shared by all message types
 *
 * `timestamp` is assigned once, by the publisher, as an ISO-8601 string.
 */
export interface Envelope<K extends MessageType> {
  readonly type: K;
  readonly match_id: MatchId;
  readonly timestamp: string;
  readonly data: MessageDataMap[K];
}

export type MatchMessage = {
  [K in MessageType]: Envelope<K>;
}[MessageType];

/**
 * Envelope as decoded from the broker. The bridge and hub never look inside
 * `data`, so it is only known to be an object.
 */
export interface InboundMessage {
  readonly type: MessageType;
  readonly match_id: MatchId;
  readonly timestamp: string;
  readonly data: Readonly<Record<string, unknown>>;
}

export type BroadcastMessage = MatchMessage | InboundMessage;

export function isMessageType(value: unknown): value is MessageType {
  return typeof value === 'string' && (MESSAGE_TYPES as readonly string[]).includes(value);
}

export function isMatchStatus(value: unknown): value is MatchStatus {
  return typeof value === 'string' && (MATCH_STATUSES as readonly string[]).includes(value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Builds an envelope for a payload
 */
export function createEnvelope<K extends MessageType>(
  type: K,
  matchId: MatchId,
  timestamp: string,
  data: MessageDataMap[K]
): Envelope<K> {
  return { type, match_id: matchId, timestamp, data };
}

/**
 * Decodes a raw broker payload into an envelope
 *
 * Only the envelope is checked; `data` is passed through untouched.
 *
 * @throws DecodeError if the payload is not JSON or not an envelope
 */
export function decodeMatchMessage(raw: string | Buffer): InboundMessage {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw.toString());
  } catch (err) {
    throw new DecodeError('Message is not valid JSON', toError(err));
  }

  if (!isRecord(parsed)) {
    throw new DecodeError('Message is not an object');
  }
  const { type, match_id: matchId, timestamp, data } = parsed;
  if (!isMessageType(type)) {
    throw new DecodeError(`Unknown message type: ${String(type)}`);
  }
  if (!isValidMatchId(matchId)) {
    throw new DecodeError(`Invalid match_id: ${String(matchId)}`);
  }
  if (typeof timestamp !== 'string' || timestamp === '') {
    throw new DecodeError('Missing timestamp');
  }
  if (!isRecord(data)) {
    throw new DecodeError('Missing data object');
  }

  return { type, match_id: matchId, timestamp, data };
}
