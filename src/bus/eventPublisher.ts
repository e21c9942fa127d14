/**
 * Event Publisher
 *
 * Write side of the realtime path. Every event is first appended to the
 * match's durable log, then published on the match's pub/sub channel for
 * the bridge and hub. If the append fails nothing is published and the
 * caller gets the error.
 */

import { KEYS } from '../cache/keys.js';
import { invalidateMatchViews } from '../cache/matchCache.js';
import type { CacheStore, InvalidationOutcome } from '../cache/matchCache.js';
import { moduleLogger } from '../core/logger.js';
import type { Logger } from '../core/logger.js';
import { BrokerError, EventLogError, ValidationError, toError } from '../errors/index.js';
import { isGoalEvent, isValidEventType, normalizeEventType } from '../models/eventTypes.js';
import { createEnvelope, isMatchStatus } from '../models/messages.js';
import type {
  Envelope,
  MatchEventData,
  MatchId,
  MatchStatusData,
  MessageDataMap,
  MessageType,
  ScoreUpdateData
} from '../models/messages.js';
import { isValidMatchId } from '../util/validation.js';
import type { PubSubBroker } from './broker.js';
import type { DurableLog } from './eventLog.js';

export type MatchEventInput = Omit<MatchEventData, 'timestamp'>;
export type ScoreUpdateInput = Omit<ScoreUpdateData, 'timestamp'>;

export interface MatchStatusInput {
  match_id: MatchId;
  /** Case-insensitive status name */
  status: string;
}

export interface PublisherDeps {
  eventLog: DurableLog;
  broker: PubSubBroker;
  cache: CacheStore;
  logger?: Logger;
  /** Wall clock in epoch milliseconds */
  now?: () => number;
}

function assertMatchId(matchId: unknown): asserts matchId is MatchId {
  if (!isValidMatchId(matchId)) {
    throw new ValidationError(`Invalid match ID: ${String(matchId)}`, 'match_id');
  }
}

function assertNonNegativeInt(value: number, field: string): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new ValidationError(`${field} must be a non-negative integer, got ${value}`, field);
  }
}

export class EventPublisher {
  private readonly eventLog: DurableLog;
  private readonly broker: PubSubBroker;
  private readonly cache: CacheStore;
  private readonly log: Logger;
  private readonly now: () => number;
  private lastTimestampMs = 0;

  constructor(deps: PublisherDeps) {
    this.eventLog = deps.eventLog;
    this.broker = deps.broker;
    this.cache = deps.cache;
    this.log = deps.logger ?? moduleLogger('publisher');
    this.now = deps.now ?? Date.now;
  }

  /**
   * Records and publishes a match event. Goal-category events also
   * invalidate the match's cached views.
   */
  async publishMatchEvent(input: MatchEventInput): Promise<Envelope<'match_event'>> {
    assertMatchId(input.match_id);
    const eventType = normalizeEventType(input.event_type);
    if (!isValidEventType(eventType)) {
      throw new ValidationError(`Invalid event type: ${input.event_type}`, 'event_type');
    }
    assertNonNegativeInt(input.minute, 'minute');

    const timestamp = this.nextTimestamp();
    const envelope = await this.appendAndPublish('match_event', input.match_id, eventType, {
      ...input,
      event_type: eventType,
      timestamp
    });

    this.log.info({ matchId: input.match_id, eventType, minute: input.minute }, 'Published match event');

    if (isGoalEvent(eventType)) {
      await this.invalidateMatchCache(input.match_id);
    }
    return envelope;
  }

  async publishScoreUpdate(input: ScoreUpdateInput): Promise<Envelope<'score_update'>> {
    assertMatchId(input.match_id);
    assertNonNegativeInt(input.home_team_score, 'home_team_score');
    assertNonNegativeInt(input.away_team_score, 'away_team_score');

    const timestamp = this.nextTimestamp();
    const envelope = await this.appendAndPublish('score_update', input.match_id, 'score_update', {
      match_id: input.match_id,
      home_team_score: input.home_team_score,
      away_team_score: input.away_team_score,
      timestamp
    });

    this.log.info(
      { matchId: input.match_id, homeScore: input.home_team_score, awayScore: input.away_team_score },
      'Published score update'
    );
    return envelope;
  }

  async publishMatchStatus(input: MatchStatusInput): Promise<Envelope<'match_status'>> {
    assertMatchId(input.match_id);
    const status = input.status.trim().toLowerCase();
    if (!isMatchStatus(status)) {
      throw new ValidationError(`Invalid match status: ${input.status}`, 'status');
    }

    const timestamp = this.nextTimestamp();
    const data: MatchStatusData = { match_id: input.match_id, status, timestamp };
    const envelope = await this.appendAndPublish('match_status', input.match_id, 'match_status', data);

    this.log.info({ matchId: input.match_id, status }, 'Published match status update');
    return envelope;
  }

  /**
   * Deletes the match's cached views. Never rejects: per-key failures are
   * logged and reported in the outcome list.
   */
  async invalidateMatchCache(matchId: MatchId): Promise<InvalidationOutcome[]> {
    const outcomes = await invalidateMatchViews(this.cache, matchId, this.log);
    const failed = outcomes.filter(o => !o.ok).length;
    this.log.info({ matchId, keys: outcomes.length, failed }, 'Invalidated match cache');
    return outcomes;
  }

  /**
   * Current wall-clock time, never earlier than the previous stamp
   */
  private nextTimestamp(): string {
    const ms = Math.max(this.now(), this.lastTimestampMs);
    this.lastTimestampMs = ms;
    return new Date(ms).toISOString();
  }

  private async appendAndPublish<K extends MessageType>(
    type: K,
    matchId: MatchId,
    eventType: string,
    data: MessageDataMap[K]
  ): Promise<Envelope<K>> {
    Object.freeze(data);
    const envelope = createEnvelope(type, matchId, data.timestamp, data);
    Object.freeze(envelope);

    try {
      await this.eventLog.append(matchId, { eventType, data, timestamp: envelope.timestamp });
    } catch (err) {
      const cause = toError(err);
      this.log.error({ err: cause, matchId, type }, 'Failed to add event to stream');
      throw new EventLogError(`Failed to append ${type} for match ${matchId}: ${cause.message}`, matchId, cause);
    }

    const channel = KEYS.eventsChannel(matchId);
    try {
      await this.broker.publish(channel, JSON.stringify(envelope));
    } catch (err) {
      const cause = toError(err);
      this.log.error({ err: cause, matchId, type }, 'Failed to publish event');
      throw new BrokerError(`Failed to publish ${type} on ${channel}: ${cause.message}`, channel, cause);
    }
    return envelope;
  }
}
