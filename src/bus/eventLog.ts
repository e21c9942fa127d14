/**
 * Durable Event Log
 *
 * Append-only, per-match ordered record of every published event, read
 * later by analytics. Two backends:
 * - Redis Streams: one stream per match (`match:{id}:stream`)
 * - Kafka: one topic, keyed by match so each match stays on one partition
 */

import type { Producer } from 'kafkajs';
import { KEYS } from '../cache/keys.js';
import type { MatchId } from '../models/messages.js';

export interface EventLogEntry {
  /** Domain event type ("goal", "score_update", ...) */
  eventType: string;
  /** Message payload, serialized by the backend */
  data: object;
  /** ISO-8601 publish time */
  timestamp: string;
}

export interface DurableLog {
  /**
   * Appends one entry to the match's log
   *
   * @returns backend-assigned position (stream entry ID or partition:offset)
   */
  append(matchId: MatchId, entry: EventLogEntry): Promise<string>;
}

/**
 * The subset of an ioredis client used for stream appends
 */
export interface StreamClient {
  xadd(key: string, id: string, ...fieldsAndValues: string[]): Promise<string | null>;
}

export class RedisStreamLog implements DurableLog {
  constructor(private readonly client: StreamClient) {}

  async append(matchId: MatchId, entry: EventLogEntry): Promise<string> {
    const unixSeconds = Math.floor(Date.parse(entry.timestamp) / 1000);
    const id = await this.client.xadd(
      KEYS.stream(matchId),
      '*',
      'event_type', entry.eventType,
      'data', JSON.stringify(entry.data),
      'timestamp', String(unixSeconds)
    );
    if (id === null) {
      throw new Error(`XADD to ${KEYS.stream(matchId)} returned no entry ID`);
    }
    return id;
  }
}

export class KafkaEventLog implements DurableLog {
  constructor(
    private readonly producer: Pick<Producer, 'send'>,
    private readonly topic: string
  ) {}

  async append(matchId: MatchId, entry: EventLogEntry): Promise<string> {
    const [metadata] = await this.producer.send({
      topic: this.topic,
      messages: [{
        key: `match:${matchId}`,
        value: JSON.stringify({ event_type: entry.eventType, data: entry.data, timestamp: entry.timestamp }),
        timestamp: String(Date.parse(entry.timestamp))
      }]
    });
    if (!metadata) return `${this.topic}:unknown`;
    return `${metadata.partition}:${metadata.baseOffset ?? metadata.offset ?? 'unknown'}`;
  }
}
