/**
 * Broker Bridge
 *
 * Feeds the hub from the broker's single pattern subscription. Messages are
 * handled strictly one at a time, in the order the broker delivered them.
 * A malformed message is logged and skipped; a transport failure is retried
 * after a fixed delay. Only the abort signal ends the loop.
 */

import { matchIdFromChannel } from '../cache/keys.js';
import { moduleLogger } from '../core/logger.js';
import type { Logger } from '../core/logger.js';
import { DecodeError, toError } from '../errors/index.js';
import { decodeMatchMessage } from '../models/messages.js';
import type { BroadcastMessage, InboundMessage } from '../models/messages.js';
import { QueueClosedError } from '../util/asyncQueue.js';
import { sleep } from '../util/sleep.js';
import type { BrokerMessage, BrokerSubscription } from './broker.js';

/**
 * Where decoded messages go (the hub's intake)
 */
export interface BroadcastIntake {
  submit(message: BroadcastMessage): Promise<void>;
}

export interface BridgeOptions {
  retryDelayMs: number;
  logger?: Logger;
}

export interface BridgeStats {
  received: number;
  forwarded: number;
  malformed: number;
  retries: number;
}

/**
 * Decodes a broker message and checks it was sent on its match's channel
 *
 * @throws DecodeError for anything that is not a well-formed envelope
 */
export function decodeBrokerMessage(message: BrokerMessage): InboundMessage {
  const decoded = decodeMatchMessage(message.payload);
  const channelMatchId = matchIdFromChannel(message.channel);
  if (channelMatchId !== null && channelMatchId !== decoded.match_id) {
    throw new DecodeError(`match_id ${decoded.match_id} does not match channel ${message.channel}`);
  }
  return decoded;
}

export class BrokerBridge {
  readonly stats: BridgeStats = { received: 0, forwarded: 0, malformed: 0, retries: 0 };
  private readonly log: Logger;

  constructor(
    private readonly subscription: BrokerSubscription,
    private readonly intake: BroadcastIntake,
    private readonly opts: BridgeOptions
  ) {
    this.log = opts.logger ?? moduleLogger('bridge');
  }

  /**
   * Receive loop; resolves after `signal` aborts and the subscription is closed
   */
  async run(signal: AbortSignal): Promise<void> {
    this.log.info('Broker listener started');
    try {
      while (!signal.aborted) {
        let message: BrokerMessage | undefined;
        try {
          message = await this.subscription.next(signal);
        } catch (err) {
          this.stats.retries++;
          this.log.error({ err: toError(err), retryDelayMs: this.opts.retryDelayMs }, 'Broker receive failed, retrying');
          await sleep(this.opts.retryDelayMs, signal);
          continue;
        }
        if (message === undefined) break;
        this.stats.received++;

        let decoded: InboundMessage;
        try {
          decoded = decodeBrokerMessage(message);
        } catch (err) {
          this.stats.malformed++;
          this.log.warn({ err: toError(err), channel: message.channel }, 'Failed to decode broker message');
          continue;
        }

        try {
          await this.intake.submit(decoded);
          this.stats.forwarded++;
        } catch (err) {
          if (err instanceof QueueClosedError) break;
          this.log.error({ err: toError(err), matchId: decoded.match_id }, 'Failed to hand message to hub');
        }
      }
    } finally {
      await this.subscription.close();
      this.log.info('Broker listener stopped');
    }
  }
}
