/**
 * Herald: Dispatcher
 *
 * Sends notifications one at a time, in order, paced to a minimum gap
 * between sends. Transient failures are retried with exponential backoff;
 * permanent ones fail that notification only. The caller learns about each
 * success through onDelivered, which is awaited before the next send.
 */

import pRetry, { AbortError } from 'p-retry';
import type { DeliveryOutcome, Notification } from '../types';
import { DeliveryFailedError, DeliveryTransientError } from '../lib/errors';
import { errorMessage, logger } from '../lib/logger';
import type { ChannelClient } from './telegram';

// ============================================================
// TYPES
// ============================================================

export interface DispatcherOptions {
  channel: ChannelClient;
  /** Minimum gap between two sends */
  minIntervalMs: number;
  maxAttempts: number;
  /** First retry delay; doubles each attempt */
  baseDelayMs: number;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

export interface DeliverOptions {
  /** Awaited after each confirmed send, before the next one starts */
  onDelivered?: (notification: Notification, messageId: string) => Promise<void>;
  /** Once aborted, notifications not yet started come back as 'aborted' */
  signal?: AbortSignal;
}

const MAX_BACKOFF_MS = 60_000;

function delay(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

// ============================================================
// DISPATCHER
// ============================================================

export class Dispatcher {
  private readonly channel: ChannelClient;
  private readonly minIntervalMs: number;
  private readonly maxAttempts: number;
  private readonly baseDelayMs: number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => number;
  private readonly log = logger.child({ component: 'dispatcher' });

  private lastSendAt?: number;

  constructor(options: DispatcherOptions) {
    this.channel = options.channel;
    this.minIntervalMs = options.minIntervalMs;
    this.maxAttempts = Math.max(1, options.maxAttempts);
    this.baseDelayMs = options.baseDelayMs;
    this.sleep = options.sleep ?? delay;
    this.now = options.now ?? Date.now;
  }

  async deliver(notifications: Notification[], options: DeliverOptions = {}): Promise<DeliveryOutcome[]> {
    const outcomes: DeliveryOutcome[] = [];

    for (const notification of notifications) {
      if (options.signal?.aborted) {
        outcomes.push({ notification, status: 'aborted', attempts: 0, error: 'delivery aborted' });
        continue;
      }
      outcomes.push(await this.deliverOne(notification, options));
    }

    const delivered = outcomes.filter(o => o.status === 'delivered').length;
    if (notifications.length > 0) {
      this.log.info('Delivery finished', {
        total: notifications.length,
        delivered,
        failed: outcomes.filter(o => o.status === 'failed').length,
        aborted: outcomes.filter(o => o.status === 'aborted').length,
      });
    }

    return outcomes;
  }

  /**
   * Send a single message outside the ordered flow (startup announcement).
   */
  async sendOne(channelId: string, text: string): Promise<string> {
    return this.sendWithRetry(channelId, text, () => undefined);
  }

  private async deliverOne(notification: Notification, options: DeliverOptions): Promise<DeliveryOutcome> {
    const { key, channelId, text } = notification;
    let attempts = 0;

    let messageId: string;
    try {
      messageId = await this.sendWithRetry(channelId, text, () => attempts++, options.signal);
    } catch (error) {
      const reason = error instanceof DeliveryFailedError ? error.reason : 'unknown';
      this.log.warn('Notification not delivered', {
        category: key.category,
        identity: key.identity,
        attempts,
        reason,
        error: errorMessage(error),
      });
      return { notification, status: 'failed', attempts, error: errorMessage(error) };
    }

    this.log.debug('Notification delivered', { category: key.category, identity: key.identity, messageId, attempts });

    if (options.onDelivered) {
      try {
        await options.onDelivered(notification, messageId);
      } catch (error) {
        // Sent but not recorded: it will be offered again next cycle
        this.log.error('Post-delivery hook failed', {
          category: key.category,
          identity: key.identity,
          error: errorMessage(error),
        });
        return { notification, status: 'delivered', messageId, attempts, error: errorMessage(error) };
      }
    }

    return { notification, status: 'delivered', messageId, attempts };
  }

  /**
   * @throws DeliveryFailedError once retries are exhausted or the failure is permanent
   */
  private async sendWithRetry(
    channelId: string,
    text: string,
    onAttempt: () => void,
    signal?: AbortSignal
  ): Promise<string> {
    try {
      return await pRetry(
        async () => {
          await this.pace();
          onAttempt();
          try {
            return await this.channel.send(channelId, text);
          } catch (error) {
            if (error instanceof DeliveryFailedError) throw new AbortError(error);
            throw error;
          } finally {
            this.lastSendAt = this.now();
          }
        },
        {
          retries: this.maxAttempts - 1,
          factor: 2,
          minTimeout: this.baseDelayMs,
          maxTimeout: MAX_BACKOFF_MS,
          onFailedAttempt: async error => {
            this.log.debug('Send attempt failed', {
              attempt: error.attemptNumber,
              retriesLeft: error.retriesLeft,
              error: error.message,
            });
            if (signal?.aborted) {
              throw new DeliveryFailedError('aborted', `delivery aborted after ${error.attemptNumber} attempt(s)`);
            }
            if (error instanceof DeliveryTransientError && error.retryAfterMs !== undefined && error.retriesLeft > 0) {
              await this.sleep(error.retryAfterMs);
            }
          },
        }
      );
    } catch (error) {
      if (error instanceof DeliveryFailedError) throw error;
      throw new DeliveryFailedError('exhausted', `gave up after ${this.maxAttempts} attempt(s): ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }

  private async pace(): Promise<void> {
    if (this.lastSendAt === undefined || this.minIntervalMs <= 0) return;
    const wait = this.lastSendAt + this.minIntervalMs - this.now();
    if (wait > 0) {
      await this.sleep(wait);
    }
  }
}
