/**
 * Herald: Error Taxonomy
 *
 * SourceUnavailable   one source, one cycle; zero items assumed
 * DeliveryTransient   retried with backoff, then demoted to DeliveryFailed
 * DeliveryFailed      that notification only; re-offered next cycle since it was never committed
 * StoreCorruption     one category treated as empty; operator-visible via logs and /status
 */

import type { SourceCategory } from '../types';

export class HeraldError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConfigError extends HeraldError {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
  }
}

export class SourceUnavailableError extends HeraldError {
  constructor(
    readonly source: string,
    reason: string,
    options?: { cause?: unknown }
  ) {
    super(`${source} unavailable: ${reason}`, options);
  }
}

export type TransientReason = 'rate_limited' | 'timeout' | 'network' | 'server';

export class DeliveryTransientError extends HeraldError {
  constructor(
    readonly reason: TransientReason,
    message: string,
    readonly retryAfterMs?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export type PermanentReason =
  | 'unauthorized'
  | 'chat_not_found'
  | 'message_too_long'
  | 'bad_request'
  | 'exhausted'
  | 'aborted';

export class DeliveryFailedError extends HeraldError {
  constructor(
    readonly reason: PermanentReason,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export class StoreCorruptionError extends HeraldError {
  constructor(
    readonly category: SourceCategory | '*',
    detail: string,
    options?: { cause?: unknown }
  ) {
    super(`Seen store corrupted for ${category}: ${detail}`, options);
  }
}
