/**
 * Herald: Telegram Delivery
 *
 * Posts HTML messages to a channel through the Bot API sendMessage call.
 * Failures are classified so the dispatcher knows which ones to retry:
 *
 *   429                         transient, honors retry_after
 *   5xx, timeout, network       transient
 *   401 / 403                   unauthorized
 *   "chat not found"            chat_not_found
 *   "message is too long"       message_too_long
 *   any other 4xx               bad_request
 */

import { z } from 'zod';
import { DeliveryFailedError, DeliveryTransientError } from '../lib/errors';
import { errorMessage, logger } from '../lib/logger';

// ============================================================
// TYPES
// ============================================================

/**
 * A destination that can post a message and return its id.
 */
export interface ChannelClient {
  readonly name: string;
  /**
   * @returns the platform's message id
   * @throws DeliveryTransientError | DeliveryFailedError
   */
  send(channelId: string, text: string): Promise<string>;
}

export interface TelegramConfig {
  botToken: string;
  apiBase?: string;
  /** Per-request timeout */
  timeoutMs?: number;
}

const TelegramResponseSchema = z.object({
  ok: z.boolean(),
  result: z.object({ message_id: z.number() }).optional(),
  error_code: z.number().optional(),
  description: z.string().optional(),
  parameters: z.object({ retry_after: z.number().optional() }).optional(),
});

type TelegramResponse = z.infer<typeof TelegramResponseSchema>;

// ============================================================
// TELEGRAM
// ============================================================

export class TelegramChannel implements ChannelClient {
  readonly name = 'telegram';

  private readonly endpoint: string;
  private readonly timeoutMs: number;

  constructor(config: TelegramConfig) {
    const base = (config.apiBase ?? 'https://api.telegram.org').replace(/\/+$/, '');
    this.endpoint = `${base}/bot${config.botToken}/sendMessage`;
    this.timeoutMs = config.timeoutMs ?? 15_000;
  }

  async send(channelId: string, text: string): Promise<string> {
    let res: Response;
    try {
      res = await fetch(this.endpoint, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
          chat_id: channelId,
          text,
          parse_mode: 'HTML',
          link_preview_options: { is_disabled: true },
        }),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      // The endpoint embeds the bot token, so the cause is not echoed
      if (error instanceof Error && error.name === 'TimeoutError') {
        throw new DeliveryTransientError('timeout', `sendMessage timed out after ${this.timeoutMs}ms`);
      }
      throw new DeliveryTransientError('network', `sendMessage request failed: ${errorMessage(error)}`);
    }

    const body = await this.readBody(res);

    if (res.ok && body?.ok && body.result) {
      return String(body.result.message_id);
    }

    throw classifyFailure(res.status, body);
  }

  private async readBody(res: Response): Promise<TelegramResponse | undefined> {
    let json: unknown;
    try {
      json = await res.json();
    } catch (error) {
      logger.debug('Telegram response is not JSON', { status: res.status, error: errorMessage(error) });
      return undefined;
    }
    const parsed = TelegramResponseSchema.safeParse(json);
    return parsed.success ? parsed.data : undefined;
  }
}

/**
 * Map an unsuccessful sendMessage response to a delivery error.
 */
export function classifyFailure(
  status: number,
  body: TelegramResponse | undefined
): DeliveryTransientError | DeliveryFailedError {
  const description = body?.description ?? `HTTP ${status}`;
  const code = body?.error_code ?? status;
  const lower = description.toLowerCase();

  if (code === 429) {
    const retryAfter = body?.parameters?.retry_after;
    return new DeliveryTransientError(
      'rate_limited',
      description,
      retryAfter !== undefined ? retryAfter * 1000 : undefined
    );
  }
  if (code >= 500) {
    return new DeliveryTransientError('server', description);
  }
  if (code === 401 || code === 403) {
    return new DeliveryFailedError('unauthorized', description);
  }
  if (lower.includes('chat not found')) {
    return new DeliveryFailedError('chat_not_found', description);
  }
  if (lower.includes('message is too long')) {
    return new DeliveryFailedError('message_too_long', description);
  }
  return new DeliveryFailedError('bad_request', description);
}

// ============================================================
// CONSOLE (dry run)
// ============================================================

/**
 * Prints messages instead of posting them.
 */
export class ConsoleChannel implements ChannelClient {
  readonly name = 'console';
  private sent = 0;

  async send(channelId: string, text: string): Promise<string> {
    this.sent += 1;
    console.log('\n' + '─'.repeat(60));
    console.log(`[dry run] message ${this.sent} → ${channelId}`);
    console.log('─'.repeat(60));
    console.log(text);
    return `console-${this.sent}`;
  }
}
