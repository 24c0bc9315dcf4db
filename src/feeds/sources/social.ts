/**
 * Herald: Social Timeline Source
 *
 * Best effort: reads a public timeline through an ordered list of mirror
 * front-ends. The first mirror that answers with at least one post wins.
 * When none does, the source yields nothing for the cycle instead of
 * failing.
 *
 * Ordering: oldest first.
 */

import * as cheerio from 'cheerio';
import { SourceAdapter, chronological, type FetchContext } from '../base';
import type { RawItem } from '../../types';
import { SourceUnavailableError } from '../../lib/errors';
import { fetchText } from '../../lib/http';
import { errorMessage, type Logger } from '../../lib/logger';
import { squish, toIsoDate, truncate } from '../../lib/text';

const TITLE_LENGTH = 100;

// ============================================================
// ORDERED ATTEMPTS
// ============================================================

export interface Attempt<T> {
  label: string;
  run: () => Promise<T>;
}

/**
 * Run attempts in order and return the first result, or undefined when
 * every attempt threw. Each failure is logged with its label.
 */
export async function firstSuccessful<T>(
  attempts: Attempt<T>[],
  log: Logger
): Promise<{ label: string; value: T } | undefined> {
  for (const attempt of attempts) {
    try {
      return { label: attempt.label, value: await attempt.run() };
    } catch (error) {
      log.debug('Attempt failed, trying next', { attempt: attempt.label, error: errorMessage(error) });
    }
  }
  return undefined;
}

// ============================================================
// SOURCE
// ============================================================

export interface SocialTimelineOptions {
  handle: string;
  /** Mirror base URLs, tried in order */
  mirrors: string[];
  maxItems?: number;
}

export class SocialTimelineSource extends SourceAdapter {
  readonly name = 'social';
  readonly kind = 'best_effort' as const;
  readonly category = 'social' as const;

  private readonly handle: string;
  private readonly mirrors: string[];
  private readonly maxItems: number;

  constructor(options: SocialTimelineOptions) {
    super();
    this.handle = options.handle.replace(/^@/, '');
    this.mirrors = options.mirrors.map(mirror => mirror.replace(/\/+$/, ''));
    this.maxItems = options.maxItems ?? 5;
  }

  async fetch({ signal }: FetchContext): Promise<RawItem[]> {
    const result = await firstSuccessful(
      this.mirrors.map(mirror => ({
        label: mirror,
        run: () => this.fetchMirror(mirror, signal),
      })),
      this.logger
    );

    if (!result) {
      this.logger.warn('No mirror answered, skipping timeline this cycle', { mirrors: this.mirrors.length });
      return [];
    }

    this.logger.debug('Timeline read', { mirror: result.label, posts: result.value.length });
    return result.value;
  }

  private async fetchMirror(mirror: string, signal: AbortSignal): Promise<RawItem[]> {
    const html = await fetchText(`${mirror}/${this.handle}`, { source: this.name, signal });
    const $ = cheerio.load(html);
    const items: RawItem[] = [];

    $('.timeline-item').each((_, element) => {
      if (items.length >= this.maxItems) return false;

      const post = $(element);
      if (post.find('.retweet-header').length > 0) return;

      const text = squish(post.find('.tweet-content').first().text());
      const statusId = parseStatusId(post.find('a.tweet-link').first().attr('href'));
      if (!text || !statusId) return;

      const dateTitle = post.find('span.tweet-date a').first().attr('title');

      items.push(
        this.item({
          naturalId: statusId,
          title: truncate(text, TITLE_LENGTH),
          body: text,
          url: `https://x.com/${this.handle}/status/${statusId}`,
          publishedAt: toIsoDate(dateTitle?.replace('·', '')),
          payload: { type: 'social', author: `@${this.handle}` },
        })
      );
    });

    if (items.length === 0) {
      throw new SourceUnavailableError(this.name, `empty timeline from ${mirror}`);
    }

    // Timelines run newest first
    return chronological(items.reverse());
  }
}

/**
 * "/handle/status/1234#m" → "1234"
 */
export function parseStatusId(href: string | undefined): string | undefined {
  if (!href) return undefined;
  const match = /\/status\/(\d+)/.exec(href);
  return match?.[1];
}
