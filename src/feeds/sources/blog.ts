/**
 * Herald: Blog Feed Source
 *
 * Latest posts from the blog RSS feed. When the feed is down or empty the
 * blog homepage is scraped instead; only both failing makes the source
 * unavailable.
 *
 * Ordering: oldest first.
 */

import * as cheerio from 'cheerio';
import { SourceAdapter, chronological, type FetchContext } from '../base';
import type { RawItem } from '../../types';
import { SourceUnavailableError } from '../../lib/errors';
import { fetchText } from '../../lib/http';
import { errorMessage } from '../../lib/logger';
import { squish, stripHtml, truncate } from '../../lib/text';
import { entryDate, entryId, parseFeed } from './feed';

const SUMMARY_LENGTH = 300;

export interface BlogFeedOptions {
  rssUrl: string;
  /** Homepage scraped when the feed fails */
  blogUrl: string;
  maxItems?: number;
}

export class BlogFeedSource extends SourceAdapter {
  readonly name = 'blog';
  readonly kind = 'feed' as const;
  readonly category = 'blog' as const;

  private readonly rssUrl: string;
  private readonly blogUrl: string;
  private readonly maxItems: number;

  constructor(options: BlogFeedOptions) {
    super();
    this.rssUrl = options.rssUrl;
    this.blogUrl = options.blogUrl;
    this.maxItems = options.maxItems ?? 5;
  }

  async fetch({ signal }: FetchContext): Promise<RawItem[]> {
    try {
      return await this.fetchFeed(signal);
    } catch (error) {
      if (!(error instanceof SourceUnavailableError)) throw error;
      this.logger.info('Blog feed failed, scraping homepage', { error: error.message });
      return this.fetchHomepageInstead(signal, error);
    }
  }

  private async fetchHomepageInstead(signal: AbortSignal, feedError: Error): Promise<RawItem[]> {
    try {
      return await this.fetchHomepage(signal);
    } catch (error) {
      throw new SourceUnavailableError(
        this.name,
        `feed and homepage both failed (${feedError.message}; ${errorMessage(error)})`,
        { cause: error }
      );
    }
  }

  private async fetchFeed(signal: AbortSignal): Promise<RawItem[]> {
    const xml = await fetchText(this.rssUrl, { source: this.name, signal });
    const entries = await parseFeed(xml, this.name);

    const items = entries.slice(0, this.maxItems).map(entry => {
      const summary = entry.contentSnippet ?? stripHtml(entry.content ?? entry.summary ?? '');
      return this.item({
        naturalId: entryId(entry),
        title: squish(entry.title ?? ''),
        body: truncate(squish(summary), SUMMARY_LENGTH),
        url: entry.link?.trim() ?? '',
        publishedAt: entryDate(entry),
        payload: { type: 'blog', source: 'rss' },
      });
    });

    return chronological(items);
  }

  private async fetchHomepage(signal: AbortSignal): Promise<RawItem[]> {
    const html = await fetchText(this.blogUrl, { source: this.name, signal });
    const $ = cheerio.load(html);
    const items: RawItem[] = [];

    $('article, div.post, div.blog-post, div.article').each((_, element) => {
      if (items.length >= this.maxItems) return false;

      const block = $(element);
      const title = squish(block.find('h1, h2, h3, a').first().text());
      const href = block.find('a[href]').first().attr('href');
      if (!title || !href) return;

      const url = resolveUrl(href, this.blogUrl);
      if (!url) return;
      items.push(
        this.item({
          naturalId: url,
          title,
          url,
          payload: { type: 'blog', source: 'web' },
        })
      );
    });

    if (items.length === 0) {
      throw new SourceUnavailableError(this.name, 'no posts found on homepage');
    }

    // Listings run newest first and carry no dates
    return items.reverse();
  }
}

function resolveUrl(href: string, base: string): string | undefined {
  try {
    return new URL(href, base).toString();
  } catch {
    return undefined;
  }
}
