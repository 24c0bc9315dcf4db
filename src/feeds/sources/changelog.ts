/**
 * Herald: Docs Changelog Source
 *
 * Scrapes the documentation changelog page. Entries have no stable
 * identifier of their own, so identity falls back to the content hash.
 *
 * Ordering: the page lists newest first; returned oldest first.
 */

import * as cheerio from 'cheerio';
import { SourceAdapter, type FetchContext } from '../base';
import type { RawItem } from '../../types';
import { SourceUnavailableError } from '../../lib/errors';
import { fetchText } from '../../lib/http';
import { squish, truncate } from '../../lib/text';

const SCANNED_BLOCKS = 10;
const MIN_TEXT_LENGTH = 10;
const TITLE_LENGTH = 100;
const BODY_LENGTH = 500;
const NAVIGATION_LABELS = ['Table of Contents', 'Navigation'];

export interface ChangelogPageOptions {
  url: string;
  maxItems?: number;
}

export class ChangelogPageSource extends SourceAdapter {
  readonly name = 'changelog';
  readonly kind = 'page_hash' as const;
  readonly category = 'changelog' as const;

  private readonly url: string;
  private readonly maxItems: number;

  constructor(options: ChangelogPageOptions) {
    super();
    this.url = options.url;
    this.maxItems = options.maxItems ?? 5;
  }

  async fetch({ signal }: FetchContext): Promise<RawItem[]> {
    const html = await fetchText(this.url, { source: this.name, signal });
    const $ = cheerio.load(html);

    const container = ['main', 'article', 'body']
      .map(selector => $(selector).first())
      .find(candidate => candidate.length > 0);
    if (!container) {
      throw new SourceUnavailableError(this.name, 'page has no content container');
    }

    const items: RawItem[] = [];
    container
      .find('h2, h3, article')
      .slice(0, SCANNED_BLOCKS)
      .each((_, element) => {
        if (items.length >= this.maxItems) return false;

        const block = $(element);
        const heading = squish(block.text());
        if (heading.length < MIN_TEXT_LENGTH) return;
        if (NAVIGATION_LABELS.some(label => heading.includes(label))) return;

        // A heading's entry is the prose up to the next heading
        const details = block.is('article')
          ? ''
          : squish(
              block
                .nextUntil('h2, h3')
                .map((_, sibling) => $(sibling).text())
                .get()
                .join(' ')
            );
        const anchor = block.attr('id');

        items.push(
          this.item({
            title: truncate(heading, TITLE_LENGTH),
            body: truncate(details ? `${heading}\n${details}` : heading, BODY_LENGTH),
            url: anchor ? `${this.url}#${anchor}` : this.url,
            payload: { type: 'changelog' },
          })
        );
      });

    if (items.length === 0) {
      throw new SourceUnavailableError(this.name, 'no changelog entries found');
    }

    this.logger.debug('Changelog entries parsed', { count: items.length });
    return items.reverse();
  }
}
