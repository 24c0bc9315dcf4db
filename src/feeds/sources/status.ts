/**
 * Herald: Incident Status Source
 *
 * The status page publishes the same event stream as RSS and as Atom.
 * Both are read concurrently and merged; either one alone is enough.
 * Entries are keyed by link, which both encodings share.
 *
 * Ordering: oldest first.
 */

import { SourceAdapter, chronological, type FetchContext } from '../base';
import type { RawItem, StatusType } from '../../types';
import { SourceUnavailableError } from '../../lib/errors';
import { fetchText } from '../../lib/http';
import { errorMessage } from '../../lib/logger';
import { squish, stripHtml, truncate } from '../../lib/text';
import { entryDate, parseFeed, type FeedEntry } from './feed';

const BODY_LENGTH = 400;

type FeedRole = 'primary' | 'alternate';

/** First matching rule wins; resolution wording beats incident wording */
const STATUS_RULES: Array<[StatusType, string[]]> = [
  ['resolved', ['resolved', 'fixed', 'restored']],
  ['incident', ['incident', 'outage', 'down', 'error']],
  ['maintenance', ['maintenance', 'scheduled', 'upgrade']],
  ['degraded', ['degraded', 'performance', 'slow']],
];

export function classifyStatus(title: string): StatusType {
  const lower = title.toLowerCase();
  for (const [type, keywords] of STATUS_RULES) {
    if (keywords.some(keyword => lower.includes(keyword))) return type;
  }
  return 'update';
}

export interface StatusFeedOptions {
  rssUrl: string;
  atomUrl: string;
  /** Entries read from each feed */
  maxItems?: number;
}

export class StatusFeedSource extends SourceAdapter {
  readonly name = 'status';
  readonly kind = 'dual_feed' as const;
  readonly category = 'incident_status' as const;

  private readonly feeds: Array<[FeedRole, string]>;
  private readonly maxItems: number;

  constructor(options: StatusFeedOptions) {
    super();
    this.feeds = [
      ['primary', options.rssUrl],
      ['alternate', options.atomUrl],
    ];
    this.maxItems = options.maxItems ?? 5;
  }

  async fetch({ signal }: FetchContext): Promise<RawItem[]> {
    const results = await Promise.allSettled(
      this.feeds.map(async ([role, url]) => {
        const xml = await fetchText(url, { source: this.name, signal });
        const entries = await parseFeed(xml, this.name);
        return entries.slice(0, this.maxItems).map(entry => this.toItem(entry, role));
      })
    );

    const merged = new Map<string, RawItem>();
    const failures: string[] = [];

    results.forEach((result, index) => {
      const [role] = this.feeds[index];
      if (result.status === 'rejected') {
        const message = errorMessage(result.reason);
        failures.push(`${role}: ${message}`);
        this.logger.warn('Status feed failed', { feed: role, error: message });
        return;
      }
      for (const item of result.value) {
        const id = item.naturalId ?? `${item.title}\n${item.url}`;
        const existing = merged.get(id);
        merged.set(id, existing ? this.withAliases(existing, item.aliases) : item);
      }
    });

    if (failures.length === this.feeds.length) {
      throw new SourceUnavailableError(this.name, `both feeds failed (${failures.join('; ')})`);
    }

    return chronological([...merged.values()]);
  }

  /** The same entry from the other encoding may carry a different guid */
  private withAliases(item: RawItem, aliases: readonly string[] | undefined): RawItem {
    if (!aliases?.length) return item;
    const merged = [...new Set([...(item.aliases ?? []), ...aliases])];
    return this.item({ ...item, aliases: merged });
  }

  private toItem(entry: FeedEntry, feed: FeedRole): RawItem {
    const title = squish(entry.title ?? '');
    const content = entry.contentSnippet ?? stripHtml(entry.content ?? entry.summary ?? '');
    const link = entry.link?.trim() || undefined;
    // Legacy records keyed entries by guid / atom id before the link
    const entryId = entry.guid?.trim() || entry.id?.trim() || undefined;

    return this.item({
      naturalId: link ?? entryId,
      ...(entryId && entryId !== link ? { aliases: [entryId] } : {}),
      title,
      body: truncate(squish(content), BODY_LENGTH),
      url: entry.link?.trim() ?? '',
      publishedAt: entryDate(entry),
      payload: { type: 'incident_status', statusType: classifyStatus(title), feed },
    });
  }
}
