/**
 * Herald: Feed Parsing
 *
 * Thin wrapper over rss-parser shared by the feed-backed sources.
 */

import Parser from 'rss-parser';
import { SourceUnavailableError } from '../../lib/errors';
import { errorMessage } from '../../lib/logger';
import { toIsoDate } from '../../lib/text';

/** Atom entries carry their identifier in `id` */
interface EntryExtras {
  id?: string;
}

export type FeedEntry = Parser.Item & EntryExtras;

const parser = new Parser<Record<string, unknown>, EntryExtras>();

/**
 * Parse an RSS or Atom document.
 * @throws SourceUnavailableError when the XML is malformed or has no entries
 */
export async function parseFeed(xml: string, source: string): Promise<FeedEntry[]> {
  let entries: FeedEntry[];
  try {
    const feed = await parser.parseString(xml);
    entries = feed.items;
  } catch (error) {
    throw new SourceUnavailableError(source, `malformed feed: ${errorMessage(error)}`, { cause: error });
  }

  if (entries.length === 0) {
    throw new SourceUnavailableError(source, 'feed has no entries');
  }
  return entries;
}

/**
 * Natural identifier of an entry: GUID, then Atom id, then link.
 */
export function entryId(entry: FeedEntry): string | undefined {
  return entry.guid?.trim() || entry.id?.trim() || entry.link?.trim() || undefined;
}

/**
 * Publication date as ISO-8601 (rss-parser fills isoDate for both encodings).
 */
export function entryDate(entry: FeedEntry): string | undefined {
  return toIsoDate(entry.isoDate ?? entry.pubDate);
}
