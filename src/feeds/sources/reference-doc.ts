/**
 * Herald: Reference Document Source
 *
 * Watches a single static page by hashing its visible text. Yields one
 * item when the hash differs from the last one committed, none otherwise.
 * Comparing against the store rather than adapter memory means a change
 * whose delivery failed is offered again next cycle.
 *
 * A version's identity is its hash plus the hash it replaced
 * (`sha256:<hash>@<previous>`), so reverting to an earlier text is a new
 * change rather than one already seen. A migrated legacy record counts as
 * no baseline.
 */

import * as cheerio from 'cheerio';
import { SourceAdapter, type FetchContext } from '../base';
import type { RawItem } from '../../types';
import { SourceUnavailableError } from '../../lib/errors';
import { fetchText } from '../../lib/http';
import { blockText, squish, truncate } from '../../lib/text';
import { HASH_PREFIX, hashContent } from '../identity';

const EXCERPT_LENGTH = 300;
const PREVIOUS_SEPARATOR = '@';

export function versionIdentity(hash: string, previousHash?: string): string {
  return previousHash ? `${HASH_PREFIX}${hash}${PREVIOUS_SEPARATOR}${previousHash}` : HASH_PREFIX + hash;
}

/**
 * Hash of the version a stored identity records, or undefined for an
 * identity this source did not write.
 */
export function versionHash(identity: string): string | undefined {
  if (!identity.startsWith(HASH_PREFIX)) return undefined;
  return identity.slice(HASH_PREFIX.length).split(PREVIOUS_SEPARATOR)[0] || undefined;
}

export interface ReferenceDocumentOptions {
  url: string;
  /** Title used when the page has no h1 */
  fallbackTitle?: string;
}

export class ReferenceDocumentSource extends SourceAdapter {
  readonly name = 'reference-doc';
  readonly kind = 'page_hash' as const;
  readonly category = 'reference_doc' as const;

  private readonly url: string;
  private readonly fallbackTitle: string;

  constructor(options: ReferenceDocumentOptions) {
    super();
    this.url = options.url;
    this.fallbackTitle = options.fallbackTitle ?? 'Reference document';
  }

  async fetch({ signal, seen }: FetchContext): Promise<RawItem[]> {
    const html = await fetchText(this.url, { source: this.name, signal });
    const $ = cheerio.load(html);
    $('script, style, noscript').remove();

    let text = '';
    for (const selector of ['main', 'article', 'body']) {
      text = blockText($, selector);
      if (text) break;
    }
    if (!text) {
      throw new SourceUnavailableError(this.name, 'page has no readable text');
    }

    const hash = hashContent(text);
    const latest = seen.latest(this.category);
    const previousHash = latest ? versionHash(latest.identity) : undefined;

    if (previousHash === hash) {
      this.logger.debug('Reference document unchanged', { hash });
      return [];
    }

    this.logger.info('Reference document changed', { hash, previousHash });

    return [
      this.item({
        naturalId: versionIdentity(hash, previousHash),
        title: squish($('h1').first().text()) || this.fallbackTitle,
        body: truncate(text, EXCERPT_LENGTH),
        url: this.url,
        payload: { type: 'reference_doc', hash, previousHash },
      }),
    ];
  }
}
