/**
 * Herald: Item Identity
 *
 * Derives the deduplication key for a raw item. Natural identifiers win;
 * otherwise a SHA-256 over normalized title and URL, and only when both
 * are blank, over a normalized body prefix.
 */

import { createHash } from 'crypto';
import type { DedupKey, RawItem } from '../types';
import type { SeenView } from './base';

export const HASH_PREFIX = 'sha256:';

/**
 * Marks migrated content hashes the current sources cannot reproduce.
 * Such a record only says the category was tracked before.
 */
export const LEGACY_PREFIX = 'legacy:';

/** Body prefix length hashed when title and URL are both blank */
export const BODY_PREFIX_LENGTH = 500;

/**
 * Normalization shared by every hash input: NFC, collapsed whitespace,
 * trimmed, lowercased.
 */
export function normalizeForIdentity(text: string | undefined): string {
  if (!text) return '';
  return text.normalize('NFC').replace(/\s+/g, ' ').trim().toLowerCase();
}

export function hashContent(text: string): string {
  return createHash('sha256').update(text, 'utf8').digest('hex');
}

export function deriveKey(item: RawItem): DedupKey {
  const natural = item.naturalId?.trim();
  if (natural) {
    return { category: item.category, identity: natural };
  }

  const title = normalizeForIdentity(item.title);
  const url = normalizeForIdentity(item.url);
  if (title || url) {
    return { category: item.category, identity: HASH_PREFIX + hashContent(`${title}\n${url}`) };
  }

  const body = Array.from(normalizeForIdentity(item.body)).slice(0, BODY_PREFIX_LENGTH).join('');
  return { category: item.category, identity: HASH_PREFIX + hashContent(body) };
}

export function isLegacyIdentity(identity: string): boolean {
  return identity.startsWith(LEGACY_PREFIX);
}

/**
 * True when the store holds the item's key or one of its legacy aliases.
 */
export function isSeen(seen: SeenView, item: RawItem, key: DedupKey = deriveKey(item)): boolean {
  if (seen.has(key)) return true;
  return item.aliases?.some(alias => seen.has({ category: key.category, identity: alias })) ?? false;
}

export function keyToString(key: DedupKey): string {
  return `${key.category}:${key.identity}`;
}
