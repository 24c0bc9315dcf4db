/**
 * Herald: Source Item Types
 *
 * Items produced by source adapters, the keys used to deduplicate them,
 * and the records the seen store persists.
 */

import { z } from 'zod';

// ============================================================
// SOURCE CATEGORY
// ============================================================

export const SourceCategorySchema = z.enum([
  'blog',
  'release',
  'merged_change',
  'changelog',
  'reference_doc',
  'incident_status',
  'social',
]);
export type SourceCategory = z.infer<typeof SourceCategorySchema>;

export const SOURCE_CATEGORIES: readonly SourceCategory[] = SourceCategorySchema.options;

export type SourceKind =
  | 'feed'           // syndication feed, entry GUID as identity
  | 'paginated_api'  // per-repository API listing
  | 'page_hash'      // unstructured page, content hash as identity
  | 'dual_feed'      // two encodings of one event stream
  | 'best_effort';   // mirror chain, silently degrades

// ============================================================
// PAYLOADS
// ============================================================

export type StatusType = 'incident' | 'resolved' | 'maintenance' | 'degraded' | 'update';

export type ItemPayload =
  | { type: 'blog'; source: 'rss' | 'web' }
  | { type: 'release'; repo: string; tag: string; name?: string; prerelease: boolean }
  | { type: 'merged_change'; repo: string; number: number; author?: string; baseBranch: string }
  | { type: 'changelog' }
  | { type: 'reference_doc'; hash: string; previousHash?: string }
  | { type: 'incident_status'; statusType: StatusType; feed: 'primary' | 'alternate' }
  | { type: 'social'; author: string };

// ============================================================
// RAW ITEM
// ============================================================

/**
 * One item as returned by a source adapter. Immutable once created.
 */
export interface RawItem {
  readonly category: SourceCategory;
  /** Identity the source itself provides (GUID, tag, number) */
  readonly naturalId?: string;
  /**
   * Identities the legacy store layout recorded this item under. A match
   * on any of them counts as seen.
   */
  readonly aliases?: readonly string[];
  readonly title: string;
  readonly body?: string;
  readonly url: string;
  /** ISO-8601 */
  readonly publishedAt?: string;
  readonly payload: ItemPayload;
}

// ============================================================
// DEDUP KEY / SEEN RECORD
// ============================================================

export const DedupKeySchema = z.object({
  category: SourceCategorySchema,
  identity: z.string().min(1),
});
export type DedupKey = z.infer<typeof DedupKeySchema>;

export const SeenRecordSchema = DedupKeySchema.extend({
  firstSeenAt: z.string().datetime({ offset: true }),
});
export type SeenRecord = z.infer<typeof SeenRecordSchema>;

/**
 * Item that passed change detection, paired with its key.
 */
export interface DetectedItem {
  item: RawItem;
  key: DedupKey;
}
