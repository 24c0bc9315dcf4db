/**
 * Herald: Seen Store
 *
 * Persistent set of (category, identity) pairs already announced.
 *
 * Lifecycle: open() at process start, commit() after each confirmed
 * delivery, prune() at the end of a cycle, close() at shutdown. Lookups
 * are served from an in-memory index loaded at open; every mutation is
 * persisted before the call resolves.
 *
 * A category whose persisted data fails validation is treated as empty
 * and reported through corruptCategories(); its items are announced again.
 */

import type { DedupKey, SeenRecord, SourceCategory } from '../types';
import type { SeenView } from '../feeds/base';
import { StoreCorruptionError } from '../lib/errors';
import { logger } from '../lib/logger';

// ============================================================
// INTERFACE
// ============================================================

export interface PruneOptions {
  /** Restrict pruning to these categories (default: all) */
  categories?: SourceCategory[];
}

export interface SeenStore extends SeenView {
  open(): Promise<void>;
  close(): Promise<void>;
  has(key: DedupKey): boolean;
  /** Record a delivered key. A key already present keeps its first-seen time. */
  commit(key: DedupKey, at?: Date): Promise<void>;
  /**
   * Remove records first seen before `before`. The newest record of each
   * category is always kept.
   * @returns number of records removed
   */
  prune(before: Date, options?: PruneOptions): Promise<number>;
  count(category: SourceCategory): number;
  latest(category: SourceCategory): SeenRecord | undefined;
  corruptCategories(): Array<SourceCategory | '*'>;
  snapshot(): Record<SourceCategory, number>;
}

export interface LoadResult {
  records: SeenRecord[];
  corruptions: StoreCorruptionError[];
}

// ============================================================
// INDEXED BASE
// ============================================================

/**
 * In-memory index shared by every backend. Subclasses only decide how
 * records are loaded and persisted.
 */
export abstract class IndexedSeenStore implements SeenStore {
  /** category → identity → first-seen ISO timestamp (insertion ordered) */
  private readonly index = new Map<SourceCategory, Map<string, string>>();
  private readonly corrupt = new Set<SourceCategory | '*'>();
  private opened = false;

  protected readonly log = logger.child({ component: 'seen-store' });

  protected abstract load(): Promise<LoadResult>;
  protected abstract persistCommit(record: SeenRecord): Promise<void>;
  protected abstract persistPrune(removed: SeenRecord[]): Promise<void>;

  protected async persistClose(): Promise<void> {}

  async open(): Promise<void> {
    if (this.opened) return;

    const { records, corruptions } = await this.load();

    this.index.clear();
    this.corrupt.clear();

    for (const corruption of corruptions) {
      this.corrupt.add(corruption.category);
      this.log.error('Seen store category corrupted, treating as empty', {
        category: corruption.category,
        error: corruption.message,
      });
    }

    for (const record of records) {
      if (this.corrupt.has(record.category)) continue;
      this.bucket(record.category).set(record.identity, record.firstSeenAt);
    }

    this.opened = true;
    this.log.info('Seen store opened', { ...this.snapshot() });
  }

  async close(): Promise<void> {
    if (!this.opened) return;
    await this.persistClose();
    this.opened = false;
    this.log.info('Seen store closed');
  }

  has(key: DedupKey): boolean {
    return this.index.get(key.category)?.has(key.identity) ?? false;
  }

  async commit(key: DedupKey, at: Date = new Date()): Promise<void> {
    this.assertOpen();
    if (this.has(key)) return;

    const record: SeenRecord = { ...key, firstSeenAt: at.toISOString() };
    const bucket = this.bucket(key.category);
    bucket.set(key.identity, record.firstSeenAt);

    try {
      await this.persistCommit(record);
    } catch (error) {
      // Not durable, so not seen: the item must be re-offered
      bucket.delete(key.identity);
      throw error;
    }
  }

  async prune(before: Date, options: PruneOptions = {}): Promise<number> {
    this.assertOpen();
    const cutoff = before.getTime();
    const categories = options.categories ?? [...this.index.keys()];
    const removed: SeenRecord[] = [];

    for (const category of categories) {
      const bucket = this.index.get(category);
      if (!bucket || bucket.size <= 1) continue;

      const newest = this.latest(category);
      for (const [identity, firstSeenAt] of bucket) {
        if (identity === newest?.identity) continue;
        if (Date.parse(firstSeenAt) < cutoff) {
          removed.push({ category, identity, firstSeenAt });
        }
      }
    }

    if (removed.length === 0) return 0;

    for (const record of removed) {
      this.index.get(record.category)?.delete(record.identity);
    }

    try {
      await this.persistPrune(removed);
    } catch (error) {
      for (const record of removed) {
        this.bucket(record.category).set(record.identity, record.firstSeenAt);
      }
      throw error;
    }

    this.log.info('Seen store pruned', { removed: removed.length, before: before.toISOString() });
    return removed.length;
  }

  count(category: SourceCategory): number {
    return this.index.get(category)?.size ?? 0;
  }

  latest(category: SourceCategory): SeenRecord | undefined {
    const bucket = this.index.get(category);
    if (!bucket) return undefined;

    let newest: SeenRecord | undefined;
    for (const [identity, firstSeenAt] of bucket) {
      // >= so that the later insert wins a tie
      if (!newest || Date.parse(firstSeenAt) >= Date.parse(newest.firstSeenAt)) {
        newest = { category, identity, firstSeenAt };
      }
    }
    return newest;
  }

  corruptCategories(): Array<SourceCategory | '*'> {
    return [...this.corrupt];
  }

  snapshot(): Record<SourceCategory, number> {
    return {
      blog: this.count('blog'),
      release: this.count('release'),
      merged_change: this.count('merged_change'),
      changelog: this.count('changelog'),
      reference_doc: this.count('reference_doc'),
      incident_status: this.count('incident_status'),
      social: this.count('social'),
    };
  }

  /**
   * Every record currently indexed, grouped by category.
   */
  exportRecords(): SeenRecord[] {
    const all: SeenRecord[] = [];
    for (const [category, bucket] of this.index) {
      for (const [identity, firstSeenAt] of bucket) {
        all.push({ category, identity, firstSeenAt });
      }
    }
    return all;
  }

  private bucket(category: SourceCategory): Map<string, string> {
    let bucket = this.index.get(category);
    if (!bucket) {
      bucket = new Map();
      this.index.set(category, bucket);
    }
    return bucket;
  }

  private assertOpen(): void {
    if (!this.opened) {
      throw new Error('Seen store is not open');
    }
  }
}

// ============================================================
// MEMORY BACKEND
// ============================================================

/**
 * Non-durable store. Used for dry runs (seeded from the real store so
 * detection matches production) and in tests.
 */
export class MemorySeenStore extends IndexedSeenStore {
  constructor(private readonly initial: SeenRecord[] = []) {
    super();
  }

  static async copyOf(store: IndexedSeenStore): Promise<MemorySeenStore> {
    const copy = new MemorySeenStore(store.exportRecords());
    await copy.open();
    return copy;
  }

  protected async load(): Promise<LoadResult> {
    return { records: [...this.initial], corruptions: [] };
  }

  protected async persistCommit(): Promise<void> {}

  protected async persistPrune(): Promise<void> {}
}
