/**
 * Herald: Source Adapter Base
 *
 * Abstract base class for all polled sources. Each adapter implements one
 * capability, fetch(), and declares its kind and category. Adapters never
 * mutate shared state; the only store access they get is a read-only view.
 */

import type { RawItem, SeenRecord, SourceCategory, SourceKind, DedupKey } from '../types';
import { logger, type Logger } from '../lib/logger';

/**
 * Read-only slice of the seen store handed to adapters.
 */
export interface SeenView {
  has(key: DedupKey): boolean;
  latest(category: SourceCategory): SeenRecord | undefined;
}

export interface FetchContext {
  /** Aborted when the source exceeds its time budget */
  signal: AbortSignal;
  seen: SeenView;
}

/**
 * Abstract base class for sources.
 */
export abstract class SourceAdapter {
  abstract readonly name: string;
  abstract readonly kind: SourceKind;
  abstract readonly category: SourceCategory;

  private childLogger?: Logger;

  protected get logger(): Logger {
    this.childLogger ??= logger.child({ source: this.name });
    return this.childLogger;
  }

  /**
   * Fetch current items, oldest first.
   * @throws SourceUnavailableError when the source cannot be read this cycle
   */
  abstract fetch(context: FetchContext): Promise<RawItem[]>;

  protected item(fields: Omit<RawItem, 'category'>): RawItem {
    return Object.freeze({ ...fields, category: this.category });
  }
}

/**
 * Sort oldest first. Items without a date keep their relative position
 * after the dated ones.
 */
export function chronological(items: RawItem[]): RawItem[] {
  return items
    .map((item, index) => ({ item, index, time: item.publishedAt ? Date.parse(item.publishedAt) : NaN }))
    .sort((a, b) => {
      const aDated = !Number.isNaN(a.time);
      const bDated = !Number.isNaN(b.time);
      if (aDated && bDated && a.time !== b.time) return a.time - b.time;
      if (aDated !== bDated) return aDated ? -1 : 1;
      return a.index - b.index;
    })
    .map(entry => entry.item);
}

/**
 * Registry of the sources selected at startup.
 */
export class SourceRegistry {
  private readonly sources = new Map<string, SourceAdapter>();

  register(source: SourceAdapter): this {
    if (this.sources.has(source.name)) {
      throw new Error(`Source already registered: ${source.name}`);
    }
    this.sources.set(source.name, source);
    logger.debug('Source registered', { name: source.name, kind: source.kind, category: source.category });
    return this;
  }

  get(name: string): SourceAdapter | undefined {
    return this.sources.get(name);
  }

  all(): SourceAdapter[] {
    return Array.from(this.sources.values());
  }

  categories(): SourceCategory[] {
    return [...new Set(this.all().map(s => s.category))];
  }
}
