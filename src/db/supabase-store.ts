/**
 * Herald: Supabase Seen Store
 *
 * Table-backed store: one row per (category, identity). Each commit is a
 * single-row upsert, so per-key writes are atomic on the database side.
 */

import { z } from 'zod';
import type { SeenRecord, SourceCategory } from '../types';
import { SourceCategorySchema } from '../types';
import { StoreCorruptionError } from '../lib/errors';
import { toIsoDate } from '../lib/text';
import { IndexedSeenStore, type LoadResult } from './seen-store';
import type { SeenTable } from './queries';

const SeenRowSchema = z.object({
  category: SourceCategorySchema,
  identity: z.string().min(1),
  first_seen_at: z.string().min(1),
});

export class SupabaseSeenStore extends IndexedSeenStore {
  constructor(private readonly table: SeenTable) {
    super();
  }

  protected async load(): Promise<LoadResult> {
    const rows = await this.table.selectAll();
    const records: SeenRecord[] = [];
    const corrupt = new Map<SourceCategory | '*', StoreCorruptionError>();

    for (const row of rows) {
      const parsed = SeenRowSchema.safeParse(row);
      const firstSeenAt = parsed.success ? toIsoDate(parsed.data.first_seen_at) : undefined;

      if (!parsed.success || !firstSeenAt) {
        const category = SourceCategorySchema.safeParse(
          row !== null && typeof row === 'object' && 'category' in row ? row.category : undefined
        );
        const scope = category.success ? category.data : '*';
        if (!corrupt.has(scope)) {
          corrupt.set(scope, new StoreCorruptionError(scope, 'row failed validation'));
        }
        continue;
      }

      records.push({
        category: parsed.data.category,
        identity: parsed.data.identity,
        firstSeenAt,
      });
    }

    return { records, corruptions: [...corrupt.values()] };
  }

  protected async persistCommit(record: SeenRecord): Promise<void> {
    await this.table.insert({
      category: record.category,
      identity: record.identity,
      first_seen_at: record.firstSeenAt,
    });
  }

  protected async persistPrune(removed: SeenRecord[]): Promise<void> {
    const byCategory = new Map<SourceCategory, string[]>();
    for (const record of removed) {
      const identities = byCategory.get(record.category) ?? [];
      identities.push(record.identity);
      byCategory.set(record.category, identities);
    }

    for (const [category, identities] of byCategory) {
      await this.table.deleteIdentities(category, identities);
    }
  }
}
