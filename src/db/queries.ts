/**
 * Herald: Seen Table Queries
 *
 * Row-level operations on the seen_items table (supabase/seen_items.sql).
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import { handleSupabaseError } from './client';

export interface SeenRow {
  category: string;
  identity: string;
  first_seen_at: string;
}

/**
 * Repository over the seen table. The Supabase-backed store depends on
 * this interface only.
 */
export interface SeenTable {
  /** Every row, oldest first. Rows are unvalidated. */
  selectAll(): Promise<unknown[]>;
  /** Insert a row; an existing (category, identity) is left untouched. */
  insert(row: SeenRow): Promise<void>;
  deleteIdentities(category: string, identities: string[]): Promise<void>;
}

const PAGE_SIZE = 1000;
const DELETE_CHUNK = 100;

export function createSeenTable(client: SupabaseClient, table: string): SeenTable {
  return {
    async selectAll() {
      const rows: unknown[] = [];

      for (let from = 0; ; from += PAGE_SIZE) {
        const { data, error } = await client
          .from(table)
          .select('category, identity, first_seen_at')
          .order('first_seen_at', { ascending: true })
          .range(from, from + PAGE_SIZE - 1);

        if (error) throw handleSupabaseError(error);
        const page: unknown[] = data ?? [];
        rows.push(...page);
        if (page.length < PAGE_SIZE) break;
      }

      return rows;
    },

    async insert(row) {
      const { error } = await client
        .from(table)
        .upsert(row, { onConflict: 'category,identity', ignoreDuplicates: true });

      if (error) throw handleSupabaseError(error);
    },

    async deleteIdentities(category, identities) {
      for (let i = 0; i < identities.length; i += DELETE_CHUNK) {
        const { error } = await client
          .from(table)
          .delete()
          .eq('category', category)
          .in('identity', identities.slice(i, i + DELETE_CHUNK));

        if (error) throw handleSupabaseError(error);
      }
    },
  };
}
