/**
 * Herald: Seen Store Factory
 */

import type { HeraldConfig } from '../lib/config';
import { createServiceClient } from './client';
import { createSeenTable } from './queries';
import { FileSeenStore } from './file-store';
import { SupabaseSeenStore } from './supabase-store';
import type { IndexedSeenStore } from './seen-store';

export { IndexedSeenStore, MemorySeenStore, type SeenStore, type PruneOptions } from './seen-store';
export { FileSeenStore } from './file-store';
export { SupabaseSeenStore } from './supabase-store';
export type { SeenTable, SeenRow } from './queries';

export function createSeenStore(config: HeraldConfig['store']): IndexedSeenStore {
  switch (config.backend) {
    case 'file':
      return new FileSeenStore(config.file);
    case 'supabase':
      return new SupabaseSeenStore(
        createSeenTable(createServiceClient(config.url, config.serviceRoleKey), config.table)
      );
  }
}
