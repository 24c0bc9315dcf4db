/**
 * Herald: File Seen Store
 *
 * JSON document on local disk. Every mutation rewrites the whole document
 * to a temp file and renames it over the original, so a crash mid-write
 * leaves either the old or the new state, never a torn one.
 *
 * Layout (version 1):
 *   { "version": 1, "updatedAt": "...", "categories": { "blog": { "<identity>": "<firstSeenAt>" } } }
 *
 * The flat legacy layout ({ "blog": ["id", ...], "github": [...], "last_updated": "..." })
 * is read on open and rewritten as version 1 on the next mutation. Legacy
 * ids are translated where the current identity can be derived from them;
 * content hashes are kept under LEGACY_PREFIX as a baseline marker.
 */

import { copyFile, mkdir, readFile, rename, unlink, writeFile } from 'fs/promises';
import { dirname } from 'path';
import { z } from 'zod';
import type { SeenRecord, SourceCategory } from '../types';
import { SourceCategorySchema } from '../types';
import { StoreCorruptionError } from '../lib/errors';
import { LEGACY_PREFIX } from '../feeds/identity';
import { errorMessage } from '../lib/logger';
import { IndexedSeenStore, type LoadResult } from './seen-store';

// ============================================================
// SCHEMAS
// ============================================================

const FirstSeenSchema = z.string().datetime({ offset: true });

const CategoryEntriesSchema = z.record(z.string().min(1), FirstSeenSchema);

const DocumentSchema = z.object({
  version: z.literal(1),
  updatedAt: z.string().optional(),
  categories: z.record(z.string(), z.unknown()),
});

const LegacyEntriesSchema = z.array(z.string().min(1));

const LEGACY_CATEGORY_NAMES: Record<string, SourceCategory> = {
  blog: 'blog',
  github: 'release',
  github_pr: 'merged_change',
  changelog: 'changelog',
  litepaper: 'reference_doc',
  status: 'incident_status',
  twitter: 'social',
};

const LEGACY_PULL_ID = /^(.+\/.+):pr:(\d+)$/;

/**
 * Legacy id to the identity the current sources derive. Release ids
 * (`owner/repo:<release id>`) and status guids stay as they are and are
 * matched through item aliases.
 */
export function migrateLegacyId(category: SourceCategory, id: string): string {
  switch (category) {
    case 'merged_change': {
      const match = LEGACY_PULL_ID.exec(id);
      return match ? `${match[1]}#${match[2]}` : id;
    }
    case 'changelog':
    case 'reference_doc':
      return LEGACY_PREFIX + id;
    default:
      return id;
  }
}

interface StoreDocument {
  version: 1;
  updatedAt: string;
  categories: Partial<Record<SourceCategory, Record<string, string>>>;
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

// ============================================================
// STORE
// ============================================================

export class FileSeenStore extends IndexedSeenStore {
  private writeChain: Promise<void> = Promise.resolve();
  private tempCounter = 0;

  constructor(readonly path: string) {
    super();
  }

  protected async load(): Promise<LoadResult> {
    await mkdir(dirname(this.path), { recursive: true });

    let raw: string;
    try {
      raw = await readFile(this.path, 'utf-8');
    } catch (error) {
      if (isNotFound(error)) {
        this.log.info('No seen store file yet, starting empty', { path: this.path });
        return { records: [], corruptions: [] };
      }
      throw error;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      await this.preserveCorruptFile();
      return {
        records: [],
        corruptions: [new StoreCorruptionError('*', `unparseable JSON: ${errorMessage(error)}`)],
      };
    }

    const result = this.decode(parsed);
    if (result.corruptions.length > 0) {
      await this.preserveCorruptFile();
    }
    return result;
  }

  protected async persistCommit(): Promise<void> {
    await this.enqueueWrite();
  }

  protected async persistPrune(): Promise<void> {
    await this.enqueueWrite();
  }

  protected async persistClose(): Promise<void> {
    await this.writeChain;
  }

  // ============================================================
  // DECODING
  // ============================================================

  private decode(parsed: unknown): LoadResult {
    const document = DocumentSchema.safeParse(parsed);
    if (document.success) {
      return this.decodeVersioned(document.data.categories);
    }

    if (parsed !== null && typeof parsed === 'object' && !Array.isArray(parsed) && !('version' in parsed)) {
      return this.decodeLegacy(Object.entries(parsed));
    }

    return {
      records: [],
      corruptions: [new StoreCorruptionError('*', 'unrecognized document layout')],
    };
  }

  private decodeVersioned(categories: Record<string, unknown>): LoadResult {
    const records: SeenRecord[] = [];
    const corruptions: StoreCorruptionError[] = [];

    for (const [name, value] of Object.entries(categories)) {
      const category = SourceCategorySchema.safeParse(name);
      if (!category.success) {
        this.log.warn('Ignoring unknown category in seen store', { category: name });
        continue;
      }

      const entries = CategoryEntriesSchema.safeParse(value);
      if (!entries.success) {
        corruptions.push(new StoreCorruptionError(category.data, entries.error.issues[0]?.message ?? 'invalid entries'));
        continue;
      }

      for (const [identity, firstSeenAt] of Object.entries(entries.data)) {
        records.push({ category: category.data, identity, firstSeenAt });
      }
    }

    return { records, corruptions };
  }

  private decodeLegacy(entries: Array<[string, unknown]>): LoadResult {
    const records: SeenRecord[] = [];
    const corruptions: StoreCorruptionError[] = [];

    // Legacy ids carry no timestamp. Counting retention from the migration
    // keeps ids still inside a source's lookback from being pruned at once.
    const firstSeenAt = new Date().toISOString();

    for (const [name, value] of entries) {
      if (name === 'last_updated') continue;
      const category = LEGACY_CATEGORY_NAMES[name];
      if (!category) {
        this.log.warn('Ignoring unknown legacy category', { category: name });
        continue;
      }

      const ids = LegacyEntriesSchema.safeParse(value);
      if (!ids.success) {
        corruptions.push(new StoreCorruptionError(category, 'legacy entries are not a list of ids'));
        continue;
      }

      for (const id of ids.data) {
        records.push({ category, identity: migrateLegacyId(category, id), firstSeenAt });
      }
    }

    this.log.info('Migrating legacy seen store layout', { records: records.length });
    return { records, corruptions };
  }

  // ============================================================
  // WRITING
  // ============================================================

  private encode(): StoreDocument {
    const categories: StoreDocument['categories'] = {};
    for (const record of this.exportRecords()) {
      const entries = (categories[record.category] ??= {});
      entries[record.identity] = record.firstSeenAt;
    }
    return { version: 1, updatedAt: new Date().toISOString(), categories };
  }

  /**
   * Serialize writes; each one snapshots the index at the time it runs.
   */
  private enqueueWrite(): Promise<void> {
    const write = this.writeChain.then(() => this.writeAtomically());
    // Keep the chain alive after a failed write; the caller still sees the rejection
    this.writeChain = write.catch(() => undefined);
    return write;
  }

  private async writeAtomically(): Promise<void> {
    const temp = `${this.path}.tmp-${process.pid}-${++this.tempCounter}`;
    try {
      await writeFile(temp, JSON.stringify(this.encode(), null, 2), 'utf-8');
      await rename(temp, this.path);
    } catch (error) {
      await unlink(temp).catch((cleanupError: unknown) => {
        if (!isNotFound(cleanupError)) {
          this.log.warn('Could not remove temp file', { temp, error: errorMessage(cleanupError) });
        }
      });
      throw error;
    }
  }

  private async preserveCorruptFile(): Promise<void> {
    const backup = `${this.path}.corrupt-${new Date().toISOString().replace(/[:.]/g, '-')}`;
    try {
      await copyFile(this.path, backup);
      this.log.warn('Copied corrupted seen store aside', { backup });
    } catch (error) {
      this.log.error('Could not back up corrupted seen store', { error: errorMessage(error) });
    }
  }
}
