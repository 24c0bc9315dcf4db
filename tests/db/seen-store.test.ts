/**
 * Tests for the indexed seen store (memory backend)
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { MemorySeenStore } from '../../src/db/seen-store';
import type { SeenRecord } from '../../src/types';

const blogKey = (identity: string) => ({ category: 'blog' as const, identity });

class FailingStore extends MemorySeenStore {
  protected async persistCommit(): Promise<void> {
    throw new Error('disk full');
  }

  protected async persistPrune(): Promise<void> {
    throw new Error('disk full');
  }
}

describe('MemorySeenStore', () => {
  let store: MemorySeenStore;

  beforeEach(async () => {
    store = new MemorySeenStore();
    await store.open();
  });

  it('should report committed keys as seen', async () => {
    expect(store.has(blogKey('a'))).toBe(false);
    await store.commit(blogKey('a'));
    expect(store.has(blogKey('a'))).toBe(true);
    expect(store.has({ category: 'release', identity: 'a' })).toBe(false);
  });

  it('should keep the first-seen time when a key is committed twice', async () => {
    await store.commit(blogKey('a'), new Date('2024-01-01T00:00:00.000Z'));
    await store.commit(blogKey('a'), new Date('2024-05-01T00:00:00.000Z'));

    expect(store.latest('blog')).toEqual({
      category: 'blog',
      identity: 'a',
      firstSeenAt: '2024-01-01T00:00:00.000Z',
    });
    expect(store.count('blog')).toBe(1);
  });

  it('should refuse to commit before open', async () => {
    const closed = new MemorySeenStore();
    await expect(closed.commit(blogKey('a'))).rejects.toThrow('Seen store is not open');
  });

  it('should return the most recently seen record as latest', async () => {
    await store.commit(blogKey('old'), new Date('2024-01-01T00:00:00.000Z'));
    await store.commit(blogKey('new'), new Date('2024-03-01T00:00:00.000Z'));
    await store.commit(blogKey('mid'), new Date('2024-02-01T00:00:00.000Z'));

    expect(store.latest('blog')?.identity).toBe('new');
    expect(store.latest('release')).toBeUndefined();
  });

  it('should prefer the later insert when first-seen times tie', async () => {
    const at = new Date('2024-01-01T00:00:00.000Z');
    await store.commit(blogKey('first'), at);
    await store.commit(blogKey('second'), at);

    expect(store.latest('blog')?.identity).toBe('second');
  });

  it('should count records per category in the snapshot', async () => {
    await store.commit(blogKey('a'));
    await store.commit(blogKey('b'));
    await store.commit({ category: 'release', identity: 'org/repo@v1' });

    expect(store.snapshot()).toEqual({
      blog: 2,
      release: 1,
      merged_change: 0,
      changelog: 0,
      reference_doc: 0,
      incident_status: 0,
      social: 0,
    });
  });

  describe('prune', () => {
    beforeEach(async () => {
      await store.commit(blogKey('jan'), new Date('2024-01-01T00:00:00.000Z'));
      await store.commit(blogKey('feb'), new Date('2024-02-01T00:00:00.000Z'));
      await store.commit(blogKey('mar'), new Date('2024-03-01T00:00:00.000Z'));
      await store.commit({ category: 'release', identity: 'r1' }, new Date('2024-01-01T00:00:00.000Z'));
      await store.commit({ category: 'release', identity: 'r2' }, new Date('2024-02-01T00:00:00.000Z'));
    });

    it('should remove records first seen before the cutoff', async () => {
      const removed = await store.prune(new Date('2024-01-15T00:00:00.000Z'));

      expect(removed).toBe(2);
      expect(store.has(blogKey('jan'))).toBe(false);
      expect(store.has(blogKey('feb'))).toBe(true);
      expect(store.has({ category: 'release', identity: 'r1' })).toBe(false);
    });

    it('should never remove the newest record of a category', async () => {
      const removed = await store.prune(new Date('2025-01-01T00:00:00.000Z'));

      expect(removed).toBe(3);
      expect(store.has(blogKey('mar'))).toBe(true);
      expect(store.has({ category: 'release', identity: 'r2' })).toBe(true);
    });

    it('should restrict pruning to the given categories', async () => {
      const removed = await store.prune(new Date('2025-01-01T00:00:00.000Z'), { categories: ['release'] });

      expect(removed).toBe(1);
      expect(store.count('blog')).toBe(3);
      expect(store.count('release')).toBe(1);
    });
  });

  it('should seed from initial records and copy another store', async () => {
    const records: SeenRecord[] = [
      { category: 'social', identity: '123', firstSeenAt: '2024-01-01T00:00:00.000Z' },
    ];
    const seeded = new MemorySeenStore(records);
    await seeded.open();

    const copy = await MemorySeenStore.copyOf(seeded);
    await copy.commit({ category: 'social', identity: '456' });

    expect(copy.has({ category: 'social', identity: '123' })).toBe(true);
    expect(seeded.has({ category: 'social', identity: '456' })).toBe(false);
  });
});

describe('persistence failures', () => {
  it('should roll back a commit that could not be persisted', async () => {
    const store = new FailingStore();
    await store.open();

    await expect(store.commit(blogKey('a'))).rejects.toThrow('disk full');
    expect(store.has(blogKey('a'))).toBe(false);
  });

  it('should restore pruned records when the prune could not be persisted', async () => {
    const store = new FailingStore([
      { category: 'blog', identity: 'old', firstSeenAt: '2024-01-01T00:00:00.000Z' },
      { category: 'blog', identity: 'new', firstSeenAt: '2024-06-01T00:00:00.000Z' },
    ]);
    await store.open();

    await expect(store.prune(new Date('2024-03-01T00:00:00.000Z'))).rejects.toThrow('disk full');
    expect(store.has(blogKey('old'))).toBe(true);
    expect(store.count('blog')).toBe(2);
  });
});
