/**
 * Tests for change detection
 */

import { describe, it, expect } from 'vitest';
import { detectChanges } from '../../src/feeds/detector';
import { MemorySeenStore } from '../../src/db/seen-store';
import { SourceUnavailableError } from '../../src/lib/errors';
import { StaticSource, blogItem } from '../helpers';

const options = { timeoutMs: 1_000 };

async function openStore(): Promise<MemorySeenStore> {
  const store = new MemorySeenStore();
  await store.open();
  return store;
}

describe('detectChanges', () => {
  it('should keep only keys the store has not seen', async () => {
    const store = await openStore();
    await store.commit({ category: 'blog', identity: 'post-A' });
    const source = new StaticSource('blog', 'blog', () => [blogItem('A'), blogItem('B')]);

    const result = await detectChanges(source, store, options);

    expect(result.fetched).toBe(2);
    expect(result.items.map(detected => detected.key)).toEqual([{ category: 'blog', identity: 'post-B' }]);
    expect(result.error).toBeUndefined();
  });

  it('should treat an item seen under a legacy alias as seen', async () => {
    const store = await openStore();
    await store.commit({ category: 'blog', identity: 'https://blog.test/a' });
    const source = new StaticSource('blog', 'blog', () => [
      blogItem('A', { aliases: ['https://blog.test/a'] }),
      blogItem('B', { aliases: ['https://blog.test/b'] }),
    ]);

    const result = await detectChanges(source, store, options);

    expect(result.items.map(detected => detected.key.identity)).toEqual(['post-B']);
  });

  it('should drop duplicates within one batch', async () => {
    const source = new StaticSource('blog', 'blog', () => [blogItem('A'), blogItem('A', { title: 'A again' })]);

    const result = await detectChanges(source, await openStore(), options);

    expect(result.items.map(detected => detected.item.title)).toEqual(['A']);
  });

  it('should never commit', async () => {
    const store = await openStore();
    const source = new StaticSource('blog', 'blog', () => [blogItem('A')]);

    await detectChanges(source, store, options);

    expect(store.count('blog')).toBe(0);
  });

  it('should turn a source failure into an empty result', async () => {
    const source = new StaticSource('blog', 'blog', () => {
      throw new SourceUnavailableError('blog', 'HTTP 503 from https://blog.test/rss.xml');
    });

    const result = await detectChanges(source, await openStore(), options);

    expect(result).toMatchObject({
      source: 'blog',
      category: 'blog',
      fetched: 0,
      items: [],
      error: 'blog unavailable: HTTP 503 from https://blog.test/rss.xml',
    });
  });

  it('should contain unexpected adapter errors', async () => {
    const source = new StaticSource('blog', 'blog', () => {
      throw new TypeError('cannot read properties of undefined');
    });

    const result = await detectChanges(source, await openStore(), options);

    expect(result.error).toBe('cannot read properties of undefined');
  });

  it('should abandon a source that exceeds its time budget', async () => {
    const received: { signal?: AbortSignal } = {};
    const source = new StaticSource('slow', 'blog', ({ signal }) => {
      received.signal = signal;
      return new Promise<never>(() => undefined);
    });

    const result = await detectChanges(source, await openStore(), { timeoutMs: 20 });

    expect(result.error).toBe('slow unavailable: timeout after 20ms');
    expect(received.signal?.aborted).toBe(true);
  });

  it('should pass an outer abort through to the adapter', async () => {
    const outer = new AbortController();
    outer.abort();
    const received: { signal?: AbortSignal } = {};
    const source = new StaticSource('blog', 'blog', ({ signal }) => {
      received.signal = signal;
      return [];
    });

    await detectChanges(source, await openStore(), { timeoutMs: 1_000, signal: outer.signal });

    expect(received.signal?.aborted).toBe(true);
  });
});
