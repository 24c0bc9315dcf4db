/**
 * Tests for the docs changelog source
 */

import { describe, it, expect } from 'vitest';
import { ChangelogPageSource } from '../../../src/feeds/sources/changelog';
import { fetchContext, html, stubFetch } from '../../helpers';

const PAGE_URL = 'https://docs.test/changelog';

const PAGE = `<html><body>
  <nav><h2>Navigation sidebar entries</h2></nav>
  <main>
    <h2>Table of Contents</h2>
    <h2 id="v0-7">Version 0.7 (March 2024)</h2>
    <p>Adds batching.</p>
    <ul><li>Faster decrypt</li></ul>
    <h3>Misc</h3>
    <h2 id="v0-6">Version 0.6 (January 2024)</h2>
    <p>Initial release.</p>
  </main>
</body></html>`;

describe('ChangelogPageSource', () => {
  it('should return entries oldest first with their prose', async () => {
    stubFetch({ [PAGE_URL]: html(PAGE) });

    const items = await new ChangelogPageSource({ url: PAGE_URL }).fetch(fetchContext());

    expect(items).toEqual([
      {
        category: 'changelog',
        title: 'Version 0.6 (January 2024)',
        body: 'Version 0.6 (January 2024)\nInitial release.',
        url: 'https://docs.test/changelog#v0-6',
        payload: { type: 'changelog' },
      },
      {
        category: 'changelog',
        title: 'Version 0.7 (March 2024)',
        body: 'Version 0.7 (March 2024)\nAdds batching. Faster decrypt',
        url: 'https://docs.test/changelog#v0-7',
        payload: { type: 'changelog' },
      },
    ]);
  });

  it('should stop at the item limit', async () => {
    stubFetch({ [PAGE_URL]: html(PAGE) });

    const items = await new ChangelogPageSource({ url: PAGE_URL, maxItems: 1 }).fetch(fetchContext());

    expect(items.map(item => item.title)).toEqual(['Version 0.7 (March 2024)']);
  });

  it('should fall back to the page url for headings without an anchor', async () => {
    stubFetch({ [PAGE_URL]: html('<html><body><article><h2>Release notes for May</h2></article></body></html>') });

    const items = await new ChangelogPageSource({ url: PAGE_URL }).fetch(fetchContext());

    expect(items.map(item => item.url)).toEqual([PAGE_URL]);
  });

  it('should be unavailable when no entry is found', async () => {
    stubFetch({ [PAGE_URL]: html('<html><body><main><p>Nothing yet</p></main></body></html>') });

    await expect(new ChangelogPageSource({ url: PAGE_URL }).fetch(fetchContext())).rejects.toThrow(
      'no changelog entries found'
    );
  });
});
