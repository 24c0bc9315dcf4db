/**
 * Tests for runtime wiring (dry-run mode)
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { access, mkdtemp, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { createRuntime } from '../../src/pipeline/runtime';
import { loadConfig } from '../../src/lib/config';
import { ConfigError } from '../../src/lib/errors';
import { stubFetch, xml } from '../helpers';

const RSS = `<?xml version="1.0" encoding="UTF-8"?>
<rss version="2.0">
  <channel>
    <title>Test Blog</title>
    <link>https://blog.test</link>
    <item>
      <title>Only post</title>
      <link>https://blog.test/only</link>
      <guid>post-only</guid>
      <description>Summary</description>
    </item>
  </channel>
</rss>`;

describe('createRuntime', () => {
  let dir: string;
  let storeFile: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'herald-'));
    storeFile = join(dir, 'seen.json');
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  const blogOnly = () =>
    loadConfig(
      {
        STORE_FILE: storeFile,
        BLOG_RSS_URL: 'https://blog.test/rss.xml',
        BLOG_URL: 'https://blog.test/blog',
        ENABLE_RELEASES: 'false',
        ENABLE_MERGED_CHANGES: 'false',
        ENABLE_CHANGELOG: 'false',
        ENABLE_REFERENCE_DOC: 'false',
        ENABLE_STATUS: 'false',
      },
      { dryRun: true }
    );

  it('should print instead of sending and leave the store file untouched', async () => {
    stubFetch({ 'https://blog.test/rss.xml': xml(RSS) });
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    const runtime = await createRuntime(blogOnly(), { dryRun: true });
    const result = await runtime.runCycle();
    await runtime.close();

    expect(result.categories.blog).toMatchObject({ fetched: 1, new: 1, delivered: 1 });
    expect(log).toHaveBeenCalledWith(
      '📝 <b>New Blog Post</b>\n\n<b>Only post</b>\n\nSummary\n\n🔗 <a href="https://blog.test/only">Read more</a>'
    );
    expect(runtime.store.has({ category: 'blog', identity: 'post-only' })).toBe(true);
    await expect(access(storeFile)).rejects.toThrow();
  });

  it('should announce the monitored categories', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    const runtime = await createRuntime(blogOnly(), { dryRun: true });
    await runtime.announce();
    await runtime.close();

    expect(log).toHaveBeenCalledWith('🤖 <b>Herald Started</b>\n\nMonitoring:\n📝 Blog');
  });

  it('should require a bot token outside dry runs', async () => {
    await expect(createRuntime(blogOnly())).rejects.toBeInstanceOf(ConfigError);
  });
});
