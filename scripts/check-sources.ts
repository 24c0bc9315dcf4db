/**
 * Herald: Source Check
 *
 * Fetches every enabled source once and prints what it returned. Reads
 * the seen store (the reference document compares against it) but never
 * writes to it, and sends nothing.
 *
 * Usage:
 *   npm run check-sources
 *   npm run check-sources -- --source status
 */

import 'dotenv/config';
import { loadConfig } from '../src/lib/config';
import { ConfigError } from '../src/lib/errors';
import { errorMessage, logger } from '../src/lib/logger';
import { createSeenStore } from '../src/db';
import { deriveKey } from '../src/feeds/identity';
import { createSources } from '../src/feeds/sources';

function parseArgs(): { source?: string } {
  const args = process.argv.slice(2);
  const index = args.indexOf('--source');
  return { source: index >= 0 ? args[index + 1] : undefined };
}

async function main(): Promise<void> {
  const options = parseArgs();
  const config = loadConfig(process.env, { dryRun: true });

  const store = createSeenStore(config.store);
  await store.open();

  const sources = createSources(config)
    .all()
    .filter(source => !options.source || source.name === options.source);

  let failures = 0;

  for (const source of sources) {
    console.log('\n' + '='.repeat(60));
    console.log(`${source.name} (${source.kind}, ${source.category})`);
    console.log('='.repeat(60));

    try {
      const items = await source.fetch({
        signal: AbortSignal.timeout(config.schedule.sourceTimeoutMs),
        seen: store,
      });

      if (items.length === 0) console.log('  (no items)');
      items.forEach((item, i) => {
        const seen = store.has(deriveKey(item)) ? 'seen' : 'NEW';
        console.log(`  ${i + 1}. [${seen}] ${item.title || '(untitled)'}`);
        if (item.publishedAt) console.log(`     ${item.publishedAt}`);
        if (item.url) console.log(`     ${item.url}`);
      });
    } catch (error) {
      failures += 1;
      console.log(`  FAILED: ${errorMessage(error)}`);
    }
  }

  await store.close();

  console.log('\n' + '='.repeat(60));
  console.log(`Checked ${sources.length} source(s), ${failures} failed`);
  console.log('='.repeat(60) + '\n');

  if (failures > 0) process.exit(1);
}

main().catch((error: unknown) => {
  if (error instanceof ConfigError) {
    console.error(`\n${error.message}\n`);
  } else {
    logger.error('Source check failed', { error: errorMessage(error) });
  }
  process.exit(1);
});
