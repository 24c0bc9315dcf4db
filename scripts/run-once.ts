/**
 * Herald: Single Cycle
 *
 * Runs one poll cycle and exits. Suited to an external cron.
 *
 * Usage:
 *   npm run once                   # Post new items and record them
 *   npm run once -- --dry-run      # Print messages, record nothing
 *
 * Exits 1 when every enabled source was unavailable.
 */

import 'dotenv/config';
import { SOURCE_CATEGORIES, type CycleResult } from '../src/types';
import { loadConfig } from '../src/lib/config';
import { ConfigError } from '../src/lib/errors';
import { errorMessage, logger } from '../src/lib/logger';
import { createRuntime } from '../src/pipeline/runtime';

interface RunOnceOptions {
  dryRun: boolean;
}

function parseArgs(): RunOnceOptions {
  const args = process.argv.slice(2);
  return { dryRun: args.includes('--dry-run') };
}

function printSummary(result: CycleResult, dryRun: boolean): void {
  console.log('\n' + '='.repeat(60));
  console.log(dryRun ? 'CYCLE COMPLETE (dry run)' : 'CYCLE COMPLETE');
  console.log('='.repeat(60));
  console.log(`Duration: ${(result.durationMs / 1000).toFixed(2)}s`);
  for (const category of SOURCE_CATEGORIES) {
    const stats = result.categories[category];
    if (!stats) continue;
    const status = stats.unavailable ? `unavailable (${stats.error ?? 'unknown'})` : 'ok';
    console.log(
      `${category.padEnd(16)} fetched ${stats.fetched}, new ${stats.new}, ` +
        `delivered ${stats.delivered}, failed ${stats.failed}, suppressed ${stats.suppressed}: ${status}`
    );
  }
  console.log(`Pruned: ${result.pruned}`);
  console.log('='.repeat(60) + '\n');
}

async function main(): Promise<void> {
  const options = parseArgs();
  const config = loadConfig(process.env, { dryRun: options.dryRun });
  const runtime = await createRuntime(config, { dryRun: options.dryRun });

  const result = await runtime.runCycle().finally(() => runtime.close());

  printSummary(result, options.dryRun);

  const polled = SOURCE_CATEGORIES.filter(category => result.categories[category] !== undefined);
  if (polled.length > 0 && polled.every(category => result.categories[category]?.unavailable)) {
    logger.error('Every source was unavailable');
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  if (error instanceof ConfigError) {
    console.error(`\n${error.message}\n`);
  } else {
    logger.error('Cycle failed', { error: errorMessage(error) });
  }
  process.exit(1);
});
