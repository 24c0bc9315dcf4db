/**
 * Herald: Long-running Bot
 *
 * Polls every enabled source on a fixed interval and posts new items to
 * the channel. Optionally serves /health and /status on STATUS_PORT.
 *
 * Usage:
 *   npm start
 *
 * Stops cleanly on SIGINT / SIGTERM: pending deliveries are abandoned
 * (and re-offered on the next start), the in-flight send completes.
 */

import 'dotenv/config';
import type { Server } from 'http';
import { loadConfig } from '../src/lib/config';
import { ConfigError } from '../src/lib/errors';
import { errorMessage, logger } from '../src/lib/logger';
import { createRuntime } from '../src/pipeline/runtime';
import { Scheduler } from '../src/pipeline/scheduler';
import { closeServer, createStatusApp, startStatusServer } from '../src/server/status';

async function main(): Promise<void> {
  const config = loadConfig();
  const runtime = await createRuntime(config);

  const scheduler = new Scheduler({
    intervalMs: config.schedule.intervalMs,
    runCycle: signal => runtime.runCycle(signal),
    announce: config.schedule.announceOnStartup ? () => runtime.announce() : undefined,
  });

  let server: Server | undefined;
  if (config.statusPort !== undefined) {
    server = await startStatusServer(createStatusApp({ scheduler, store: runtime.store }), config.statusPort);
  }

  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info('Shutting down', { signal });

    await scheduler.stop();
    if (server) await closeServer(server);
    await runtime.close();
    process.exit(0);
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.on(signal, () => {
      shutdown(signal).catch((error: unknown) => {
        logger.error('Shutdown failed', { error: errorMessage(error) });
        process.exit(1);
      });
    });
  }

  console.log('='.repeat(60));
  console.log('HERALD');
  console.log('='.repeat(60));
  console.log(`Sources: ${runtime.registry.all().map(s => s.name).join(', ')}`);
  console.log(`Interval: ${Math.round(config.schedule.intervalMs / 60_000)} min`);
  console.log(`Store: ${config.store.backend}`);
  if (config.statusPort !== undefined) {
    console.log(`Status: http://localhost:${config.statusPort}/status`);
  }
  console.log('='.repeat(60) + '\n');

  await scheduler.start();
}

main().catch((error: unknown) => {
  if (error instanceof ConfigError) {
    console.error(`\n${error.message}\n`);
  } else {
    logger.error('Herald failed to start', { error: errorMessage(error) });
  }
  process.exit(1);
});
