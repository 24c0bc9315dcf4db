/**
 * Herald: Runtime Wiring
 *
 * Builds the store, sources, channel and dispatcher from configuration.
 * Shared by the entry-point scripts.
 */

import type { CycleResult } from '../types';
import type { HeraldConfig } from '../lib/config';
import { ConfigError } from '../lib/errors';
import { logger } from '../lib/logger';
import { createSeenStore, MemorySeenStore, type SeenStore } from '../db';
import type { SourceRegistry } from '../feeds/base';
import { createSources, type SourceDependencies } from '../feeds/sources';
import { Dispatcher } from '../delivery/dispatcher';
import { renderStartupMessage } from '../delivery/formatter';
import { ConsoleChannel, TelegramChannel, type ChannelClient } from '../delivery/telegram';
import { runCycle } from './cycle';

export interface RuntimeOptions {
  /** Print instead of sending; commits go to an in-memory copy of the store */
  dryRun?: boolean;
  sources?: SourceDependencies;
}

export interface Runtime {
  store: SeenStore;
  registry: SourceRegistry;
  dispatcher: Dispatcher;
  channelId: string;
  runCycle(signal?: AbortSignal): Promise<CycleResult>;
  announce(): Promise<void>;
  close(): Promise<void>;
}

function createChannel(config: HeraldConfig, dryRun: boolean): ChannelClient {
  if (dryRun) return new ConsoleChannel();
  if (!config.telegram.botToken) {
    throw new ConfigError(['TELEGRAM_BOT_TOKEN is required']);
  }
  return new TelegramChannel({ botToken: config.telegram.botToken });
}

export async function createRuntime(config: HeraldConfig, options: RuntimeOptions = {}): Promise<Runtime> {
  const dryRun = options.dryRun ?? false;
  const channel = createChannel(config, dryRun);
  const channelId = config.telegram.channelId ?? 'dry-run';

  const persistent = createSeenStore(config.store);
  await persistent.open();

  let store: SeenStore = persistent;
  if (dryRun) {
    // Detect against real history without ever writing to it
    store = await MemorySeenStore.copyOf(persistent);
    await persistent.close();
  }

  const registry = createSources(config, options.sources);
  const dispatcher = new Dispatcher({
    channel,
    minIntervalMs: dryRun ? 0 : config.delivery.minIntervalMs,
    maxAttempts: config.delivery.maxAttempts,
    baseDelayMs: config.delivery.baseDelayMs,
  });

  logger.info('Runtime ready', {
    dryRun,
    channel: channel.name,
    store: config.store.backend,
    sources: registry.all().map(source => source.name),
  });

  return {
    store,
    registry,
    dispatcher,
    channelId,
    runCycle: signal =>
      runCycle({
        sources: registry.all(),
        store,
        dispatcher,
        channelId,
        sourceTimeoutMs: config.schedule.sourceTimeoutMs,
        signal,
      }),
    announce: async () => {
      await dispatcher.sendOne(channelId, renderStartupMessage(registry.categories()));
    },
    close: () => store.close(),
  };
}
