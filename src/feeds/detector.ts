/**
 * Herald: Change Detector
 *
 * Runs one adapter against the seen store: fetch, key, keep the keys not
 * yet seen. Never commits and never throws; a failed source yields zero
 * items and a recorded error.
 */

import type { DetectedItem, SourceCategory } from '../types';
import { SourceUnavailableError } from '../lib/errors';
import { logger, errorMessage } from '../lib/logger';
import type { SeenView, SourceAdapter } from './base';
import { deriveKey, isSeen, keyToString } from './identity';

export interface DetectionResult {
  source: string;
  category: SourceCategory;
  fetched: number;
  items: DetectedItem[];
  durationMs: number;
  error?: string;
}

export interface DetectOptions {
  timeoutMs: number;
  /** Aborts the fetch early, e.g. on shutdown */
  signal?: AbortSignal;
}

/**
 * Fetch with a hard time budget. The adapter's signal aborts at the
 * deadline, and the race guarantees the caller is released even if an
 * adapter ignores its signal.
 */
async function fetchWithTimeout(
  adapter: SourceAdapter,
  seen: SeenView,
  options: DetectOptions
): Promise<Awaited<ReturnType<SourceAdapter['fetch']>>> {
  const controller = new AbortController();
  const signal = options.signal ? AbortSignal.any([controller.signal, options.signal]) : controller.signal;

  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new SourceUnavailableError(adapter.name, `timeout after ${options.timeoutMs}ms`));
    }, options.timeoutMs);
  });

  try {
    return await Promise.race([adapter.fetch({ signal, seen }), timeout]);
  } finally {
    clearTimeout(timer);
  }
}

export async function detectChanges(
  adapter: SourceAdapter,
  seen: SeenView,
  options: DetectOptions
): Promise<DetectionResult> {
  const log = logger.child({ source: adapter.name });
  const startTime = Date.now();

  try {
    const items = await fetchWithTimeout(adapter, seen, options);
    const batch = new Set<string>();
    const fresh: DetectedItem[] = [];

    for (const item of items) {
      const key = deriveKey(item);
      const id = keyToString(key);
      if (batch.has(id) || isSeen(seen, item, key)) continue;
      batch.add(id);
      fresh.push({ item, key });
    }

    const durationMs = Date.now() - startTime;
    log.info('Source polled', { fetched: items.length, new: fresh.length, durationMs });

    return {
      source: adapter.name,
      category: adapter.category,
      fetched: items.length,
      items: fresh,
      durationMs,
    };
  } catch (error) {
    const message = errorMessage(error);
    const durationMs = Date.now() - startTime;

    if (error instanceof SourceUnavailableError) {
      log.warn('Source unavailable', { error: message, durationMs });
    } else {
      log.error('Source adapter failed unexpectedly', { error: message, durationMs });
    }

    return {
      source: adapter.name,
      category: adapter.category,
      fetched: 0,
      items: [],
      durationMs,
      error: message,
    };
  }
}
