/**
 * Herald: Poll Cycle
 *
 * One pass over every source:
 *
 *   detect    all sources concurrently, store read-only
 *   suppress  on a fresh store, commit stale backfill without sending
 *   deliver   source order, then adapter order; commit after each send
 *   prune     per-category retention
 *
 * A key is committed only after its send is confirmed, so an interrupted
 * or failed delivery is offered again next cycle.
 */

import { nanoid } from 'nanoid';
import { SOURCE_CATEGORIES } from '../types';
import type {
  CategoryCycleStats,
  CycleResult,
  DetectedItem,
  Notification,
  SourceCategory,
} from '../types';
import type { SourceAdapter } from '../feeds/base';
import { detectChanges, type DetectionResult } from '../feeds/detector';
import { isLegacyIdentity } from '../feeds/identity';
import type { SeenStore } from '../db/seen-store';
import type { Dispatcher } from '../delivery/dispatcher';
import { renderNotification } from '../delivery/formatter';
import { errorMessage, logger, timeOperation, type Logger } from '../lib/logger';

// ============================================================
// POLICY
// ============================================================

const DAY_MS = 24 * 60 * 60 * 1000;

/** How long a delivered key is remembered */
export const RETENTION_DAYS: Record<SourceCategory, number> = {
  blog: 365,
  release: 365,
  merged_change: 90,
  changelog: 365,
  reference_doc: 365,
  incident_status: 180,
  social: 90,
};

/** Categories whose record count decides whether the store is fresh */
const FRESHNESS_CATEGORIES: SourceCategory[] = ['blog', 'release', 'merged_change'];
const FRESH_STORE_THRESHOLD = 5;

/** On a fresh store, items older than this are committed silently */
export const BACKFILL_DAYS: Record<SourceCategory, number> = {
  blog: 30,
  release: 30,
  merged_change: 7,
  changelog: 30,
  reference_doc: 30,
  incident_status: 30,
  social: 30,
};

// ============================================================
// TYPES
// ============================================================

export interface CycleDependencies {
  /** Polled concurrently, delivered in this order */
  sources: SourceAdapter[];
  store: SeenStore;
  dispatcher: Dispatcher;
  channelId: string;
  sourceTimeoutMs: number;
  /** Aborts pending deliveries and in-flight fetches */
  signal?: AbortSignal;
  retentionDays?: Record<SourceCategory, number>;
  now?: () => Date;
}

function emptyStats(): CategoryCycleStats {
  return { fetched: 0, new: 0, delivered: 0, failed: 0, suppressed: 0, unavailable: false };
}

export function isFreshStore(store: SeenStore): boolean {
  const total = FRESHNESS_CATEGORIES.reduce((sum, category) => sum + store.count(category), 0);
  return total < FRESH_STORE_THRESHOLD;
}

/**
 * A category whose newest record is a migrated content hash. Its current
 * items are recorded without sending, once, to set a baseline.
 */
export function awaitsBaseline(store: SeenStore, category: SourceCategory): boolean {
  const latest = store.latest(category);
  return latest !== undefined && isLegacyIdentity(latest.identity);
}

// ============================================================
// CYCLE
// ============================================================

export async function runCycle(deps: CycleDependencies): Promise<CycleResult> {
  const now = deps.now ?? (() => new Date());
  const cycleId = nanoid(10);
  const log = logger.child({ cycleId });
  const startedAt = now();

  log.info('Cycle started', { sources: deps.sources.length });

  const categories: CycleResult['categories'] = {};
  const statsFor = (category: SourceCategory): CategoryCycleStats => (categories[category] ??= emptyStats());

  // 1. Detect
  const detections = await timeOperation(
    'Detection',
    () =>
      Promise.all(
        deps.sources.map(source =>
          detectChanges(source, deps.store, { timeoutMs: deps.sourceTimeoutMs, signal: deps.signal })
        )
      ),
    log
  );

  for (const detection of detections) {
    const stats = statsFor(detection.category);
    stats.fetched += detection.fetched;
    stats.new += detection.items.length;
    if (detection.error !== undefined) {
      stats.unavailable = true;
      stats.error = detection.error;
    }
  }

  // 2. Suppress stale backfill on a fresh store, and baseline migrated hashes
  const pending = await suppressBackfill(detections, deps.store, now(), statsFor, log);

  // 3. Deliver
  const notifications: Notification[] = pending.map(({ item, key }) => ({
    key,
    category: key.category,
    text: renderNotification(item),
    channelId: deps.channelId,
  }));

  const outcomes = await deps.dispatcher.deliver(notifications, {
    signal: deps.signal,
    onDelivered: notification => deps.store.commit(notification.key, now()),
  });

  for (const outcome of outcomes) {
    const stats = statsFor(outcome.notification.category);
    if (outcome.status === 'delivered') stats.delivered += 1;
    if (outcome.status === 'failed') stats.failed += 1;
  }

  const aborted = deps.signal?.aborted ?? false;

  // 4. Prune
  const pruned = aborted ? 0 : await pruneExpired(deps.store, now(), deps.retentionDays ?? RETENTION_DAYS, log);

  const finishedAt = now();
  const result: CycleResult = {
    cycleId,
    startedAt: startedAt.toISOString(),
    finishedAt: finishedAt.toISOString(),
    durationMs: finishedAt.getTime() - startedAt.getTime(),
    categories,
    pruned,
    aborted,
  };

  log.info('Cycle finished', {
    durationMs: result.durationMs,
    new: pending.length,
    delivered: outcomes.filter(o => o.status === 'delivered').length,
    failed: outcomes.filter(o => o.status === 'failed').length,
    unavailable: detections.filter(d => d.error !== undefined).map(d => d.source),
    pruned,
    aborted,
  });

  return result;
}

/**
 * On a fresh store, commit items older than their category's backfill
 * age without sending them. Items of a category awaiting its baseline are
 * committed the same way regardless of age. Returns the items still to
 * deliver, in order.
 */
async function suppressBackfill(
  detections: DetectionResult[],
  store: SeenStore,
  now: Date,
  statsFor: (category: SourceCategory) => CategoryCycleStats,
  log: Logger
): Promise<DetectedItem[]> {
  const all = detections.flatMap(detection => detection.items);
  const fresh = isFreshStore(store);
  const baselining = new Set(SOURCE_CATEGORIES.filter(category => awaitsBaseline(store, category)));
  if (!fresh && baselining.size === 0) return all;

  const pending: DetectedItem[] = [];
  for (const detected of all) {
    const category = detected.key.category;
    const published = detected.item.publishedAt ? Date.parse(detected.item.publishedAt) : NaN;
    const cutoff = now.getTime() - BACKFILL_DAYS[category] * DAY_MS;
    const stale = fresh && !Number.isNaN(published) && published < cutoff;

    if (!stale && !baselining.has(category)) {
      pending.push(detected);
      continue;
    }

    try {
      await store.commit(detected.key, now);
      statsFor(detected.key.category).suppressed += 1;
    } catch (error) {
      log.error('Could not record suppressed backfill item', {
        category: detected.key.category,
        identity: detected.key.identity,
        error: errorMessage(error),
      });
    }
  }

  const skipped = all.length - pending.length;
  if (skipped > 0) {
    log.info('Recorded items without sending', {
      skipped,
      pending: pending.length,
      baselined: [...baselining],
    });
  }
  return pending;
}

async function pruneExpired(
  store: SeenStore,
  now: Date,
  retentionDays: Record<SourceCategory, number>,
  log: Logger
): Promise<number> {
  let pruned = 0;
  for (const category of SOURCE_CATEGORIES) {
    const before = new Date(now.getTime() - retentionDays[category] * DAY_MS);
    try {
      pruned += await store.prune(before, { categories: [category] });
    } catch (error) {
      log.error('Retention prune failed', { category, error: errorMessage(error) });
    }
  }
  return pruned;
}
