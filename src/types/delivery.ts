/**
 * Herald: Delivery & Cycle Types
 */

import type { DedupKey, SourceCategory } from './source-item';

export interface Notification {
  key: DedupKey;
  category: SourceCategory;
  text: string;
  channelId: string;
}

export type DeliveryStatus = 'delivered' | 'failed' | 'aborted';

export interface DeliveryOutcome {
  notification: Notification;
  status: DeliveryStatus;
  messageId?: string;
  attempts: number;
  error?: string;
}

export interface CategoryCycleStats {
  fetched: number;
  new: number;
  delivered: number;
  failed: number;
  /** Committed without sending (first-run backfill suppression) */
  suppressed: number;
  unavailable: boolean;
  error?: string;
}

export interface CycleResult {
  cycleId: string;
  startedAt: string;
  finishedAt: string;
  durationMs: number;
  categories: Partial<Record<SourceCategory, CategoryCycleStats>>;
  pruned: number;
  aborted: boolean;
}
