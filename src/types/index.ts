/**
 * Herald: Type Exports
 *
 * Re-exports all types from the types module.
 */

// Source items
export type {
  SourceCategory,
  SourceKind,
  StatusType,
  ItemPayload,
  RawItem,
  DedupKey,
  SeenRecord,
  DetectedItem,
} from './source-item';
export {
  SourceCategorySchema,
  SOURCE_CATEGORIES,
  DedupKeySchema,
  SeenRecordSchema,
} from './source-item';

// Delivery
export type {
  Notification,
  DeliveryStatus,
  DeliveryOutcome,
  CategoryCycleStats,
  CycleResult,
} from './delivery';
