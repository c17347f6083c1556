/**
 * Schemas for collected items, dataset records and run statistics.
 *
 * @module schemas
 */

// ============================================================================
// Raw Items
// ============================================================================

export {
  StrategyIdSchema,
  UNREPORTED,
  UNREPORTED_SENTINEL,
  reported,
  countOrZero,
  countOrSentinel,
  tagItems,
  type StrategyId,
  type Count,
  type ItemSnippet,
  type ItemStatistics,
  type VideoItem,
  type RawItem,
} from './item.js';

// ============================================================================
// Dataset Records
// ============================================================================

export {
  DATASET_COLUMNS,
  DATASET_SCHEMA_VERSION,
  TrainingRecordSchema,
  validateRecord,
  type TrainingRecord,
  type DatasetColumn,
} from './record.js';

// ============================================================================
// Run Statistics
// ============================================================================

export { createEmptyStats, type RunState, type CollectionStats } from './stats.js';
