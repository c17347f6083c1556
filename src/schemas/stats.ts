/**
 * Collection Statistics
 *
 * Run-scoped summary created at run start, mutated only by the
 * orchestrator and finalised at run end.
 *
 * @module schemas/stats
 */

import type { StrategyId } from './item.js';

/**
 * Orchestrator states. `failed` is terminal.
 */
export type RunState =
  | 'idle'
  | 'label_collection'
  | 'concurrent_discovery'
  | 'processing'
  | 'dedup'
  | 'write'
  | 'done'
  | 'failed';

export interface CollectionStats {
  /** Calendar date the run is keyed by (YYYY-MM-DD) */
  runDate: string;
  /** Final state of the run */
  state: RunState;
  /** ISO8601 timestamp when the run started */
  startTime: string;
  /** ISO8601 timestamp when the run finished; empty while running */
  endTime: string;
  /** Raw items returned by all strategies, before processing */
  totalItemsCollected: number;
  /** Records written to the dataset */
  totalRecordsProcessed: number;
  /** Written records carrying the trending label */
  trendingCount: number;
  /** Dataset path; empty when no file was written */
  csvFilePath: string;
  fileSizeBytes: number;
  /** Quota units charged during the run, across all keys */
  quotaUsed: number;
  errorCount: number;
  /** Raw items per strategy */
  strategyCounts: Record<StrategyId, number>;
  /** Reason for a failed run */
  failureReason?: string;
}

export function createEmptyStats(runDate: string, startTime: string): CollectionStats {
  return {
    runDate,
    state: 'idle',
    startTime,
    endTime: '',
    totalItemsCollected: 0,
    totalRecordsProcessed: 0,
    trendingCount: 0,
    csvFilePath: '',
    fileSizeBytes: 0,
    quotaUsed: 0,
    errorCount: 0,
    strategyCounts: {
      macro_trend: 0,
      keyword_discovery: 0,
      channel_performance: 0,
    },
  };
}
