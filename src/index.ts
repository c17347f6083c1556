/**
 * Trend Harvester
 *
 * Quota-aware YouTube trend collection producing a labeled CSV dataset.
 *
 * @module trend-harvester
 */

export { loadConfig, ConfigError, DEFAULT_TARGETS, type HarvesterConfig, type CollectionTargets } from './config/index.js';
export { QuotaLedger, QuotaExhaustedError, isQuotaExhaustedError } from './quota/ledger.js';
export { YouTubeClient, YouTubeApiError, isYouTubeApiError } from './youtube/client.js';
export { parseDuration, sanitizeText, extractKeywords } from './normalize/text.js';
export { computeFeatures } from './features/metrics.js';
export {
  createDefaultStrategies,
  executeStrategies,
  type DiscoveryStrategy,
  type StrategyOutput,
} from './strategies/index.js';
export { collectTrendingIds } from './labels/oracle.js';
export { RecordProcessor } from './processing/processor.js';
export { dedupeRecords } from './dedupe/index.js';
export { writeDataset, DatasetWriteError } from './export/index.js';
export { HarvestOrchestrator, type OrchestratorOptions } from './pipeline/orchestrator.js';
export type { Logger, RunContext } from './pipeline/types.js';
export {
  DATASET_COLUMNS,
  validateRecord,
  type RawItem,
  type StrategyId,
  type Count,
  type TrainingRecord,
  type CollectionStats,
  type RunState,
} from './schemas/index.js';
