/**
 * Harvest Orchestrator
 *
 * Drives one collection run through its states:
 *
 * ```
 * idle → label_collection → concurrent_discovery → processing → dedup → write → done
 *              │                     │                                    │
 *              └──── quota ──────────┴──── quota ──────── failed ◄─ fs ───┘
 * ```
 *
 * The orchestrator owns the run's {@link CollectionStats}; components report
 * counts back to it and never touch the stats themselves. The quota ledger
 * and API client outlive individual runs, so a multi-date batch keeps
 * charging the same per-key budgets.
 *
 * @module pipeline/orchestrator
 */

import { DEFAULT_TARGETS, type CollectionTargets, type HarvesterConfig } from '../config/index.js';
import { dedupeRecords } from '../dedupe/index.js';
import { DatasetWriteError, writeDataset } from '../export/index.js';
import { collectTrendingIds } from '../labels/oracle.js';
import { RecordProcessor } from '../processing/processor.js';
import { isQuotaExhaustedError, QuotaLedger } from '../quota/ledger.js';
import type { RawItem } from '../schemas/item.js';
import { validateRecord, type TrainingRecord } from '../schemas/record.js';
import { createEmptyStats, type CollectionStats, type RunState } from '../schemas/stats.js';
import { createDefaultStrategies } from '../strategies/index.js';
import { executeStrategies } from '../strategies/executor.js';
import type { DiscoveryStrategy } from '../strategies/types.js';
import { ConcurrencyLimiter } from '../utils/concurrency.js';
import { formatLocalDate, isValidRunDate } from '../utils/dates.js';
import { YouTubeClient } from '../youtube/client.js';
import { silentLogger, type Logger, type RunContext } from './types.js';

// ============================================================================
// Types
// ============================================================================

export interface OrchestratorOptions {
  config: HarvesterConfig;
  /** Keywords, vocabulary and channels (default: built-in targets) */
  targets?: CollectionTargets;
  logger?: Logger;
  /** Clock shared by the ledger, search window and features */
  now?: () => Date;
  /** Pre-built ledger; by default one is created from the config's keys */
  ledger?: QuotaLedger;
  /** Pre-built client; by default one is created on the ledger */
  client?: YouTubeClient;
  /** Strategies in concatenation order (default: macro, keyword, watchlist) */
  strategies?: DiscoveryStrategy[];
  /** Called on every state transition */
  onStateChange?: (state: RunState, runDate: string) => void;
}

export interface BatchOptions {
  /** Pause between consecutive runs (default: 5000ms) */
  delayMs?: number;
  /** Sleep implementation, replaceable in tests */
  sleep?: (ms: number) => Promise<void>;
}

const DEFAULT_BATCH_DELAY_MS = 5000;

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// ============================================================================
// Orchestrator
// ============================================================================

/**
 * HarvestOrchestrator runs collections for one or more dates.
 *
 * @example
 * ```typescript
 * const orchestrator = new HarvestOrchestrator({ config: loadConfig(), logger });
 * const stats = await orchestrator.run('2026-01-01');
 * if (stats.state === 'failed') {
 *   console.error(stats.failureReason);
 * }
 * ```
 */
export class HarvestOrchestrator {
  private readonly config: HarvesterConfig;
  private readonly targets: CollectionTargets;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly ledger: QuotaLedger;
  private readonly client: YouTubeClient;
  private readonly strategies: DiscoveryStrategy[];
  private readonly onStateChange?: (state: RunState, runDate: string) => void;

  constructor(options: OrchestratorOptions) {
    this.config = options.config;
    this.targets = options.targets ?? DEFAULT_TARGETS;
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? (() => new Date());
    this.ledger =
      options.ledger ??
      new QuotaLedger(this.config.apiKeys, {
        dailyQuota: this.config.dailyQuota,
        now: this.now,
        logger: this.logger,
      });
    this.client =
      options.client ??
      new YouTubeClient({ ledger: this.ledger, timeoutMs: this.config.requestTimeoutMs });
    this.strategies = options.strategies ?? createDefaultStrategies();
    this.onStateChange = options.onStateChange;
  }

  getLedger(): QuotaLedger {
    return this.ledger;
  }

  /**
   * Collect, process and write the dataset for one run date.
   *
   * Quota exhaustion and write failures end the run in `failed` and are
   * reported through the returned stats; other errors propagate.
   *
   * @param runDate - YYYY-MM-DD (default: today)
   * @throws Error if `runDate` is not a valid calendar date
   */
  async run(runDate: string = formatLocalDate(this.now())): Promise<CollectionStats> {
    if (!isValidRunDate(runDate)) {
      throw new Error(`Invalid run date: ${runDate} (expected YYYY-MM-DD)`);
    }

    const stats = createEmptyStats(runDate, this.now().toISOString());
    const chargedAtStart = this.ledger.getTotalCharged();
    const context = this.createContext();

    this.transition('idle', stats);
    this.logger.info(`[harvest] Starting collection for ${runDate}`);

    try {
      await this.execute(stats, context);
    } catch (error) {
      if (!isQuotaExhaustedError(error) && !(error instanceof DatasetWriteError)) {
        this.transition('failed', stats);
        stats.failureReason = errorMessage(error);
        this.finalize(stats, chargedAtStart);
        throw error;
      }
      stats.errorCount++;
      this.fail(stats, errorMessage(error));
    }

    this.finalize(stats, chargedAtStart);
    return stats;
  }

  /**
   * Run one collection per date, sequentially, pausing between runs.
   *
   * A failed run does not stop the batch; every run's stats are returned
   * in date order.
   */
  async runBatch(dates: readonly string[], options: BatchOptions = {}): Promise<CollectionStats[]> {
    const delayMs = options.delayMs ?? DEFAULT_BATCH_DELAY_MS;
    const pause = options.sleep ?? sleep;
    const results: CollectionStats[] = [];

    for (const [index, runDate] of dates.entries()) {
      if (index > 0 && delayMs > 0) {
        await pause(delayMs);
      }
      this.logger.info(`[harvest] Batch run ${index + 1}/${dates.length}: ${runDate}`);
      results.push(await this.run(runDate));
    }

    return results;
  }

  // ==========================================================================
  // Stages
  // ==========================================================================

  private async execute(stats: CollectionStats, context: RunContext): Promise<void> {
    // Label collection
    this.transition('label_collection', stats);
    const labels = await collectTrendingIds(context);
    stats.errorCount += labels.errorCount;

    // Concurrent discovery
    this.transition('concurrent_discovery', stats);
    const outputs = await executeStrategies(this.strategies, context);
    const items: RawItem[] = [];
    for (const output of outputs) {
      stats.strategyCounts[output.strategyId] += output.items.length;
      stats.errorCount += output.errors.length;
      items.push(...output.items);
    }
    stats.totalItemsCollected = items.length;

    const fatal = outputs.find((output) => output.fatal);
    if (fatal) {
      this.fail(stats, `Strategy ${fatal.strategyId} failed: ${fatal.errors.join('; ')}`);
      return;
    }
    this.logger.info(`[harvest] ${items.length} raw items collected`);

    // Processing
    this.transition('processing', stats);
    const processor = new RecordProcessor(context, labels.ids);
    const processed = await this.processItems(items, processor, stats);

    // Dedup
    this.transition('dedup', stats);
    const records = dedupeRecords(processed);
    this.logger.info(`[harvest] ${records.length} unique records (${processed.length - records.length} duplicates removed)`);

    if (records.length === 0) {
      this.logger.warn(`[harvest] No records collected for ${stats.runDate}; no file written`);
      this.transition('done', stats);
      return;
    }

    // Write
    this.transition('write', stats);
    const result = await writeDataset(records, stats.runDate, this.config.outputDir);

    stats.csvFilePath = result.filePath;
    stats.fileSizeBytes = result.fileSizeBytes;
    stats.totalRecordsProcessed = records.length;
    stats.trendingCount = records.filter((record) => record.isTrendingCategory === 1).length;
    this.logger.info(`[harvest] Wrote ${records.length} records to ${result.filePath}`);

    this.transition('done', stats);
  }

  /**
   * Run the processor in batches of `batchSize`, with at most
   * `maxConcurrentTasks` items in flight. Output keeps input order.
   */
  private async processItems(
    items: RawItem[],
    processor: RecordProcessor,
    stats: CollectionStats
  ): Promise<TrainingRecord[]> {
    const { batchSize, maxConcurrentTasks, enableDataValidation } = this.config;
    const limiter = new ConcurrencyLimiter(maxConcurrentTasks);
    const records: TrainingRecord[] = [];

    for (let offset = 0; offset < items.length; offset += batchSize) {
      const batch = items.slice(offset, offset + batchSize);
      const results = await Promise.all(
        batch.map((item) => limiter.run(() => processor.process(item, stats.runDate)))
      );

      for (const record of results) {
        if (!record) {
          stats.errorCount++;
          continue;
        }
        if (enableDataValidation) {
          const problems = validateRecord(record);
          if (problems.length > 0) {
            this.logger.warn(`[harvest] Dropping invalid record ${record.videoId}: ${problems.join('; ')}`);
            stats.errorCount++;
            continue;
          }
        }
        records.push(record);
      }

      this.logger.debug(`[harvest] Processed ${Math.min(offset + batchSize, items.length)}/${items.length} items`);
    }

    return records;
  }

  // ==========================================================================
  // Helpers
  // ==========================================================================

  private createContext(): RunContext {
    return {
      config: this.config,
      targets: this.targets,
      client: this.client,
      ledger: this.ledger,
      logger: this.logger,
      now: this.now,
    };
  }

  private transition(state: RunState, stats: CollectionStats): void {
    stats.state = state;
    this.onStateChange?.(state, stats.runDate);
  }

  private fail(stats: CollectionStats, reason: string): void {
    this.transition('failed', stats);
    stats.failureReason = reason;
    this.logger.error(`[harvest] Run ${stats.runDate} failed: ${reason}`);
  }

  private finalize(stats: CollectionStats, chargedAtStart: number): void {
    stats.endTime = this.now().toISOString();
    stats.quotaUsed = this.ledger.getTotalCharged() - chargedAtStart;
  }
}
