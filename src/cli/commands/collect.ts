/**
 * Collect Command
 *
 * `harvest collect` runs one collection for a date (default today) or a
 * sequential batch over an inclusive date range.
 *
 * @module cli/commands/collect
 */

import type { Command } from 'commander';
import { ConfigError, loadConfig, type HarvesterConfig } from '../../config/index.js';
import { HarvestOrchestrator } from '../../pipeline/orchestrator.js';
import type { CollectionStats } from '../../schemas/stats.js';
import { formatLocalDate, generateDateRange, isValidRunDate } from '../../utils/dates.js';
import { BaseCommand, EXIT_CODES, type GlobalOptions } from '../base-command.js';
import { RunProgressDisplay, formatBatchSummary, formatRunSummary } from '../formatters/index.js';

// ============================================================================
// Types
// ============================================================================

export type CollectOptions = {
  date?: string;
  startDate?: string;
  endDate?: string;
  outputDir?: string;
  /** Pause between batch runs in ms, as typed on the command line */
  delay?: string;
};

/**
 * Raised for invalid combinations of command-line options.
 */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

// ============================================================================
// Option Handling
// ============================================================================

/**
 * Run dates selected by the options.
 *
 * @throws UsageError for malformed dates or conflicting options
 */
export function resolveRunDates(options: CollectOptions, today: Date = new Date()): string[] {
  const { date, startDate, endDate } = options;

  if (date && (startDate || endDate)) {
    throw new UsageError('--date cannot be combined with --start-date/--end-date');
  }

  if (startDate || endDate) {
    if (!startDate || !endDate) {
      throw new UsageError('--start-date and --end-date must be given together');
    }
    try {
      return generateDateRange(startDate, endDate);
    } catch (error) {
      throw new UsageError(error instanceof Error ? error.message : String(error));
    }
  }

  if (date) {
    if (!isValidRunDate(date)) {
      throw new UsageError(`Invalid --date "${date}" (expected YYYY-MM-DD)`);
    }
    return [date];
  }

  return [formatLocalDate(today)];
}

/**
 * Parse the --delay option.
 *
 * @throws UsageError if not a non-negative integer
 */
export function parseDelay(value: string | undefined): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  const delay = Number(value);
  if (!Number.isInteger(delay) || delay < 0) {
    throw new UsageError(`Invalid --delay "${value}" (expected milliseconds)`);
  }
  return delay;
}

// ============================================================================
// Command Handler
// ============================================================================

async function collectHandler(options: CollectOptions & GlobalOptions): Promise<void> {
  const base: BaseCommand = new BaseCommand(options);

  let dates: string[];
  let delayMs: number | undefined;
  try {
    dates = resolveRunDates(options);
    delayMs = parseDelay(options.delay);
  } catch (error) {
    base.error(error instanceof Error ? error.message : String(error), EXIT_CODES.USAGE_ERROR);
  }

  let config: HarvesterConfig;
  try {
    config = loadConfig(process.env);
  } catch (error) {
    if (error instanceof ConfigError) {
      base.error(`${error.message}\nSee .env.example for the expected variables.`);
    }
    throw error;
  }
  if (options.outputDir) {
    config = { ...config, outputDir: options.outputDir };
  }

  const progress = base.isQuiet() || base.isVerbose() ? undefined : new RunProgressDisplay();
  const orchestrator = new HarvestOrchestrator({
    config,
    logger: base.createLogger(),
    onStateChange: progress ? (state, runDate) => progress.onStateChange(state, runDate) : undefined,
  });

  base.debug(`Collecting ${dates.length} date(s) with ${config.apiKeys.length} API key(s)`);

  let runs: CollectionStats[];
  try {
    runs = await orchestrator.runBatch(dates, { delayMs });
  } finally {
    progress?.stop();
  }

  for (const stats of runs) {
    base.print('');
    base.print(formatRunSummary(stats));
  }
  if (runs.length > 1) {
    base.print('');
    base.print(formatBatchSummary(runs));
  }

  const failed = runs.filter((stats) => stats.state === 'failed');
  if (failed.length > 0) {
    base.fail(`${failed.length} of ${runs.length} run(s) failed`);
    process.exitCode = EXIT_CODES.ERROR;
    return;
  }
  base.success(`Collection finished for ${dates.length} date(s)`);
}

// ============================================================================
// Registration
// ============================================================================

export function registerCollectCommand(program: Command): void {
  program
    .command('collect')
    .description('Collect the training dataset for one date or a date range')
    .option('-d, --date <date>', 'Run date (YYYY-MM-DD, default: today)')
    .option('--start-date <date>', 'First date of a batch range (YYYY-MM-DD)')
    .option('--end-date <date>', 'Last date of a batch range, inclusive (YYYY-MM-DD)')
    .option('-o, --output-dir <path>', 'Override OUTPUT_DIRECTORY')
    .option('--delay <ms>', 'Pause between batch runs in milliseconds (default: 5000)')
    .action(async (_options: CollectOptions, command: Command) => {
      await collectHandler(command.optsWithGlobals<CollectOptions & GlobalOptions>());
    });
}
