/**
 * Run Summary Formatters
 *
 * Terminal output for finished collection runs.
 *
 * @module cli/formatters/run-summary
 */

import chalk from 'chalk';
import type { CollectionStats } from '../../schemas/stats.js';
import { formatQuota } from '../../config/quota.js';
import { formatDuration } from './progress.js';

const LABEL_WIDTH = 18;

function row(label: string, value: string): string {
  return `  ${chalk.dim(`${label}:`.padEnd(LABEL_WIDTH))}${value}`;
}

function runDurationMs(stats: CollectionStats): number {
  const start = Date.parse(stats.startTime);
  const end = Date.parse(stats.endTime);
  return Number.isNaN(start) || Number.isNaN(end) ? 0 : Math.max(0, end - start);
}

/**
 * Multi-line summary of one run.
 *
 * @example
 * ```
 * Collection 2026-01-01: done
 *   Items collected:  4 (macro 2, keyword 2, watchlist 0)
 *   Records written:  3 (1 trending)
 *   Dataset:          results/youtube_viral_dataset_v1_20260101.csv (1,204 bytes)
 *   Quota used:       309 units
 *   Errors:           1
 *   Duration:         2.4s
 * ```
 */
export function formatRunSummary(stats: CollectionStats): string {
  const stateLabel = stats.state === 'failed' ? chalk.red(stats.state) : chalk.green(stats.state);
  const counts = stats.strategyCounts;

  const lines = [
    chalk.bold(`Collection ${stats.runDate}: `) + stateLabel,
    row(
      'Items collected',
      `${stats.totalItemsCollected} (macro ${counts.macro_trend}, keyword ${counts.keyword_discovery}, watchlist ${counts.channel_performance})`
    ),
    row('Records written', `${stats.totalRecordsProcessed} (${stats.trendingCount} trending)`),
    row(
      'Dataset',
      stats.csvFilePath
        ? `${stats.csvFilePath} (${stats.fileSizeBytes.toLocaleString('en-US')} bytes)`
        : chalk.dim('none')
    ),
    row('Quota used', formatQuota(stats.quotaUsed)),
    row('Errors', stats.errorCount > 0 ? chalk.yellow(String(stats.errorCount)) : '0'),
    row('Duration', formatDuration(runDurationMs(stats))),
  ];

  if (stats.failureReason) {
    lines.push(row('Failure', chalk.red(stats.failureReason)));
  }

  return lines.join('\n');
}

/**
 * One-line totals across a batch of runs.
 */
export function formatBatchSummary(runs: readonly CollectionStats[]): string {
  const failed = runs.filter((stats) => stats.state === 'failed').length;
  const records = runs.reduce((sum, stats) => sum + stats.totalRecordsProcessed, 0);
  const quota = runs.reduce((sum, stats) => sum + stats.quotaUsed, 0);

  return `${runs.length} run(s), ${failed} failed, ${records} records, ${formatQuota(quota)}`;
}
