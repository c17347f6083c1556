/**
 * CLI formatters
 *
 * @module cli/formatters
 */

export { RunProgressDisplay, STATE_LABELS, formatDuration } from './progress.js';
export { formatRunSummary, formatBatchSummary } from './run-summary.js';
