/**
 * Progress Formatters
 *
 * Run-state progress for the collect command: an ora spinner on a
 * terminal, plain lines elsewhere.
 *
 * @module cli/formatters/progress
 */

import ora, { type Ora } from 'ora';
import chalk from 'chalk';
import type { RunState } from '../../schemas/stats.js';

// ============================================================================
// State Labels
// ============================================================================

/**
 * Human-readable labels for each run state.
 */
export const STATE_LABELS: Record<RunState, string> = {
  idle: 'Starting',
  label_collection: 'Collecting trending labels',
  concurrent_discovery: 'Running discovery strategies',
  processing: 'Processing records',
  dedup: 'Removing duplicates',
  write: 'Writing dataset',
  done: 'Done',
  failed: 'Failed',
};

// ============================================================================
// Run Progress Display
// ============================================================================

function marker(state: RunState): string {
  if (state === 'failed') return '[X]';
  if (state === 'done') return '[+]';
  return '[*]';
}

/**
 * Follows orchestrator state transitions for one or more runs.
 *
 * On a TTY one ora spinner per run tracks the current state and ends with
 * the run's elapsed time; otherwise each transition prints a line.
 *
 * @example
 * ```typescript
 * const progress = new RunProgressDisplay();
 * const orchestrator = new HarvestOrchestrator({
 *   config,
 *   onStateChange: (state, runDate) => progress.onStateChange(state, runDate),
 * });
 * ```
 */
export class RunProgressDisplay {
  private readonly interactive: boolean;
  private spinner: Ora | null = null;
  private runStartedAt = 0;

  constructor(private readonly write: (line: string) => void = (line) => console.log(line)) {
    this.interactive = process.stdout.isTTY === true;
  }

  onStateChange(state: RunState, runDate: string): void {
    const text = `[${runDate}] ${STATE_LABELS[state]}`;

    if (!this.interactive) {
      this.write(`${marker(state)} ${text}`);
      return;
    }

    if (state === 'done' || state === 'failed') {
      const elapsed = chalk.dim(` (${formatDuration(Date.now() - this.runStartedAt)})`);
      if (state === 'done') {
        this.spinner?.succeed(text + elapsed);
      } else {
        this.spinner?.fail(text + elapsed);
      }
      this.spinner = null;
      return;
    }

    if (this.spinner) {
      this.spinner.text = `${text}...`;
      return;
    }

    this.runStartedAt = Date.now();
    this.spinner = ora({ text: `${text}...`, color: 'cyan', stream: process.stdout }).start();
  }

  /** Stop any running spinner */
  stop(): void {
    this.spinner?.stop();
    this.spinner = null;
  }
}

// ============================================================================
// Utility Functions
// ============================================================================

/**
 * Format a duration in milliseconds to human-readable string.
 *
 * @example
 * formatDuration(500)   // '500ms'
 * formatDuration(1500)  // '1.5s'
 * formatDuration(65000) // '1m 5s'
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }

  const seconds = ms / 1000;
  if (seconds < 60) {
    return `${seconds.toFixed(1)}s`;
  }

  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = Math.round(seconds % 60);
  return `${minutes}m ${remainingSeconds}s`;
}
