/**
 * Discovery Strategy Types
 *
 * A strategy is an independent source of raw items. Strategies run
 * concurrently and report through a uniform output so that one failing
 * source never takes down the others.
 *
 * @module strategies/types
 */

import type { RawItem, StrategyId } from '../schemas/item.js';
import type { RunContext } from '../pipeline/types.js';

/**
 * Outcome of one strategy execution.
 * - ok: every sub-query succeeded
 * - partial: some sub-queries failed and were skipped
 * - error: the strategy produced nothing because it failed
 */
export type StrategyStatus = 'ok' | 'partial' | 'error';

export interface StrategyOutput {
  strategyId: StrategyId;
  status: StrategyStatus;
  items: RawItem[];
  /** Messages for each failed sub-query or the strategy failure */
  errors: string[];
  durationMs: number;
  /** Set when the failure was quota exhaustion; the run cannot continue */
  fatal?: boolean;
}

/**
 * DiscoveryStrategy is the interface every discovery source implements.
 *
 * Implementations swallow per-sub-query transport errors (recording them in
 * `errors`) but let {@link QuotaExhaustedError} escape so the executor can
 * mark the output fatal.
 */
export interface DiscoveryStrategy {
  readonly id: StrategyId;
  execute(context: RunContext): Promise<StrategyOutput>;
}
