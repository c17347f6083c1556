/**
 * Helpers shared by the discovery strategies.
 *
 * @module strategies/support
 */

import { describeError } from '../youtube/client.js';
import { isQuotaExhaustedError } from '../quota/ledger.js';
import type { RawItem, StrategyId } from '../schemas/item.js';
import type { StrategyOutput } from './types.js';

/**
 * Turn a sub-query failure into an error message.
 * Quota exhaustion is rethrown: it ends the strategy, not just the sub-query.
 */
export function captureFailure(error: unknown, label: string): string {
  if (isQuotaExhaustedError(error)) {
    throw error;
  }
  return `${label}: ${describeError(error)}`;
}

/**
 * Build the output of a strategy that ran all of its sub-queries.
 *
 * Status is `error` when every sub-query failed, `partial` when some did.
 */
export function buildOutput(
  strategyId: StrategyId,
  items: RawItem[],
  errors: string[],
  attempted: number,
  startTime: number
): StrategyOutput {
  let status: StrategyOutput['status'] = 'ok';
  if (errors.length > 0) {
    status = attempted > 0 && errors.length >= attempted ? 'error' : 'partial';
  }

  return {
    strategyId,
    status,
    items,
    errors,
    durationMs: Date.now() - startTime,
  };
}
