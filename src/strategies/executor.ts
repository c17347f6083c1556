/**
 * Strategy Executor
 *
 * Runs every discovery strategy concurrently with failure isolation.
 *
 * @module strategies/executor
 */

import { isQuotaExhaustedError } from '../quota/ledger.js';
import type { StrategyId } from '../schemas/item.js';
import type { RunContext } from '../pipeline/types.js';
import type { DiscoveryStrategy, StrategyOutput } from './types.js';

/**
 * Output for a strategy whose execute() rejected.
 */
export function createFailedOutput(
  strategyId: StrategyId,
  error: unknown,
  durationMs: number
): StrategyOutput {
  const message = error instanceof Error ? error.message : String(error);
  return {
    strategyId,
    status: 'error',
    items: [],
    errors: [message],
    durationMs,
    fatal: isQuotaExhaustedError(error),
  };
}

/**
 * Execute all strategies in parallel.
 *
 * Uses Promise.allSettled so one strategy's rejection never cancels the
 * others. Outputs come back in strategy order; a rejection caused by quota
 * exhaustion yields an output marked `fatal`.
 *
 * @example
 * ```typescript
 * const outputs = await executeStrategies(
 *   [new MacroTrendStrategy(), new KeywordDiscoveryStrategy(), new WatchlistStrategy()],
 *   context
 * );
 * if (outputs.some((o) => o.fatal)) {
 *   // stop the run
 * }
 * ```
 */
export async function executeStrategies(
  strategies: readonly DiscoveryStrategy[],
  context: RunContext
): Promise<StrategyOutput[]> {
  const startTime = Date.now();

  const results = await Promise.allSettled(
    strategies.map((strategy) => strategy.execute(context))
  );

  return results.map((result, index) => {
    if (result.status === 'fulfilled') {
      return result.value;
    }

    const strategy = strategies[index];
    const output = createFailedOutput(strategy.id, result.reason, Date.now() - startTime);
    context.logger.error(`[executor] Strategy ${strategy.id} failed: ${output.errors.join('; ')}`);
    return output;
  });
}
