/**
 * Discovery strategies
 *
 * @module strategies
 */

export type { DiscoveryStrategy, StrategyOutput, StrategyStatus } from './types.js';
export { MacroTrendStrategy } from './macro-trend.js';
export { KeywordDiscoveryStrategy } from './keyword-discovery.js';
export { WatchlistStrategy } from './watchlist.js';
export { isRelevant, filterRelevant } from './relevance.js';
export { executeStrategies, createFailedOutput } from './executor.js';

import type { DiscoveryStrategy } from './types.js';
import { MacroTrendStrategy } from './macro-trend.js';
import { KeywordDiscoveryStrategy } from './keyword-discovery.js';
import { WatchlistStrategy } from './watchlist.js';

/**
 * The three strategies in concatenation order.
 */
export function createDefaultStrategies(): DiscoveryStrategy[] {
  return [new MacroTrendStrategy(), new KeywordDiscoveryStrategy(), new WatchlistStrategy()];
}
