/**
 * Label Oracle
 *
 * Collects the ids currently on the region's most-popular chart. A record
 * is labelled trending when its id is in this set. The set is filled once,
 * before discovery starts, and only read afterwards.
 *
 * @module labels/oracle
 */

import { COLLECTION_PARAMS } from '../config/targets.js';
import { isQuotaExhaustedError } from '../quota/ledger.js';
import { describeError } from '../youtube/client.js';
import type { RunContext } from '../pipeline/types.js';

export interface TrendingLabels {
  /** Ids on the chart at collection time */
  ids: ReadonlySet<string>;
  /** 1 when the chart could not be fetched, else 0 */
  errorCount: number;
}

/**
 * Fetch the trending id set.
 *
 * Transport failures yield an empty set (every record is then labelled
 * non-trending) and one counted error.
 *
 * @throws QuotaExhaustedError when no key has capacity
 */
export async function collectTrendingIds(context: RunContext): Promise<TrendingLabels> {
  try {
    const ids = await context.client.listPopularVideoIds({
      regionCode: COLLECTION_PARAMS.regionCode,
      categoryId: COLLECTION_PARAMS.categoryId,
      maxResults: COLLECTION_PARAMS.popularPageSize,
    });
    context.logger.info(`[labels] ${ids.length} trending ids collected`);
    return { ids: new Set(ids), errorCount: 0 };
  } catch (error) {
    if (isQuotaExhaustedError(error)) {
      throw error;
    }
    context.logger.warn(`[labels] Trending chart unavailable, labelling all items non-trending: ${describeError(error)}`);
    return { ids: new Set(), errorCount: 1 };
  }
}
