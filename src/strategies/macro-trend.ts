/**
 * Macro-Trend Strategy
 *
 * Pulls the most-popular chart for the target region and category and keeps
 * the items relevant to the collection vocabulary.
 *
 * @module strategies/macro-trend
 */

import { COLLECTION_PARAMS } from '../config/targets.js';
import { tagItems, type RawItem } from '../schemas/item.js';
import type { RunContext } from '../pipeline/types.js';
import type { DiscoveryStrategy, StrategyOutput } from './types.js';
import { filterRelevant } from './relevance.js';
import { buildOutput, captureFailure } from './support.js';

export class MacroTrendStrategy implements DiscoveryStrategy {
  readonly id = 'macro_trend' as const;

  async execute(context: RunContext): Promise<StrategyOutput> {
    const startTime = Date.now();
    const errors: string[] = [];
    let items: RawItem[] = [];

    try {
      const videos = await context.client.listPopularVideos({
        regionCode: COLLECTION_PARAMS.regionCode,
        categoryId: COLLECTION_PARAMS.categoryId,
        maxResults: COLLECTION_PARAMS.popularPageSize,
      });

      const relevant = filterRelevant(videos, context.targets.vocabulary);
      items = tagItems(relevant, this.id);
      context.logger.info(`[macro] ${relevant.length}/${videos.length} chart items relevant`);
    } catch (error) {
      const message = captureFailure(error, 'mostPopular chart');
      context.logger.warn(`[macro] ${message}`);
      errors.push(message);
    }

    return buildOutput(this.id, items, errors, 1, startTime);
  }
}
