/**
 * Keyword Discovery Strategy
 *
 * For each target keyword: search recent uploads ordered by views, then
 * hydrate the hits in one batched details call. Search costs 100 units per
 * keyword, so this strategy dominates quota usage.
 *
 * @module strategies/keyword-discovery
 */

import { COLLECTION_PARAMS } from '../config/targets.js';
import { tagItems, type RawItem } from '../schemas/item.js';
import type { RunContext } from '../pipeline/types.js';
import { daysBefore } from '../utils/dates.js';
import type { DiscoveryStrategy, StrategyOutput } from './types.js';
import { buildOutput, captureFailure } from './support.js';

export class KeywordDiscoveryStrategy implements DiscoveryStrategy {
  readonly id = 'keyword_discovery' as const;

  async execute(context: RunContext): Promise<StrategyOutput> {
    const startTime = Date.now();
    const { keywords } = context.targets;
    const publishedAfter = daysBefore(context.now(), COLLECTION_PARAMS.searchWindowDays);

    const items: RawItem[] = [];
    const errors: string[] = [];

    for (const keyword of keywords) {
      try {
        const ids = await context.client.searchVideoIds(keyword, {
          maxResults: COLLECTION_PARAMS.searchPageSize,
          order: 'viewCount',
          publishedAfter,
        });

        if (ids.length === 0) {
          context.logger.debug(`[keyword] No results for "${keyword}"`);
          continue;
        }

        const videos = await context.client.getVideoDetails(ids);
        items.push(...tagItems(videos, this.id, { discoveredKeyword: keyword }));
        context.logger.debug(`[keyword] "${keyword}": ${videos.length} items`);
      } catch (error) {
        const message = captureFailure(error, `keyword "${keyword}"`);
        context.logger.warn(`[keyword] Skipping ${message}`);
        errors.push(message);
      }
    }

    context.logger.info(`[keyword] ${items.length} items from ${keywords.length} keywords`);
    return buildOutput(this.id, items, errors, keywords.length, startTime);
  }
}
