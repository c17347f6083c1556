/**
 * Watchlist Performance Strategy
 *
 * For each watched channel: resolve its uploads playlist, list the most
 * recent uploads, hydrate them and keep the relevant ones.
 *
 * @module strategies/watchlist
 */

import { COLLECTION_PARAMS } from '../config/targets.js';
import { tagItems, type RawItem } from '../schemas/item.js';
import type { RunContext } from '../pipeline/types.js';
import type { DiscoveryStrategy, StrategyOutput } from './types.js';
import { filterRelevant } from './relevance.js';
import { buildOutput, captureFailure } from './support.js';

export class WatchlistStrategy implements DiscoveryStrategy {
  readonly id = 'channel_performance' as const;

  async execute(context: RunContext): Promise<StrategyOutput> {
    const startTime = Date.now();
    const { channels, vocabulary } = context.targets;

    const items: RawItem[] = [];
    const errors: string[] = [];

    for (const channelId of channels) {
      try {
        items.push(...(await this.collectChannel(channelId, vocabulary, context)));
      } catch (error) {
        const message = captureFailure(error, `channel ${channelId}`);
        context.logger.warn(`[watchlist] Skipping ${message}`);
        errors.push(message);
      }
    }

    context.logger.info(`[watchlist] ${items.length} items from ${channels.length} channels`);
    return buildOutput(this.id, items, errors, channels.length, startTime);
  }

  private async collectChannel(
    channelId: string,
    vocabulary: readonly string[],
    context: RunContext
  ): Promise<RawItem[]> {
    const playlistId = await context.client.getUploadsPlaylistId(channelId);
    if (!playlistId) {
      context.logger.debug(`[watchlist] No uploads playlist for ${channelId}`);
      return [];
    }

    const ids = await context.client.listPlaylistVideoIds(playlistId, COLLECTION_PARAMS.recentUploads);
    if (ids.length === 0) {
      return [];
    }

    const videos = await context.client.getVideoDetails(ids);
    return tagItems(filterRelevant(videos, vocabulary), this.id, { monitoredChannelId: channelId });
  }
}
