/**
 * Raw Item Schemas
 *
 * Types for items returned by the discovery strategies before enrichment.
 * API payloads are parsed into these shapes at the client boundary, so no
 * untyped maps travel past the record processor's input.
 *
 * @module schemas/item
 */

import { z } from 'zod';

// ============================================================================
// Strategy Identifiers
// ============================================================================

/**
 * Provenance tag for the strategy that produced an item.
 * - macro_trend: category-filtered most-popular chart
 * - keyword_discovery: search-then-hydrate per keyword
 * - channel_performance: watched channels' recent uploads
 */
export const StrategyIdSchema = z.enum([
  'macro_trend',
  'keyword_discovery',
  'channel_performance',
]);

export type StrategyId = z.infer<typeof StrategyIdSchema>;

// ============================================================================
// Counts
// ============================================================================

/**
 * A counter the API may withhold (e.g., likes hidden by the uploader).
 * Unreported is distinct from zero.
 */
export type Count = { reported: true; value: number } | { reported: false };

export const UNREPORTED: Count = { reported: false };

/** Integer written to the dataset for an unreported like or comment count */
export const UNREPORTED_SENTINEL = -1;

export function reported(value: number): Count {
  return { reported: true, value };
}

/**
 * Value to use in feature math: unreported counts count as zero.
 */
export function countOrZero(count: Count): number {
  return count.reported ? Math.max(0, count.value) : 0;
}

/**
 * Value to serialise: unreported counts become the sentinel.
 */
export function countOrSentinel(count: Count): number {
  return count.reported ? count.value : UNREPORTED_SENTINEL;
}

// ============================================================================
// Raw Item
// ============================================================================

export interface ItemSnippet {
  title: string;
  channelId: string;
  channelTitle: string;
  /** ISO8601 publish timestamp, absent when the API omits it */
  publishedAt?: string;
  description: string;
  tags: string[];
}

export interface ItemStatistics {
  viewCount: Count;
  likeCount: Count;
  commentCount: Count;
}

/**
 * A hydrated video as returned by videos.list, not yet tagged.
 */
export interface VideoItem {
  id: string;
  snippet: ItemSnippet;
  statistics: ItemStatistics;
  contentDetails: {
    /** ISO8601 duration token (e.g., "PT4M13S") */
    duration: string;
  };
}

/**
 * A video tagged with the strategy that discovered it.
 */
export interface RawItem extends VideoItem {
  strategy: StrategyId;
  /** Keyword that surfaced the item (keyword discovery only) */
  discoveredKeyword?: string;
  /** Watched channel the item came from (watchlist only) */
  monitoredChannelId?: string;
}

/**
 * Tag a batch of videos with their producing strategy.
 */
export function tagItems(
  videos: VideoItem[],
  strategy: StrategyId,
  extra: Pick<RawItem, 'discoveredKeyword' | 'monitoredChannelId'> = {}
): RawItem[] {
  return videos.map((video) => ({ ...video, ...extra, strategy }));
}
