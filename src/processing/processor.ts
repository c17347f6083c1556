/**
 * Record Processor
 *
 * Turns a raw item into a training record: sanitised text, parsed
 * duration, counts with sentinel semantics, subscriber and comment
 * enrichment, derived features, description keywords and the trending
 * label.
 *
 * Enrichment is best effort. A failed subscriber lookup yields 0 and a
 * failed comment fetch yields no comments; neither drops the record.
 *
 * @module processing/processor
 */

import { COLLECTION_PARAMS } from '../config/targets.js';
import { computeFeatures } from '../features/metrics.js';
import { extractKeywords, parseDuration, sanitizeText } from '../normalize/text.js';
import type { RawItem } from '../schemas/item.js';
import type { TrainingRecord } from '../schemas/record.js';
import type { RunContext } from '../pipeline/types.js';
import { describeError } from '../youtube/client.js';

/** Separator between comments in the comments column */
export const COMMENT_SEPARATOR = '|';

/**
 * RecordProcessor converts raw items for one run.
 *
 * @example
 * ```typescript
 * const processor = new RecordProcessor(context, trending.ids);
 * const record = await processor.process(item, '2026-01-01');
 * ```
 */
export class RecordProcessor {
  private readonly vocabulary: string[];

  constructor(
    private readonly context: RunContext,
    private readonly trendingIds: ReadonlySet<string>
  ) {
    this.vocabulary = [...context.targets.vocabulary, ...context.targets.keywords];
  }

  /**
   * Build the record for `raw`, or null when the item has no id or an
   * unexpected failure occurs.
   */
  async process(raw: RawItem, runDate: string): Promise<TrainingRecord | null> {
    if (!raw.id) {
      this.context.logger.debug(`[processor] Dropping item without id from ${raw.strategy}`);
      return null;
    }

    try {
      const subscriberCount = await this.lookupSubscribers(raw.snippet.channelId);
      const topCommentsText = await this.lookupComments(raw.id);

      const features = computeFeatures({
        viewCount: raw.statistics.viewCount,
        likeCount: raw.statistics.likeCount,
        commentCount: raw.statistics.commentCount,
        subscriberCount,
        uploadDate: raw.snippet.publishedAt,
        now: this.context.now(),
      });

      return {
        collectionDate: runDate,
        videoId: raw.id,
        title: sanitizeText(raw.snippet.title),
        channelName: sanitizeText(raw.snippet.channelTitle),
        uploadDate: raw.snippet.publishedAt,
        durationSec: parseDuration(raw.contentDetails.duration),
        subscriberCount,
        viewCount: raw.statistics.viewCount,
        likeCount: raw.statistics.likeCount,
        commentCount: raw.statistics.commentCount,
        ...features,
        topCommentsText,
        descriptionKeywords: extractKeywords(raw.snippet.description, this.vocabulary),
        isTrendingCategory: this.trendingIds.has(raw.id) ? 1 : 0,
        sourceType: raw.strategy,
      };
    } catch (error) {
      this.context.logger.error(`[processor] Failed to process ${raw.id}: ${describeError(error)}`);
      return null;
    }
  }

  private async lookupSubscribers(channelId: string): Promise<number> {
    if (!channelId) {
      return 0;
    }
    try {
      return await this.context.client.getSubscriberCount(channelId);
    } catch (error) {
      this.context.logger.debug(`[processor] Subscriber lookup failed for ${channelId}: ${describeError(error)}`);
      return 0;
    }
  }

  private async lookupComments(videoId: string): Promise<string> {
    try {
      const comments = await this.context.client.listTopComments(videoId, COLLECTION_PARAMS.maxComments);
      return comments
        .map((comment) => sanitizeText(comment))
        .filter((comment) => comment.length > 0)
        .join(COMMENT_SEPARATOR);
    } catch (error) {
      this.context.logger.debug(`[processor] Comments unavailable for ${videoId}: ${describeError(error)}`);
      return '';
    }
  }
}
