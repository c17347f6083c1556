/**
 * Training Record Schema
 *
 * The unit written to the dataset file. Field order here is the column
 * order of the CSV; {@link DATASET_COLUMNS} is the single definition of it.
 *
 * @module schemas/record
 */

import { z } from 'zod';
import { StrategyIdSchema, type Count, type StrategyId } from './item.js';

// ============================================================================
// Types
// ============================================================================

export interface TrainingRecord {
  /** Run date (YYYY-MM-DD), not the upload date */
  collectionDate: string;
  /** Primary key, unique within a run */
  videoId: string;
  title: string;
  channelName: string;
  /** ISO8601 upload timestamp; undefined when the API omitted it */
  uploadDate?: string;
  durationSec: number;
  subscriberCount: number;
  viewCount: Count;
  likeCount: Count;
  commentCount: Count;
  /** Views per hour since upload */
  viewVelocity: number;
  /** Views per subscriber */
  vpvRatio: number;
  /** (likes + comments) per view */
  engagementRate: number;
  /** Top comments joined with "|" */
  topCommentsText: string;
  /** Matched keywords, sorted, joined with ", " */
  descriptionKeywords: string;
  isTrendingCategory: 0 | 1;
  sourceType: StrategyId;
}

// ============================================================================
// Column Order
// ============================================================================

/**
 * Dataset columns in output order.
 */
export const DATASET_COLUMNS = [
  'collection_date',
  'video_id',
  'title',
  'channel_name',
  'upload_date',
  'duration_sec',
  'subscriber_count',
  'view_count',
  'like_count',
  'comment_count',
  'view_velocity',
  'vpv_ratio',
  'engagement_rate',
  'top_comments_text',
  'description_keywords',
  'is_trending_category',
  'source_type',
] as const;

export type DatasetColumn = (typeof DATASET_COLUMNS)[number];

/** Version token embedded in dataset file names */
export const DATASET_SCHEMA_VERSION = 1;

// ============================================================================
// Validation Schema
// ============================================================================

const CountSchema = z.discriminatedUnion('reported', [
  z.object({ reported: z.literal(true), value: z.number().int().nonnegative() }),
  z.object({ reported: z.literal(false) }),
]);

const finiteRatio = z.number().finite().nonnegative();

/**
 * Record validation applied before writing when data validation is enabled.
 */
export const TrainingRecordSchema = z.object({
  collectionDate: z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Expected YYYY-MM-DD'),
  videoId: z.string().min(1),
  title: z.string(),
  channelName: z.string(),
  uploadDate: z.string().datetime({ offset: true }).optional(),
  durationSec: z.number().int().nonnegative(),
  subscriberCount: z.number().int().nonnegative(),
  viewCount: CountSchema,
  likeCount: CountSchema,
  commentCount: CountSchema,
  viewVelocity: finiteRatio,
  vpvRatio: finiteRatio,
  engagementRate: finiteRatio,
  topCommentsText: z.string(),
  descriptionKeywords: z.string(),
  isTrendingCategory: z.union([z.literal(0), z.literal(1)]),
  sourceType: StrategyIdSchema,
});

/**
 * Validate a record, returning the list of problems (empty when valid).
 */
export function validateRecord(record: TrainingRecord): string[] {
  const result = TrainingRecordSchema.safeParse(record);
  if (result.success) {
    return [];
  }
  return result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
}
