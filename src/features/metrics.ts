/**
 * Feature Engine
 *
 * Derived numeric features for a training record. Every function is total:
 * results are finite, non-negative numbers and degenerate inputs yield 0.
 *
 * @module features/metrics
 */

import { countOrZero, type Count } from '../schemas/item.js';
import { hoursBetween } from '../utils/dates.js';

/**
 * Counters and timestamps a feature computation needs.
 */
export interface FeatureInput {
  viewCount: Count;
  likeCount: Count;
  commentCount: Count;
  subscriberCount: number;
  /** ISO8601 upload timestamp */
  uploadDate?: string;
  /** Reference instant ("now") */
  now: Date;
}

export interface Features {
  viewVelocity: number;
  vpvRatio: number;
  engagementRate: number;
}

function finiteOrZero(value: number): number {
  return Number.isFinite(value) && value > 0 ? value : 0;
}

/**
 * Views per hour since upload.
 * 0 when the upload is missing, unparseable, or not in the past.
 */
export function calculateViewVelocity(views: number, uploadDate: string | undefined, now: Date): number {
  if (!uploadDate) {
    return 0;
  }

  const uploaded = new Date(uploadDate);
  if (Number.isNaN(uploaded.getTime())) {
    return 0;
  }

  const hoursElapsed = hoursBetween(uploaded, now);
  if (hoursElapsed <= 0) {
    return 0;
  }

  return finiteOrZero(views / hoursElapsed);
}

/**
 * Views per subscriber (VPV). 0 when the subscriber count is unknown.
 */
export function calculateVpvRatio(views: number, subscribers: number): number {
  if (subscribers <= 0) {
    return 0;
  }
  return finiteOrZero(views / subscribers);
}

/**
 * (likes + comments) per view, with negative inputs clamped to 0.
 */
export function calculateEngagementRate(views: number, likes: number, comments: number): number {
  if (views <= 0) {
    return 0;
  }
  return finiteOrZero((Math.max(likes, 0) + Math.max(comments, 0)) / views);
}

/**
 * Compute all three features. Unreported counts are treated as 0 here only;
 * the record keeps them as unreported.
 */
export function computeFeatures(input: FeatureInput): Features {
  const views = countOrZero(input.viewCount);
  const likes = countOrZero(input.likeCount);
  const comments = countOrZero(input.commentCount);

  return {
    viewVelocity: calculateViewVelocity(views, input.uploadDate, input.now),
    vpvRatio: calculateVpvRatio(views, input.subscriberCount),
    engagementRate: calculateEngagementRate(views, likes, comments),
  };
}
