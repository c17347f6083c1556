/**
 * Quota Configuration
 *
 * YouTube Data API quota costs per call type. YouTube is quota-based,
 * not cost-based: each key gets a fixed number of units per day.
 *
 * @module config/quota
 */

/**
 * Quota units charged per endpoint call.
 * `videos` covers both the popular-items chart and batched detail lookups.
 */
export const QUOTA_COSTS = {
  videos: 1,
  search: 100,
  channels: 1,
  playlistItems: 1,
  commentThreads: 1,
} as const;

export type QuotaCallType = keyof typeof QUOTA_COSTS;

/** Default daily units per API key */
export const DEFAULT_DAILY_QUOTA = 10_000;

/** Fraction of the daily budget at which the ledger moves to the next key */
export const ROTATION_THRESHOLD = 0.9;

/**
 * Format a quota figure for display (e.g., "1,204 / 10,000 units").
 */
export function formatQuota(used: number, budget?: number): string {
  const usedStr = used.toLocaleString('en-US');
  if (budget === undefined) {
    return `${usedStr} units`;
  }
  return `${usedStr} / ${budget.toLocaleString('en-US')} units`;
}
