/**
 * Record deduplication
 *
 * @module dedupe
 */

import type { TrainingRecord } from '../schemas/record.js';

/**
 * Keep the first record for each video id, preserving input order.
 *
 * Since strategy outputs are concatenated macro, keyword, watchlist, an
 * item found by several strategies keeps the earliest strategy's tag.
 */
export function dedupeRecords(records: readonly TrainingRecord[]): TrainingRecord[] {
  const seen = new Set<string>();
  const unique: TrainingRecord[] = [];

  for (const record of records) {
    if (seen.has(record.videoId)) {
      continue;
    }
    seen.add(record.videoId);
    unique.push(record);
  }

  return unique;
}
