/**
 * Dataset Writer
 *
 * Serialises training records to the per-date CSV file. The file is UTF-8
 * with a byte-order mark so spreadsheet tools detect the encoding, rows end
 * with CRLF, and fields are quoted only when they contain a comma, a quote
 * or a line break.
 *
 * @module export/dataset-writer
 */

import * as path from 'node:path';
import {
  DATASET_COLUMNS,
  DATASET_SCHEMA_VERSION,
  type DatasetColumn,
  type TrainingRecord,
} from '../schemas/record.js';
import { countOrSentinel, countOrZero } from '../schemas/item.js';
import { atomicWriteText, fileSize } from '../storage/index.js';
import { compactDate } from '../utils/dates.js';

// ============================================================================
// Constants
// ============================================================================

const BOM = '\uFEFF';
const ROW_SEPARATOR = '\r\n';
const NEEDS_QUOTING = /[",\r\n]/;

// ============================================================================
// Types
// ============================================================================

export interface DatasetWriteResult {
  filePath: string;
  fileSizeBytes: number;
  rowCount: number;
}

/**
 * Raised when the dataset file cannot be written. No partial file remains.
 */
export class DatasetWriteError extends Error {
  constructor(
    message: string,
    public readonly filePath: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'DatasetWriteError';
  }
}

// ============================================================================
// Serialisation
// ============================================================================

/**
 * Quote a field when it contains a delimiter, quote or line break;
 * embedded quotes are doubled.
 */
export function escapeCsvField(value: string): string {
  if (NEEDS_QUOTING.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

/**
 * Render a float column so it always reads back as a float ("3.0", not "3").
 */
export function formatFloat(value: number): string {
  return Number.isInteger(value) ? value.toFixed(1) : String(value);
}

function toCells(record: TrainingRecord): Record<DatasetColumn, string> {
  return {
    collection_date: record.collectionDate,
    video_id: record.videoId,
    title: record.title,
    channel_name: record.channelName,
    upload_date: record.uploadDate ?? '',
    duration_sec: String(record.durationSec),
    subscriber_count: String(record.subscriberCount),
    view_count: String(countOrZero(record.viewCount)),
    like_count: String(countOrSentinel(record.likeCount)),
    comment_count: String(countOrSentinel(record.commentCount)),
    view_velocity: formatFloat(record.viewVelocity),
    vpv_ratio: formatFloat(record.vpvRatio),
    engagement_rate: formatFloat(record.engagementRate),
    top_comments_text: record.topCommentsText,
    description_keywords: record.descriptionKeywords,
    is_trending_category: String(record.isTrendingCategory),
    source_type: record.sourceType,
  };
}

/**
 * One CSV row (without terminator) in {@link DATASET_COLUMNS} order.
 */
export function serializeRecord(record: TrainingRecord): string {
  const cells = toCells(record);
  return DATASET_COLUMNS.map((column) => escapeCsvField(cells[column])).join(',');
}

/**
 * Full file content: BOM, header and one row per record.
 */
export function renderDataset(records: readonly TrainingRecord[]): string {
  const lines = [DATASET_COLUMNS.join(','), ...records.map(serializeRecord)];
  return BOM + lines.map((line) => line + ROW_SEPARATOR).join('');
}

// ============================================================================
// File Output
// ============================================================================

/**
 * Dataset file name for a run date.
 *
 * @example
 * buildDatasetFileName('2026-01-01') // 'youtube_viral_dataset_v1_20260101.csv'
 */
export function buildDatasetFileName(runDate: string): string {
  return `youtube_viral_dataset_v${DATASET_SCHEMA_VERSION}_${compactDate(runDate)}.csv`;
}

export function buildDatasetPath(outputDir: string, runDate: string): string {
  return path.join(outputDir, buildDatasetFileName(runDate));
}

/**
 * Write the dataset for `runDate`, replacing any earlier file for that date.
 *
 * @throws DatasetWriteError if the directory or file cannot be written
 */
export async function writeDataset(
  records: readonly TrainingRecord[],
  runDate: string,
  outputDir: string
): Promise<DatasetWriteResult> {
  const filePath = buildDatasetPath(outputDir, runDate);

  try {
    await atomicWriteText(filePath, renderDataset(records));
    return {
      filePath,
      fileSizeBytes: await fileSize(filePath),
      rowCount: records.length,
    };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new DatasetWriteError(`Could not write dataset: ${message}`, filePath, { cause: error });
  }
}
