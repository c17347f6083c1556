/**
 * Unit tests for item, record and stats schemas
 */

import { describe, it, expect } from '@jest/globals';
import {
  StrategyIdSchema,
  reported,
  UNREPORTED,
  countOrZero,
  countOrSentinel,
  tagItems,
  type VideoItem,
} from './item.js';
import { DATASET_COLUMNS, validateRecord, type TrainingRecord } from './record.js';
import { createEmptyStats } from './stats.js';

function validRecord(overrides: Partial<TrainingRecord> = {}): TrainingRecord {
  return {
    collectionDate: '2026-01-10',
    videoId: 'v1',
    title: 'Title',
    channelName: 'Channel',
    uploadDate: '2026-01-09T08:30:00Z',
    durationSec: 60,
    subscriberCount: 10,
    viewCount: reported(100),
    likeCount: UNREPORTED,
    commentCount: reported(0),
    viewVelocity: 1.5,
    vpvRatio: 10,
    engagementRate: 0,
    topCommentsText: '',
    descriptionKeywords: '',
    isTrendingCategory: 0,
    sourceType: 'macro_trend',
    ...overrides,
  };
}

describe('counts', () => {
  it('treats unreported as zero in math and as -1 on output', () => {
    expect(countOrZero(UNREPORTED)).toBe(0);
    expect(countOrSentinel(UNREPORTED)).toBe(-1);
    expect(countOrZero(reported(7))).toBe(7);
    expect(countOrSentinel(reported(0))).toBe(0);
  });
});

describe('StrategyIdSchema', () => {
  it('accepts the three strategy tags only', () => {
    expect(StrategyIdSchema.options).toEqual(['macro_trend', 'keyword_discovery', 'channel_performance']);
    expect(StrategyIdSchema.safeParse('search').success).toBe(false);
  });
});

describe('tagItems', () => {
  it('adds strategy and provenance without dropping fields', () => {
    const video: VideoItem = {
      id: 'v1',
      snippet: { title: 't', channelId: 'c', channelTitle: 'C', description: '', tags: [] },
      statistics: { viewCount: UNREPORTED, likeCount: UNREPORTED, commentCount: UNREPORTED },
      contentDetails: { duration: 'PT1S' },
    };

    const [item] = tagItems([video], 'keyword_discovery', { discoveredKeyword: 'Anua' });

    expect(item).toEqual({ ...video, strategy: 'keyword_discovery', discoveredKeyword: 'Anua' });
  });
});

describe('DATASET_COLUMNS', () => {
  it('has 17 columns starting with the run date and ending with the source', () => {
    expect(DATASET_COLUMNS).toHaveLength(17);
    expect(DATASET_COLUMNS[0]).toBe('collection_date');
    expect(DATASET_COLUMNS[16]).toBe('source_type');
  });
});

describe('validateRecord', () => {
  it('accepts a valid record', () => {
    expect(validateRecord(validRecord())).toEqual([]);
  });

  it('accepts a record without upload date', () => {
    expect(validateRecord(validRecord({ uploadDate: undefined }))).toEqual([]);
  });

  it('reports each problem with its field path', () => {
    const problems = validateRecord(
      validRecord({ videoId: '', durationSec: -1, uploadDate: 'yesterday' })
    );

    expect(problems).toHaveLength(3);
    expect(problems[0]).toMatch(/^videoId: /);
    expect(problems[1]).toMatch(/^uploadDate: /);
    expect(problems[2]).toMatch(/^durationSec: /);
  });

  it('rejects negative reported counts', () => {
    expect(validateRecord(validRecord({ viewCount: reported(-5) }))).toHaveLength(1);
  });
});

describe('createEmptyStats', () => {
  it('starts idle with zeroed counters', () => {
    const stats = createEmptyStats('2026-01-10', '2026-01-10T12:00:00.000Z');

    expect(stats.state).toBe('idle');
    expect(stats.errorCount).toBe(0);
    expect(stats.csvFilePath).toBe('');
    expect(stats.strategyCounts).toEqual({ macro_trend: 0, keyword_discovery: 0, channel_performance: 0 });
  });
});
