/**
 * Tests for configuration module
 *
 * @module config/index.test
 */

import { describe, it, expect } from '@jest/globals';
import {
  loadConfig,
  ConfigError,
  formatQuota,
  QUOTA_COSTS,
  DEFAULT_TARGETS,
  TARGET_KEYWORDS,
} from './index.js';

describe('loadConfig', () => {
  it('applies defaults', () => {
    const config = loadConfig({ YOUTUBE_API_KEYS: 'key-a' });

    expect(config).toEqual({
      apiKeys: ['key-a'],
      outputDir: 'results',
      minViewCount: 1000,
      batchSize: 100,
      maxConcurrentTasks: 5,
      enableDataValidation: true,
      dailyQuota: 10000,
      requestTimeoutMs: 10000,
    });
  });

  it('splits and trims the key list, dropping blanks', () => {
    const config = loadConfig({ YOUTUBE_API_KEYS: ' key-a , ,key-b,' });
    expect(config.apiKeys).toEqual(['key-a', 'key-b']);
  });

  it('reads overrides', () => {
    const config = loadConfig({
      YOUTUBE_API_KEYS: 'key-a',
      OUTPUT_DIRECTORY: '/data/out',
      BATCH_SIZE: '10',
      MAX_CONCURRENT_TASKS: '2',
      ENABLE_DATA_VALIDATION: 'False',
      DAILY_QUOTA: '500',
    });

    expect(config.outputDir).toBe('/data/out');
    expect(config.batchSize).toBe(10);
    expect(config.maxConcurrentTasks).toBe(2);
    expect(config.enableDataValidation).toBe(false);
    expect(config.dailyQuota).toBe(500);
  });

  it('requires at least one key', () => {
    expect(() => loadConfig({})).toThrow(ConfigError);
    expect(() => loadConfig({ YOUTUBE_API_KEYS: ' , ' })).toThrow(
      'YOUTUBE_API_KEYS must contain at least one key'
    );
  });

  it('lists every invalid variable', () => {
    try {
      loadConfig({ YOUTUBE_API_KEYS: 'key-a', BATCH_SIZE: '0', ENABLE_DATA_VALIDATION: 'maybe' });
      throw new Error('expected loadConfig to throw');
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      if (!(error instanceof ConfigError)) return;

      expect(error.issues).toHaveLength(2);
      expect(error.issues[0]).toMatch(/^BATCH_SIZE: /);
      expect(error.issues[1]).toBe('ENABLE_DATA_VALIDATION: Expected a boolean flag (true/false)');
      expect(error.message.startsWith('Invalid environment variables:\n  BATCH_SIZE: ')).toBe(true);
    }
  });
});

describe('quota helpers', () => {
  it('prices search far above other calls', () => {
    expect(QUOTA_COSTS.search).toBe(100);
    expect(QUOTA_COSTS.videos).toBe(1);
  });

  it('formats quota figures', () => {
    expect(formatQuota(1204)).toBe('1,204 units');
    expect(formatQuota(1204, 10000)).toBe('1,204 / 10,000 units');
  });
});

describe('collection targets', () => {
  it('exposes the default lists', () => {
    expect(DEFAULT_TARGETS.keywords).toBe(TARGET_KEYWORDS);
    expect(DEFAULT_TARGETS.keywords).toHaveLength(14);
    expect(DEFAULT_TARGETS.vocabulary).toContain('skincare');
    expect(DEFAULT_TARGETS.channels).toHaveLength(5);
  });
});
