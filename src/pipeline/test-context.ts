/**
 * Run contexts wired to the fake API, for tests.
 *
 * @module pipeline/test-context
 */

import type { CollectionTargets, HarvesterConfig } from '../config/index.js';
import { QuotaLedger } from '../quota/ledger.js';
import { YouTubeClient } from '../youtube/client.js';
import { createFakeApi, type FakeApi, type FakeEndpoint, type FakeHandler } from '../youtube/fake-api.js';
import { silentLogger, type Logger, type RunContext } from './types.js';

export const TEST_NOW = new Date('2026-01-10T12:00:00Z');

export const TEST_CONFIG: HarvesterConfig = {
  apiKeys: ['test-key'],
  outputDir: 'results',
  minViewCount: 1000,
  batchSize: 2,
  maxConcurrentTasks: 2,
  enableDataValidation: true,
  dailyQuota: 10000,
  requestTimeoutMs: 1000,
};

export const TEST_TARGETS: CollectionTargets = {
  keywords: ['Glass Skin', 'COSRX'],
  vocabulary: ['serum', 'skincare'],
  channels: ['UC-watch-1'],
};

export interface TestContextOptions {
  handlers?: Partial<Record<FakeEndpoint, FakeHandler>>;
  config?: Partial<HarvesterConfig>;
  targets?: CollectionTargets;
  logger?: Logger;
  now?: () => Date;
}

export interface TestContext {
  context: RunContext;
  api: FakeApi;
}

/**
 * Build a run context whose client talks to a fake API.
 * Installs the fake as `global.fetch`; callers restore it.
 */
export function createTestContext(options: TestContextOptions = {}): TestContext {
  const config = { ...TEST_CONFIG, ...options.config };
  const now = options.now ?? (() => TEST_NOW);
  const logger = options.logger ?? silentLogger;

  const api = createFakeApi(options.handlers ?? {});
  global.fetch = api.fetch;

  const ledger = new QuotaLedger(config.apiKeys, { dailyQuota: config.dailyQuota, now, logger });
  const client = new YouTubeClient({ ledger, timeoutMs: config.requestTimeoutMs });

  return {
    context: {
      config,
      targets: options.targets ?? TEST_TARGETS,
      client,
      ledger,
      logger,
      now,
    },
    api,
  };
}
