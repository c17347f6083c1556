/**
 * Configuration Module
 *
 * Loads and validates the harvester's environment variables.
 * Uses Zod for runtime validation with sensible defaults.
 *
 * Unlike a module-level singleton, configuration is produced by
 * {@link loadConfig} and handed to each run through its context.
 *
 * @module config
 */

import { z } from 'zod';

// ============================================================================
// Environment Schema
// ============================================================================

/** Parses "true"/"false"/"1"/"0" style flags */
const booleanFlag = z
  .string()
  .trim()
  .toLowerCase()
  .refine((value) => ['true', 'false', '1', '0', 'yes', 'no'].includes(value), {
    message: 'Expected a boolean flag (true/false)',
  })
  .transform((value) => value === 'true' || value === '1' || value === 'yes');

const positiveInt = z.coerce.number().int().positive();

const envSchema = z.object({
  // Comma-separated credential list; blanks are dropped
  YOUTUBE_API_KEYS: z
    .string({ required_error: 'YOUTUBE_API_KEYS is required' })
    .transform((value) =>
      value
        .split(',')
        .map((key) => key.trim())
        .filter((key) => key.length > 0)
    )
    .refine((keys) => keys.length > 0, {
      message: 'YOUTUBE_API_KEYS must contain at least one key',
    }),

  OUTPUT_DIRECTORY: z.string().trim().min(1).default('results'),

  // Accepted for compatibility; no filter is applied with it
  MIN_VIEW_COUNT: z.coerce.number().int().nonnegative().default(1000),

  BATCH_SIZE: positiveInt.default(100),
  MAX_CONCURRENT_TASKS: positiveInt.default(5),
  ENABLE_DATA_VALIDATION: booleanFlag.default('true'),

  DAILY_QUOTA: positiveInt.default(10_000),
  REQUEST_TIMEOUT_MS: positiveInt.default(10_000),
});

type Env = z.infer<typeof envSchema>;

// ============================================================================
// Types
// ============================================================================

/**
 * Harvester configuration consumed by the pipeline.
 */
export interface HarvesterConfig {
  /** YouTube Data API keys in rotation order */
  apiKeys: string[];
  /** Directory receiving the dataset CSV files */
  outputDir: string;
  /** Reserved: accepted but not enforced as a filter */
  minViewCount: number;
  /** Number of raw items handed to the record processor per batch */
  batchSize: number;
  /** Maximum items processed concurrently within a batch */
  maxConcurrentTasks: number;
  /** Validate records against the record schema before writing */
  enableDataValidation: boolean;
  /** Daily quota units per API key */
  dailyQuota: number;
  /** Per-request timeout */
  requestTimeoutMs: number;
}

/**
 * Raised when the environment fails validation.
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly issues: string[]
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

// ============================================================================
// Loading
// ============================================================================

/**
 * Load configuration from an environment object.
 *
 * @param env - Variables to read (defaults to `process.env`)
 * @throws ConfigError listing every invalid or missing variable
 *
 * @example
 * ```typescript
 * const config = loadConfig({ YOUTUBE_API_KEYS: 'key-a,key-b' });
 * config.apiKeys; // ['key-a', 'key-b']
 * ```
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env
): HarvesterConfig {
  const parseResult = envSchema.safeParse(env);

  if (!parseResult.success) {
    const issues = parseResult.error.issues.map(
      (issue) => `${issue.path.join('.') || 'env'}: ${issue.message}`
    );
    throw new ConfigError(`Invalid environment variables:\n  ${issues.join('\n  ')}`, issues);
  }

  return toHarvesterConfig(parseResult.data);
}

function toHarvesterConfig(env: Env): HarvesterConfig {
  return {
    apiKeys: env.YOUTUBE_API_KEYS,
    outputDir: env.OUTPUT_DIRECTORY,
    minViewCount: env.MIN_VIEW_COUNT,
    batchSize: env.BATCH_SIZE,
    maxConcurrentTasks: env.MAX_CONCURRENT_TASKS,
    enableDataValidation: env.ENABLE_DATA_VALIDATION,
    dailyQuota: env.DAILY_QUOTA,
    requestTimeoutMs: env.REQUEST_TIMEOUT_MS,
  };
}

// Re-export quota cost table and collection targets
export * from './quota.js';
export * from './targets.js';
