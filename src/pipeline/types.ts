/**
 * Pipeline Type Definitions
 *
 * The run context handed to every component: configuration, targets,
 * the shared client and ledger, a logger and the clock.
 *
 * @module pipeline/types
 */

import type { HarvesterConfig, CollectionTargets } from '../config/index.js';
import type { QuotaLedger } from '../quota/ledger.js';
import type { YouTubeClient } from '../youtube/client.js';

// ============================================================================
// Logger Interface
// ============================================================================

/**
 * Minimal logger interface for pipeline components.
 * Allows components to log at various levels without depending on a specific logger.
 */
export interface Logger {
  /** Log debug-level message (typically hidden in production) */
  debug(message: string, ...args: unknown[]): void;

  /** Log informational message */
  info(message: string, ...args: unknown[]): void;

  /** Log warning message */
  warn(message: string, ...args: unknown[]): void;

  /** Log error message */
  error(message: string, ...args: unknown[]): void;
}

/**
 * Logger that discards everything. Used when no logger is supplied.
 */
export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

// ============================================================================
// Run Context
// ============================================================================

/**
 * Runtime context shared by the strategies, the label oracle and the
 * record processor during one run.
 *
 * The ledger and client are shared across all concurrently running
 * strategies; every other piece of mutable state is owned by a single
 * component.
 */
export interface RunContext {
  /** Validated configuration */
  config: HarvesterConfig;

  /** Keywords, vocabulary and watched channels */
  targets: CollectionTargets;

  /** API client, charging the shared quota ledger */
  client: YouTubeClient;

  /** Shared per-key quota ledger */
  ledger: QuotaLedger;

  /** Logger for component output */
  logger: Logger;

  /** Clock used for search windows and view velocity */
  now: () => Date;
}
