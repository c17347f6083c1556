/**
 * Quota Ledger
 *
 * Tracks YouTube Data API quota consumption per API key against a daily
 * budget, selects the active key, rotates when a key nears exhaustion and
 * resets all counters when the calendar day changes.
 *
 * The ledger is shared by every strategy running in the process. All of its
 * mutations are synchronous, so under the event loop no two charges can
 * interleave and no lock is needed.
 *
 * @module quota/ledger
 */

import { DEFAULT_DAILY_QUOTA, ROTATION_THRESHOLD } from '../config/quota.js';
import { silentLogger, type Logger } from '../pipeline/types.js';
import { formatLocalDate } from '../utils/dates.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Usage state for a single key.
 */
export interface QuotaState {
  /** Units consumed since the last reset */
  used: number;
  /** Calendar date (YYYY-MM-DD) of the last reset */
  lastReset: string;
}

/**
 * Snapshot of the ledger for reporting.
 */
export interface LedgerSnapshot {
  /** Index of the selected key in rotation order */
  currentIndex: number;
  /** Per-key usage in rotation order */
  keys: QuotaState[];
  /** True once every key has crossed the rotation threshold today */
  exhausted: boolean;
  /** Units charged over the ledger's lifetime (not reset daily) */
  totalCharged: number;
}

export interface QuotaLedgerOptions {
  /** Daily units per key (default 10,000) */
  dailyQuota?: number;
  /** Clock, injectable for tests */
  now?: () => Date;
  logger?: Logger;
}

/**
 * Raised when every key has used its budget for the day.
 * Fatal for the current run.
 */
export class QuotaExhaustedError extends Error {
  constructor(
    public readonly keyCount: number,
    public readonly dailyQuota: number
  ) {
    super(`API quota exhausted for all ${keyCount} key(s) (daily budget ${dailyQuota} units each)`);
    this.name = 'QuotaExhaustedError';
  }
}

// ============================================================================
// QuotaLedger Class
// ============================================================================

/**
 * QuotaLedger charges usage to the selected key and rotates keys.
 *
 * @example
 * ```typescript
 * const ledger = new QuotaLedger(['key-a', 'key-b'], { dailyQuota: 10_000 });
 *
 * const key = ledger.currentCredential();
 * // ... issue request with key ...
 * ledger.recordUsage(100);
 *
 * console.log(`${ledger.remaining()} units left on the active key`);
 * ```
 */
export class QuotaLedger {
  private readonly keys: readonly string[];
  private readonly dailyQuota: number;
  private readonly now: () => Date;
  private readonly logger: Logger;

  private states: QuotaState[];
  private currentIndex = 0;
  private exhausted = false;
  private totalCharged = 0;

  /**
   * @throws Error if no keys are given or the budget is not positive
   */
  constructor(keys: readonly string[], options: QuotaLedgerOptions = {}) {
    if (keys.length === 0) {
      throw new Error('At least one API key is required');
    }
    const dailyQuota = options.dailyQuota ?? DEFAULT_DAILY_QUOTA;
    if (!Number.isFinite(dailyQuota) || dailyQuota <= 0) {
      throw new Error('Daily quota must be a positive number');
    }

    this.keys = [...keys];
    this.dailyQuota = dailyQuota;
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger ?? silentLogger;

    const today = this.today();
    this.states = this.keys.map(() => ({ used: 0, lastReset: today }));
  }

  // ==========================================================================
  // Public API
  // ==========================================================================

  /**
   * Key to use for the next request.
   *
   * @throws QuotaExhaustedError when every key is spent for today
   */
  currentCredential(): string {
    this.checkDailyReset();

    if (this.exhausted) {
      throw new QuotaExhaustedError(this.keys.length, this.dailyQuota);
    }

    return this.keys[this.currentIndex];
  }

  /**
   * Charge units to the selected key, rotating when it crosses the
   * threshold. Once no key has capacity the ledger is exhausted and the next
   * {@link currentCredential} call throws.
   *
   * @param cost - Quota units consumed by the request just observed
   */
  recordUsage(cost: number): void {
    if (!Number.isFinite(cost) || cost < 0) {
      throw new Error(`Quota cost must be a non-negative number, got ${cost}`);
    }

    this.checkDailyReset();

    const state = this.states[this.currentIndex];
    state.used += cost;
    this.totalCharged += cost;

    if (!this.exhausted && this.isSpent(state)) {
      this.rotate();
    }
  }

  /**
   * Units left on the selected key today (0 once exhausted).
   */
  remaining(): number {
    this.checkDailyReset();

    if (this.exhausted) {
      return 0;
    }

    return Math.max(0, this.dailyQuota - this.states[this.currentIndex].used);
  }

  /**
   * Units charged since the ledger was created, across all keys and days.
   */
  getTotalCharged(): number {
    return this.totalCharged;
  }

  getDailyQuota(): number {
    return this.dailyQuota;
  }

  getSnapshot(): LedgerSnapshot {
    this.checkDailyReset();
    return {
      currentIndex: this.currentIndex,
      keys: this.states.map((state) => ({ ...state })),
      exhausted: this.exhausted,
      totalCharged: this.totalCharged,
    };
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private today(): string {
    return formatLocalDate(this.now());
  }

  private isSpent(state: QuotaState): boolean {
    return state.used >= this.dailyQuota * ROTATION_THRESHOLD;
  }

  /**
   * Advance to the next key in cyclic order that still has capacity.
   */
  private rotate(): void {
    const start = this.currentIndex;

    for (let step = 1; step < this.keys.length; step++) {
      const candidate = (start + step) % this.keys.length;
      if (!this.isSpent(this.states[candidate])) {
        this.currentIndex = candidate;
        this.logger.info(`[ledger] Rotated to API key ${candidate + 1}/${this.keys.length}`);
        return;
      }
    }

    this.exhausted = true;
    this.logger.warn(`[ledger] Quota exhausted for all ${this.keys.length} API key(s)`);
  }

  /**
   * Reset every counter once the calendar day changes.
   */
  private checkDailyReset(): void {
    const today = this.today();
    if (this.states.every((state) => state.lastReset === today)) {
      return;
    }

    this.states = this.keys.map(() => ({ used: 0, lastReset: today }));
    this.currentIndex = 0;
    this.exhausted = false;
    this.logger.info('[ledger] Daily quota reset');
  }
}

/**
 * Check if an error signals that every key is spent
 */
export function isQuotaExhaustedError(error: unknown): error is QuotaExhaustedError {
  return error instanceof QuotaExhaustedError;
}
