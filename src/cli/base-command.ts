/**
 * Base Command
 *
 * Shared CLI plumbing: global option handling (verbose, quiet, no-color),
 * exit codes, console output helpers and the console-backed {@link Logger}
 * handed to the pipeline.
 *
 * @module cli/base-command
 */

import chalk from 'chalk';
import type { Logger } from '../pipeline/types.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Global CLI options available to all commands.
 */
export type GlobalOptions = {
  /** Enable verbose output for debugging */
  verbose?: boolean;
  /** Suppress all non-essential output */
  quiet?: boolean;
  /** commander inverts --no-color to color: false */
  color?: boolean;
};

// ============================================================================
// Exit Codes
// ============================================================================

export const EXIT_CODES = {
  SUCCESS: 0,
  /** Run failed or configuration invalid */
  ERROR: 1,
  /** Invalid usage or arguments */
  USAGE_ERROR: 2,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

// ============================================================================
// BaseCommand Class
// ============================================================================

/**
 * Base command class providing common CLI functionality.
 *
 * @example
 * ```typescript
 * const base = new BaseCommand(command.optsWithGlobals());
 * base.info('Collecting...');
 * const orchestrator = new HarvestOrchestrator({ config, logger: base.createLogger() });
 * ```
 */
export class BaseCommand {
  readonly options: GlobalOptions;
  private readonly useColor: boolean;

  constructor(options: GlobalOptions) {
    this.options = options;
    this.useColor = options.color !== false && process.stdout.isTTY === true;

    if (!this.useColor) {
      chalk.level = 0;
    }
  }

  // ==========================================================================
  // Output Methods
  // ==========================================================================

  /**
   * Log a debug message (only visible in verbose mode).
   */
  debug(message: string, ...args: unknown[]): void {
    if (this.options.verbose) {
      console.log(chalk.dim(`[DEBUG] ${message}`), ...args);
    }
  }

  /**
   * Log an informational message (hidden in quiet mode).
   */
  info(message: string, ...args: unknown[]): void {
    if (!this.options.quiet) {
      console.log(message, ...args);
    }
  }

  warn(message: string, ...args: unknown[]): void {
    console.warn(chalk.yellow(`Warning: ${message}`), ...args);
  }

  /**
   * Print an error message and exit.
   */
  error(message: string, code: ExitCode = EXIT_CODES.ERROR, cause?: unknown): never {
    console.error(chalk.red(`Error: ${message}`));
    if (this.options.verbose && cause instanceof Error && cause.stack) {
      console.error(chalk.dim(cause.stack));
    }
    process.exit(code);
  }

  success(message: string): void {
    if (!this.options.quiet) {
      console.log(chalk.green(`${this.useColor ? '✔' : '[OK]'} ${message}`));
    }
  }

  fail(message: string): void {
    console.log(chalk.red(`${this.useColor ? '✘' : '[FAIL]'} ${message}`));
  }

  /**
   * Print a block of text (hidden in quiet mode).
   */
  print(text: string): void {
    if (!this.options.quiet) {
      console.log(text);
    }
  }

  // ==========================================================================
  // Pipeline Logger
  // ==========================================================================

  /**
   * Logger for pipeline components.
   *
   * Component info lines appear only in verbose mode, where they replace
   * the progress spinner; warnings and errors always appear.
   */
  createLogger(): Logger {
    return {
      debug: (message, ...args) => this.debug(message, ...args),
      info: (message, ...args) => {
        if (this.options.verbose) {
          console.log(chalk.cyan(message), ...args);
        }
      },
      warn: (message, ...args) => {
        if (!this.options.quiet) {
          console.warn(chalk.yellow(message), ...args);
        }
      },
      error: (message, ...args) => console.error(chalk.red(message), ...args),
    };
  }

  // ==========================================================================
  // Utility Methods
  // ==========================================================================

  isVerbose(): boolean {
    return this.options.verbose === true;
  }

  isQuiet(): boolean {
    return this.options.quiet === true;
  }
}
