#!/usr/bin/env node
/**
 * Trend Harvester CLI
 *
 * Usage:
 *   harvest --help
 *   harvest collect
 *   harvest collect --date 2026-01-01
 *   harvest collect --start-date 2026-01-01 --end-date 2026-01-07
 *
 * @module cli
 */

import 'dotenv/config';
import { Command } from 'commander';
import { VERSION } from './version.js';
import type { GlobalOptions } from './base-command.js';
import { EXIT_CODES } from './base-command.js';
import { registerCommands } from './commands/index.js';

// ============================================================================
// Main Program Setup
// ============================================================================

/**
 * Create and configure the main CLI program.
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('harvest')
    .description('Collect a labeled YouTube trend dataset under a daily API quota')
    .version(VERSION, '-V, --version', 'Display version number');

  // Global options (available to all commands)
  program
    .option('-v, --verbose', 'Enable verbose output for debugging')
    .option('-q, --quiet', 'Suppress all non-essential output')
    .option('--no-color', 'Disable colored output');

  program.hook('preAction', (thisCommand) => {
    const opts = thisCommand.opts<GlobalOptions>();
    if (opts.verbose && opts.quiet) {
      thisCommand.error('Cannot use both --verbose and --quiet flags', {
        exitCode: EXIT_CODES.USAGE_ERROR,
      });
    }
  });

  registerCommands(program);

  program.exitOverride((err) => {
    if (err.code === 'commander.helpDisplayed' || err.code === 'commander.version') {
      process.exit(EXIT_CODES.SUCCESS);
    }
    process.exit(EXIT_CODES.USAGE_ERROR);
  });

  return program;
}

/**
 * Main CLI entry point.
 */
export async function main(argv: string[] = process.argv): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(argv);
  } catch (error) {
    if (error instanceof Error && error.message) {
      console.error(`Error: ${error.message}`);
    }
    process.exit(EXIT_CODES.ERROR);
  }
}

if (require.main === module) {
  main().catch((error: unknown) => {
    console.error(error);
    process.exit(EXIT_CODES.ERROR);
  });
}
