/**
 * CLI Commands Registry
 *
 * @module cli/commands
 */

import type { Command } from 'commander';
import { registerCollectCommand } from './collect.js';

/**
 * Register all CLI commands with the program.
 */
export function registerCommands(program: Command): void {
  registerCollectCommand(program);
}
