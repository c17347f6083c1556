/**
 * CLI Version Information
 *
 * Should match package.json version.
 *
 * @module cli/version
 */

export const VERSION = '1.0.0';

/**
 * Version line for display.
 */
export function getVersionInfo(): string {
  return `Trend Harvester v${VERSION}`;
}
