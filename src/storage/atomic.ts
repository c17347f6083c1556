/**
 * Atomic File Operations
 *
 * Writes go to a temp file beside the target and are renamed into place,
 * so readers see either the old file or the complete new one.
 *
 * @module storage/atomic
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';

/**
 * Write text atomically, creating parent directories.
 *
 * @example
 * ```typescript
 * await atomicWriteText('/data/out.csv', 'a,b\r\n');
 * ```
 *
 * @throws Error with the target path in the message; the original error is
 *   kept as `cause`. The temp file is removed on failure.
 */
export async function atomicWriteText(filePath: string, content: string): Promise<void> {
  const tempPath = `${filePath}.tmp.${process.pid}.${Date.now()}`;
  let directoryReady = false;

  try {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    directoryReady = true;
    await fs.writeFile(tempPath, content, 'utf-8');
    await fs.rename(tempPath, filePath);
  } catch (error) {
    if (directoryReady) {
      await fs.rm(tempPath, { force: true });
    }
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Atomic write failed for ${filePath}: ${message}`, { cause: error });
  }
}

/**
 * Size of a file in bytes.
 */
export async function fileSize(filePath: string): Promise<number> {
  const stat = await fs.stat(filePath);
  return stat.size;
}
