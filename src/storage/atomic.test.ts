import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { atomicWriteText, fileSize } from './atomic.js';

describe('atomic', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'atomic-test-'));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  describe('atomicWriteText', () => {
    it('creates file with the given content', async () => {
      const filePath = path.join(tempDir, 'out.csv');

      await atomicWriteText(filePath, 'a,b\r\n');

      expect(await fs.readFile(filePath, 'utf-8')).toBe('a,b\r\n');
    });

    it('creates parent directories', async () => {
      const filePath = path.join(tempDir, 'nested', 'deep', 'out.csv');

      await atomicWriteText(filePath, 'x');

      expect(await fs.readFile(filePath, 'utf-8')).toBe('x');
    });

    it('overwrites existing file and leaves no temp files', async () => {
      const filePath = path.join(tempDir, 'out.csv');
      await atomicWriteText(filePath, 'first');
      await atomicWriteText(filePath, 'second');

      expect(await fs.readFile(filePath, 'utf-8')).toBe('second');
      expect(await fs.readdir(tempDir)).toEqual(['out.csv']);
    });

    it('fails with the target path when the directory cannot be created', async () => {
      const blocker = path.join(tempDir, 'blocker');
      await fs.writeFile(blocker, 'not a directory');
      const filePath = path.join(blocker, 'out.csv');

      await expect(atomicWriteText(filePath, 'x')).rejects.toThrow(`Atomic write failed for ${filePath}`);
    });
  });

  describe('fileSize', () => {
    it('counts bytes, not characters', async () => {
      const filePath = path.join(tempDir, 'utf8.txt');
      await fs.writeFile(filePath, '\uFEFF수분', 'utf-8');

      expect(await fileSize(filePath)).toBe(9);
    });
  });
});
