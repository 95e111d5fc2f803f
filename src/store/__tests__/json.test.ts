/**
 * Tests for JSON read/write with validation and backup.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, readFile, writeFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { readJson, saveJson } from '../json.js';

describe('JSON store', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'todo-test-'));
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  describe('readJson', () => {
    it('reads and parses valid JSON', async () => {
      const filePath = join(tempDir, 'data.json');
      await writeFile(filePath, '{"key": "value"}');
      expect(await readJson(filePath)).toEqual({ key: 'value' });
    });

    it('returns null for missing files', async () => {
      expect(await readJson(join(tempDir, 'missing.json'))).toBeNull();
    });

    it('throws on invalid JSON', async () => {
      const filePath = join(tempDir, 'bad.json');
      await writeFile(filePath, '{invalid}');
      await expect(readJson(filePath)).rejects.toThrow('Invalid JSON');
    });
  });

  describe('saveJson', () => {
    it('backs up the previous version before writing', async () => {
      const filePath = join(tempDir, 'data.json');
      const backupDir = join(tempDir, 'backups');
      await saveJson(filePath, { v: 1 }, { backupDir });
      expect(existsSync(join(backupDir, 'data.json.1'))).toBe(false);

      await saveJson(filePath, { v: 2 }, { backupDir });
      expect(JSON.parse(await readFile(join(backupDir, 'data.json.1'), 'utf8'))).toEqual({ v: 1 });
      expect(await readJson(filePath)).toEqual({ v: 2 });
    });

    it('skips backups when maxBackups is 0', async () => {
      const filePath = join(tempDir, 'data.json');
      const backupDir = join(tempDir, 'backups');
      await saveJson(filePath, { v: 1 });
      await saveJson(filePath, { v: 2 }, { backupDir, maxBackups: 0 });
      expect(existsSync(backupDir)).toBe(false);
    });

    it('aborts without writing when validation throws', async () => {
      const filePath = join(tempDir, 'data.json');
      const validate = (): void => {
        throw new Error('bad shape');
      };
      await expect(saveJson(filePath, { v: 1 }, { validate })).rejects.toThrow('Validation failed before write');
      expect(existsSync(filePath)).toBe(false);
    });
  });
});
