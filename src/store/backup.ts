/**
 * Numbered backup system for data files.
 * Maintains a rotating window of recent backups (file.1 is newest).
 */

import { copyFile, readdir, rename, rm, mkdir } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { join, basename } from 'node:path';
import { TodoError } from '../core/errors.js';
import { ExitCode } from '../types/exit-codes.js';
import { isErrnoCode } from './atomic.js';

const DEFAULT_MAX_BACKUPS = 5;

/**
 * Create a numbered backup of a file.
 * Rotates existing backups (file.1 -> file.2, etc.) and removes excess.
 */
export async function createBackup(
  filePath: string,
  backupDir: string,
  maxBackups: number = DEFAULT_MAX_BACKUPS,
): Promise<string> {
  if (!existsSync(filePath)) {
    throw new TodoError(
      ExitCode.FILE_ERROR,
      `Cannot backup: source file not found: ${filePath}`,
    );
  }

  try {
    await mkdir(backupDir, { recursive: true });
    const fileName = basename(filePath);

    await rm(join(backupDir, `${fileName}.${maxBackups}`), { force: true });
    for (let i = maxBackups - 1; i >= 1; i--) {
      const current = join(backupDir, `${fileName}.${i}`);
      if (existsSync(current)) {
        await rename(current, join(backupDir, `${fileName}.${i + 1}`));
      }
    }

    const backupPath = join(backupDir, `${fileName}.1`);
    await copyFile(filePath, backupPath);
    return backupPath;
  } catch (err) {
    throw new TodoError(
      ExitCode.FILE_ERROR,
      `Backup failed for: ${filePath}`,
      { cause: err },
    );
  }
}

/**
 * List existing backups for a file, newest first.
 */
export async function listBackups(
  fileName: string,
  backupDir: string,
): Promise<string[]> {
  let entries: string[];
  try {
    entries = await readdir(backupDir);
  } catch (err) {
    if (isErrnoCode(err, 'ENOENT')) return [];
    throw new TodoError(ExitCode.FILE_ERROR, `Cannot read backups: ${backupDir}`, { cause: err });
  }
  const prefix = `${fileName}.`;
  return entries
    .filter((e) => e.startsWith(prefix) && /^\d+$/.test(e.slice(prefix.length)))
    .sort((a, b) => parseInt(a.slice(prefix.length), 10) - parseInt(b.slice(prefix.length), 10))
    .map((e) => join(backupDir, e));
}
