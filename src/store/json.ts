/**
 * JSON read/write with validation and backup.
 */

import { atomicWriteJson, safeReadFile } from './atomic.js';
import { createBackup } from './backup.js';
import { existsSync } from 'node:fs';
import { TodoError } from '../core/errors.js';
import { ExitCode } from '../types/exit-codes.js';

/**
 * Read and parse a JSON file.
 * Returns null if the file does not exist.
 */
export async function readJson(filePath: string): Promise<unknown> {
  const content = await safeReadFile(filePath);
  if (content === null) return null;

  try {
    const parsed: unknown = JSON.parse(content);
    return parsed;
  } catch (err) {
    throw new TodoError(
      ExitCode.VALIDATION_ERROR,
      `Invalid JSON in: ${filePath}`,
      { cause: err },
    );
  }
}

/** Options for saveJson. */
export interface SaveJsonOptions {
  /** Directory for backups. If omitted, no backup is created. */
  backupDir?: string;
  /** Maximum number of backups to retain. Default: 5. 0 disables backups. */
  maxBackups?: number;
  /** JSON indentation. Default: 2. */
  indent?: number;
  /** Validation function. Called before write; throw to abort. */
  validate?: (data: unknown) => void;
}

/**
 * Save JSON data with optional backup and validation:
 *   1. Validate data
 *   2. Back up the existing file
 *   3. Atomic write (temp file -> rename)
 */
export async function saveJson(
  filePath: string,
  data: unknown,
  options?: SaveJsonOptions,
): Promise<void> {
  if (options?.validate) {
    try {
      options.validate(data);
    } catch (err) {
      throw new TodoError(
        ExitCode.VALIDATION_ERROR,
        `Validation failed before write: ${filePath}`,
        { cause: err },
      );
    }
  }

  const maxBackups = options?.maxBackups ?? 5;
  if (options?.backupDir && maxBackups > 0 && existsSync(filePath)) {
    await createBackup(filePath, options.backupDir, maxBackups);
  }

  await atomicWriteJson(filePath, data, { indent: options?.indent });
}
