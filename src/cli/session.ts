/**
 * Per-command working state: the loaded task collection, the effective
 * configuration and the clock reading every engine call shares.
 */

import type { TaskStore } from '../types/task.js';
import type { TodoConfig } from '../types/config.js';
import { TodoError } from '../core/errors.js';
import { loadConfig } from '../core/config.js';
import { getBackupDir, getTaskPath } from '../core/paths.js';
import { loadTaskStore, saveTaskStore } from '../store/task-store.js';
import { cliError } from './renderers/index.js';

export interface CommandSession {
  store: TaskStore;
  config: TodoConfig;
  now: Date;
  /** Persist the collection, rotating backups per config. */
  save(): Promise<void>;
}

export async function openSession(): Promise<CommandSession> {
  const config = await loadConfig();
  const taskPath = getTaskPath();
  const store = await loadTaskStore(taskPath);

  return {
    store,
    config,
    now: new Date(),
    save: () => saveTaskStore(taskPath, store, {
      backupDir: getBackupDir(),
      maxBackups: config.backup.maxBackups,
    }),
  };
}

/**
 * Command catch block: print a TodoError and exit with its code.
 * Anything else is a bug and propagates.
 */
export function handleCommandError(err: unknown): void {
  if (err instanceof TodoError) {
    cliError(err);
    process.exit(err.code);
  }
  throw err;
}
