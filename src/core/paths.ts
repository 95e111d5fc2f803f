/**
 * Data directory path resolution.
 *
 * Environment variables:
 *   TODO_HOME - Data directory (default: ~/.todo)
 */

import { join } from 'node:path';
import { homedir } from 'node:os';

/**
 * Get the data directory.
 * Respects TODO_HOME env var, defaults to ~/.todo.
 */
export function getTodoHome(): string {
  return process.env['TODO_HOME'] ?? join(homedir(), '.todo');
}

/** Path to the task file. */
export function getTaskPath(): string {
  return join(getTodoHome(), 'tasks.json');
}

/** Path to the config file. */
export function getConfigPath(): string {
  return join(getTodoHome(), 'config.json');
}

/** Directory holding numbered task-file backups. */
export function getBackupDir(): string {
  return join(getTodoHome(), 'backups');
}
