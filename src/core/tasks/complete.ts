/**
 * Marking tasks complete or pending.
 */

import type { Task, TaskStore } from '../../types/task.js';
import { TodoError } from '../errors.js';
import { getLogger } from '../logger.js';
import { ExitCode } from '../../types/exit-codes.js';
import { findTaskById } from './find.js';

function applyCompletion(task: Task, completed: boolean, now: Date): void {
  task.completed = completed;
  task.completedAt = completed ? now.toISOString() : null;
}

/**
 * Set one task's completion state. Completing stamps completedAt;
 * reopening clears it.
 */
export function setCompletion(store: TaskStore, id: number, completed: boolean, now: Date): Task {
  const task = findTaskById(store.tasks, id);
  if (!task) {
    throw new TodoError(ExitCode.NOT_FOUND, `Task not found: ${id}`, {
      fix: "Use 'todo list -a' to see task ids",
    });
  }
  applyCompletion(task, completed, now);
  getLogger('tasks').info({ id, completed }, 'Task completion changed');
  return task;
}

/** Set completion on every listed id that exists; returns how many changed. */
export function setCompletionMany(
  store: TaskStore,
  ids: readonly number[],
  completed: boolean,
  now: Date,
): number {
  let count = 0;
  for (const id of new Set(ids)) {
    const task = findTaskById(store.tasks, id);
    if (!task) continue;
    applyCompletion(task, completed, now);
    count++;
  }
  getLogger('tasks').info({ count, completed }, 'Batch completion changed');
  return count;
}

/**
 * Parse a batch selection: "all", or comma-separated 1-based positions
 * into `candidates`. Out-of-range and non-numeric entries are ignored.
 */
export function parseSelection(input: string, candidates: readonly Task[]): Task[] {
  const trimmed = input.trim();
  if (trimmed.toLowerCase() === 'all') return [...candidates];

  const picked: Task[] = [];
  for (const part of trimmed.split(',')) {
    const value = part.trim();
    if (!/^\d+$/.test(value)) continue;
    const task = candidates[Number(value) - 1];
    if (task && !picked.includes(task)) picked.push(task);
  }
  return picked;
}
