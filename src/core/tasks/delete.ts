/**
 * Task removal.
 */

import type { Task, TaskStore } from '../../types/task.js';
import { TodoError } from '../errors.js';
import { getLogger } from '../logger.js';
import { ExitCode } from '../../types/exit-codes.js';

/** Remove one task by id. */
export function deleteTask(store: TaskStore, id: number): Task {
  const index = store.tasks.findIndex((t) => t.id === id);
  const task = store.tasks[index];
  if (!task) {
    throw new TodoError(ExitCode.NOT_FOUND, `Task with ID ${id} not found`, {
      fix: "Use 'todo list -a' to see task ids",
    });
  }
  store.tasks.splice(index, 1);
  getLogger('tasks').info({ id }, 'Task deleted');
  return task;
}

/** Remove every listed id that exists; returns the removed tasks. */
export function deleteTasks(store: TaskStore, ids: readonly number[]): Task[] {
  const wanted = new Set(ids);
  const removed = store.tasks.filter((t) => wanted.has(t.id));
  store.tasks = store.tasks.filter((t) => !wanted.has(t.id));
  if (removed.length > 0) {
    getLogger('tasks').info({ ids: removed.map((t) => t.id) }, 'Tasks deleted');
  }
  return removed;
}
