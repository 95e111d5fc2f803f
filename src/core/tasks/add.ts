/**
 * Task creation.
 */

import type { NewTaskInput, Task, TaskStore } from '../../types/task.js';
import { TodoError } from '../errors.js';
import { getLogger } from '../logger.js';
import { normalizePriority, validateDescription, validateDueDate } from './validate.js';

/** An add request that was not applied. */
export interface SkippedTask {
  description: string;
  reason: string;
}

/** Result of adding several tasks at once. */
export interface AddTasksResult {
  added: Task[];
  skipped: SkippedTask[];
}

/**
 * Validate and append a task, assigning the next id.
 */
export function addTask(store: TaskStore, input: NewTaskInput, now: Date): Task {
  const description = validateDescription(input.description);
  const dueDate = validateDueDate(input.dueDate);
  const priority = normalizePriority(input.priority);

  const task: Task = {
    id: store.nextId,
    description,
    dueDate,
    priority,
    completed: false,
    createdAt: now.toISOString(),
    completedAt: null,
  };
  store.tasks.push(task);
  store.nextId++;

  getLogger('tasks').info({ id: task.id }, 'Task added');
  return task;
}

/**
 * Add one task per description, sharing the due date and priority.
 * Empty descriptions and invalid fields skip that entry; the rest still go in.
 */
export function addTasks(
  store: TaskStore,
  descriptions: readonly string[],
  options: { dueDate?: string; priority?: string },
  now: Date,
): AddTasksResult {
  const result: AddTasksResult = { added: [], skipped: [] };

  for (const description of descriptions) {
    if (description.trim() === '') {
      result.skipped.push({ description, reason: 'empty description' });
      continue;
    }
    try {
      result.added.push(addTask(store, { description, ...options }, now));
    } catch (err) {
      if (!(err instanceof TodoError)) throw err;
      result.skipped.push({ description, reason: err.message });
    }
  }

  return result;
}
