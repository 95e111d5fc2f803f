/**
 * Editing task fields.
 */

import type { Task, TaskChange, TaskEdit, TaskStore } from '../../types/task.js';
import { TodoError } from '../errors.js';
import { getLogger } from '../logger.js';
import { ExitCode } from '../../types/exit-codes.js';
import { findTaskById } from './find.js';
import { normalizePriority, validateDescription, validateDueDate } from './validate.js';

export interface UpdateTaskResult {
  task: Task;
  changes: TaskChange[];
}

/**
 * Apply an edit. Every given field is validated before any is applied,
 * so an invalid field leaves the task untouched.
 */
export function updateTask(store: TaskStore, id: number, edit: TaskEdit): UpdateTaskResult {
  const task = findTaskById(store.tasks, id);
  if (!task) {
    throw new TodoError(ExitCode.NOT_FOUND, `Task not found: ${id}`);
  }

  const dueDate = edit.dueDate !== undefined ? validateDueDate(edit.dueDate) : undefined;
  const priority = edit.priority !== undefined ? normalizePriority(edit.priority) : undefined;
  const description = edit.description !== undefined ? validateDescription(edit.description) : undefined;

  const changes: TaskChange[] = [];
  if (dueDate !== undefined) {
    changes.push({ field: 'dueDate', from: task.dueDate, to: dueDate });
    task.dueDate = dueDate;
  }
  if (priority !== undefined) {
    changes.push({ field: 'priority', from: task.priority, to: priority });
    task.priority = priority;
  }
  if (description !== undefined) {
    changes.push({ field: 'description', from: task.description, to: description });
    task.description = description;
  }

  if (changes.length > 0) {
    getLogger('tasks').info({ id, fields: changes.map((c) => c.field) }, 'Task updated');
  }
  return { task, changes };
}
