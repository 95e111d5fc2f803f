/**
 * Task lookup by id or name.
 */

import type { Task } from '../../types/task.js';

/** Parse a whole positive integer id; anything else is null. */
export function parseTaskId(identifier: string): number | null {
  const trimmed = identifier.trim();
  if (!/^\d+$/.test(trimmed)) return null;
  const id = Number(trimmed);
  return Number.isSafeInteger(id) && id > 0 ? id : null;
}

export function findTaskById(tasks: readonly Task[], id: number): Task | undefined {
  return tasks.find((t) => t.id === id);
}

/** Every task whose description contains `name`, case-insensitively. */
export function findTasksByName(tasks: readonly Task[], name: string): Task[] {
  const needle = name.toLowerCase();
  return tasks.filter((t) => t.description.toLowerCase().includes(needle));
}

/**
 * An id match when the identifier is a number and that id exists,
 * otherwise the first description containing it.
 */
export function findTaskByIdOrName(tasks: readonly Task[], identifier: string): Task | undefined {
  const id = parseTaskId(identifier);
  if (id !== null) {
    const byId = findTaskById(tasks, id);
    if (byId) return byId;
  }
  return findTasksByName(tasks, identifier)[0];
}
