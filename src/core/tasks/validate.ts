/**
 * Input validation for task fields.
 */

import { TodoError } from '../errors.js';
import { ExitCode } from '../../types/exit-codes.js';
import type { TaskPriority } from '../../types/task.js';
import { parseDueDate } from '../query/dates.js';

const DATE_FORMAT = /^\d{4}-\d{2}-\d{2}$/;

const PRIORITY_ALIASES: Record<string, TaskPriority> = {
  low: 'low',
  l: 'low',
  normal: 'normal',
  n: 'normal',
  high: 'high',
  h: 'high',
};

/**
 * Validate a due date. Empty input means "no date" and yields null.
 */
export function validateDueDate(input: string | undefined): string | null {
  const value = input?.trim() ?? '';
  if (value === '') return null;
  if (!DATE_FORMAT.test(value)) {
    throw new TodoError(
      ExitCode.INVALID_INPUT,
      `Invalid date format: ${value}. Please use YYYY-MM-DD format`,
      { fix: 'Example: --due 2025-12-31' },
    );
  }
  if (!parseDueDate(value)) {
    throw new TodoError(ExitCode.INVALID_INPUT, `Invalid date: ${value} does not exist`);
  }
  return value;
}

/**
 * Normalize a priority name or shortcut (l/n/h), case-insensitive.
 * Empty input yields the default 'normal'.
 */
export function normalizePriority(input: string | undefined): TaskPriority {
  const value = input?.trim().toLowerCase() ?? '';
  if (value === '') return 'normal';
  const priority = PRIORITY_ALIASES[value];
  if (!priority) {
    throw new TodoError(
      ExitCode.VALIDATION_ERROR,
      `Invalid priority: ${input}. Valid values: low, normal, high (or l, n, h)`,
    );
  }
  return priority;
}

/** Trim a description; empty is rejected. */
export function validateDescription(input: string | undefined): string {
  const value = input?.trim() ?? '';
  if (value === '') {
    throw new TodoError(ExitCode.INVALID_INPUT, 'Task description cannot be empty');
  }
  return value;
}
