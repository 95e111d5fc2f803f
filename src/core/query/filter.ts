/**
 * List filtering and ordering.
 */

import type { Task, TaskPriority } from '../../types/task.js';
import { PRIORITY_WEIGHT } from '../../types/task.js';
import {
  isDueSoon, isInWeekRange, isOverdue, isSameDay, isSameMonth, parseDueDate,
} from './dates.js';

/** Time window for `list`. */
export type TimeFilter = 'today' | 'week' | 'month' | 'all';

/** Options for filterTasks. */
export interface FilterOptions {
  timeFilter: TimeFilter;
  /** Priority name or shortcut letter (h/n/l), case-insensitive. */
  priority?: string;
  completed?: boolean;
  pending?: boolean;
  overdue?: boolean;
  dueSoon?: boolean;
  noDate?: boolean;
  /** Window for the due-soon filter. Default: 3. */
  dueSoonDays?: number;
}

/** Pick the time window from flags: week, then month, then all; default today. */
export function resolveTimeFilter(flags: { week?: boolean; month?: boolean; all?: boolean }): TimeFilter {
  if (flags.week) return 'week';
  if (flags.month) return 'month';
  if (flags.all) return 'all';
  return 'today';
}

const PRIORITY_SHORTCUTS: Record<string, TaskPriority> = {
  h: 'high',
  n: 'normal',
  l: 'low',
};

/** Exact priority match; accepts h/n/l and any letter case. */
export function matchesPriority(task: Task, filter: string): boolean {
  const lowered = filter.toLowerCase();
  const wanted = PRIORITY_SHORTCUTS[lowered] ?? lowered;
  return task.priority === wanted;
}

/**
 * Time window match. Undated tasks always match; unparseable dates never do.
 */
export function matchesTimeFilter(task: Task, filter: TimeFilter, now: Date): boolean {
  if (filter === 'all') return true;
  if (task.dueDate === null || task.dueDate === '') return true;

  const due = parseDueDate(task.dueDate);
  if (!due) return false;

  switch (filter) {
    case 'today': return isSameDay(due, now);
    case 'week': return isInWeekRange(due, now);
    case 'month': return isSameMonth(due, now);
  }
}

function hasSpecialFilter(options: FilterOptions): boolean {
  return Boolean(options.overdue || options.dueSoon || options.noDate);
}

/**
 * Filter and sort tasks for display.
 * The time window only applies when no overdue/due-soon/no-date filter is set.
 */
export function filterTasks(tasks: readonly Task[], options: FilterOptions, now: Date): Task[] {
  const special = hasSpecialFilter(options);
  const soonDays = options.dueSoonDays ?? 3;

  const filtered = tasks.filter((task) => {
    if (options.overdue && !isOverdue(task, now)) return false;
    if (options.dueSoon && !isDueSoon(task, now, soonDays)) return false;
    if (options.noDate && task.dueDate !== null) return false;

    if (!special && !matchesTimeFilter(task, options.timeFilter, now)) return false;

    if (options.priority && !matchesPriority(task, options.priority)) return false;

    if (options.completed && !options.pending) return task.completed;
    if (options.pending && !options.completed) return !task.completed;
    return true;
  });

  return sortTasks(filtered);
}

/**
 * Stable display order: pending first, then priority high > normal > low,
 * then dated before undated, then earliest due date.
 */
export function sortTasks(tasks: readonly Task[]): Task[] {
  return [...tasks].sort((a, b) => {
    if (a.completed !== b.completed) return a.completed ? 1 : -1;

    const weight = PRIORITY_WEIGHT[b.priority] - PRIORITY_WEIGHT[a.priority];
    if (weight !== 0) return weight;

    if (a.dueDate && b.dueDate) {
      if (a.dueDate < b.dueDate) return -1;
      if (a.dueDate > b.dueDate) return 1;
      return 0;
    }
    if (a.dueDate) return -1;
    if (b.dueDate) return 1;
    return 0;
  });
}
