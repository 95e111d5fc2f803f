/**
 * Counts and statistics over the task collection.
 */

import type { Task } from '../../types/task.js';
import {
  isDueSoon, isInWeekRange, isOverdue, isSameDay, isSameMonth, parseDueDate,
} from './dates.js';

/** Pending task counts per priority. */
export interface PriorityBreakdown {
  high: number;
  normal: number;
  low: number;
}

export interface TaskInsights {
  total: number;
  completed: number;
  pending: number;
  /** One-decimal percentage; 0 for an empty collection. */
  completedPercent: number;
  pendingPercent: number;
  overdue: number;
  /** Due soon and not overdue. */
  dueSoon: number;
  /** Pending tasks without a due date. */
  noDate: number;
  priorities: PriorityBreakdown;
}

export interface TaskStatistics extends TaskInsights {
  dueToday: number;
  dueThisWeek: number;
  dueThisMonth: number;
}

export interface QuickInsights {
  overdue: number;
  dueSoon: number;
}

/** Round to one decimal place. */
export function percent(part: number, total: number): number {
  if (total === 0) return 0;
  return Math.round((part / total) * 1000) / 10;
}

export function priorityBreakdown(tasks: readonly Task[]): PriorityBreakdown {
  const counts: PriorityBreakdown = { high: 0, normal: 0, low: 0 };
  for (const task of tasks) {
    if (!task.completed) counts[task.priority]++;
  }
  return counts;
}

/** Overdue and due-soon counts over pending tasks; an overdue task is never also due soon. */
export function quickInsights(tasks: readonly Task[], now: Date, dueSoonDays = 3): QuickInsights {
  let overdue = 0;
  let dueSoon = 0;
  for (const task of tasks) {
    if (task.completed) continue;
    if (isOverdue(task, now)) overdue++;
    else if (isDueSoon(task, now, dueSoonDays)) dueSoon++;
  }
  return { overdue, dueSoon };
}

export function computeInsights(tasks: readonly Task[], now: Date, dueSoonDays = 3): TaskInsights {
  const total = tasks.length;
  const completed = tasks.filter((t) => t.completed).length;
  const pending = total - completed;
  const { overdue, dueSoon } = quickInsights(tasks, now, dueSoonDays);
  const noDate = tasks.filter((t) => !t.completed && t.dueDate === null).length;

  return {
    total,
    completed,
    pending,
    completedPercent: percent(completed, total),
    pendingPercent: percent(pending, total),
    overdue,
    dueSoon,
    noDate,
    priorities: priorityBreakdown(tasks),
  };
}

/** Insights plus due-date windows over pending, validly dated tasks. */
export function computeStatistics(tasks: readonly Task[], now: Date, dueSoonDays = 3): TaskStatistics {
  let dueToday = 0;
  let dueThisWeek = 0;
  let dueThisMonth = 0;

  for (const task of tasks) {
    if (task.completed) continue;
    const due = parseDueDate(task.dueDate);
    if (!due) continue;
    if (isSameDay(due, now)) dueToday++;
    if (isInWeekRange(due, now)) dueThisWeek++;
    if (isSameMonth(due, now)) dueThisMonth++;
  }

  return { ...computeInsights(tasks, now, dueSoonDays), dueToday, dueThisWeek, dueThisMonth };
}

/** Completed tasks whose completion time falls on today's calendar day. */
export function completedTodayCount(tasks: readonly Task[], now: Date): number {
  return tasks.filter((t) => {
    if (!t.completed || !t.completedAt) return false;
    const at = new Date(t.completedAt);
    return !isNaN(at.getTime()) && isSameDay(at, now);
  }).length;
}
