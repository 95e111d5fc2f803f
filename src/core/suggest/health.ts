/**
 * Health score and the analyses behind `mark`: focus advice,
 * completion recommendations and post-completion hints.
 */

import type { Task } from '../../types/task.js';
import { isOverdue, isUpcoming } from '../query/dates.js';
import { percent, priorityBreakdown, type PriorityBreakdown } from '../query/insights.js';
import { findCompleted, findLowImpactTasks, findOverdue } from './cleanup.js';
import { findDueTodayPending, findHighPriorityPending } from './smart-view.js';

export interface HealthInput {
  total: number;
  completed: number;
  overdue: number;
  highPriorityPending: number;
}

/**
 * floor(completed percent) - 20 per overdue - 10 per pending high-priority task,
 * clamped to 0..100. An empty collection scores 100.
 */
export function calculateHealthScore(input: HealthInput): number {
  if (input.total === 0) return 100;
  const base = Math.floor((input.completed * 100) / input.total);
  const score = base - input.overdue * 20 - input.highPriorityPending * 10;
  return Math.max(0, Math.min(100, score));
}

export type FocusSuggestion =
  | { kind: 'overdue'; count: number }
  | { kind: 'today'; count: number }
  | { kind: 'high-priority'; count: number }
  | { kind: 'quick-wins'; count: 0 };

export interface TaskAnalysis {
  total: number;
  completed: number;
  completionRate: number;
  overdue: number;
  dueToday: number;
  highPriorityPending: number;
  healthScore: number;
  priorities: PriorityBreakdown;
  upcomingDeadlines: Task[];
  focus: FocusSuggestion;
  quickWins: Task[];
  highImpact: Task[];
  overdueRecovery: Task[];
  cleanup: {
    completed: number;
    /** Pending, low priority, undated. */
    stale: number;
  };
}

/** First applicable of: overdue, due today, high priority, quick wins. */
export function suggestFocus(tasks: readonly Task[], now: Date): FocusSuggestion {
  const overdue = findOverdue(tasks, now).length;
  if (overdue > 0) return { kind: 'overdue', count: overdue };
  const today = findDueTodayPending(tasks, now).length;
  if (today > 0) return { kind: 'today', count: today };
  const high = findHighPriorityPending(tasks).length;
  if (high > 0) return { kind: 'high-priority', count: high };
  return { kind: 'quick-wins', count: 0 };
}

export function analyzeTasks(tasks: readonly Task[], now: Date, upcomingDays = 7): TaskAnalysis {
  const total = tasks.length;
  const completed = findCompleted(tasks).length;
  const overdueTasks = findOverdue(tasks, now);
  const dueToday = findDueTodayPending(tasks, now).length;
  const highImpact = findHighPriorityPending(tasks);
  const lowImpact = findLowImpactTasks(tasks);

  return {
    total,
    completed,
    completionRate: percent(completed, total),
    overdue: overdueTasks.length,
    dueToday,
    highPriorityPending: highImpact.length,
    healthScore: calculateHealthScore({
      total,
      completed,
      overdue: overdueTasks.length,
      highPriorityPending: highImpact.length,
    }),
    priorities: priorityBreakdown(tasks),
    upcomingDeadlines: tasks.filter((t) => isUpcoming(t, now, upcomingDays)),
    focus: suggestFocus(tasks, now),
    quickWins: lowImpact,
    highImpact,
    overdueRecovery: overdueTasks,
    cleanup: { completed, stale: lowImpact.length },
  };
}

export interface MarkSuggestions {
  today: Task[];
  highPriority: Task[];
  quickWins: Task[];
  overdue: Task[];
}

/** What `mark` with no arguments proposes to complete. */
export function markSuggestions(tasks: readonly Task[], now: Date): MarkSuggestions {
  return {
    today: findDueTodayPending(tasks, now),
    highPriority: findHighPriorityPending(tasks),
    quickWins: findLowImpactTasks(tasks),
    overdue: tasks.filter((t) => isOverdue(t, now)),
  };
}

export interface PostCompletionSuggestions {
  nextHighPriority: Task | null;
  nextDueToday: Task | null;
  /** More than five tasks are completed. */
  suggestCleanup: boolean;
}

/** Hints shown after completing a task; null when nothing is left pending. */
export function postCompletionSuggestions(tasks: readonly Task[], now: Date): PostCompletionSuggestions | null {
  if (!tasks.some((t) => !t.completed)) return null;
  return {
    nextHighPriority: findHighPriorityPending(tasks)[0] ?? null,
    nextDueToday: findDueTodayPending(tasks, now)[0] ?? null,
    suggestCleanup: findCompleted(tasks).length > 5,
  };
}
