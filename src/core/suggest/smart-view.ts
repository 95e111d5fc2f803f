/**
 * The `list --smart` view: what needs attention now, and advice.
 */

import type { Task } from '../../types/task.js';
import { isDueSoon, isDueToday, isOverdue } from '../query/dates.js';
import { completedTodayCount } from '../query/insights.js';
import { findLowImpactTasks } from './cleanup.js';

export type RecommendationKind = 'overdue' | 'no-date' | 'high-priority' | 'completed-today';

export interface Recommendation {
  kind: RecommendationKind;
  count: number;
  message: string;
}

export interface SmartView {
  /** Overdue, or high priority and due soon. */
  critical: Task[];
  today: Task[];
  dueSoon: Task[];
  /** Pending low-priority undated tasks; only reported when there are 1 to 3. */
  quickWins: Task[];
  recommendations: Recommendation[];
}

export function findCriticalTasks(tasks: readonly Task[], now: Date, dueSoonDays = 3): Task[] {
  return tasks.filter((t) =>
    !t.completed && (isOverdue(t, now) || (t.priority === 'high' && isDueSoon(t, now, dueSoonDays))));
}

export function findDueTodayPending(tasks: readonly Task[], now: Date): Task[] {
  return tasks.filter((t) => !t.completed && isDueToday(t, now));
}

export function findDueSoon(tasks: readonly Task[], now: Date, dueSoonDays = 3): Task[] {
  return tasks.filter((t) => isDueSoon(t, now, dueSoonDays));
}

export function findHighPriorityPending(tasks: readonly Task[]): Task[] {
  return tasks.filter((t) => !t.completed && t.priority === 'high');
}

/** Advice lines, in fixed order, each only when its condition holds. */
export function buildRecommendations(tasks: readonly Task[], now: Date): Recommendation[] {
  const recommendations: Recommendation[] = [];

  const overdue = tasks.filter((t) => isOverdue(t, now)).length;
  if (overdue > 0) {
    recommendations.push({
      kind: 'overdue',
      count: overdue,
      message: `You have ${overdue} overdue task(s). Consider rescheduling or completing them.`,
    });
  }

  const noDate = tasks.filter((t) => !t.completed && t.dueDate === null).length;
  if (noDate > 5) {
    recommendations.push({
      kind: 'no-date',
      count: noDate,
      message: `You have ${noDate} tasks without due dates. Consider adding dates for better planning.`,
    });
  }

  const high = findHighPriorityPending(tasks).length;
  if (high > 3) {
    recommendations.push({
      kind: 'high-priority',
      count: high,
      message: `You have ${high} high-priority tasks. Consider focusing on top 3 first.`,
    });
  }

  const doneToday = completedTodayCount(tasks, now);
  if (doneToday > 0) {
    recommendations.push({
      kind: 'completed-today',
      count: doneToday,
      message: `Great job! You've completed ${doneToday} task(s) today!`,
    });
  }

  return recommendations;
}

export function buildSmartView(tasks: readonly Task[], now: Date, dueSoonDays = 3): SmartView {
  const quickWins = findLowImpactTasks(tasks);
  return {
    critical: findCriticalTasks(tasks, now, dueSoonDays),
    today: findDueTodayPending(tasks, now),
    dueSoon: findDueSoon(tasks, now, dueSoonDays),
    quickWins: quickWins.length <= 3 ? quickWins : [],
    recommendations: buildRecommendations(tasks, now),
  };
}
