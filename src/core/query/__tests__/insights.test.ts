/**
 * Tests for counts and statistics.
 */

import { describe, it, expect } from 'vitest';
import type { Task } from '../../../types/task.js';
import {
  completedTodayCount, computeInsights, computeStatistics, percent, priorityBreakdown, quickInsights,
} from '../insights.js';

const NOW = new Date(2025, 5, 15, 12, 0);

function task(id: number, overrides: Partial<Task> = {}): Task {
  return {
    id,
    description: `Task ${id}`,
    dueDate: null,
    priority: 'normal',
    completed: false,
    createdAt: null,
    completedAt: null,
    ...overrides,
  };
}

const tasks = [
  task(1, { dueDate: '2025-06-10', priority: 'high' }),
  task(2, { dueDate: '2025-06-16' }),
  task(3, { dueDate: '2025-06-15', priority: 'low' }),
  task(4),
  task(5, { completed: true, completedAt: new Date(2025, 5, 15, 8, 0).toISOString() }),
  task(6, { completed: true, dueDate: '2025-06-01', completedAt: new Date(2025, 5, 1).toISOString() }),
];

describe('percent', () => {
  it('rounds to one decimal', () => {
    expect(percent(1, 3)).toBe(33.3);
    expect(percent(2, 3)).toBe(66.7);
  });

  it('is zero for an empty total', () => {
    expect(percent(0, 0)).toBe(0);
  });
});

describe('quickInsights', () => {
  it('counts overdue and due-soon pending tasks', () => {
    expect(quickInsights(tasks, NOW)).toEqual({ overdue: 1, dueSoon: 1 });
  });
});

describe('priorityBreakdown', () => {
  it('counts pending tasks only', () => {
    expect(priorityBreakdown(tasks)).toEqual({ high: 1, normal: 2, low: 1 });
  });
});

describe('computeInsights', () => {
  it('summarizes the collection', () => {
    expect(computeInsights(tasks, NOW)).toEqual({
      total: 6,
      completed: 2,
      pending: 4,
      completedPercent: 33.3,
      pendingPercent: 66.7,
      overdue: 1,
      dueSoon: 1,
      noDate: 1,
      priorities: { high: 1, normal: 2, low: 1 },
    });
  });

  it('handles an empty collection', () => {
    const insights = computeInsights([], NOW);
    expect(insights.completedPercent).toBe(0);
    expect(insights.pendingPercent).toBe(0);
  });
});

describe('computeStatistics', () => {
  it('adds due-date windows over pending tasks', () => {
    const stats = computeStatistics(tasks, NOW);
    expect(stats.dueToday).toBe(1);
    expect(stats.dueThisWeek).toBe(2);
    expect(stats.dueThisMonth).toBe(3);
  });
});

describe('completedTodayCount', () => {
  it('counts completions stamped today', () => {
    expect(completedTodayCount(tasks, NOW)).toBe(1);
  });
});
