/**
 * Tests for health scoring and mark analysis.
 */

import { describe, it, expect } from 'vitest';
import type { Task } from '../../../types/task.js';
import {
  analyzeTasks, calculateHealthScore, markSuggestions, postCompletionSuggestions, suggestFocus,
} from '../health.js';

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

const ids = (tasks: Task[]): number[] => tasks.map((t) => t.id);

describe('calculateHealthScore', () => {
  it('is 100 for an empty collection', () => {
    expect(calculateHealthScore({ total: 0, completed: 0, overdue: 0, highPriorityPending: 0 })).toBe(100);
  });

  it('floors the completion percentage and subtracts penalties', () => {
    expect(calculateHealthScore({ total: 3, completed: 2, overdue: 0, highPriorityPending: 1 })).toBe(56);
    expect(calculateHealthScore({ total: 4, completed: 4, overdue: 0, highPriorityPending: 0 })).toBe(100);
  });

  it('clamps at zero', () => {
    expect(calculateHealthScore({ total: 2, completed: 1, overdue: 2, highPriorityPending: 1 })).toBe(0);
  });
});

describe('suggestFocus', () => {
  it('picks the first applicable focus', () => {
    expect(suggestFocus([task(1, { dueDate: '2025-06-01' }), task(2, { priority: 'high' })], NOW))
      .toEqual({ kind: 'overdue', count: 1 });
    expect(suggestFocus([task(1, { dueDate: '2025-06-15' })], NOW)).toEqual({ kind: 'today', count: 1 });
    expect(suggestFocus([task(1, { priority: 'high' })], NOW)).toEqual({ kind: 'high-priority', count: 1 });
    expect(suggestFocus([task(1)], NOW)).toEqual({ kind: 'quick-wins', count: 0 });
  });
});

describe('analyzeTasks', () => {
  it('summarizes completion, risk and recommendations', () => {
    const tasks = [
      task(1, { dueDate: '2025-06-10', priority: 'high' }),
      task(2, { dueDate: '2025-06-15' }),
      task(3, { dueDate: '2025-06-20' }),
      task(4, { priority: 'low' }),
      task(5, { completed: true }),
    ];
    const analysis = analyzeTasks(tasks, NOW);
    expect(analysis.total).toBe(5);
    expect(analysis.completed).toBe(1);
    expect(analysis.completionRate).toBe(20);
    expect(analysis.overdue).toBe(1);
    expect(analysis.dueToday).toBe(1);
    expect(analysis.highPriorityPending).toBe(1);
    expect(analysis.healthScore).toBe(0);
    expect(analysis.priorities).toEqual({ high: 1, normal: 2, low: 1 });
    expect(ids(analysis.upcomingDeadlines)).toEqual([3]);
    expect(analysis.focus).toEqual({ kind: 'overdue', count: 1 });
    expect(ids(analysis.quickWins)).toEqual([4]);
    expect(ids(analysis.highImpact)).toEqual([1]);
    expect(ids(analysis.overdueRecovery)).toEqual([1]);
    expect(analysis.cleanup).toEqual({ completed: 1, stale: 1 });
  });
});

describe('markSuggestions', () => {
  it('lists today, high-priority, quick-win and overdue candidates', () => {
    const tasks = [
      task(1, { dueDate: '2025-06-15', priority: 'high' }),
      task(2, { priority: 'low' }),
      task(3, { dueDate: '2025-06-12' }),
      task(4, { dueDate: '2025-06-15', completed: true }),
    ];
    const s = markSuggestions(tasks, NOW);
    expect(ids(s.today)).toEqual([1]);
    expect(ids(s.highPriority)).toEqual([1]);
    expect(ids(s.quickWins)).toEqual([2]);
    expect(ids(s.overdue)).toEqual([3]);
  });
});

describe('postCompletionSuggestions', () => {
  it('is null when nothing is pending', () => {
    expect(postCompletionSuggestions([task(1, { completed: true })], NOW)).toBeNull();
  });

  it('points at the next high-priority and due-today tasks', () => {
    const tasks = [
      task(1, { priority: 'high' }),
      task(2, { dueDate: '2025-06-15' }),
      ...[3, 4, 5, 6, 7, 8].map((id) => task(id, { completed: true })),
    ];
    const next = postCompletionSuggestions(tasks, NOW);
    expect(next?.nextHighPriority?.id).toBe(1);
    expect(next?.nextDueToday?.id).toBe(2);
    expect(next?.suggestCleanup).toBe(true);
  });

  it('suggests cleanup only past five completed tasks', () => {
    const tasks = [task(1), ...[2, 3, 4, 5, 6].map((id) => task(id, { completed: true }))];
    expect(postCompletionSuggestions(tasks, NOW)).toEqual({
      nextHighPriority: null,
      nextDueToday: null,
      suggestCleanup: false,
    });
  });
});
