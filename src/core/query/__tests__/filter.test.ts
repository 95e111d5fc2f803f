/**
 * Tests for list filtering and ordering.
 */

import { describe, it, expect } from 'vitest';
import type { Task } from '../../../types/task.js';
import { filterTasks, matchesPriority, matchesTimeFilter, resolveTimeFilter, sortTasks } from '../filter.js';

const NOW = new Date(2025, 5, 15, 9, 0);

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

describe('resolveTimeFilter', () => {
  it('defaults to today', () => {
    expect(resolveTimeFilter({})).toBe('today');
  });

  it('prefers week, then month, then all', () => {
    expect(resolveTimeFilter({ week: true, month: true, all: true })).toBe('week');
    expect(resolveTimeFilter({ month: true, all: true })).toBe('month');
    expect(resolveTimeFilter({ all: true })).toBe('all');
  });
});

describe('matchesPriority', () => {
  it('accepts full names and shortcut letters in any case', () => {
    expect(matchesPriority(task(1, { priority: 'high' }), 'high')).toBe(true);
    expect(matchesPriority(task(1, { priority: 'high' }), 'H')).toBe(true);
    expect(matchesPriority(task(1, { priority: 'low' }), 'l')).toBe(true);
    expect(matchesPriority(task(1, { priority: 'low' }), 'normal')).toBe(false);
  });
});

describe('matchesTimeFilter', () => {
  it('always includes undated tasks', () => {
    expect(matchesTimeFilter(task(1), 'today', NOW)).toBe(true);
  });

  it('excludes tasks with unparseable dates outside the all window', () => {
    const bad = task(1, { dueDate: 'someday' });
    expect(matchesTimeFilter(bad, 'today', NOW)).toBe(false);
    expect(matchesTimeFilter(bad, 'all', NOW)).toBe(true);
  });

  it('applies today, week and month windows', () => {
    const nextWeek = task(1, { dueDate: '2025-06-21' });
    expect(matchesTimeFilter(nextWeek, 'today', NOW)).toBe(false);
    expect(matchesTimeFilter(nextWeek, 'week', NOW)).toBe(true);
    expect(matchesTimeFilter(task(2, { dueDate: '2025-06-30' }), 'month', NOW)).toBe(true);
    expect(matchesTimeFilter(task(3, { dueDate: '2025-07-01' }), 'month', NOW)).toBe(false);
  });
});

describe('filterTasks', () => {
  const tasks = [
    task(1, { dueDate: '2025-06-15' }),
    task(2, { dueDate: '2025-06-10' }),
    task(3, { dueDate: '2025-06-17', priority: 'high' }),
    task(4),
    task(5, { dueDate: '2025-06-15', completed: true }),
    task(6, { dueDate: '2025-08-01', priority: 'low' }),
  ];

  it('shows today and undated tasks by default', () => {
    expect(ids(filterTasks(tasks, { timeFilter: 'today' }, NOW))).toEqual([1, 4, 5]);
  });

  it('overdue ignores the time window', () => {
    expect(ids(filterTasks(tasks, { timeFilter: 'today', overdue: true }, NOW))).toEqual([2]);
  });

  it('due soon honours its window', () => {
    expect(ids(filterTasks(tasks, { timeFilter: 'today', dueSoon: true }, NOW))).toEqual([3]);
    expect(ids(filterTasks(tasks, { timeFilter: 'today', dueSoon: true, dueSoonDays: 1 }, NOW))).toEqual([]);
  });

  it('no-date keeps only undated tasks', () => {
    expect(ids(filterTasks(tasks, { timeFilter: 'today', noDate: true }, NOW))).toEqual([4]);
  });

  it('filters by completion and priority', () => {
    expect(ids(filterTasks(tasks, { timeFilter: 'all', completed: true }, NOW))).toEqual([5]);
    expect(ids(filterTasks(tasks, { timeFilter: 'all', pending: true, priority: 'n' }, NOW))).toEqual([2, 1, 4]);
  });

  it('treats completed and pending together as no status filter', () => {
    expect(filterTasks(tasks, { timeFilter: 'all', completed: true, pending: true }, NOW)).toHaveLength(6);
  });
});

describe('sortTasks', () => {
  it('orders pending first, then priority, then dated before undated, then date', () => {
    const sorted = sortTasks([
      task(1, { completed: true, priority: 'high' }),
      task(2, { priority: 'low', dueDate: '2025-06-01' }),
      task(3),
      task(4, { dueDate: '2025-07-01' }),
      task(5, { dueDate: '2025-06-20' }),
      task(6, { priority: 'high' }),
    ]);
    expect(ids(sorted)).toEqual([6, 5, 4, 3, 2, 1]);
  });

  it('keeps input order for ties', () => {
    expect(ids(sortTasks([task(2), task(1), task(3)]))).toEqual([2, 1, 3]);
  });
});
