/**
 * Tests for task creation.
 */

import { describe, it, expect } from 'vitest';
import type { TaskStore } from '../../../types/task.js';
import { addTask, addTasks } from '../add.js';

const NOW = new Date(2025, 5, 15, 12, 0);

function emptyStore(): TaskStore {
  return { tasks: [], nextId: 1 };
}

describe('addTask', () => {
  it('assigns the next id and stamps creation time', () => {
    const store = emptyStore();
    const task = addTask(store, { description: ' Buy milk ', dueDate: '2025-06-20', priority: 'h' }, NOW);
    expect(task).toEqual({
      id: 1,
      description: 'Buy milk',
      dueDate: '2025-06-20',
      priority: 'high',
      completed: false,
      createdAt: NOW.toISOString(),
      completedAt: null,
    });
    expect(store.nextId).toBe(2);
    expect(store.tasks).toEqual([task]);
  });

  it('never reuses ids after deletions', () => {
    const store: TaskStore = { tasks: [], nextId: 7 };
    expect(addTask(store, { description: 'Walk dog' }, NOW).id).toBe(7);
  });

  it('leaves the store untouched when validation fails', () => {
    const store = emptyStore();
    expect(() => addTask(store, { description: 'Bad date', dueDate: '2025-02-30' }, NOW)).toThrow();
    expect(store).toEqual({ tasks: [], nextId: 1 });
  });
});

describe('addTasks', () => {
  it('adds each description with the shared options', () => {
    const store = emptyStore();
    const result = addTasks(store, ['Buy milk', 'Walk dog'], { priority: 'low' }, NOW);
    expect(result.added.map((t) => [t.id, t.description, t.priority])).toEqual([
      [1, 'Buy milk', 'low'],
      [2, 'Walk dog', 'low'],
    ]);
    expect(result.skipped).toEqual([]);
  });

  it('skips empty entries and keeps going', () => {
    const store = emptyStore();
    const result = addTasks(store, ['Buy milk', '  ', 'Walk dog'], {}, NOW);
    expect(result.added.map((t) => t.id)).toEqual([1, 2]);
    expect(result.skipped).toEqual([{ description: '  ', reason: 'empty description' }]);
  });

  it('skips every entry when a shared option is invalid', () => {
    const store = emptyStore();
    const result = addTasks(store, ['Buy milk'], { priority: 'urgent' }, NOW);
    expect(result.added).toEqual([]);
    expect(result.skipped).toEqual([
      { description: 'Buy milk', reason: 'Invalid priority: urgent. Valid values: low, normal, high (or l, n, h)' },
    ]);
    expect(store.nextId).toBe(1);
  });
});
