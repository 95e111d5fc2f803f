/**
 * Tests for task removal.
 */

import { describe, it, expect } from 'vitest';
import type { Task, TaskStore } from '../../../types/task.js';
import { deleteTask, deleteTasks } from '../delete.js';
import { addTask } from '../add.js';

const NOW = new Date(2025, 5, 15, 12, 0);

function task(id: number): Task {
  return {
    id,
    description: `Task ${id}`,
    dueDate: null,
    priority: 'normal',
    completed: false,
    createdAt: null,
    completedAt: null,
  };
}

describe('deleteTask', () => {
  it('removes the task and keeps the id counter', () => {
    const s: TaskStore = { tasks: [task(1), task(2)], nextId: 3 };
    expect(deleteTask(s, 2).id).toBe(2);
    expect(s.tasks.map((t) => t.id)).toEqual([1]);
    expect(addTask(s, { description: 'Next' }, NOW).id).toBe(3);
  });

  it('throws for a missing id', () => {
    const s: TaskStore = { tasks: [task(1)], nextId: 2 };
    expect(() => deleteTask(s, 4)).toThrow('Task with ID 4 not found');
  });
});

describe('deleteTasks', () => {
  it('ignores ids that are already gone', () => {
    const s: TaskStore = { tasks: [task(1), task(2), task(3)], nextId: 4 };
    expect(deleteTasks(s, [3, 1, 8]).map((t) => t.id)).toEqual([1, 3]);
    expect(s.tasks.map((t) => t.id)).toEqual([2]);
    expect(deleteTasks(s, [1])).toEqual([]);
  });
});
