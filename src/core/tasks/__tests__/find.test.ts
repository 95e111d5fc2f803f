/**
 * Tests for task lookup.
 */

import { describe, it, expect } from 'vitest';
import type { Task } from '../../../types/task.js';
import { findTaskById, findTaskByIdOrName, findTasksByName, parseTaskId } from '../find.js';

function task(id: number, description: string): Task {
  return {
    id,
    description,
    dueDate: null,
    priority: 'normal',
    completed: false,
    createdAt: null,
    completedAt: null,
  };
}

const tasks = [task(1, 'Buy milk'), task(2, 'Call 3 clients'), task(3, 'Buy bread')];

describe('parseTaskId', () => {
  it('accepts positive whole numbers', () => {
    expect(parseTaskId('12')).toBe(12);
    expect(parseTaskId(' 3 ')).toBe(3);
  });

  it('rejects everything else', () => {
    expect(parseTaskId('0')).toBeNull();
    expect(parseTaskId('-1')).toBeNull();
    expect(parseTaskId('1.5')).toBeNull();
    expect(parseTaskId('milk')).toBeNull();
  });
});

describe('findTaskById', () => {
  it('returns undefined for a missing id', () => {
    expect(findTaskById(tasks, 2)?.description).toBe('Call 3 clients');
    expect(findTaskById(tasks, 9)).toBeUndefined();
  });
});

describe('findTasksByName', () => {
  it('matches substrings case-insensitively', () => {
    expect(findTasksByName(tasks, 'BUY').map((t) => t.id)).toEqual([1, 3]);
  });
});

describe('findTaskByIdOrName', () => {
  it('prefers an existing id', () => {
    expect(findTaskByIdOrName(tasks, '3')?.id).toBe(3);
  });

  it('falls back to a name match when the id is missing', () => {
    expect(findTaskByIdOrName(tasks, '3 client')?.id).toBe(2);
    expect(findTaskByIdOrName([task(5, 'Read chapter 12')], '12')?.id).toBe(5);
  });

  it('returns undefined when nothing matches', () => {
    expect(findTaskByIdOrName(tasks, 'taxes')).toBeUndefined();
  });
});
