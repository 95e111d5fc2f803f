/**
 * Tests for text similarity and fuzzy lookup.
 */

import { describe, it, expect } from 'vitest';
import type { Task } from '../../../types/task.js';
import {
  descriptionSimilarity, fuzzyFindTasks, normalizeDescription, similarityScore,
} from '../similarity.js';

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

describe('similarityScore', () => {
  it('scores identical text 1.0, ignoring case', () => {
    expect(similarityScore('Buy Milk', 'buy milk')).toBe(1);
  });

  it('scores containment 0.8', () => {
    expect(similarityScore('buy milk and eggs', 'milk')).toBe(0.8);
  });

  it('scores partial word matches proportionally', () => {
    expect(similarityScore('buy milk', 'milk bread')).toBeCloseTo(0.3);
    expect(similarityScore('review budget', 'budget reviews')).toBeCloseTo(0.3);
    expect(similarityScore('call the dentist', 'dentist call')).toBeCloseTo(0.6);
  });

  it('scores no overlap and empty patterns 0', () => {
    expect(similarityScore('walk dog', 'taxes')).toBe(0);
    expect(similarityScore('walk dog', '   ')).toBe(0);
  });
});

describe('descriptionSimilarity', () => {
  it('normalizes whitespace and case before comparing', () => {
    expect(normalizeDescription('  Buy   MILK ')).toBe('buy milk');
    expect(descriptionSimilarity('Buy  milk', 'buy milk ')).toBe(1);
  });

  it('is symmetric', () => {
    expect(descriptionSimilarity('milk', 'buy milk')).toBe(0.8);
    expect(descriptionSimilarity('buy milk', 'milk')).toBe(0.8);
  });
});

describe('fuzzyFindTasks', () => {
  const tasks = [
    task(1, 'Write quarterly report'),
    task(2, 'Report'),
    task(3, 'Walk the dog'),
    task(4, 'Review report draft'),
  ];

  it('ranks matches above the threshold, best first', () => {
    const matches = fuzzyFindTasks(tasks, 'report');
    expect(matches.map((m) => [m.task.id, m.score])).toEqual([[2, 1], [1, 0.8], [4, 0.8]]);
  });

  it('excludes scores at or below the threshold', () => {
    expect(fuzzyFindTasks(tasks, 'report dog cat')).toEqual([]);
  });

  it('caps the number of matches', () => {
    expect(fuzzyFindTasks(tasks, 'report', { limit: 1 }).map((m) => m.task.id)).toEqual([2]);
  });
});
