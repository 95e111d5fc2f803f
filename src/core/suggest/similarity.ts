/**
 * Text similarity scoring for fuzzy lookup and duplicate detection.
 */

import type { Task } from '../../types/task.js';

function words(text: string): string[] {
  return text.split(/\s+/).filter((w) => w.length > 0);
}

/**
 * Score how well `pattern` matches `text` (case-insensitive), 0..1.
 *
 *   1.0  identical
 *   0.8  text contains pattern
 *   else 0.6 * (pattern words found inside some text word) / (pattern words)
 */
export function similarityScore(text: string, pattern: string): number {
  const t = text.toLowerCase();
  const p = pattern.toLowerCase();

  if (t === p) return 1.0;
  if (t.includes(p)) return 0.8;

  const patternWords = words(p);
  if (patternWords.length === 0) return 0;
  const textWords = words(t);

  const matched = patternWords.filter((pw) => textWords.some((tw) => tw.includes(pw))).length;
  return (matched / patternWords.length) * 0.6;
}

/** Lowercase, trim, and collapse whitespace runs. */
export function normalizeDescription(description: string): string {
  return words(description.toLowerCase()).join(' ');
}

/** Symmetric similarity of two descriptions after normalization. */
export function descriptionSimilarity(a: string, b: string): number {
  const na = normalizeDescription(a);
  const nb = normalizeDescription(b);
  return Math.max(similarityScore(na, nb), similarityScore(nb, na));
}

export interface FuzzyMatch {
  task: Task;
  score: number;
}

export interface FuzzyOptions {
  /** Scores must be strictly above this. Default: 0.3. */
  threshold?: number;
  /** Maximum matches returned. Default: 5. */
  limit?: number;
}

/**
 * Rank tasks by similarity of their description to `query`, best first.
 * Ties keep collection order.
 */
export function fuzzyFindTasks(tasks: readonly Task[], query: string, options?: FuzzyOptions): FuzzyMatch[] {
  const threshold = options?.threshold ?? 0.3;
  const limit = options?.limit ?? 5;

  return tasks
    .map((task) => ({ task, score: similarityScore(task.description, query) }))
    .filter((m) => m.score > threshold)
    .sort((a, b) => b.score - a.score)
    .slice(0, limit);
}
