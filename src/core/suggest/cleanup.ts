/**
 * Deletion suggestions: duplicates, stale, vague and low-impact tasks,
 * scored and ranked by how much removing them would help.
 */

import type { Task } from '../../types/task.js';
import { PRIORITY_WEIGHT } from '../../types/task.js';
import type { SuggestionConfig } from '../../types/config.js';
import { isAncient, isOverdue, daysBetween } from '../query/dates.js';
import { descriptionSimilarity } from './similarity.js';

export type CleanupImpact = 'high' | 'medium' | 'low';

export interface CleanupSuggestion {
  category: string;
  tasks: Task[];
  /** 0-100: how beneficial deleting these tasks would be. */
  score: number;
  reason: string;
  impact: CleanupImpact;
}

export type CleanupTier = 'high' | 'moderate' | 'minor';

export interface CleanupSummary {
  averageScore: number;
  tier: CleanupTier;
}

export interface BatchGroup {
  name: string;
  tasks: Task[];
}

export type SpecificCleanupKind = 'completed' | 'overdue' | 'old';

export const DEFAULT_VAGUE_KEYWORDS: readonly string[] = [
  'stuff', 'things', 'misc', 'todo', 'remember', 'check', 'fix', 'update',
];

/**
 * When two tasks duplicate each other, decide whether the one already seen
 * stays. A due date wins; otherwise the existing task stays unless the
 * candidate has strictly higher priority.
 */
export function shouldKeepExisting(existing: Task, candidate: Task): boolean {
  if (existing.dueDate !== null && candidate.dueDate === null) return true;
  if (existing.dueDate === null && candidate.dueDate !== null) return false;
  return PRIORITY_WEIGHT[existing.priority] >= PRIORITY_WEIGHT[candidate.priority];
}

/**
 * Pending tasks that duplicate an earlier pending task.
 * At threshold 1 only identical normalized descriptions match.
 */
export function findDuplicateTasks(tasks: readonly Task[], threshold = 1): Task[] {
  const duplicates: Task[] = [];
  const kept: Task[] = [];

  for (const task of tasks) {
    if (task.completed) continue;

    const index = kept.findIndex(
      (k) => descriptionSimilarity(k.description, task.description) >= threshold,
    );
    const existing = index === -1 ? undefined : kept[index];
    if (existing === undefined) {
      kept.push(task);
    } else if (shouldKeepExisting(existing, task)) {
      duplicates.push(task);
    } else {
      duplicates.push(existing);
      kept[index] = task;
    }
  }

  return duplicates;
}

/** Pending, low priority, no due date. */
export function findLowImpactTasks(tasks: readonly Task[]): Task[] {
  return tasks.filter((t) => !t.completed && t.priority === 'low' && t.dueDate === null);
}

export interface VagueOptions {
  minLength?: number;
  keywords?: readonly string[];
}

/** Pending tasks with a very short description or a vague keyword in it. */
export function findVagueTasks(tasks: readonly Task[], options?: VagueOptions): Task[] {
  const minLength = options?.minLength ?? 10;
  const keywords = options?.keywords ?? DEFAULT_VAGUE_KEYWORDS;

  return tasks.filter((t) => {
    if (t.completed) return false;
    const desc = t.description.toLowerCase();
    if ([...desc].length < minLength) return true;
    return keywords.some((k) => desc.includes(k.toLowerCase()));
  });
}

export function findOverdueHighPriority(tasks: readonly Task[], now: Date): Task[] {
  return tasks.filter((t) => t.priority === 'high' && isOverdue(t, now));
}

export function findAncientLowPriority(tasks: readonly Task[], now: Date): Task[] {
  return tasks.filter((t) => isAncient(t, now));
}

export function findCompleted(tasks: readonly Task[]): Task[] {
  return tasks.filter((t) => t.completed);
}

export function findOverdue(tasks: readonly Task[], now: Date): Task[] {
  return tasks.filter((t) => isOverdue(t, now));
}

/**
 * Completed more than `days` days ago. Completed tasks with no recorded
 * completion time count as old.
 */
export function findOldCompleted(tasks: readonly Task[], now: Date, days = 7): Task[] {
  return tasks.filter((t) => {
    if (!t.completed) return false;
    if (!t.completedAt) return true;
    const at = new Date(t.completedAt);
    if (isNaN(at.getTime())) return true;
    return daysBetween(at, now) > days;
  });
}

type CleanupSettings = Pick<
  SuggestionConfig,
  'duplicateThreshold' | 'staleCompletedDays' | 'vagueMinLength' | 'vagueKeywords'
>;

const DEFAULT_SETTINGS: CleanupSettings = {
  duplicateThreshold: 1,
  staleCompletedDays: 7,
  vagueMinLength: 10,
  vagueKeywords: [...DEFAULT_VAGUE_KEYWORDS],
};

/**
 * All cleanup suggestions that apply, highest score first.
 */
export function buildCleanupSuggestions(
  tasks: readonly Task[],
  now: Date,
  settings: CleanupSettings = DEFAULT_SETTINGS,
): CleanupSuggestion[] {
  const suggestions: CleanupSuggestion[] = [];
  const add = (s: CleanupSuggestion): void => {
    if (s.tasks.length > 0) suggestions.push(s);
  };

  add({
    category: 'Stale High Priority Tasks',
    tasks: findOverdueHighPriority(tasks, now),
    score: 85,
    reason: "These high-priority tasks are overdue. Consider if they're still relevant or need rescheduling.",
    impact: 'high',
  });

  add({
    category: 'Archive-Ready Completed Tasks',
    tasks: findOldCompleted(tasks, now, settings.staleCompletedDays),
    score: 90,
    reason: 'Completed tasks taking up mental space. Safe to clean up for better focus.',
    impact: 'low',
  });

  add({
    category: 'Duplicate Tasks',
    tasks: findDuplicateTasks(tasks, settings.duplicateThreshold),
    score: 95,
    reason: 'Found tasks with very similar descriptions. Eliminating duplicates improves clarity.',
    impact: 'medium',
  });

  const lowImpact = findLowImpactTasks(tasks);
  if (lowImpact.length > 3) {
    add({
      category: 'Low-Impact Tasks',
      tasks: lowImpact.slice(0, 3),
      score: 60,
      reason: "Low priority tasks without deadlines. Consider if they're still needed.",
      impact: 'low',
    });
  }

  add({
    category: 'Unclear Tasks',
    tasks: findVagueTasks(tasks, { minLength: settings.vagueMinLength, keywords: settings.vagueKeywords }),
    score: 70,
    reason: 'Tasks with vague descriptions may need clarification or removal.',
    impact: 'medium',
  });

  add({
    category: 'Ancient Low Priority Tasks',
    tasks: findAncientLowPriority(tasks, now),
    score: 80,
    reason: 'Low priority tasks overdue by more than a month. Likely no longer relevant.',
    impact: 'low',
  });

  return suggestions.sort((a, b) => b.score - a.score);
}

/** Raise confidence by 10 (capped at 100) and tag the reason. */
export function boostSuggestions(suggestions: readonly CleanupSuggestion[]): CleanupSuggestion[] {
  return suggestions.map((s) => ({
    ...s,
    score: Math.min(s.score + 10, 100),
    reason: `Smart analysis detected: ${s.reason}`,
  }));
}

/** Integer average score and its tier; null when there is nothing to summarize. */
export function summarizeSuggestions(suggestions: readonly CleanupSuggestion[]): CleanupSummary | null {
  if (suggestions.length === 0) return null;
  const total = suggestions.reduce((sum, s) => sum + s.score, 0);
  const averageScore = Math.floor(total / suggestions.length);
  const tier: CleanupTier = averageScore > 70 ? 'high' : averageScore > 40 ? 'moderate' : 'minor';
  return { averageScore, tier };
}

/**
 * Groups offered for bulk deletion, in fixed order. Groups with fewer
 * than two tasks are left out.
 */
export function groupForBatch(tasks: readonly Task[]): BatchGroup[] {
  const groups: BatchGroup[] = [
    { name: 'Completed Tasks', tasks: findCompleted(tasks) },
    { name: 'Low Priority Tasks Without Dates', tasks: findLowImpactTasks(tasks) },
  ];
  return groups.filter((g) => g.tasks.length >= 2);
}

/** Category label and tasks for `delete --completed|--overdue|--old`. */
export function specificSuggestions(
  tasks: readonly Task[],
  kind: SpecificCleanupKind,
  now: Date,
  staleCompletedDays = 7,
): BatchGroup {
  switch (kind) {
    case 'completed':
      return { name: 'Completed Tasks', tasks: findCompleted(tasks) };
    case 'overdue':
      return { name: 'Overdue Tasks', tasks: findOverdue(tasks, now) };
    case 'old':
      return { name: 'Old Completed Tasks', tasks: findOldCompleted(tasks, now, staleCompletedDays) };
  }
}
