/**
 * Task type definitions.
 *
 * The in-memory shape is camelCase; the on-disk record (snake_case) lives in
 * store/task-store.ts and is mapped on load and save.
 */

/** Task priority levels. */
export type TaskPriority = 'low' | 'normal' | 'high';

/** All priorities, lowest first. */
export const TASK_PRIORITIES: readonly TaskPriority[] = ['low', 'normal', 'high'];

/** Sort weight per priority (higher sorts first). */
export const PRIORITY_WEIGHT: Readonly<Record<TaskPriority, number>> = {
  high: 3,
  normal: 2,
  low: 1,
};

/** A single todo item. */
export interface Task {
  id: number;
  description: string;
  /** Calendar date `YYYY-MM-DD`, or null when undated. */
  dueDate: string | null;
  priority: TaskPriority;
  completed: boolean;
  /** ISO timestamp; null for records written before creation times were kept. */
  createdAt: string | null;
  /** ISO timestamp of the last completion; cleared when reopened. */
  completedAt: string | null;
}

/** The task collection plus its id counter. */
export interface TaskStore {
  tasks: Task[];
  /** Always greater than every id in `tasks`. */
  nextId: number;
}

/** Fields accepted when creating a task. */
export interface NewTaskInput {
  description: string;
  dueDate?: string;
  priority?: string;
}

/** Fields accepted when editing a task. */
export interface TaskEdit {
  description?: string;
  dueDate?: string;
  priority?: string;
}

/** One field change reported by an edit. */
export interface TaskChange {
  field: 'description' | 'dueDate' | 'priority';
  from: string | null;
  to: string | null;
}
