/**
 * Task file persistence.
 *
 * The file keeps a flat snake_case layout:
 *   { "tasks": [{ "id", "description", "due_date", "priority", "completed", ... }], "next_id" }
 * An empty due_date means "no date". Records are validated with zod on load
 * and mapped to the camelCase Task shape.
 */

import { z } from 'zod';
import { readJson, saveJson } from './json.js';
import { TodoError } from '../core/errors.js';
import { getLogger } from '../core/logger.js';
import { ExitCode } from '../types/exit-codes.js';
import type { Task, TaskStore } from '../types/task.js';

export const TaskRecordSchema = z.object({
  id: z.number().int().positive(),
  description: z.string(),
  due_date: z.string().default(''),
  priority: z.enum(['low', 'normal', 'high']).default('normal'),
  completed: z.boolean().default(false),
  created_at: z.string().nullable().optional(),
  completed_at: z.string().nullable().optional(),
});
export type TaskRecord = z.infer<typeof TaskRecordSchema>;

export const TaskFileSchema = z.object({
  tasks: z.array(TaskRecordSchema).default([]),
  next_id: z.number().int().positive().optional(),
});
export type TaskFile = z.infer<typeof TaskFileSchema>;

/** Map an on-disk record to a Task. */
export function fromRecord(record: TaskRecord): Task {
  return {
    id: record.id,
    description: record.description,
    dueDate: record.due_date === '' ? null : record.due_date,
    priority: record.priority,
    completed: record.completed,
    createdAt: record.created_at ?? null,
    completedAt: record.completed_at ?? null,
  };
}

/** Map a Task to its on-disk record. */
export function toRecord(task: Task): TaskRecord {
  return {
    id: task.id,
    description: task.description,
    due_date: task.dueDate ?? '',
    priority: task.priority,
    completed: task.completed,
    created_at: task.createdAt,
    completed_at: task.completedAt,
  };
}

/** An empty collection. */
export function emptyStore(): TaskStore {
  return { tasks: [], nextId: 1 };
}

/**
 * Load the task file. A missing file is an empty collection.
 * A missing or stale next_id is repaired to max(id) + 1.
 */
export async function loadTaskStore(filePath: string): Promise<TaskStore> {
  const log = getLogger('store');
  const raw = await readJson(filePath);
  if (raw === null) {
    log.debug({ filePath }, 'Task file not found, starting empty');
    return emptyStore();
  }

  const parsed = TaskFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new TodoError(
      ExitCode.VALIDATION_ERROR,
      `Malformed task file: ${filePath}`,
      { fix: 'Restore it from the backups directory or fix the JSON by hand', cause: parsed.error },
    );
  }

  const tasks = parsed.data.tasks.map(fromRecord);
  const maxId = tasks.reduce((max, t) => Math.max(max, t.id), 0);
  const stored = parsed.data.next_id ?? 0;
  const nextId = Math.max(stored, maxId + 1);
  if (parsed.data.next_id !== undefined && nextId !== stored) {
    log.warn({ filePath, stored, nextId }, 'Repaired next_id');
  }

  log.debug({ filePath, count: tasks.length }, 'Loaded tasks');
  return { tasks, nextId };
}

/** Options for saveTaskStore. */
export interface SaveTaskStoreOptions {
  backupDir?: string;
  maxBackups?: number;
}

/**
 * Write the task file atomically, backing up the previous version.
 */
export async function saveTaskStore(
  filePath: string,
  store: TaskStore,
  options?: SaveTaskStoreOptions,
): Promise<void> {
  const file: TaskFile = {
    tasks: store.tasks.map(toRecord),
    next_id: store.nextId,
  };
  await saveJson(filePath, file, {
    backupDir: options?.backupDir,
    maxBackups: options?.maxBackups,
    validate: (data) => {
      TaskFileSchema.parse(data);
    },
  });
  getLogger('store').debug({ filePath, count: store.tasks.length }, 'Saved tasks');
}
