/**
 * Calendar-day arithmetic for due dates.
 *
 * Due dates are whole local calendar days. Every comparison here works on
 * local midnight, so the time of day of `now` never changes a result.
 */

import type { Task } from '../../types/task.js';

const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
const MS_PER_DAY = 24 * 60 * 60 * 1000;

/**
 * Parse a `YYYY-MM-DD` string to local midnight.
 * Returns null for empty, malformed, or impossible dates (e.g. 2025-02-30).
 */
export function parseDueDate(value: string | null | undefined): Date | null {
  if (!value) return null;
  const match = DATE_PATTERN.exec(value);
  if (!match) return null;
  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const date = new Date(year, month - 1, day);
  if (date.getFullYear() !== year || date.getMonth() !== month - 1 || date.getDate() !== day) {
    return null;
  }
  return date;
}

/** Format a date as local `YYYY-MM-DD`. */
export function formatDate(date: Date): string {
  const y = String(date.getFullYear()).padStart(4, '0');
  const m = String(date.getMonth() + 1).padStart(2, '0');
  const d = String(date.getDate()).padStart(2, '0');
  return `${y}-${m}-${d}`;
}

export function startOfDay(date: Date): Date {
  return new Date(date.getFullYear(), date.getMonth(), date.getDate());
}

/** Same day-of-month `months` away; overflow rolls forward like Date does. */
export function addMonths(date: Date, months: number): Date {
  return new Date(date.getFullYear(), date.getMonth() + months, date.getDate());
}

export function isSameDay(a: Date, b: Date): boolean {
  return a.getFullYear() === b.getFullYear()
    && a.getMonth() === b.getMonth()
    && a.getDate() === b.getDate();
}

export function isSameMonth(a: Date, b: Date): boolean {
  return a.getFullYear() === b.getFullYear() && a.getMonth() === b.getMonth();
}

/**
 * Whole calendar days from `from` to `to` (negative when `to` is earlier).
 * Rounds to absorb DST shifts between the two midnights.
 */
export function daysBetween(from: Date, to: Date): number {
  return Math.round((startOfDay(to).getTime() - startOfDay(from).getTime()) / MS_PER_DAY);
}

/** Today through today + 6, inclusive. */
export function isInWeekRange(date: Date, now: Date): boolean {
  const offset = daysBetween(now, date);
  return offset >= 0 && offset <= 6;
}

/** Days from today to the task's due day, or null when undated or invalid. */
function dueOffset(task: Task, now: Date): number | null {
  const due = parseDueDate(task.dueDate);
  return due ? daysBetween(now, due) : null;
}

/** Pending, dated, and due strictly before today. */
export function isOverdue(task: Task, now: Date): boolean {
  if (task.completed) return false;
  const offset = dueOffset(task, now);
  return offset !== null && offset < 0;
}

/** Due today, whatever the completion status. */
export function isDueToday(task: Task, now: Date): boolean {
  return dueOffset(task, now) === 0;
}

/** Pending and due 1..days calendar days ahead. */
export function isDueSoon(task: Task, now: Date, days = 3): boolean {
  if (task.completed) return false;
  const offset = dueOffset(task, now);
  return offset !== null && offset >= 1 && offset <= days;
}

/** Pending and due 1..days calendar days ahead (upcoming deadline window). */
export function isUpcoming(task: Task, now: Date, days = 7): boolean {
  return isDueSoon(task, now, days);
}

/** Whole days a task is past due, or null when it has no valid date. */
export function overdueDays(task: Task, now: Date): number | null {
  const offset = dueOffset(task, now);
  return offset === null ? null : -offset;
}

/** "1 day" / "N days". */
export function formatDayCount(days: number): string {
  return days === 1 ? '1 day' : `${days} days`;
}

/**
 * Pending, low priority, and due before the same calendar day one month ago.
 */
export function isAncient(task: Task, now: Date): boolean {
  if (task.completed || task.priority !== 'low') return false;
  const due = parseDueDate(task.dueDate);
  if (!due) return false;
  return due.getTime() < addMonths(startOfDay(now), -1).getTime();
}
