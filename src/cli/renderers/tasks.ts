/**
 * Human-readable renderers for task lists and task mutations.
 *
 * Each renderer takes the same data that --json would emit as `result`
 * and returns a string for terminal display.
 */

import type { Task } from '../../types/task.js';
import type { AddTasksResult } from '../../core/tasks/add.js';
import type { UpdateTaskResult } from '../../core/tasks/update.js';
import type { TimeFilter } from '../../core/query/filter.js';
import type { QuickInsights } from '../../core/query/insights.js';
import type { FuzzyMatch } from '../../core/suggest/similarity.js';
import type { BatchGroup } from '../../core/suggest/cleanup.js';
import type { PostCompletionSuggestions } from '../../core/suggest/health.js';
import { formatDate, isOverdue, isSameDay, parseDueDate } from '../../core/query/dates.js';
import { bold, green, hRule, priorityColor, prioritySymbol, red, sym } from './colors.js';

// ---------------------------------------------------------------------------
// Shared task line
// ---------------------------------------------------------------------------

/** " 📅 Today", " ⚠️  Overdue (date)", " 📅 date", or '' when undated. */
export function dueLabel(task: Task, now: Date = new Date()): string {
  const due = parseDueDate(task.dueDate);
  if (!due || task.dueDate === null) return '';
  if (isSameDay(due, now)) return ` ${sym('calendar')} Today`;
  if (isOverdue(task, now)) return ` ${red(`${sym('warning')} Overdue (${task.dueDate})`)}`;
  return ` ${sym('calendar')} ${task.dueDate}`;
}

/** One task: status, priority, id, description and due label. */
export function taskLine(task: Task, now: Date = new Date()): string {
  const status = task.completed ? sym('done') : sym('pending');
  const priority = priorityColor(task.priority)(prioritySymbol(task.priority));
  return `  ${status} ${priority} #${task.id}: ${task.description}${dueLabel(task, now)}`;
}

function sectionHeader(title: string): string[] {
  return ['', title, hRule(30, '-')];
}

// ---------------------------------------------------------------------------
// add
// ---------------------------------------------------------------------------

export function renderAdd(data: AddTasksResult, quiet: boolean): string {
  if (quiet) return data.added.map((t) => String(t.id)).join('\n');

  const lines: string[] = [];
  if (data.added.length + data.skipped.length > 1) {
    lines.push('Multiple tasks detected. Adding each task separately:');
  }
  for (const skipped of data.skipped) {
    lines.push(skipped.reason === 'empty description'
      ? 'Skipping empty task description.'
      : `${red('Error')} adding task '${skipped.description}': ${skipped.reason}`);
  }
  for (const task of data.added) {
    lines.push(`${green(sym('check'))} Added task #${task.id}: ${task.description}`);
    if (task.dueDate) lines.push(`  Due date: ${task.dueDate}`);
    lines.push(`  Priority: ${task.priority}`);
    lines.push(`  Status: ${task.completed ? 'Completed' : 'Pending'}`);
    lines.push('');
  }
  if (data.added.length > 0) {
    lines.push(`Successfully added ${data.added.length} task(s) and saved to file.`);
  }
  return lines.join('\n');
}

// ---------------------------------------------------------------------------
// list
// ---------------------------------------------------------------------------

export interface ListView {
  tasks: Task[];
  timeFilter: TimeFilter;
  /** Null when a specific filter was requested. */
  quickInsights: QuickInsights | null;
}

function listTitle(filter: TimeFilter, now: Date): string {
  switch (filter) {
    case 'today': return `Today's Tasks (${formatDate(now)})`;
    case 'week': return "This Week's Tasks";
    case 'month': return "This Month's Tasks";
    case 'all': return 'All Tasks';
  }
}

export function renderList(data: ListView, quiet: boolean): string {
  if (data.tasks.length === 0) {
    return quiet ? '' : 'No tasks match the specified filters.';
  }
  if (quiet) return data.tasks.map((t) => String(t.id)).join('\n');

  const now = new Date();
  const pending = data.tasks.filter((t) => !t.completed);
  const completed = data.tasks.filter((t) => t.completed);

  const lines: string[] = [`${sym('calendar')} ${bold(listTitle(data.timeFilter, now))}`, hRule(50)];
  if (pending.length > 0) {
    lines.push(...sectionHeader(`${sym('pending')} Pending Tasks (${pending.length})`));
    lines.push(...pending.map((t) => taskLine(t, now)));
  }
  if (completed.length > 0) {
    lines.push(...sectionHeader(`${sym('done')} Completed Tasks (${completed.length})`));
    lines.push(...completed.map((t) => taskLine(t, now)));
  }
  lines.push('', `Total: ${data.tasks.length} tasks`);

  const quick = data.quickInsights;
  if (quick && (quick.overdue > 0 || quick.dueSoon > 0)) {
    const parts: string[] = [];
    if (quick.overdue > 0) parts.push(`${quick.overdue} overdue`);
    if (quick.dueSoon > 0) parts.push(`${quick.dueSoon} due soon`);
    lines.push('', `${sym('bulb')} Quick Insights: ${parts.join(', ')}`);
  }
  return lines.join('\n');
}

// ---------------------------------------------------------------------------
// mark: completion and edits
// ---------------------------------------------------------------------------

export interface MarkedView {
  tasks: Task[];
  completed: boolean;
  /** Present for a single completion. */
  suggestions?: PostCompletionSuggestions | null;
}

export function renderMarked(data: MarkedView, quiet: boolean): string {
  if (quiet) return data.tasks.map((t) => String(t.id)).join('\n');

  const first = data.tasks[0];
  if (data.tasks.length !== 1 || first === undefined || data.suggestions === undefined) {
    const action = data.completed ? 'Completed' : 'Marked as incomplete';
    return `${sym('done')} ${action} ${data.tasks.length} task(s)`;
  }

  const status = data.completed
    ? `${sym('done')} completed`
    : `${sym('pending')} marked as incomplete`;
  const lines = [`${sym('done')} Task #${first.id} ${status}: ${first.description}`];

  if (data.completed) {
    lines.push('', `${sym('party')} Great job completing: ${first.description}`);
    const next = data.suggestions;
    if (next) {
      lines.push(`${sym('bulb')} Next suggestions:`);
      if (next.nextHighPriority) {
        lines.push(`   ${prioritySymbol('high')} High priority: ${next.nextHighPriority.description}`);
      }
      if (next.nextDueToday) {
        lines.push(`   ${sym('calendar')} Due today: ${next.nextDueToday.description}`);
      }
      if (next.suggestCleanup) {
        lines.push(`   ${sym('broom')} Consider running 'todo delete --completed' to clean up`);
      }
    }
  }
  return lines.join('\n');
}

const FIELD_LABELS: Record<UpdateTaskResult['changes'][number]['field'], string> = {
  dueDate: 'Due date',
  priority: 'Priority',
  description: 'Description',
};

export function renderEdited(data: UpdateTaskResult, quiet: boolean): string {
  if (quiet) return String(data.task.id);

  const lines = [`${sym('edit')} Editing Task #${data.task.id}: ${data.task.description}`, hRule(40)];
  if (data.changes.length === 0) {
    lines.push(`${sym('info')} No changes specified. Use --due, --priority, or --desc flags to edit.`);
    return lines.join('\n');
  }
  lines.push(`${sym('done')} Task updated successfully!`);
  for (const change of data.changes) {
    lines.push(`  ${FIELD_LABELS[change.field]}: ${change.from ?? 'none'} -> ${change.to ?? 'none'}`);
  }
  return lines.join('\n');
}

// ---------------------------------------------------------------------------
// delete
// ---------------------------------------------------------------------------

export interface DeletedView {
  tasks: Task[];
  /** Removed as part of a group rather than picked by id or name. */
  bulk: boolean;
}

export function renderDeleted(data: DeletedView, quiet: boolean): string {
  if (quiet) return data.tasks.map((t) => String(t.id)).join('\n');
  const only = data.tasks[0];
  if (!data.bulk && data.tasks.length === 1 && only) {
    return `${sym('done')} Deleted task #${only.id}: ${only.description}`;
  }
  return `${sym('done')} Successfully deleted ${data.tasks.length} task(s).`;
}

/** A named group of tasks offered for deletion. */
export function renderTaskGroup(data: BatchGroup, quiet: boolean): string {
  if (quiet) return data.tasks.map((t) => String(t.id)).join('\n');
  if (data.tasks.length === 0) {
    return `No ${data.name.toLowerCase()} found for deletion.`;
  }
  const now = new Date();
  return [
    `${sym('trash')} ${bold(data.name)} (${data.tasks.length} tasks)`,
    hRule(40),
    ...data.tasks.map((t) => taskLine(t, now)),
  ].join('\n');
}

export interface MatchesView {
  query: string;
  matches: FuzzyMatch[];
}

export function renderMatches(data: MatchesView, quiet: boolean): string {
  if (quiet) return data.matches.map((m) => String(m.task.id)).join('\n');
  if (data.matches.length === 0) {
    return [
      `${sym('cross')} No tasks found matching '${data.query}'.`,
      `${sym('bulb')} Try: `,
      '   - Using partial words',
      "   - Checking task IDs with 'todo list -a'",
      "   - Using 'todo delete --smart' for smart suggestions",
    ].join('\n');
  }
  const lines = [`${sym('search')} Found ${data.matches.length} similar tasks (ranked by relevance):`];
  data.matches.forEach((m, i) => {
    lines.push(`  ${i + 1}. #${m.task.id}: ${m.task.description} (${Math.round(m.score * 100)}% match)`);
  });
  return lines.join('\n');
}

/** Numbered pending tasks for batch selection. */
export function renderSelection(data: { tasks: Task[] }, quiet: boolean): string {
  if (quiet) return data.tasks.map((t) => String(t.id)).join('\n');
  if (data.tasks.length === 0) return 'No pending tasks found.';
  const lines = [`${sym('package')} Batch Task Operations`, hRule(50), `Found ${data.tasks.length} pending task(s):`, ''];
  data.tasks.forEach((t, i) => {
    const status = t.completed ? sym('done') : sym('pending');
    lines.push(`${i + 1}. ${status} #${t.id}: ${t.description}${t.dueDate ? ` (due: ${t.dueDate})` : ''}`);
  });
  return lines.join('\n');
}
