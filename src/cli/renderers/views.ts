/**
 * Human-readable renderers for the analysis views: smart list, insights,
 * statistics, mark analysis and cleanup suggestions.
 */

import type { Task } from '../../types/task.js';
import type { TaskInsights, TaskStatistics } from '../../core/query/insights.js';
import type { SmartView } from '../../core/suggest/smart-view.js';
import type {
  FocusSuggestion, MarkSuggestions, TaskAnalysis,
} from '../../core/suggest/health.js';
import type { BatchGroup, CleanupSuggestion, CleanupSummary } from '../../core/suggest/cleanup.js';
import { formatDayCount, isOverdue, overdueDays, parseDueDate } from '../../core/query/dates.js';
import { taskLine } from './tasks.js';
import { bold, hRule, impactSymbol, priorityColor, prioritySymbol, red, sym, yellow } from './colors.js';

function section(title: string, width = 30): string[] {
  return ['', title, hRule(width, '-')];
}

function bullet(task: Task, suffix = ''): string {
  return `  - #${task.id}: ${task.description}${suffix}`;
}

// ---------------------------------------------------------------------------
// list --smart / --insights / --stats
// ---------------------------------------------------------------------------

export function renderSmart(data: SmartView, quiet: boolean): string {
  if (quiet) {
    return [...data.critical, ...data.today, ...data.dueSoon, ...data.quickWins]
      .map((t) => String(t.id)).join('\n');
  }

  const now = new Date();
  const lines = [`${sym('brain')} ${bold('Smart Task View')}`, hRule(50)];
  const groups: Array<[string, Task[]]> = [
    [`${sym('siren')} Critical Tasks`, data.critical],
    [`${sym('target')} Today's Focus`, data.today],
    [`${sym('alarm')} Due Soon (Next 3 Days)`, data.dueSoon],
    [`${sym('bolt')} Quick Wins`, data.quickWins],
  ];
  for (const [title, tasks] of groups) {
    if (tasks.length === 0) continue;
    lines.push(...section(`${title} (${tasks.length})`));
    lines.push(...tasks.map((t) => taskLine(t, now)));
  }

  lines.push(...section(`${sym('bulb')} Smart Recommendations`));
  if (data.recommendations.length === 0) {
    lines.push('- Your tasks look well organized.');
  }
  for (const rec of data.recommendations) {
    lines.push(`- ${rec.message}${rec.kind === 'completed-today' ? ` ${sym('party')}` : ''}`);
  }
  return lines.join('\n');
}

function overviewLines(data: TaskInsights): string[] {
  const lines = [
    ...section(`${sym('trend')} Task Overview`),
    `Total Tasks: ${data.total}`,
    `Completed: ${data.completed} (${data.completedPercent.toFixed(1)}%)`,
    `Pending: ${data.pending} (${data.pendingPercent.toFixed(1)}%)`,
  ];
  if (data.overdue > 0) lines.push(red(`${sym('warning')} Overdue: ${data.overdue}`));
  if (data.dueSoon > 0) lines.push(yellow(`${sym('alarm')} Due Soon: ${data.dueSoon}`));
  if (data.noDate > 0) lines.push(`${sym('note')} No Due Date: ${data.noDate}`);

  lines.push(
    ...section(`${sym('target')} Priority Breakdown`),
    `${prioritySymbol('high')} High: ${data.priorities.high}`,
    `${prioritySymbol('normal')} Normal: ${data.priorities.normal}`,
    `${prioritySymbol('low')} Low: ${data.priorities.low}`,
  );
  return lines;
}

export function renderInsights(data: TaskInsights, quiet: boolean): string {
  if (quiet) return `${data.completed}/${data.total}`;
  return [`${sym('chart')} ${bold('Task Insights')}`, hRule(50), ...overviewLines(data)].join('\n');
}

export function renderStats(data: TaskStatistics, quiet: boolean): string {
  if (quiet) return `${data.completed}/${data.total}`;
  return [
    `${sym('chart')} ${bold('Detailed Statistics')}`,
    hRule(50),
    ...overviewLines(data),
    ...section(`${sym('calendar')} Time-based Analysis`),
    `Due Today: ${data.dueToday}`,
    `Due This Week: ${data.dueThisWeek}`,
    `Due This Month: ${data.dueThisMonth}`,
  ].join('\n');
}

// ---------------------------------------------------------------------------
// mark --smart
// ---------------------------------------------------------------------------

export function focusLine(focus: FocusSuggestion): string {
  const prefix = `${sym('target')} Focus:`;
  switch (focus.kind) {
    case 'overdue': return `${prefix} Handle ${focus.count} overdue task(s) first`;
    case 'today': return `${prefix} Complete ${focus.count} task(s) due today`;
    case 'high-priority': return `${prefix} Work on ${focus.count} high-priority task(s)`;
    case 'quick-wins': return `${prefix} Great job! Consider picking up some quick wins`;
  }
}

export function renderMarkAnalysis(data: TaskAnalysis, quiet: boolean): string {
  if (quiet) return String(data.healthScore);

  const lines = [
    `${sym('brain')} ${bold('Smart Task Analysis')}`,
    hRule(50),
    ...section(`${sym('chart')} Task Pattern Analysis`),
    `${sym('trend')} Completion Rate: ${data.completionRate.toFixed(1)}% (${data.completed}/${data.total})`,
  ];
  if (data.overdue > 0) {
    lines.push(red(`${sym('warning')} Overdue Tasks: ${data.overdue} (needs immediate attention)`));
  }
  if (data.dueToday > 0) lines.push(`${sym('target')} Due Today: ${data.dueToday} tasks`);
  if (data.highPriorityPending > 0) {
    lines.push(`${prioritySymbol('high')} High Priority Pending: ${data.highPriorityPending} tasks`);
  }
  lines.push(`${sym('heart')} Task Health Score: ${data.healthScore}/100`);

  lines.push(
    ...section(`${sym('bulb')} Productivity Insights`),
    `Priority Distribution: High:${data.priorities.high}, Normal:${data.priorities.normal}, Low:${data.priorities.low}`,
  );
  if (data.upcomingDeadlines.length > 0) {
    lines.push(`${sym('calendar')} Upcoming Deadlines (${data.upcomingDeadlines.length} tasks in next 7 days)`);
  }
  lines.push(focusLine(data.focus));

  lines.push(...section(`${sym('target')} Completion Recommendations`));
  if (data.quickWins.length > 0) {
    lines.push(`${sym('bolt')} Quick Wins (${data.quickWins.length} tasks):`);
    lines.push(...data.quickWins.slice(0, 3).map((t) => bullet(t)));
  }
  if (data.highImpact.length > 0) {
    lines.push(`${sym('target')} High Impact (${data.highImpact.length} tasks):`);
    lines.push(...data.highImpact.slice(0, 3).map((t) => bullet(t)));
  }
  if (data.overdueRecovery.length > 0) {
    lines.push(`${sym('siren')} Overdue Recovery (${data.overdueRecovery.length} tasks):`);
    lines.push(...data.overdueRecovery.slice(0, 3).map((t) => bullet(t, ` (due ${t.dueDate ?? ''})`)));
  }

  lines.push(...section(`${sym('broom')} Cleanup Integration`));
  if (data.cleanup.completed > 0) {
    lines.push(`${sym('trash')} Consider deleting ${data.cleanup.completed} old completed tasks`);
    lines.push('   Run: todo delete --completed');
  }
  if (data.cleanup.stale > 0) {
    lines.push(`${sym('note')} Review ${data.cleanup.stale} stale tasks (no due date, low priority)`);
    lines.push('   Run: todo delete --low-impact');
  }
  return lines.join('\n');
}

// ---------------------------------------------------------------------------
// mark (no arguments) / --overdue / --cleanup
// ---------------------------------------------------------------------------

export function renderMarkSuggestions(data: MarkSuggestions, quiet: boolean): string {
  if (quiet) {
    const ids = new Set([...data.today, ...data.highPriority, ...data.quickWins, ...data.overdue].map((t) => t.id));
    return [...ids].join('\n');
  }

  const lines = [`${sym('target')} ${bold('Smart Mark Suggestions')}`, hRule(50)];
  const groups: Array<[string, Task[]]> = [
    [`${sym('calendar')} Due Today`, data.today],
    [`${prioritySymbol('high')} High Priority`, data.highPriority],
    [`${sym('bolt')} Quick Wins`, data.quickWins],
    [`${sym('warning')} Overdue`, data.overdue],
  ];
  for (const [title, tasks] of groups) {
    if (tasks.length === 0) continue;
    lines.push('', `${title} (${tasks.length} tasks):`);
    lines.push(...tasks.slice(0, 3).map((t) => bullet(t)));
  }
  lines.push(
    '',
    `${sym('bulb')} Use 'todo mark <id>' to mark tasks as complete`,
    `${sym('bulb')} Use 'todo mark --smart' for detailed analysis`,
  );
  return lines.join('\n');
}

export function renderOverdueActions(data: { tasks: Task[] }, quiet: boolean): string {
  if (quiet) return data.tasks.map((t) => String(t.id)).join('\n');

  const lines = [`${sym('warning')} ${bold('Overdue Task Actions')}`, hRule(50)];
  if (data.tasks.length === 0) {
    lines.push(`${sym('party')} Great! No overdue tasks found.`);
    return lines.join('\n');
  }

  const now = new Date();
  lines.push(`Found ${data.tasks.length} overdue task(s):`, '');
  data.tasks.forEach((t, i) => {
    const days = overdueDays(t, now);
    const by = days === null ? '' : ` (overdue by ${formatDayCount(days)})`;
    lines.push(`${i + 1}. #${t.id}: ${t.description}`);
    lines.push(`   Due: ${t.dueDate ?? ''}${by}`);
    lines.push(`   Priority: ${priorityColor(t.priority)(t.priority)}`);
    lines.push('');
  });
  lines.push(
    `${sym('target')} Suggested Actions:`,
    '1. Complete overdue tasks immediately',
    '2. Reschedule to realistic dates',
    '3. Mark as done if already completed',
    '4. Delete if no longer relevant',
  );
  return lines.join('\n');
}

export interface OverdueActionResult {
  task: Task;
  action: 'completed' | 'rescheduled' | 'deleted' | 'skipped' | 'invalid-date';
  /** New due date for a reschedule. */
  dueDate?: string;
}

export function renderOverdueAction(data: OverdueActionResult, quiet: boolean): string {
  if (quiet) return String(data.task.id);
  const id = data.task.id;
  switch (data.action) {
    case 'completed': return `${sym('done')} Marked task #${id} as completed`;
    case 'rescheduled': return `${sym('calendar')} Rescheduled task #${id} to ${data.dueDate ?? ''}`;
    case 'deleted': return `${sym('trash')} Deleted task #${id}`;
    case 'skipped': return `${sym('skip')} Skipped task #${id}`;
    case 'invalid-date': return `${sym('cross')} Invalid date format`;
  }
}

export function renderMarkCleanup(data: { completed: number }, quiet: boolean): string {
  if (quiet) return String(data.completed);
  return [
    `${sym('broom')} ${bold('Cleanup Operations')}`,
    hRule(50),
    `${sym('robot')} Scanning for obvious completions...`,
    '   (No obvious completions detected)',
    '',
    `${sym('trash')} Cleanup Suggestions:`,
    data.completed > 0
      ? `${data.completed} completed task(s) can be removed. Run 'todo delete --smart' for intelligent cleanup options`
      : "Run 'todo delete --smart' for intelligent cleanup options",
  ].join('\n');
}

// ---------------------------------------------------------------------------
// delete
// ---------------------------------------------------------------------------

/** Task line for deletion lists, with the category impact icon. */
export function impactTaskLine(task: Task, suggestion: Pick<CleanupSuggestion, 'impact'>, now: Date): string {
  const status = task.completed ? sym('done') : sym('pending');
  const due = parseDueDate(task.dueDate);
  let dueText = '';
  if (due && task.dueDate) {
    dueText = isOverdue(task, now)
      ? ` ${red(`${sym('warning')} Overdue (${task.dueDate})`)}`
      : ` ${sym('calendar')} ${task.dueDate}`;
  }
  const priority = priorityColor(task.priority)(prioritySymbol(task.priority));
  return `  ${status} ${priority} ${impactSymbol(suggestion.impact)} #${task.id}: ${task.description}${dueText}`;
}

export type CleanupMode = 'default' | 'smart' | 'cleanup';

export interface CleanupAnalysis {
  mode: CleanupMode;
  suggestions: CleanupSuggestion[];
  summary: CleanupSummary | null;
}

function cleanupTitle(mode: CleanupMode): string[] {
  switch (mode) {
    case 'default':
      return [`${sym('robot')} ${bold('Ultra-Smart Deletion Analysis')}`, hRule(50)];
    case 'smart':
      return [
        `${sym('robot')} ${bold('Smart-Powered Deletion Assistant')}`,
        hRule(50),
        `${sym('brain')} Analyzing task patterns and behavioral insights...`,
      ];
    case 'cleanup':
      return [
        `${sym('broom')} ${bold('Full Cleanup Mode')}`,
        hRule(50),
        `${sym('search')} Performing comprehensive task analysis...`,
      ];
  }
}

export function renderCleanupAnalysis(data: CleanupAnalysis, quiet: boolean): string {
  if (quiet) {
    return data.suggestions.map((s) => `${s.category}: ${s.tasks.map((t) => t.id).join(',')}`).join('\n');
  }

  const lines = cleanupTitle(data.mode);
  if (data.suggestions.length === 0) {
    if (data.mode === 'smart') {
      lines.push(`${sym('party')} Smart Analysis: Your task management is optimal!`);
    } else {
      lines.push(`${sym('party')} Excellent! Your task list is perfectly optimized!`);
    }
    lines.push(`${sym('bulb')} No cleanup suggestions at this time.`);
    return lines.join('\n');
  }

  const now = new Date();
  if (data.mode === 'smart') {
    lines.push('', `${sym('microscope')} Smart analysis found ${data.suggestions.length} behavioral patterns suggesting cleanup:`);
    for (const s of data.suggestions) {
      lines.push(
        '',
        `${sym('target')} ${s.category}`,
        `   ${sym('brain')} Smart Insight: ${s.reason}`,
        `   ${sym('chart')} Confidence: ${s.score}%`,
        hRule(30, '-'),
        ...s.tasks.map((t) => impactTaskLine(t, s, now)),
      );
    }
  } else {
    lines.push('', `${sym('brain')} Smart Analysis: Found ${data.suggestions.length} optimization opportunities`, hRule(40, '-'));
    for (const s of data.suggestions) {
      lines.push(
        '',
        `${sym('folder')} ${s.category} (Score: ${s.score}/100, ${s.tasks.length} tasks)`,
        `   ${sym('thought')} ${s.reason}`,
        hRule(25, '-'),
        ...s.tasks.map((t) => impactTaskLine(t, s, now)),
      );
    }
  }

  if (data.summary) {
    lines.push('', `${sym('chart')} Cleanup Impact Analysis`, `   Average optimization score: ${data.summary.averageScore}/100`);
    switch (data.summary.tier) {
      case 'high': lines.push(`   ${sym('fire')} High impact cleanup opportunity!`); break;
      case 'moderate': lines.push(`   ${sym('bolt')} Moderate cleanup benefits`); break;
      case 'minor': lines.push(`   ${sym('seedling')} Minor optimizations available`); break;
    }
  }
  return lines.join('\n');
}

export function renderBatchGroups(data: { groups: BatchGroup[] }, quiet: boolean): string {
  if (quiet) return data.groups.map((g) => `${g.name}: ${g.tasks.map((t) => t.id).join(',')}`).join('\n');

  const lines = [`${sym('package')} ${bold('Batch Delete Mode')}`, hRule(50)];
  if (data.groups.length === 0) {
    lines.push('No groups of similar tasks found for batch deletion.');
    return lines.join('\n');
  }
  const now = new Date();
  for (const group of data.groups) {
    lines.push(
      '',
      `${sym('folder')} ${group.name} (${group.tasks.length} tasks)`,
      hRule(30, '-'),
      ...group.tasks.map((t) => taskLine(t, now)),
    );
  }
  return lines.join('\n');
}

export interface CandidatesView {
  kind: 'duplicates' | 'low-impact';
  tasks: Task[];
}

export function renderCandidates(data: CandidatesView, quiet: boolean): string {
  if (quiet) return data.tasks.map((t) => String(t.id)).join('\n');

  const label = data.kind === 'duplicates' ? 'duplicate' : 'low-impact';
  if (data.tasks.length === 0) return `${sym('done')} No ${label} tasks found.`;

  const icon = data.kind === 'duplicates' ? sym('search') : sym('seedling');
  const now = new Date();
  return [
    `${icon} Found ${data.tasks.length} ${label} tasks:`,
    hRule(30, '-'),
    ...data.tasks.map((t) => taskLine(t, now)),
  ].join('\n');
}
