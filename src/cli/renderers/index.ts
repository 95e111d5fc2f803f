/**
 * Central output dispatch for CLI commands.
 *
 * Provides cliOutput() which replaces `console.log(formatSuccess(data))`.
 * Checks the resolved format (JSON/human/quiet) and dispatches to either
 * the JSON envelope (formatSuccess) or a human-readable renderer.
 *
 * Commands call:
 *   cliOutput('list', { tasks, timeFilter, quickInsights })
 */

import { getFormatContext } from '../format-context.js';
import { formatError, formatSuccess } from '../../core/output.js';
import type { TodoError } from '../../core/errors.js';
import type { AddTasksResult } from '../../core/tasks/add.js';
import type { UpdateTaskResult } from '../../core/tasks/update.js';
import type { TaskInsights, TaskStatistics } from '../../core/query/insights.js';
import type { SmartView } from '../../core/suggest/smart-view.js';
import type { MarkSuggestions, TaskAnalysis } from '../../core/suggest/health.js';
import type { BatchGroup } from '../../core/suggest/cleanup.js';
import type { Task } from '../../types/task.js';

// Task renderers
import {
  renderAdd, renderDeleted, renderEdited, renderList, renderMarked,
  renderMatches, renderSelection, renderTaskGroup,
  type DeletedView, type ListView, type MarkedView, type MatchesView,
} from './tasks.js';

// Analysis renderers
import {
  renderBatchGroups, renderCandidates, renderCleanupAnalysis, renderInsights,
  renderMarkAnalysis, renderMarkCleanup, renderMarkSuggestions, renderOverdueAction,
  renderOverdueActions, renderSmart, renderStats,
  type CandidatesView, type CleanupAnalysis, type OverdueActionResult,
} from './views.js';

// System renderers
import {
  renderConfigList, renderConfigSet, renderConfigValue, renderMessage, renderVersion,
  type ConfigValueView,
} from './system.js';

// ---------------------------------------------------------------------------
// View registry: maps view name to its data shape and human renderer
// ---------------------------------------------------------------------------

/** Data carried by each view; the same object is the JSON `result`. */
export interface ViewData {
  'add': AddTasksResult;
  'list': ListView;
  'smart': SmartView;
  'insights': TaskInsights;
  'stats': TaskStatistics;
  'marked': MarkedView;
  'edited': UpdateTaskResult;
  'mark-analysis': TaskAnalysis;
  'mark-suggestions': MarkSuggestions;
  'mark-cleanup': { completed: number };
  'overdue-actions': { tasks: Task[] };
  'overdue-action': OverdueActionResult;
  'selection': { tasks: Task[] };
  'deleted': DeletedView;
  'task-group': BatchGroup;
  'matches': MatchesView;
  'cleanup-analysis': CleanupAnalysis;
  'batch-groups': { groups: BatchGroup[] };
  'candidates': CandidatesView;
  'version': { version: string };
  'config-value': ConfigValueView;
  'config-set': { key: string; value: unknown };
  'config-list': { config: object };
  'message': { message: string };
}

export type ViewName = keyof ViewData;

type RendererRegistry = {
  [K in ViewName]: (data: ViewData[K], quiet: boolean) => string;
};

const renderers: RendererRegistry = {
  'add': renderAdd,
  'list': renderList,
  'smart': renderSmart,
  'insights': renderInsights,
  'stats': renderStats,
  'marked': renderMarked,
  'edited': renderEdited,
  'mark-analysis': renderMarkAnalysis,
  'mark-suggestions': renderMarkSuggestions,
  'mark-cleanup': renderMarkCleanup,
  'overdue-actions': renderOverdueActions,
  'overdue-action': renderOverdueAction,
  'selection': renderSelection,
  'deleted': renderDeleted,
  'task-group': renderTaskGroup,
  'matches': renderMatches,
  'cleanup-analysis': renderCleanupAnalysis,
  'batch-groups': renderBatchGroups,
  'candidates': renderCandidates,
  'version': renderVersion,
  'config-value': renderConfigValue,
  'config-set': renderConfigSet,
  'config-list': renderConfigList,
  'message': renderMessage,
};

// ---------------------------------------------------------------------------
// Main output function
// ---------------------------------------------------------------------------

/**
 * Output data to stdout in the resolved format (JSON or human-readable).
 *
 * When format is 'human', dispatches to the view's renderer and prints its
 * text (nothing when it renders empty). When format is 'json', prints a
 * success envelope with the view name as `command`.
 */
export function cliOutput<K extends ViewName>(view: K, data: ViewData[K], message?: string): void {
  const ctx = getFormatContext();

  if (ctx.format === 'human') {
    const renderer: (data: ViewData[K], quiet: boolean) => string = renderers[view];
    const text = renderer(data, ctx.quiet);
    if (text) {
      console.log(text);
    }
    return;
  }

  console.log(formatSuccess(data, view, message));
}

/**
 * Output an error in the resolved format, on stderr.
 * For JSON: the error envelope. For human: the message and any fix hint.
 */
export function cliError(error: TodoError): void {
  const ctx = getFormatContext();

  if (ctx.format === 'human') {
    console.error(`Error: ${error.message}`);
    if (error.fix) console.error(`  Fix: ${error.fix}`);
    return;
  }

  console.error(formatError(error));
}
