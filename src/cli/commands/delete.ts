/**
 * CLI delete command: removal by id or fuzzy name, and the scored
 * cleanup suggestion modes.
 */

import { Command } from 'commander';
import type { Task } from '../../types/task.js';
import { ExitCode } from '../../types/exit-codes.js';
import { TodoError } from '../../core/errors.js';
import { getLogger } from '../../core/logger.js';
import { findTaskById, parseTaskId } from '../../core/tasks/find.js';
import { deleteTasks } from '../../core/tasks/delete.js';
import { fuzzyFindTasks } from '../../core/suggest/similarity.js';
import {
  boostSuggestions, buildCleanupSuggestions, findDuplicateTasks, findLowImpactTasks,
  groupForBatch, specificSuggestions, summarizeSuggestions,
  type SpecificCleanupKind,
} from '../../core/suggest/cleanup.js';
import type { CleanupMode } from '../renderers/views.js';
import { cliOutput } from '../renderers/index.js';
import { confirm, question } from '../prompt.js';
import { handleCommandError, openSession, type CommandSession } from '../session.js';

interface DeleteOptions {
  completed?: boolean;
  overdue?: boolean;
  old?: boolean;
  duplicates?: boolean;
  lowImpact?: boolean;
  batch?: boolean;
  smart?: boolean;
  cleanup?: boolean;
  interactive?: boolean;
  force?: boolean;
}

/** Confirm unless --force; --interactive always asks. */
async function approve(opts: DeleteOptions, message: string): Promise<boolean> {
  if (opts.force && !opts.interactive) return true;
  return confirm(message);
}

async function removeTasks(session: CommandSession, tasks: readonly Task[], bulk: boolean): Promise<void> {
  const removed = deleteTasks(session.store, tasks.map((t) => t.id));
  if (removed.length === 0) return;
  await session.save();
  cliOutput('deleted', { tasks: removed, bulk });
}

async function runSuggestions(session: CommandSession, mode: CleanupMode, opts: DeleteOptions): Promise<void> {
  const { store, config, now } = session;
  const base = buildCleanupSuggestions(store.tasks, now, config.suggestions);
  const suggestions = mode === 'smart' ? boostSuggestions(base) : base;

  cliOutput('cleanup-analysis', {
    mode,
    suggestions,
    summary: mode === 'smart' ? null : summarizeSuggestions(suggestions),
  });

  for (const suggestion of suggestions) {
    const ok = await approve(opts,
      `\n${suggestion.category} (${suggestion.tasks.length} tasks)?\n   ${suggestion.reason}\n   Proceed with deletion?`);
    if (ok) await removeTasks(session, suggestion.tasks, true);
  }
}

async function runCandidates(
  session: CommandSession,
  kind: 'duplicates' | 'low-impact',
  opts: DeleteOptions,
): Promise<void> {
  const tasks = kind === 'duplicates'
    ? findDuplicateTasks(session.store.tasks, session.config.suggestions.duplicateThreshold)
    : findLowImpactTasks(session.store.tasks);

  cliOutput('candidates', { kind, tasks });
  if (tasks.length === 0) return;

  const label = kind === 'duplicates' ? 'duplicate' : 'low-impact';
  if (await approve(opts, `Delete ${tasks.length} ${label} tasks?`)) {
    await removeTasks(session, tasks, true);
  }
}

async function runBatch(session: CommandSession, opts: DeleteOptions): Promise<void> {
  const groups = groupForBatch(session.store.tasks);
  cliOutput('batch-groups', { groups });
  for (const group of groups) {
    if (await approve(opts, `Delete all ${group.name.toLowerCase()}?`)) {
      await removeTasks(session, group.tasks, true);
    }
  }
}

async function runSpecific(session: CommandSession, kind: SpecificCleanupKind, opts: DeleteOptions): Promise<void> {
  const group = specificSuggestions(
    session.store.tasks, kind, session.now, session.config.suggestions.staleCompletedDays,
  );
  cliOutput('task-group', group);
  if (group.tasks.length === 0) return;
  if (await approve(opts, `Delete all ${group.name.toLowerCase()}?`)) {
    await removeTasks(session, group.tasks, true);
  }
}

async function deleteOne(session: CommandSession, task: Task, opts: DeleteOptions): Promise<void> {
  if (!(await approve(opts, `Delete task #${task.id}: ${task.description}?`))) {
    cliOutput('message', { message: 'Deletion cancelled.' });
    return;
  }
  await removeTasks(session, [task], false);
}

async function deleteByIdOrName(session: CommandSession, identifier: string, opts: DeleteOptions): Promise<void> {
  const id = parseTaskId(identifier);
  if (id !== null) {
    const task = findTaskById(session.store.tasks, id);
    if (!task) {
      throw new TodoError(ExitCode.NOT_FOUND, `Task with ID ${id} not found`, {
        fix: "Use 'todo list -a' to see task ids",
      });
    }
    await deleteOne(session, task, opts);
    return;
  }

  const matches = fuzzyFindTasks(session.store.tasks, identifier, {
    threshold: session.config.suggestions.fuzzyThreshold,
    limit: session.config.suggestions.fuzzyLimit,
  });

  const only = matches[0];
  if (matches.length === 1 && only) {
    await deleteOne(session, only.task, opts);
    return;
  }

  cliOutput('matches', { query: identifier, matches });
  if (matches.length === 0) {
    process.exit(ExitCode.NOT_FOUND);
  }

  const answer = await question('\nEnter the number to delete (0 to cancel): ');
  const choice = /^\d+$/.test(answer) ? Number(answer) : 0;
  const picked = matches[choice - 1];
  if (choice < 1 || !picked) {
    cliOutput('message', { message: 'Deletion cancelled.' });
    return;
  }
  await removeTasks(session, [picked.task], false);
}

function specificKind(opts: DeleteOptions): SpecificCleanupKind | null {
  if (opts.completed) return 'completed';
  if (opts.overdue) return 'overdue';
  if (opts.old) return 'old';
  return null;
}

/**
 * Register the delete command.
 */
export function registerDeleteCommand(program: Command): void {
  program
    .command('delete [identifier]')
    .alias('rm')
    .description('Delete tasks by id or name, or clean up with smart suggestions')
    .option('--completed', 'Suggest completed tasks for deletion')
    .option('--overdue', 'Suggest overdue tasks for deletion')
    .option('--old', 'Suggest old completed tasks for deletion')
    .option('--duplicates', 'Find and delete duplicate tasks')
    .option('--low-impact', 'Suggest low-impact tasks to remove')
    .option('--batch', 'Batch delete with smart grouping')
    .option('--smart', 'Smart-powered deletion suggestions')
    .option('--cleanup', 'Full cleanup mode with comprehensive analysis')
    .option('-i, --interactive', 'Confirm each category, even with --force')
    .option('-f, --force', 'Delete without confirmation')
    .action(async (identifier: string | undefined, opts: DeleteOptions) => {
      try {
        const session = await openSession();
        getLogger('cli').debug({ identifier, opts }, 'delete');

        if (session.store.tasks.length === 0) {
          cliOutput('message', { message: 'No tasks found.' });
          return;
        }

        if (opts.smart) {
          await runSuggestions(session, 'smart', opts);
          return;
        }
        if (opts.cleanup) {
          await runSuggestions(session, 'cleanup', opts);
          cliOutput('message', { message: '\nAdditional Cleanup Opportunities:' });
          await runCandidates(session, 'duplicates', opts);
          await runCandidates(session, 'low-impact', opts);
          return;
        }
        if (opts.batch) {
          await runBatch(session, opts);
          return;
        }

        const kind = specificKind(opts);
        if (identifier === undefined && kind === null && !opts.duplicates && !opts.lowImpact) {
          await runSuggestions(session, 'default', opts);
          return;
        }
        if (opts.duplicates) {
          await runCandidates(session, 'duplicates', opts);
          return;
        }
        if (opts.lowImpact) {
          await runCandidates(session, 'low-impact', opts);
          return;
        }
        if (kind !== null) {
          await runSpecific(session, kind, opts);
          return;
        }
        if (identifier !== undefined) {
          await deleteByIdOrName(session, identifier, opts);
        }
      } catch (err) {
        handleCommandError(err);
      }
    });
}
