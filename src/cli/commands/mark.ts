/**
 * CLI mark command: complete or reopen tasks, edit their fields, and the
 * analysis modes around completion.
 */

import { Command } from 'commander';
import type { Task } from '../../types/task.js';
import { ExitCode } from '../../types/exit-codes.js';
import { TodoError } from '../../core/errors.js';
import { getLogger } from '../../core/logger.js';
import { findTaskByIdOrName } from '../../core/tasks/find.js';
import { parseSelection, setCompletion, setCompletionMany } from '../../core/tasks/complete.js';
import { updateTask } from '../../core/tasks/update.js';
import { deleteTask } from '../../core/tasks/delete.js';
import { findCompleted, findOverdue } from '../../core/suggest/cleanup.js';
import { analyzeTasks, markSuggestions, postCompletionSuggestions } from '../../core/suggest/health.js';
import { cliOutput } from '../renderers/index.js';
import { confirm, question } from '../prompt.js';
import { handleCommandError, openSession, type CommandSession } from '../session.js';

interface MarkOptions {
  undone?: boolean;
  force?: boolean;
  overdue?: boolean;
  smart?: boolean;
  batch?: boolean;
  cleanup?: boolean;
  edit?: boolean;
  due?: string;
  priority?: string;
  desc?: string;
}

function requireTask(session: CommandSession, identifier: string): Task {
  const task = findTaskByIdOrName(session.store.tasks, identifier);
  if (!task) {
    throw new TodoError(ExitCode.NOT_FOUND, `Task not found: ${identifier}`, {
      fix: "Use 'todo list -a' to see task ids",
    });
  }
  return task;
}

async function markOne(session: CommandSession, identifier: string, opts: MarkOptions): Promise<void> {
  const task = requireTask(session, identifier);
  const completed = !opts.undone;

  if (!opts.force) {
    const action = completed ? 'Complete' : 'Mark as incomplete';
    if (!(await confirm(`${action} task #${task.id}: ${task.description}`))) {
      cliOutput('message', { message: 'Operation cancelled.' });
      return;
    }
  }

  const updated = setCompletion(session.store, task.id, completed, session.now);
  await session.save();
  cliOutput('marked', {
    tasks: [updated],
    completed,
    suggestions: completed ? postCompletionSuggestions(session.store.tasks, session.now) : null,
  });
}

async function editOne(session: CommandSession, identifier: string, opts: MarkOptions): Promise<void> {
  const task = requireTask(session, identifier);
  const result = updateTask(session.store, task.id, {
    dueDate: opts.due,
    priority: opts.priority,
    description: opts.desc,
  });
  if (result.changes.length > 0) {
    await session.save();
  }
  cliOutput('edited', result);
}

async function handleOverdue(session: CommandSession): Promise<void> {
  const overdue = findOverdue(session.store.tasks, session.now);
  cliOutput('overdue-actions', { tasks: overdue });
  if (overdue.length === 0) return;
  if (!(await confirm('Would you like to take action on overdue tasks?'))) return;

  let changed = false;
  for (const task of overdue) {
    const choice = (await question(
      `\nTask #${task.id}: ${task.description} (due ${task.dueDate ?? ''})\n`
      + 'Actions: (c)omplete, (r)eschedule, (d)elete, (s)kip\nChoose action: ',
    )).toLowerCase();

    if (choice === 'c' || choice === 'complete') {
      setCompletion(session.store, task.id, true, session.now);
      changed = true;
      cliOutput('overdue-action', { task, action: 'completed' });
    } else if (choice === 'r' || choice === 'reschedule') {
      const dueDate = await question('New due date (YYYY-MM-DD): ');
      try {
        updateTask(session.store, task.id, { dueDate });
      } catch (err) {
        if (!(err instanceof TodoError)) throw err;
        cliOutput('overdue-action', { task, action: 'invalid-date' });
        continue;
      }
      changed = true;
      cliOutput('overdue-action', { task, action: 'rescheduled', dueDate });
    } else if (choice === 'd' || choice === 'delete') {
      if (await confirm(`Delete task #${task.id}`)) {
        deleteTask(session.store, task.id);
        changed = true;
        cliOutput('overdue-action', { task, action: 'deleted' });
      }
    } else {
      cliOutput('overdue-action', { task, action: 'skipped' });
    }
  }

  if (changed) await session.save();
}

async function handleBatch(session: CommandSession, opts: MarkOptions): Promise<void> {
  const pending = session.store.tasks.filter((t) => !t.completed);
  cliOutput('selection', { tasks: pending });
  if (pending.length === 0) return;

  const selected = opts.force
    ? pending
    : parseSelection(await question("\nEnter task numbers to mark (comma-separated, or 'all'): "), pending);

  const completed = !opts.undone;
  const count = setCompletionMany(session.store, selected.map((t) => t.id), completed, session.now);
  if (count > 0) await session.save();
  cliOutput('marked', { tasks: selected, completed });
}

/**
 * Register the mark command.
 */
export function registerMarkCommand(program: Command): void {
  program
    .command('mark [identifier]')
    .description('Mark tasks as complete or incomplete, or edit task properties')
    .option('-u, --undone', 'Mark task as incomplete')
    .option('-f, --force', 'Skip confirmation prompts')
    .option('--overdue', 'Show overdue tasks with recovery actions')
    .option('-s, --smart', 'Smart task analysis and recommendations')
    .option('--batch', 'Batch mark multiple tasks')
    .option('--cleanup', 'Show cleanup operations')
    .option('-e, --edit', 'Edit task properties')
    .option('--due <date>', 'New due date (YYYY-MM-DD)')
    .option('-p, --priority <priority>', 'New priority (low, normal, high)')
    .option('-d, --desc <description>', 'New description')
    .action(async (identifier: string | undefined, opts: MarkOptions) => {
      try {
        const session = await openSession();
        getLogger('cli').debug({ identifier, opts }, 'mark');

        if (session.store.tasks.length === 0) {
          cliOutput('message', {
            message: 'No tasks found. Use \'todo add "task description"\' to add a task.',
          });
          return;
        }

        if (opts.smart) {
          cliOutput('mark-analysis', analyzeTasks(
            session.store.tasks, session.now, session.config.suggestions.upcomingDays,
          ));
          return;
        }
        if (opts.overdue) {
          await handleOverdue(session);
          return;
        }
        if (opts.batch) {
          await handleBatch(session, opts);
          return;
        }
        if (opts.cleanup) {
          cliOutput('mark-cleanup', { completed: findCompleted(session.store.tasks).length });
          return;
        }
        if (identifier === undefined) {
          cliOutput('mark-suggestions', markSuggestions(session.store.tasks, session.now));
          return;
        }

        const editing = opts.edit || opts.due !== undefined
          || opts.priority !== undefined || opts.desc !== undefined;
        if (editing) {
          await editOne(session, identifier, opts);
          return;
        }

        await markOne(session, identifier, opts);
      } catch (err) {
        handleCommandError(err);
      }
    });
}
