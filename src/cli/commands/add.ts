/**
 * CLI add command.
 */

import { Command } from 'commander';
import { addTasks } from '../../core/tasks/add.js';
import { getLogger } from '../../core/logger.js';
import { ExitCode } from '../../types/exit-codes.js';
import { cliOutput } from '../renderers/index.js';
import { handleCommandError, openSession } from '../session.js';

interface AddOptions {
  due?: string;
  priority: string;
}

/**
 * Register the add command.
 */
export function registerAddCommand(program: Command): void {
  program
    .command('add <description...>')
    .description('Add one or more tasks to your todo list')
    .option('-d, --due <date>', 'Due date for the task (format: YYYY-MM-DD)')
    .option('-p, --priority <priority>', 'Priority level of the task (low, normal, high)', 'normal')
    .action(async (descriptions: string[], opts: AddOptions) => {
      try {
        const session = await openSession();
        const result = addTasks(
          session.store,
          descriptions,
          { dueDate: opts.due, priority: opts.priority },
          session.now,
        );

        if (result.added.length > 0) {
          await session.save();
          getLogger('cli').info({ ids: result.added.map((t) => t.id) }, 'Added tasks');
        }
        cliOutput('add', result);

        if (result.added.length === 0) {
          process.exit(ExitCode.INVALID_INPUT);
        }
      } catch (err) {
        handleCommandError(err);
      }
    });
}
