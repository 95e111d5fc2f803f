/**
 * CLI list command: filtered task list, plus the smart, insights and
 * statistics views.
 */

import { Command } from 'commander';
import { filterTasks, resolveTimeFilter } from '../../core/query/filter.js';
import { computeInsights, computeStatistics, quickInsights } from '../../core/query/insights.js';
import { buildSmartView } from '../../core/suggest/smart-view.js';
import { cliOutput } from '../renderers/index.js';
import { handleCommandError, openSession } from '../session.js';

interface ListOptions {
  week?: boolean;
  month?: boolean;
  all?: boolean;
  priority?: string;
  completed?: boolean;
  pending?: boolean;
  overdue?: boolean;
  dueSoon?: boolean;
  /** Commander's negatable flag: false when --no-date is given. */
  date?: boolean;
  insights?: boolean;
  smart?: boolean;
  stats?: boolean;
}

/**
 * Register the list command.
 */
export function registerListCommand(program: Command): void {
  program
    .command('list')
    .alias('ls')
    .description('List tasks with filtering, insights and smart views')
    .option('-w, --week', "Show this week's tasks")
    .option('-m, --month', "Show this month's tasks")
    .option('-a, --all', 'Show all tasks')
    .option('-p, --priority <priority>', 'Filter by priority (low/l, normal/n, high/h)')
    .option('--completed', 'Show only completed tasks')
    .option('--pending', 'Show only pending tasks')
    .option('--overdue', 'Show only overdue tasks')
    .option('--due-soon', 'Show tasks due in the next few days')
    .option('--no-date', 'Show tasks without due dates')
    .option('-i, --insights', 'Show productivity insights')
    .option('-s, --smart', 'Smart view with recommendations')
    .option('--stats', 'Show detailed statistics')
    .action(async (opts: ListOptions) => {
      try {
        const { store, config, now } = await openSession();
        const dueSoonDays = config.suggestions.dueSoonDays;

        if (store.tasks.length === 0) {
          cliOutput('message', {
            message: 'No tasks found. Use \'todo add "task description"\' to add a task.',
          });
          return;
        }

        if (opts.smart) {
          cliOutput('smart', buildSmartView(store.tasks, now, dueSoonDays));
          return;
        }
        if (opts.insights) {
          cliOutput('insights', computeInsights(store.tasks, now, dueSoonDays));
          return;
        }
        if (opts.stats) {
          cliOutput('stats', computeStatistics(store.tasks, now, dueSoonDays));
          return;
        }

        const noDate = opts.date === false;
        const timeFilter = resolveTimeFilter(opts);
        const tasks = filterTasks(store.tasks, {
          timeFilter,
          priority: opts.priority,
          completed: opts.completed,
          pending: opts.pending,
          overdue: opts.overdue,
          dueSoon: opts.dueSoon,
          noDate,
          dueSoonDays,
        }, now);

        const specific = Boolean(opts.overdue || opts.dueSoon || noDate || opts.completed);
        cliOutput('list', {
          tasks,
          timeFilter,
          quickInsights: specific ? null : quickInsights(tasks, now, dueSoonDays),
        });
      } catch (err) {
        handleCommandError(err);
      }
    });
}
