/**
 * Command tree for the todo CLI.
 *
 * Kept apart from the entry point so tests can build a fresh program and
 * drive it with parseAsync().
 */

import { Command } from 'commander';
import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { loadConfig } from '../core/config.js';
import { initLogger, getLogger } from '../core/logger.js';
import { getTodoHome } from '../core/paths.js';
import { registerAddCommand } from './commands/add.js';
import { registerListCommand } from './commands/list.js';
import { registerMarkCommand } from './commands/mark.js';
import { registerDeleteCommand } from './commands/delete.js';
import { registerConfigCommand } from './commands/config.js';
import { resolveFormat, setFormatContext } from './format-context.js';
import { setDisplayOptions } from './renderers/colors.js';
import { cliOutput } from './renderers/index.js';
import { handleCommandError } from './session.js';

const PackageSchema = z.object({ version: z.string() });

/** Read version from package.json (single source of truth). */
export function getPackageVersion(): string {
  // src/cli/program.ts and dist/cli/program.js both sit two levels below the root
  const pkgPath = fileURLToPath(new URL('../../package.json', import.meta.url));
  const parsed = PackageSchema.safeParse(JSON.parse(readFileSync(pkgPath, 'utf-8')));
  return parsed.success ? parsed.data.version : '0.0.0';
}

interface GlobalOptions {
  json?: boolean;
  human?: boolean;
  quiet?: boolean;
}

export function createProgram(version: string = getPackageVersion()): Command {
  const program = new Command();

  program
    .name('todo')
    .description('Smart Todo - a todo list with insights, smart views and cleanup suggestions')
    .version(version)
    .option('--json', 'Output in JSON format')
    .option('--human', 'Output in human-readable format (default)')
    .option('--quiet', 'Print ids only, for scripting');

  program
    .command('version')
    .description('Display the version')
    .action(() => {
      cliOutput('version', { version });
    });

  registerAddCommand(program);
  registerListCommand(program);
  registerMarkCommand(program);
  registerDeleteCommand(program);
  registerConfigCommand(program);

  // Load config, start logging and resolve the output format before any command.
  program.hook('preAction', async (_thisCommand, actionCommand) => {
    const flags: GlobalOptions = actionCommand.optsWithGlobals();
    try {
      const config = await loadConfig();
      initLogger(getTodoHome(), config.logging);
      setDisplayOptions({ color: config.output.showColor, unicode: config.output.showUnicode });
      setFormatContext(resolveFormat(flags, config.output.defaultFormat));
      getLogger('cli').debug({ command: actionCommand.name() }, 'Dispatching command');
    } catch (err) {
      setFormatContext(resolveFormat(flags));
      handleCommandError(err);
    }
  });

  return program;
}
