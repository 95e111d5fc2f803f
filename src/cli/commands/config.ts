/**
 * CLI config command - configuration management.
 */

import { Command } from 'commander';
import { cliOutput } from '../renderers/index.js';
import { getConfigValue, loadConfig, parseEnvValue, setConfigValue } from '../../core/config.js';
import { handleCommandError } from '../session.js';

export function registerConfigCommand(program: Command): void {
  const config = program
    .command('config')
    .description('Configuration management');

  config
    .command('get <key>')
    .description('Get a configuration value and where it came from')
    .action(async (key: string) => {
      try {
        const resolved = await getConfigValue(key);
        cliOutput('config-value', { key, value: resolved.value, source: resolved.source });
      } catch (err) {
        handleCommandError(err);
      }
    });

  config
    .command('set <key> <value>')
    .description('Set a configuration value in config.json')
    .action(async (key: string, value: string) => {
      try {
        const parsedValue = parseEnvValue(value);
        await setConfigValue(key, parsedValue);
        cliOutput('config-set', { key, value: parsedValue });
      } catch (err) {
        handleCommandError(err);
      }
    });

  config
    .command('list')
    .description('Show all resolved configuration')
    .action(async () => {
      try {
        cliOutput('config-list', { config: await loadConfig() });
      } catch (err) {
        handleCommandError(err);
      }
    });
}
