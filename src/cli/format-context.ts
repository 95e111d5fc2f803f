/**
 * CLI output format resolution context.
 *
 * Singleton that holds the resolved output format for the current CLI invocation.
 * Set once in the Commander.js preAction hook; read by cliOutput() and renderers.
 */

import type { OutputFormat } from '../types/config.js';

/** Resolved output flags and where the format came from. */
export interface FormatResolution {
  format: OutputFormat;
  source: 'flag' | 'config' | 'default';
  quiet: boolean;
}

let currentResolution: FormatResolution = {
  format: 'human',
  source: 'default',
  quiet: false,
};

/**
 * Resolve the format: --json / --human flags win over the configured default.
 */
export function resolveFormat(
  flags: { json?: boolean; human?: boolean; quiet?: boolean },
  configured?: OutputFormat,
): FormatResolution {
  const quiet = flags.quiet === true;
  if (flags.json) return { format: 'json', source: 'flag', quiet };
  if (flags.human) return { format: 'human', source: 'flag', quiet };
  if (configured) return { format: configured, source: 'config', quiet };
  return { format: 'human', source: 'default', quiet };
}

/**
 * Set the resolved format for this CLI invocation.
 */
export function setFormatContext(resolution: FormatResolution): void {
  currentResolution = resolution;
}

export function getFormatContext(): FormatResolution {
  return currentResolution;
}
