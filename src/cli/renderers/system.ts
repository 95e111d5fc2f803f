/**
 * Human-readable renderers for version, configuration and plain messages.
 */

import type { ConfigSource } from '../../types/config.js';
import { bold, dim, sym } from './colors.js';

export function renderVersion(data: { version: string }, quiet: boolean): string {
  if (quiet) return data.version;
  return `Smart Todo CLI ${data.version}`;
}

export interface ConfigValueView {
  key: string;
  value: unknown;
  source: ConfigSource;
}

function formatValue(value: unknown): string {
  if (value === null || value === undefined) return '';
  if (typeof value === 'object') return JSON.stringify(value);
  return String(value);
}

export function renderConfigValue(data: ConfigValueView, quiet: boolean): string {
  if (quiet) return formatValue(data.value);
  return `${data.key} = ${formatValue(data.value)} ${dim(`(${data.source})`)}`;
}

export function renderConfigSet(data: { key: string; value: unknown }, quiet: boolean): string {
  if (quiet) return '';
  return `${sym('done')} Set ${data.key} = ${formatValue(data.value)}`;
}

function flatten(prefix: string, value: unknown, out: string[]): void {
  if (value !== null && typeof value === 'object' && !Array.isArray(value)) {
    for (const [key, child] of Object.entries(value)) {
      flatten(prefix ? `${prefix}.${key}` : key, child, out);
    }
    return;
  }
  out.push(`  ${prefix} = ${formatValue(value)}`);
}

/**
 * Dotted key/value listing of the effective configuration.
 */
export function renderConfigList(data: { config: object }, quiet: boolean): string {
  const lines: string[] = [];
  flatten('', data.config, lines);
  if (quiet) return lines.map((l) => l.trim()).join('\n');
  return [bold('Configuration'), ...lines].join('\n');
}

/** One-line notices: empty collection hints, cancellations. */
export function renderMessage(data: { message: string }, quiet: boolean): string {
  return quiet ? '' : data.message;
}
