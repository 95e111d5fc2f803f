/**
 * Terminal color and symbol utilities for human-readable CLI output.
 *
 * Respects NO_COLOR (https://no-color.org) and FORCE_COLOR env vars and the
 * output.showColor / output.showUnicode settings. Falls back to plain ASCII
 * when Unicode is not supported.
 */

import type { CleanupImpact } from '../../core/suggest/cleanup.js';
import type { TaskPriority } from '../../types/task.js';

function detectColor(): boolean {
  if (process.env['NO_COLOR'] !== undefined) return false;
  if (process.env['FORCE_COLOR'] !== undefined) return true;
  return process.stdout.isTTY === true;
}

function detectUnicode(): boolean {
  const lang = process.env['LANG'] ?? '';
  if (lang === 'C' || lang === 'POSIX') return false;
  return lang.includes('UTF') || process.platform === 'darwin';
}

let colorsEnabled = detectColor();
let unicodeEnabled = detectUnicode();

/**
 * Apply output settings. A setting can only switch a capability off;
 * detection still decides when it is on.
 */
export function setDisplayOptions(options: { color: boolean; unicode: boolean }): void {
  colorsEnabled = options.color && detectColor();
  unicodeEnabled = options.unicode && detectUnicode();
}

// ---------------------------------------------------------------------------
// ANSI escape helpers
// ---------------------------------------------------------------------------

function paint(code: string): (text: string) => string {
  return (text) => (colorsEnabled ? `${code}${text}\x1b[0m` : text);
}

export const bold = paint('\x1b[1m');
export const dim = paint('\x1b[2m');
export const red = paint('\x1b[0;31m');
export const green = paint('\x1b[0;32m');
export const yellow = paint('\x1b[1;33m');

// ---------------------------------------------------------------------------
// Symbols
// ---------------------------------------------------------------------------

const SYMBOLS = {
  pending: ['\u{1F532}', '[ ]'],
  done: ['✅', '[x]'],
  calendar: ['\u{1F4C5}', '@'],
  warning: ['⚠️ ', '!'],
  alarm: ['⏰', '~'],
  note: ['\u{1F4DD}', '-'],
  chart: ['\u{1F4CA}', '#'],
  trend: ['\u{1F4C8}', '#'],
  target: ['\u{1F3AF}', '>'],
  bolt: ['⚡', '*'],
  bulb: ['\u{1F4A1}', '*'],
  brain: ['\u{1F9E0}', '*'],
  robot: ['\u{1F916}', '*'],
  siren: ['\u{1F6A8}', '!!'],
  party: ['\u{1F389}', '*'],
  folder: ['\u{1F4C2}', '+'],
  thought: ['\u{1F4AD}', '>'],
  trash: ['\u{1F5D1}️ ', 'x'],
  broom: ['\u{1F9F9}', '*'],
  search: ['\u{1F50D}', '?'],
  question: ['❓', '?'],
  cross: ['❌', 'x'],
  check: ['✓', '+'],
  edit: ['\u{1F4DD}', '*'],
  info: ['ℹ️ ', 'i'],
  skip: ['⏭️ ', '>'],
  seedling: ['\u{1F331}', '.'],
  fire: ['\u{1F525}', '!'],
  heart: ['\u{1F49A}', '+'],
  package: ['\u{1F4E6}', '+'],
  microscope: ['\u{1F52C}', '*'],
} as const satisfies Record<string, readonly [string, string]>;

export type SymbolName = keyof typeof SYMBOLS;

/** A display symbol, Unicode or its ASCII fallback. */
export function sym(name: SymbolName): string {
  const [unicode, ascii] = SYMBOLS[name];
  return unicodeEnabled ? unicode : ascii;
}

/** Map task priority to a display symbol. */
export function prioritySymbol(priority: TaskPriority): string {
  if (unicodeEnabled) {
    switch (priority) {
      case 'high': return '\u{1F534}';
      case 'normal': return '\u{1F7E1}';
      case 'low': return '\u{1F7E2}';
    }
  }
  switch (priority) {
    case 'high': return '(H)';
    case 'normal': return '(N)';
    case 'low': return '(L)';
  }
}

/** Map task priority to a color. */
export function priorityColor(priority: TaskPriority): (text: string) => string {
  switch (priority) {
    case 'high': return red;
    case 'normal': return yellow;
    case 'low': return dim;
  }
}

/** Map a cleanup impact to a display symbol. */
export function impactSymbol(impact: CleanupImpact): string {
  switch (impact) {
    case 'high': return sym('bolt');
    case 'medium': return sym('chart');
    case 'low': return sym('seedling');
  }
}

/** Horizontal rule. */
export function hRule(width: number = 50, char: string = '='): string {
  return char.repeat(width);
}
