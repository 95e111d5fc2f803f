/**
 * Line prompts for interactive confirmations.
 *
 * Prompts go to stderr so stdout stays clean for command output. One
 * readline interface is shared across prompts so piped answers are read
 * line by line.
 */

import * as readline from 'node:readline';

let rl: readline.Interface | null = null;
let lines: AsyncIterator<string> | null = null;

function getLines(): AsyncIterator<string> {
  if (!lines) {
    rl = readline.createInterface({ input: process.stdin, terminal: false });
    lines = rl[Symbol.asyncIterator]();
  }
  return lines;
}

/**
 * Ask a question and resolve with the trimmed answer ('' at end of input).
 */
export async function question(promptText: string): Promise<string> {
  process.stderr.write(promptText);
  const next = await getLines().next();
  return next.done ? '' : next.value.trim();
}

/** Ask a y/N question; only "y" or "yes" confirm. */
export async function confirm(message: string): Promise<boolean> {
  const answer = (await question(`${message} (y/N): `)).toLowerCase();
  return answer === 'y' || answer === 'yes';
}

/** Release stdin so the process can exit. */
export function closePrompt(): void {
  rl?.close();
  rl = null;
  lines = null;
}
