/**
 * Error type carrying a process exit code.
 */

import { ExitCode, getExitCodeName } from '../types/exit-codes.js';

/** JSON shape of a failed command. */
export interface ErrorEnvelope {
  success: false;
  error: {
    code: ExitCode;
    name: string;
    message: string;
    fix?: string;
  };
}

/**
 * Structured error for todo operations.
 * Carries an exit code, human-readable message, and an optional fix hint.
 */
export class TodoError extends Error {
  readonly code: ExitCode;
  readonly fix?: string;

  constructor(
    code: ExitCode,
    message: string,
    options?: {
      fix?: string;
      cause?: unknown;
    },
  ) {
    super(message, { cause: options?.cause });
    this.name = 'TodoError';
    this.code = code;
    this.fix = options?.fix;
  }

  /** Structured JSON representation for --json output. */
  toJSON(): ErrorEnvelope {
    return {
      success: false,
      error: {
        code: this.code,
        name: getExitCodeName(this.code),
        message: this.message,
        ...(this.fix && { fix: this.fix }),
      },
    };
  }
}
