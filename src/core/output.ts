/**
 * JSON envelope formatting for --json output.
 */

import { TodoError, type ErrorEnvelope } from './errors.js';

/** Envelope for a successful command result. */
export interface SuccessEnvelope<T> {
  success: true;
  command: string;
  result: T;
  message?: string;
}

/** Format a successful result as a JSON envelope. */
export function formatSuccess<T>(data: T, command: string, message?: string): string {
  const envelope: SuccessEnvelope<T> = {
    success: true,
    command,
    result: data,
    ...(message && { message }),
  };
  return JSON.stringify(envelope);
}

/** Format an error as a JSON envelope. */
export function formatError(error: TodoError): string {
  const envelope: ErrorEnvelope = error.toJSON();
  return JSON.stringify(envelope);
}
