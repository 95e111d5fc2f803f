/**
 * Tests for error types and JSON envelopes.
 */

import { describe, it, expect } from 'vitest';
import { formatError, formatSuccess } from '../output.js';
import { TodoError } from '../errors.js';
import { bytesToSizeString } from '../logger.js';
import { ExitCode, getExitCodeName, isErrorCode, isSuccessCode } from '../../types/exit-codes.js';

describe('TodoError', () => {
  it('carries its exit code and fix hint', () => {
    const err = new TodoError(ExitCode.NOT_FOUND, 'Task not found: 3', { fix: 'List tasks first' });
    expect(err.name).toBe('TodoError');
    expect(err.toJSON()).toEqual({
      success: false,
      error: { code: 4, name: 'NOT_FOUND', message: 'Task not found: 3', fix: 'List tasks first' },
    });
  });

  it('omits an absent fix', () => {
    expect(new TodoError(ExitCode.FILE_ERROR, 'boom').toJSON().error).toEqual({
      code: 3,
      name: 'FILE_ERROR',
      message: 'boom',
    });
  });
});

describe('envelopes', () => {
  it('wraps a result', () => {
    expect(formatSuccess({ id: 1 }, 'add')).toBe('{"success":true,"command":"add","result":{"id":1}}');
    expect(formatSuccess([], 'list', 'empty')).toBe(
      '{"success":true,"command":"list","result":[],"message":"empty"}',
    );
  });

  it('serializes an error', () => {
    expect(formatError(new TodoError(ExitCode.INVALID_INPUT, 'bad'))).toBe(
      '{"success":false,"error":{"code":2,"name":"INVALID_INPUT","message":"bad"}}',
    );
  });
});

describe('exit codes', () => {
  it('separates errors from special states', () => {
    expect(isErrorCode(ExitCode.NOT_FOUND)).toBe(true);
    expect(isSuccessCode(ExitCode.NO_DATA)).toBe(true);
    expect(getExitCodeName(ExitCode.CONFIG_ERROR)).toBe('CONFIG_ERROR');
  });
});

describe('bytesToSizeString', () => {
  it('picks the largest whole unit', () => {
    expect(bytesToSizeString(10 * 1024 * 1024)).toBe('10m');
    expect(bytesToSizeString(1536)).toBe('1k');
    expect(bytesToSizeString(512)).toBe('512');
  });
});
