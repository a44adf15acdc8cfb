/**
 * Error taxonomy and classification tests.
 */

import { describe, it, expect } from '@jest/globals';

import {
  classifyError,
  ConflictError,
  ErrorCategory,
  ErrorCode,
  formatErrorForResponse,
  getErrorMessage,
  isRetryableError,
  NotFoundError,
  PipelineError,
  TerminalError,
  TimeoutError,
  TransientError,
  ValidationError,
} from '@pipeline/core';

describe('error classes', () => {
  it('should keep the prototype chain for instanceof checks', () => {
    const timeout = new TimeoutError(100, 'generate');

    expect(timeout).toBeInstanceOf(TimeoutError);
    expect(timeout).toBeInstanceOf(TransientError);
    expect(timeout).toBeInstanceOf(PipelineError);
    expect(timeout.code).toBe(ErrorCode.OPERATION_TIMEOUT);
    expect(timeout.name).toBe('TimeoutError');
  });

  it('should describe version conflicts', () => {
    const conflict = new ConflictError('ApplicationRecord', 'app_1', 3, 4);

    expect(conflict.message).toBe('ApplicationRecord app_1 version conflict: expected 3, found 4');
    expect(conflict.context).toEqual({ entity: 'ApplicationRecord', id: 'app_1', expectedVersion: 3, actualVersion: 4 });
  });

  it('should carry the cause of a terminal error', () => {
    const cause = new Error('HTTP 503');
    const terminal = new TerminalError('delivery failed', 6, { cause });

    expect(terminal.cause).toBe(cause);
    expect(terminal.attempts).toBe(6);
    expect(terminal.toJSON().cause).toBe('HTTP 503');
  });

  it('should format pipeline errors for responses', () => {
    expect(formatErrorForResponse(new NotFoundError('ApplicationRecord', 'app_9'))).toEqual({
      code: ErrorCode.NOT_FOUND,
      message: 'ApplicationRecord not found: app_9',
      details: { entity: 'ApplicationRecord', id: 'app_9' },
    });
    expect(formatErrorForResponse('plain failure')).toEqual({
      code: ErrorCode.UNKNOWN_ERROR,
      message: 'plain failure',
    });
  });

  it('should read messages from anything thrown', () => {
    expect(getErrorMessage(new Error('x'))).toBe('x');
    expect(getErrorMessage('y')).toBe('y');
    expect(getErrorMessage(42)).toBe('42');
  });
});

describe('classifyError', () => {
  it('should classify taxonomy errors directly', () => {
    expect(classifyError(new TransientError('flaky'))).toBe(ErrorCategory.TRANSIENT);
    expect(classifyError(new TimeoutError(5))).toBe(ErrorCategory.TRANSIENT);
    expect(classifyError(new ConflictError('x', 'y', 1))).toBe(ErrorCategory.TRANSIENT);
    expect(classifyError(new ValidationError('bad'))).toBe(ErrorCategory.PERMANENT);
    expect(classifyError(new NotFoundError('x', 'y'))).toBe(ErrorCategory.PERMANENT);
  });

  it('should classify foreign errors by HTTP status', () => {
    expect(classifyError(Object.assign(new Error('bad request'), { status: 400 }))).toBe(ErrorCategory.PERMANENT);
    expect(classifyError(Object.assign(new Error('slow down'), { status: 429 }))).toBe(ErrorCategory.TRANSIENT);
    expect(classifyError(Object.assign(new Error('down'), { statusCode: 503 }))).toBe(ErrorCategory.TRANSIENT);
  });

  it('should classify network codes and messages', () => {
    expect(classifyError(Object.assign(new Error('socket'), { code: 'ECONNRESET' }))).toBe(ErrorCategory.TRANSIENT);
    expect(classifyError(new Error('Request timed out'))).toBe(ErrorCategory.TRANSIENT);
    expect(classifyError(new Error('something odd'))).toBe(ErrorCategory.UNKNOWN);
    expect(classifyError(undefined)).toBe(ErrorCategory.PERMANENT);
  });

  it('should retry everything that is not permanent', () => {
    expect(isRetryableError(new Error('something odd'))).toBe(true);
    expect(isRetryableError(new ValidationError('bad'))).toBe(false);
  });
});
