import { describe, it, expect } from '@jest/globals';
import {
  InvalidArgumentError,
  InvalidOperationError,
  TransportFailureError,
  isAuthClientError,
} from '@/auth/auth-errors.js';
import { formatErrorForLogging, logError } from '@/utils/error-handler.js';
import { createCapturingLogger } from './test-utils.js';

describe('formatErrorForLogging', () => {
  it('should log caller mistakes as warnings', () => {
    const formatted = formatErrorForLogging(new InvalidArgumentError('stream'), {
      operation: 'load',
    });

    expect(formatted.level).toBe('warn');
    expect(formatted.message).toBe("[INVALID_ARGUMENT] Argument 'stream' is required");
    expect(formatted.meta).toMatchObject({
      type: 'InvalidArgumentError',
      code: 'INVALID_ARGUMENT',
      context: { operation: 'load' },
    });
  });

  it('should log transport failures as errors with provider details', () => {
    const formatted = formatErrorForLogging(
      new TransportFailureError('Token request failed with HTTP 400', {
        statusCode: 400,
        providerError: 'invalid_grant',
      })
    );

    expect(formatted.level).toBe('error');
    expect(formatted.meta).toMatchObject({ statusCode: 400, providerError: 'invalid_grant' });
  });

  it('should handle plain errors and thrown values', () => {
    expect(formatErrorForLogging(new Error('boom'))).toMatchObject({
      level: 'error',
      message: 'boom',
    });
    expect(formatErrorForLogging('boom')).toMatchObject({
      level: 'error',
      message: 'boom',
      meta: { type: 'string' },
    });
  });
});

describe('logError', () => {
  it('should write the formatted record at its level', () => {
    const { logger, records } = createCapturingLogger();

    logError(logger, new InvalidOperationError('Client has been disposed'));

    expect(records).toHaveLength(1);
    expect(records[0]).toMatchObject({
      level: 'warn',
      msg: '[INVALID_OPERATION] Client has been disposed',
      type: 'InvalidOperationError',
    });
  });
});

describe('isAuthClientError', () => {
  it('should recognise only client errors', () => {
    expect(isAuthClientError(new InvalidOperationError('x'))).toBe(true);
    expect(isAuthClientError(new Error('x'))).toBe(false);
  });
});
