/**
 * Error formatting helpers for structured logging
 */

import type { Logger } from 'pino';
import {
  AuthClientErrorCode,
  TransportFailureError,
  isAuthClientError,
} from '@/auth/auth-errors.js';

export interface FormattedError {
  level: 'error' | 'warn';
  message: string;
  meta: Record<string, unknown>;
}

/**
 * Shapes any thrown value into a log record. Argument and operation errors
 * are caller mistakes and log at warn; everything else logs at error.
 */
export function formatErrorForLogging(
  error: unknown,
  context?: Record<string, unknown>
): FormattedError {
  if (isAuthClientError(error)) {
    const meta: Record<string, unknown> = {
      type: error.name,
      code: error.code,
      message: error.message,
      context,
    };

    if (error instanceof TransportFailureError) {
      meta.statusCode = error.statusCode;
      meta.providerError = error.providerError;
    }

    return {
      level:
        error.code === AuthClientErrorCode.TRANSPORT_FAILURE ? 'error' : 'warn',
      message: `[${error.code}] ${error.message}`,
      meta,
    };
  }

  if (error instanceof Error) {
    return {
      level: 'error',
      message: error.message,
      meta: {
        type: error.name,
        message: error.message,
        context,
        stack: error.stack,
      },
    };
  }

  return {
    level: 'error',
    message: String(error),
    meta: { type: typeof error, context },
  };
}

/**
 * Writes a formatted error to the given logger
 */
export function logError(
  logger: Logger,
  error: unknown,
  context?: Record<string, unknown>
): void {
  const formatted = formatErrorForLogging(error, context);
  logger[formatted.level](formatted.meta, formatted.message);
}
