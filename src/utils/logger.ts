/**
 * Logger Configuration Module
 *
 * Provides the pino logger used by authentication clients, with redaction of
 * credential material and environment-aware output.
 *
 * @module utils/logger
 */

import pino from 'pino';
import type { DestinationStream, Logger, LoggerOptions } from 'pino';

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

export interface LoggingConfig {
  readonly level: LogLevel;
  readonly environment: 'development' | 'test' | 'production';
  /** Pretty output through pino-pretty; only honoured in development */
  readonly pretty: boolean;
  readonly serviceName?: string;
}

/**
 * Paths removed from every log record
 */
export const REDACTED_PATHS = [
  'password',
  'accessToken',
  'refreshToken',
  'credentials.password',
  'headers.authorization',
  'headers.Authorization',
];

/**
 * Redacts Authorization header value for safe logging
 *
 * @param authHeader - Full Authorization header value (e.g., "Bearer eyJhbGc...")
 * @returns Redacted header showing only last 6 characters (e.g., "Bearer ***abc123")
 *
 * @example
 * ```typescript
 * const header = "Bearer eyJhbGciOiJIUzI1NiIsInR5cCI6IkpXVCJ9";
 * const redacted = redactAuthHeader(header);
 * // Returns: "Bearer ***IkpXVCJ9"
 * ```
 */
export function redactAuthHeader(authHeader: string | undefined): string {
  if (!authHeader) {
    return '(none)';
  }

  if (authHeader.startsWith('Bearer ')) {
    const token = authHeader.substring(7);
    if (token.length <= 6) {
      return 'Bearer ***';
    }
    return `Bearer ***${token.slice(-6)}`;
  }

  // Basic auth or other schemes
  const parts = authHeader.split(' ');
  if (parts.length === 2) {
    const [scheme, credentials] = parts;
    if (credentials && credentials.length <= 6) {
      return `${scheme} ***`;
    }
    return `${scheme} ***${credentials?.slice(-6) || ''}`;
  }

  return '***';
}

/**
 * Creates pino logger options for the given configuration
 */
export function createLoggerOptions(config: LoggingConfig): LoggerOptions {
  const baseOptions: LoggerOptions = {
    level: config.level,
    redact: { paths: REDACTED_PATHS, censor: '***REDACTED***' },
    formatters: {
      level: (label: string) => ({ level: label }),
    },
  };

  if (config.environment === 'development' && config.pretty) {
    return {
      ...baseOptions,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss.l',
          ignore: 'pid,hostname',
          messageFormat: '{levelLabel} - {msg}',
        },
      },
    };
  }

  return {
    ...baseOptions,
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      ...baseOptions.formatters,
      bindings: (bindings: Record<string, unknown>) => ({
        pid: bindings.pid,
        hostname: bindings.hostname,
        service: config.serviceName ?? 'auth-session-client',
      }),
    },
  };
}

/**
 * Creates a logger. A destination stream, when given, replaces stdout and
 * any pretty transport.
 */
export function createLogger(
  config: LoggingConfig,
  destination?: DestinationStream
): Logger {
  if (destination) {
    const { transport: _transport, ...options } = createLoggerOptions(config);
    return pino(options, destination);
  }
  return pino(createLoggerOptions(config));
}

/**
 * Reads logging settings from environment variables
 */
export function loadLoggingConfig(
  env: NodeJS.ProcessEnv = process.env
): LoggingConfig {
  const environment =
    env.NODE_ENV === 'production' || env.NODE_ENV === 'test'
      ? env.NODE_ENV
      : 'development';
  const defaultLevel: LogLevel =
    environment === 'test'
      ? 'silent'
      : environment === 'production'
        ? 'info'
        : 'debug';

  return {
    level: parseLogLevel(env.LOG_LEVEL) ?? defaultLevel,
    environment,
    pretty: env.DISABLE_PRETTY_LOGS !== 'true',
    serviceName: env.AUTH_CLIENT_SERVICE_NAME,
  };
}

function parseLogLevel(value: string | undefined): LogLevel | undefined {
  switch (value) {
    case 'fatal':
    case 'error':
    case 'warn':
    case 'info':
    case 'debug':
    case 'trace':
    case 'silent':
      return value;
    default:
      return undefined;
  }
}

/**
 * Default pino logger instance
 *
 * Configured from NODE_ENV, LOG_LEVEL and DISABLE_PRETTY_LOGS:
 * - Development: pretty-printed output with colors
 * - Production: structured JSON logs with timestamps
 * - Test: silent unless LOG_LEVEL is set
 *
 * @example
 * ```typescript
 * import { logger } from './utils/logger.js';
 *
 * logger.info('Session restored');
 * logger.error({ err: error }, 'Login failed');
 * ```
 */
export const logger: Logger = createLogger(loadLoggingConfig());

/**
 * Creates a child logger with additional context
 *
 * @example
 * ```typescript
 * const clientLogger = createChildLogger({ component: 'auth-client' });
 * clientLogger.info('Logging out'); // Includes component: 'auth-client'
 * ```
 */
export function createChildLogger(context: Record<string, unknown>): Logger {
  return logger.child(context);
}

export type { Logger, LoggerOptions, DestinationStream };
