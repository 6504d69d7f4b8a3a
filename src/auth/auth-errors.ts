/**
 * Authentication client error definitions
 */

/**
 * Error categories raised by the authentication client and its variants
 */
export enum AuthClientErrorCode {
  INVALID_ARGUMENT = 'INVALID_ARGUMENT',
  INVALID_OPERATION = 'INVALID_OPERATION',
  TRANSPORT_FAILURE = 'TRANSPORT_FAILURE',
}

/**
 * Base error class for the authentication client
 */
export class AuthClientError extends Error {
  constructor(
    message: string,
    public readonly code: AuthClientErrorCode
  ) {
    super(message);
    this.name = 'AuthClientError';
  }
}

/**
 * A required argument was absent or malformed
 */
export class InvalidArgumentError extends AuthClientError {
  constructor(
    public readonly argumentName: string,
    message: string = `Argument '${argumentName}' is required`
  ) {
    super(message, AuthClientErrorCode.INVALID_ARGUMENT);
    this.name = 'InvalidArgumentError';
  }
}

/**
 * The operation is not supported in the client's current state
 */
export class InvalidOperationError extends AuthClientError {
  constructor(message: string) {
    super(message, AuthClientErrorCode.INVALID_OPERATION);
    this.name = 'InvalidOperationError';
  }
}

export interface TransportFailureDetails {
  /** HTTP status returned by the identity provider, when one was received */
  statusCode?: number;
  /** OAuth `error` field from the provider's response body */
  providerError?: string;
  cause?: unknown;
}

/**
 * The network exchange with the identity provider failed
 */
export class TransportFailureError extends AuthClientError {
  public readonly statusCode?: number;
  public readonly providerError?: string;

  constructor(message: string, details: TransportFailureDetails = {}) {
    super(message, AuthClientErrorCode.TRANSPORT_FAILURE);
    this.name = 'TransportFailureError';
    this.statusCode = details.statusCode;
    this.providerError = details.providerError;
    if (details.cause !== undefined) {
      this.cause = details.cause;
    }
  }
}

/**
 * Throws InvalidArgumentError when `value` is null or undefined
 */
export function assertPresent<T>(
  value: T | null | undefined,
  argumentName: string
): asserts value is T {
  if (value === null || value === undefined) {
    throw new InvalidArgumentError(argumentName);
  }
}

/**
 * Check if error was raised by the authentication client
 */
export function isAuthClientError(error: unknown): error is AuthClientError {
  return error instanceof AuthClientError;
}
