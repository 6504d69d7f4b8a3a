/**
 * Authentication module exports
 */

// Client and variants
export { AuthenticationClient } from './authentication-client.js';
export {
  createPasswordClient,
  createTokenClient,
  type CredentialedClientOptions,
  type PasswordClientOptions,
} from './client-factory.js';
export { AnonymousAuthenticationStrategy } from './strategies/anonymous-strategy.js';
export {
  PasswordAuthenticationStrategy,
  type PasswordStrategyOptions,
} from './strategies/password-strategy.js';
export {
  TokenAuthenticationStrategy,
  usernameFromToken,
} from './strategies/token-strategy.js';
export type {
  AuthenticationClientOptions,
  AuthenticationContext,
  AuthenticationStrategy,
} from './types.js';

// Status feed
export { ConnectionStatus } from './connection-status.js';
export {
  StatusBroadcaster,
  type StatusBroadcasterOptions,
  type StatusFeed,
  type StatusListener,
  type StatusObserver,
  type StatusSubscription,
} from './status-broadcaster.js';

// Credentials and persisted state
export {
  UserCredentials,
  type TokenCredentialOptions,
  type UserCredentialsSummary,
} from './user-credentials.js';
export { CredentialStore } from './credential-store.js';
export {
  SESSION_STATE_VERSION,
  readSessionState,
  writeSessionState,
  type SessionState,
} from './session-state.js';
export {
  persistSession,
  restoreSession,
  type SessionStateStore,
} from './session-persistence.js';

// Errors
export {
  AuthClientError,
  AuthClientErrorCode,
  InvalidArgumentError,
  InvalidOperationError,
  TransportFailureError,
  assertPresent,
  isAuthClientError,
  type TransportFailureDetails,
} from './auth-errors.js';
