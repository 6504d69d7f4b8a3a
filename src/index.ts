/**
 * Client-side authentication session manager
 *
 * Tracks the login lifecycle of a client against a remote identity provider,
 * exposes the connection status as a replay-latest feed, and saves/restores
 * credential state across process restarts.
 *
 * @example
 * ```typescript
 * import {
 *   ConnectionStatus,
 *   EnvironmentSettingsRepository,
 *   UserCredentials,
 *   createPasswordClient,
 * } from 'auth-session-client';
 *
 * const client = createPasswordClient({
 *   settings: new EnvironmentSettingsRepository({ loadDotEnv: true }),
 * });
 * client.statusStream.subscribe(status => console.log(status));
 * client.setCredentials(UserCredentials.fromPassword('alice', 'test-secret'));
 * await client.beginLogin();
 * ```
 */

export * from './auth/index.js';

export {
  EnvironmentSettingsRepository,
  InMemorySettingsRepository,
  SettingKeys,
  loadIdentityProviderConfig,
  type EnvironmentSettingsOptions,
  type IdentityProviderConfig,
  type SettingsRepository,
} from './config/index.js';

export { HttpIdentityTransport, type HttpIdentityTransportOptions } from './transport/http-identity-transport.js';
export type {
  IdentityTransport,
  PasswordTokenRequest,
  TokenGrant,
  UserInfo,
} from './transport/identity-transport.js';

export { FileSessionStore, type FileSessionStoreOptions } from './storage/file-session-store.js';

export {
  createChildLogger,
  createLogger,
  loadLoggingConfig,
  logger,
  redactAuthHeader,
  type LogLevel,
  type Logger,
  type LoggingConfig,
} from './utils/logger.js';
export { formatErrorForLogging, logError, type FormattedError } from './utils/error-handler.js';
