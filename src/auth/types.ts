/**
 * Contracts shared by the authentication client and its variants
 */

import type { Readable } from 'stream';
import type { Logger } from 'pino';
import type { SettingsRepository } from '@/config/settings-repository.js';
import type { ConnectionStatus } from './connection-status.js';
import type { UserCredentials } from './user-credentials.js';

/**
 * What a variant may see and do while one of its hooks runs
 */
export interface AuthenticationContext {
  readonly logger: Logger;
  readonly settings: SettingsRepository;
  /** Credentials last passed to `setCredentials`, or null */
  readonly credentials: UserCredentials | null;
  readonly status: ConnectionStatus;
  /** The client's status-transition primitive */
  setStatus(status: ConnectionStatus): void;
}

/**
 * Capability set implemented by every authentication variant.
 *
 * `onBeginLogin` runs with the status already at Connecting and must move it
 * to Connected, Disconnected or Failed on every path.
 */
export interface AuthenticationStrategy {
  readonly authenticationMethod: string;
  readonly clientType: string;
  readonly username: string | null;
  readonly accessToken: string | null;

  onBeginLogin(context: AuthenticationContext): Promise<void>;
  onLogout?(context: AuthenticationContext): Promise<void>;
  onSave?(context: AuthenticationContext): Promise<Readable>;
  onLoad?(stream: Readable, context: AuthenticationContext): Promise<UserCredentials>;
  onSetCredentials?(credentials: UserCredentials, context: AuthenticationContext): void;
  dispose?(): void;
}

export interface AuthenticationClientOptions {
  logger: Logger;
  settings: SettingsRepository;
}
