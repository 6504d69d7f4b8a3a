/**
 * Authentication client
 *
 * Orchestrates the connection status around login, logout, save and load,
 * delegating the provider-specific work to an AuthenticationStrategy. The
 * status only ever changes through `setStatus`, which variants reach via the
 * AuthenticationContext handed to their hooks.
 */

import { Readable } from 'stream';
import type { Logger } from 'pino';
import type { SettingsRepository } from '@/config/settings-repository.js';
import { InMemorySettingsRepository } from '@/config/settings-repository.js';
import { createChildLogger } from '@/utils/logger.js';
import { logError } from '@/utils/error-handler.js';
import { InvalidOperationError, assertPresent } from './auth-errors.js';
import { ConnectionStatus } from './connection-status.js';
import { CredentialStore } from './credential-store.js';
import { StatusBroadcaster, type StatusFeed } from './status-broadcaster.js';
import { UserCredentials } from './user-credentials.js';
import { AnonymousAuthenticationStrategy } from './strategies/anonymous-strategy.js';
import type {
  AuthenticationClientOptions,
  AuthenticationContext,
  AuthenticationStrategy,
} from './types.js';

export class AuthenticationClient {
  private readonly strategy: AuthenticationStrategy;
  private readonly logger: Logger;
  private readonly settings: SettingsRepository;
  private readonly credentialStore = new CredentialStore();
  private readonly status: StatusBroadcaster<ConnectionStatus>;
  private readonly context: AuthenticationContext;
  private disposed = false;

  constructor(
    strategy: AuthenticationStrategy,
    options: AuthenticationClientOptions
  ) {
    assertPresent(strategy, 'strategy');
    assertPresent(options, 'options');
    assertPresent(options.logger, 'logger');
    assertPresent(options.settings, 'settings');

    this.strategy = strategy;
    this.logger = options.logger;
    this.settings = options.settings;
    this.status = new StatusBroadcaster<ConnectionStatus>(
      ConnectionStatus.Disconnected,
      {
        onListenerError: (error, status) => {
          this.logger.warn(
            { err: error, status },
            'Connection status subscriber threw'
          );
        },
      }
    );

    const client = this;
    this.context = {
      get logger() {
        return client.logger;
      },
      get settings() {
        return client.settings;
      },
      get credentials() {
        return client.credentialStore.current;
      },
      get status() {
        return client.status.current;
      },
      setStatus: status => this.setStatus(status),
    };
  }

  /**
   * The default client when no identity is configured
   */
  static anonymous(
    options: Partial<AuthenticationClientOptions> = {}
  ): AuthenticationClient {
    return new AuthenticationClient(new AnonymousAuthenticationStrategy(), {
      logger: options.logger ?? createChildLogger({ component: 'auth-client' }),
      settings: options.settings ?? new InMemorySettingsRepository(),
    });
  }

  get authenticationMethod(): string {
    return this.strategy.authenticationMethod;
  }

  get clientType(): string {
    return this.strategy.clientType;
  }

  get username(): string | null {
    return this.strategy.username;
  }

  get accessToken(): string | null {
    return this.strategy.accessToken;
  }

  get credentials(): UserCredentials | null {
    return this.credentialStore.current;
  }

  get isConnected(): boolean {
    return this.status.current === ConnectionStatus.Connected;
  }

  get currentStatus(): ConnectionStatus {
    return this.status.current;
  }

  get statusStream(): StatusFeed<ConnectionStatus> {
    return this.status;
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  setCredentials(credentials: UserCredentials): void {
    assertPresent(credentials, 'credentials');
    this.ensureNotDisposed();

    this.credentialStore.replace(credentials);
    this.strategy.onSetCredentials?.(credentials, this.context);
  }

  async beginLogin(): Promise<void> {
    this.ensureNotDisposed();
    this.logger.info(
      `Beginning login process for client type ${this.clientType} for user ${this.username ?? '[Anonymous]'}...`
    );
    this.setStatus(ConnectionStatus.Connecting);

    try {
      await this.strategy.onBeginLogin(this.context);
    } catch (error) {
      logError(this.logger, error, { operation: 'login', clientType: this.clientType });
      if (!this.disposed && this.status.current === ConnectionStatus.Connecting) {
        this.logger.warn(
          `Client type ${this.clientType} left login without a final status`
        );
        this.setStatus(ConnectionStatus.Failed);
      }
      throw error;
    }
  }

  async logout(): Promise<void> {
    this.ensureNotDisposed();
    this.logger.info(`Logging out client type ${this.clientType}...`);

    try {
      await this.strategy.onLogout?.(this.context);
    } catch (error) {
      logError(this.logger, error, { operation: 'logout', clientType: this.clientType });
      throw error;
    } finally {
      if (!this.disposed) {
        this.setStatus(ConnectionStatus.Disconnected);
      }
    }
  }

  async save(): Promise<Readable> {
    this.ensureNotDisposed();
    this.logger.info(`Saving security state for client type ${this.clientType}...`);

    if (this.strategy.onSave) {
      return this.strategy.onSave(this.context);
    }
    return Readable.from([]);
  }

  /**
   * Rebuilds credentials from state written by `save`. Throws
   * InvalidArgumentError synchronously when `stream` is absent.
   */
  load(stream: Readable): Promise<UserCredentials> {
    assertPresent(stream, 'stream');
    this.ensureNotDisposed();
    this.logger.info(`Restoring security state for client type ${this.clientType}...`);

    if (this.strategy.onLoad) {
      return this.strategy.onLoad(stream, this.context);
    }
    return Promise.resolve(UserCredentials.empty());
  }

  /**
   * Completes the status stream for all subscribers. Safe to call repeatedly.
   */
  dispose(): void {
    if (this.disposed) {
      return;
    }
    this.disposed = true;
    this.status.close();
    this.strategy.dispose?.();
  }

  private setStatus(status: ConnectionStatus): void {
    this.ensureNotDisposed();
    this.logger.debug(`Authentication client status changing to: ${status}`);
    this.status.publish(status);
  }

  private ensureNotDisposed(): void {
    if (this.disposed) {
      throw new InvalidOperationError(
        `Authentication client ${this.clientType} has been disposed`
      );
    }
  }
}
