/**
 * Username/password variant
 *
 * Exchanges the stored username and password for tokens with the OAuth
 * password grant. A failed exchange ends in ConnectionStatus.Failed.
 */

import type { Readable } from 'stream';
import { InvalidOperationError } from '../auth-errors.js';
import { ConnectionStatus } from '../connection-status.js';
import {
  SESSION_STATE_VERSION,
  emptySessionStream,
  readSessionState,
  writeSessionState,
} from '../session-state.js';
import type { AuthenticationContext, AuthenticationStrategy } from '../types.js';
import { UserCredentials } from '../user-credentials.js';
import type {
  IdentityTransport,
  TokenGrant,
} from '@/transport/identity-transport.js';

export interface PasswordStrategyOptions {
  /** Scopes to request instead of the transport's configured ones */
  scopes?: string[];
}

export class PasswordAuthenticationStrategy implements AuthenticationStrategy {
  readonly authenticationMethod = 'password';
  readonly clientType = 'oauth-password';

  private grant: TokenGrant | null = null;
  private grantUsername: string | null = null;
  private credentialUsername: string | null = null;
  /** Grant read by `onLoad`, adopted once matching credentials are set */
  private pendingRestore: { grant: TokenGrant; username: string | null } | null = null;

  constructor(
    private readonly transport: IdentityTransport,
    private readonly options: PasswordStrategyOptions = {}
  ) {}

  get username(): string | null {
    return this.grantUsername ?? this.credentialUsername;
  }

  get accessToken(): string | null {
    return this.grant?.accessToken ?? null;
  }

  onSetCredentials(credentials: UserCredentials): void {
    this.credentialUsername = credentials.username;

    const pending = this.pendingRestore;
    this.pendingRestore = null;
    if (pending && pending.grant.accessToken === credentials.accessToken) {
      this.grant = pending.grant;
      this.grantUsername = pending.username;
      return;
    }

    // Keep the current grant only when the new credentials carry its token
    if (this.grant && this.grant.accessToken !== credentials.accessToken) {
      this.grant = null;
      this.grantUsername = null;
    }
  }

  async onBeginLogin(context: AuthenticationContext): Promise<void> {
    const username = context.credentials?.username;
    const password = context.credentials?.password;
    if (!username || !password) {
      context.setStatus(ConnectionStatus.Disconnected);
      throw new InvalidOperationError(
        'Password login requires credentials with a username and password'
      );
    }

    let grant: TokenGrant;
    try {
      grant = await this.transport.requestPasswordToken({
        username,
        password,
        scopes: this.options.scopes,
      });
    } catch (error) {
      this.grant = null;
      this.grantUsername = null;
      context.setStatus(ConnectionStatus.Failed);
      throw error;
    }

    this.grant = grant;
    this.grantUsername = username;
    context.logger.debug(
      { tokenType: grant.tokenType, scope: grant.scope, expiresIn: grant.expiresIn },
      'Password grant issued'
    );
    context.setStatus(ConnectionStatus.Connected);
  }

  async onLogout(context: AuthenticationContext): Promise<void> {
    const grant = this.grant;
    this.grant = null;
    this.grantUsername = null;

    if (grant && this.transport.supportsRevocation) {
      context.logger.debug('Revoking access token');
      await this.transport.revokeToken(grant.accessToken);
    }
  }

  async onSave(): Promise<Readable> {
    if (!this.grant) {
      return emptySessionStream();
    }
    return writeSessionState({
      version: SESSION_STATE_VERSION,
      clientType: this.clientType,
      username: this.username,
      accessToken: this.grant.accessToken,
      refreshToken: this.grant.refreshToken ?? null,
      tokenType: this.grant.tokenType,
      scope: this.grant.scope ?? null,
    });
  }

  async onLoad(stream: Readable): Promise<UserCredentials> {
    const state = await readSessionState(stream, this.clientType);
    if (!state) {
      return UserCredentials.empty();
    }

    this.pendingRestore = {
      grant: {
        accessToken: state.accessToken,
        tokenType: state.tokenType ?? 'Bearer',
        refreshToken: state.refreshToken ?? undefined,
        scope: state.scope ?? undefined,
      },
      username: state.username,
    };

    return UserCredentials.fromToken(state.accessToken, {
      username: state.username,
      refreshToken: state.refreshToken,
    });
  }
}
