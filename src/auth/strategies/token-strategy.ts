/**
 * Pre-issued bearer token variant
 *
 * Login confirms the token against the provider's user-info endpoint. A
 * rejected token ends in ConnectionStatus.Disconnected: nothing was
 * established, and retrying needs a new token rather than a new attempt.
 */

import type { Readable } from 'stream';
import jwt, { type JwtPayload } from 'jsonwebtoken';
import createDebug from 'debug';
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
import type { IdentityTransport, UserInfo } from '@/transport/identity-transport.js';

const debug = createDebug('auth-session:token');

/**
 * Name claimed by a JWT, read without verifying its signature
 */
export function usernameFromToken(token: string): string | null {
  let payload: JwtPayload | string | null;
  try {
    payload = jwt.decode(token);
  } catch (error) {
    // A JWT header over a non-JSON payload; read it as an opaque token
    debug('Token claims not readable: %s', error instanceof Error ? error.message : String(error));
    return null;
  }
  if (!payload || typeof payload === 'string') {
    return null;
  }
  const preferred: unknown = payload.preferred_username;
  if (typeof preferred === 'string' && preferred.length > 0) {
    return preferred;
  }
  return payload.sub ?? null;
}

export class TokenAuthenticationStrategy implements AuthenticationStrategy {
  readonly authenticationMethod = 'token';
  readonly clientType = 'oauth-bearer';

  private token: string | null = null;
  private refreshToken: string | null = null;
  private declaredUsername: string | null = null;
  private userInfo: UserInfo | null = null;

  constructor(private readonly transport: IdentityTransport) {}

  get username(): string | null {
    if (this.userInfo) {
      return this.userInfo.preferredUsername ?? this.userInfo.subject;
    }
    if (this.declaredUsername) {
      return this.declaredUsername;
    }
    return this.token ? usernameFromToken(this.token) : null;
  }

  get accessToken(): string | null {
    return this.token;
  }

  onSetCredentials(credentials: UserCredentials): void {
    this.token = credentials.accessToken;
    this.refreshToken = credentials.refreshToken;
    this.declaredUsername = credentials.username;
    this.userInfo = null;
  }

  async onBeginLogin(context: AuthenticationContext): Promise<void> {
    const token = context.credentials?.accessToken;
    if (!token) {
      context.setStatus(ConnectionStatus.Disconnected);
      throw new InvalidOperationError(
        'Token login requires credentials with an access token'
      );
    }

    try {
      this.userInfo = await this.transport.fetchUserInfo(token);
    } catch (error) {
      this.userInfo = null;
      context.setStatus(ConnectionStatus.Disconnected);
      throw error;
    }

    context.logger.debug({ subject: this.userInfo.subject }, 'Bearer token accepted');
    context.setStatus(ConnectionStatus.Connected);
  }

  async onLogout(): Promise<void> {
    this.userInfo = null;
  }

  async onSave(): Promise<Readable> {
    if (!this.token) {
      return emptySessionStream();
    }
    return writeSessionState({
      version: SESSION_STATE_VERSION,
      clientType: this.clientType,
      username: this.username,
      accessToken: this.token,
      refreshToken: this.refreshToken,
      tokenType: 'Bearer',
      scope: null,
    });
  }

  async onLoad(stream: Readable): Promise<UserCredentials> {
    const state = await readSessionState(stream, this.clientType);
    if (!state) {
      return UserCredentials.empty();
    }

    return UserCredentials.fromToken(state.accessToken, {
      username: state.username,
      refreshToken: state.refreshToken,
    });
  }
}
