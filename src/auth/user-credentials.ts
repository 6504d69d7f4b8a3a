/**
 * User credentials value object
 *
 * Instances are frozen; changing credentials means building a new instance
 * and handing it to `AuthenticationClient.setCredentials`.
 */

import { InvalidArgumentError } from './auth-errors.js';

export interface TokenCredentialOptions {
  username?: string | null;
  refreshToken?: string | null;
}

/**
 * Shape written by `toJSON`; the password is always masked
 */
export interface UserCredentialsSummary {
  username: string | null;
  password: '***' | null;
  accessToken: string | null;
  refreshToken: string | null;
}

export class UserCredentials {
  private constructor(
    public readonly username: string | null,
    public readonly password: string | null,
    public readonly accessToken: string | null,
    public readonly refreshToken: string | null
  ) {
    Object.freeze(this);
  }

  /**
   * Credentials carrying nothing. Never performs I/O.
   */
  static empty(): UserCredentials {
    return new UserCredentials(null, null, null, null);
  }

  static fromPassword(username: string, password: string): UserCredentials {
    if (!username) {
      throw new InvalidArgumentError('username');
    }
    if (!password) {
      throw new InvalidArgumentError('password');
    }
    return new UserCredentials(username, password, null, null);
  }

  static fromToken(
    accessToken: string,
    options: TokenCredentialOptions = {}
  ): UserCredentials {
    if (!accessToken) {
      throw new InvalidArgumentError('accessToken');
    }
    return new UserCredentials(
      options.username ?? null,
      null,
      accessToken,
      options.refreshToken ?? null
    );
  }

  get isEmpty(): boolean {
    return (
      this.username === null &&
      this.password === null &&
      this.accessToken === null &&
      this.refreshToken === null
    );
  }

  get hasPassword(): boolean {
    return this.username !== null && this.password !== null;
  }

  get hasAccessToken(): boolean {
    return this.accessToken !== null;
  }

  equals(other: UserCredentials): boolean {
    return (
      this.username === other.username &&
      this.password === other.password &&
      this.accessToken === other.accessToken &&
      this.refreshToken === other.refreshToken
    );
  }

  toJSON(): UserCredentialsSummary {
    return {
      username: this.username,
      password: this.password === null ? null : '***',
      accessToken: this.accessToken,
      refreshToken: this.refreshToken,
    };
  }
}
