import type { UserCredentials } from './user-credentials.js';

/**
 * Holds the credentials of one client. Values are replaced wholesale.
 */
export class CredentialStore {
  private value: UserCredentials | null = null;

  get current(): UserCredentials | null {
    return this.value;
  }

  replace(credentials: UserCredentials): void {
    this.value = credentials;
  }

  clear(): void {
    this.value = null;
  }
}
