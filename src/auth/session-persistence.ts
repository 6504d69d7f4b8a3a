import type { Readable } from 'stream';
import { assertPresent } from './auth-errors.js';
import type { AuthenticationClient } from './authentication-client.js';
import { UserCredentials } from './user-credentials.js';

/**
 * Somewhere to keep a client's saved state between runs
 */
export interface SessionStateStore {
  write(stream: Readable): Promise<void>;
  read(): Promise<Readable | null>;
}

export async function persistSession(
  client: AuthenticationClient,
  store: SessionStateStore
): Promise<void> {
  assertPresent(client, 'client');
  assertPresent(store, 'store');
  await store.write(await client.save());
}

/**
 * Loads saved state into `client`. Non-empty credentials are applied with
 * `setCredentials`; the status is left untouched.
 */
export async function restoreSession(
  client: AuthenticationClient,
  store: SessionStateStore
): Promise<UserCredentials> {
  assertPresent(client, 'client');
  assertPresent(store, 'store');

  const stream = await store.read();
  if (!stream) {
    return UserCredentials.empty();
  }

  const credentials = await client.load(stream);
  if (!credentials.isEmpty) {
    client.setCredentials(credentials);
  }
  return credentials;
}
