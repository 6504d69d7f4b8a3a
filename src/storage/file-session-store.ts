/**
 * File-based storage for serialized session state
 *
 * One file per session name under the user's home directory, readable and
 * writable by the owner only. Contents are written as produced by
 * `AuthenticationClient.save`, without encryption.
 */

import { promises as fs } from 'fs';
import { Readable } from 'stream';
import { text } from 'stream/consumers';
import { join } from 'path';
import { homedir } from 'os';
import { createHash } from 'crypto';

export interface FileSessionStoreOptions {
  /** Defaults to ~/.auth-session-client */
  directory?: string;
  /** Distinguishes several stored sessions, defaults to "default" */
  sessionName?: string;
}

function isErrnoException(error: unknown, code: string): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === code
  );
}

export class FileSessionStore {
  readonly directory: string;
  readonly filePath: string;

  constructor(options: FileSessionStoreOptions = {}) {
    this.directory = options.directory ?? join(homedir(), '.auth-session-client');
    const sessionHash = createHash('sha256')
      .update(options.sessionName ?? 'default')
      .digest('hex')
      .substring(0, 8);
    this.filePath = join(this.directory, `session_${sessionHash}.json`);
  }

  async write(stream: Readable): Promise<void> {
    const content = await text(stream);
    try {
      await fs.mkdir(this.directory, { recursive: true, mode: 0o700 });
      await fs.writeFile(this.filePath, content, { encoding: 'utf8', mode: 0o600 });
    } catch (error) {
      throw new Error(
        `Failed to store session state: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error }
      );
    }
  }

  /**
   * @returns the stored state, or null when nothing has been stored
   */
  async read(): Promise<Readable | null> {
    try {
      const content = await fs.readFile(this.filePath);
      return Readable.from([content]);
    } catch (error) {
      if (isErrnoException(error, 'ENOENT')) {
        return null;
      }
      throw new Error(
        `Failed to read session state: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error }
      );
    }
  }

  async clear(): Promise<void> {
    try {
      await fs.unlink(this.filePath);
    } catch (error) {
      if (isErrnoException(error, 'ENOENT')) {
        return;
      }
      throw error;
    }
  }
}
