/**
 * Shared helpers for unit tests
 */

import { Readable } from 'stream';
import { text } from 'stream/consumers';
import { createLogger, type Logger } from '@/utils/logger.js';
import type { SessionStateStore } from '@/auth/session-persistence.js';
import type { StatusFeed } from '@/auth/status-broadcaster.js';
import type { IdentityTransport } from '@/transport/identity-transport.js';

export interface CapturedLog {
  level: string;
  msg: string;
  [key: string]: unknown;
}

/**
 * Debug-level logger that keeps every record in memory
 */
export function createCapturingLogger(): { logger: Logger; records: CapturedLog[] } {
  const records: CapturedLog[] = [];
  const logger = createLogger(
    { level: 'debug', environment: 'test', pretty: false },
    {
      write(line: string) {
        records.push(JSON.parse(line) as CapturedLog);
      },
    }
  );
  return { logger, records };
}

/**
 * Waits until queued status deliveries have run
 */
export function flushDeliveries(): Promise<void> {
  return new Promise(resolve => setImmediate(resolve));
}

/**
 * Subscribes to a feed and collects every value it delivers
 */
export function collectStatuses<T>(feed: StatusFeed<T>): T[] {
  const seen: T[] = [];
  feed.subscribe(value => {
    seen.push(value);
  });
  return seen;
}

export const createTransportStub = (
  overrides: Partial<IdentityTransport> = {}
): IdentityTransport => ({
  supportsRevocation: false,
  async requestPasswordToken() {
    throw new Error('Unexpected call');
  },
  async fetchUserInfo() {
    throw new Error('Unexpected call');
  },
  async revokeToken() {
    throw new Error('Unexpected call');
  },
  ...overrides,
});

/**
 * Session store keeping the saved document in memory
 */
export class MemorySessionStore implements SessionStateStore {
  content: string | null = null;

  async write(stream: Readable): Promise<void> {
    this.content = await text(stream);
  }

  async read(): Promise<Readable | null> {
    return this.content === null ? null : Readable.from([this.content]);
  }
}

export function streamOf(content: string): Readable {
  return Readable.from([Buffer.from(content, 'utf8')]);
}
