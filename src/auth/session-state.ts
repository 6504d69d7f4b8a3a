/**
 * Serialized session state shared by the token-holding variants
 *
 * UTF-8 JSON document. An empty stream means "nothing saved".
 */

import { Readable } from 'stream';
import { text } from 'stream/consumers';
import { z } from 'zod';
import { InvalidArgumentError, InvalidOperationError } from './auth-errors.js';

export const SESSION_STATE_VERSION = 1;

const sessionStateSchema = z.object({
  version: z.literal(SESSION_STATE_VERSION),
  clientType: z.string().min(1),
  username: z.string().nullable(),
  accessToken: z.string().min(1),
  refreshToken: z.string().nullable(),
  tokenType: z.string().nullable(),
  scope: z.string().nullable(),
});

export type SessionState = z.infer<typeof sessionStateSchema>;

export function emptySessionStream(): Readable {
  return Readable.from([]);
}

export function writeSessionState(state: SessionState): Readable {
  return Readable.from([Buffer.from(JSON.stringify(state), 'utf8')]);
}

/**
 * Reads a session document written for `clientType`
 *
 * @returns the state, or null when the stream is empty
 * @throws {InvalidArgumentError} when the stream is not a session document
 * @throws {InvalidOperationError} when the document belongs to another client type
 */
export async function readSessionState(
  stream: Readable,
  clientType: string
): Promise<SessionState | null> {
  const content = (await text(stream)).trim();
  if (content.length === 0) {
    return null;
  }

  let document: unknown;
  try {
    document = JSON.parse(content);
  } catch (error) {
    throw new InvalidArgumentError(
      'stream',
      `Stream does not contain a valid session state: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  const result = sessionStateSchema.safeParse(document);
  if (!result.success) {
    throw new InvalidArgumentError(
      'stream',
      `Stream does not contain a valid session state: ${result.error.issues[0]?.message ?? 'unknown shape'}`
    );
  }

  if (result.data.clientType !== clientType) {
    throw new InvalidOperationError(
      `Session state was saved by client type ${result.data.clientType}, not ${clientType}`
    );
  }

  return result.data;
}
