import { ConnectionStatus } from '../connection-status.js';
import type { AuthenticationContext, AuthenticationStrategy } from '../types.js';

/**
 * Variant for callers without an identity. Login needs no credentials and
 * connects immediately.
 */
export class AnonymousAuthenticationStrategy implements AuthenticationStrategy {
  readonly authenticationMethod = 'anonymous';
  readonly clientType = 'anonymous';
  readonly username = null;
  readonly accessToken = null;

  async onBeginLogin(context: AuthenticationContext): Promise<void> {
    context.setStatus(ConnectionStatus.Connected);
  }
}
