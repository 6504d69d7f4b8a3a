/**
 * Builders for the credentialed clients. Settings are read once, here; the
 * resulting client only borrows them.
 */

import type { Logger } from 'pino';
import { loadIdentityProviderConfig } from '@/config/index.js';
import type { SettingsRepository } from '@/config/settings-repository.js';
import type { IdentityTransport } from '@/transport/identity-transport.js';
import { HttpIdentityTransport } from '@/transport/http-identity-transport.js';
import { createChildLogger } from '@/utils/logger.js';
import { assertPresent } from './auth-errors.js';
import { AuthenticationClient } from './authentication-client.js';
import { PasswordAuthenticationStrategy } from './strategies/password-strategy.js';
import { TokenAuthenticationStrategy } from './strategies/token-strategy.js';

export interface CredentialedClientOptions {
  settings: SettingsRepository;
  logger?: Logger;
  /** Replaces the HTTP transport built from settings */
  transport?: IdentityTransport;
}

export interface PasswordClientOptions extends CredentialedClientOptions {
  scopes?: string[];
}

function resolveDependencies(options: CredentialedClientOptions): {
  logger: Logger;
  settings: SettingsRepository;
  transport: IdentityTransport;
} {
  assertPresent(options, 'options');
  assertPresent(options.settings, 'settings');

  const logger = options.logger ?? createChildLogger({ component: 'auth-client' });
  const transport =
    options.transport ??
    new HttpIdentityTransport(loadIdentityProviderConfig(options.settings), {
      logger: logger.child({ component: 'identity-transport' }),
    });

  return { logger, settings: options.settings, transport };
}

export function createPasswordClient(
  options: PasswordClientOptions
): AuthenticationClient {
  const { logger, settings, transport } = resolveDependencies(options);
  return new AuthenticationClient(
    new PasswordAuthenticationStrategy(transport, { scopes: options.scopes }),
    { logger, settings }
  );
}

export function createTokenClient(
  options: CredentialedClientOptions
): AuthenticationClient {
  const { logger, settings, transport } = resolveDependencies(options);
  return new AuthenticationClient(new TokenAuthenticationStrategy(transport), {
    logger,
    settings,
  });
}
