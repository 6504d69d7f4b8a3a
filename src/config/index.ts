/**
 * Configuration for reaching the identity provider
 */

import { z } from 'zod';
import createDebug from 'debug';
import { InvalidArgumentError } from '@/auth/auth-errors.js';
import type { SettingsRepository } from './settings-repository.js';

const debug = createDebug('auth-session:config');

/**
 * Setting keys read by `loadIdentityProviderConfig`
 */
export const SettingKeys = {
  baseUrl: 'IDENTITY_BASE_URL',
  clientId: 'OAUTH_CLIENT_ID',
  clientSecret: 'OAUTH_CLIENT_SECRET',
  scopes: 'OAUTH_SCOPES',
  tokenPath: 'OAUTH_TOKEN_PATH',
  userInfoPath: 'OAUTH_USERINFO_PATH',
  revocationPath: 'OAUTH_REVOCATION_PATH',
  timeoutMs: 'IDENTITY_TIMEOUT_MS',
} as const;

type SettingName = keyof typeof SettingKeys;

const SETTING_NAMES: readonly SettingName[] = [
  'baseUrl',
  'clientId',
  'clientSecret',
  'scopes',
  'tokenPath',
  'userInfoPath',
  'revocationPath',
  'timeoutMs',
];

const httpUrl = z
  .string()
  .url()
  .refine(value => /^https?:\/\//.test(value), {
    message: 'must be an http or https URL',
  });

const identityProviderSchema = z.object({
  baseUrl: httpUrl,
  clientId: z.string().min(1),
  clientSecret: z.string().min(1).optional(),
  scopes: z
    .string()
    .default('openid profile')
    .transform(value => value.split(/[\s,]+/).filter(Boolean)),
  tokenPath: z.string().startsWith('/').default('/oauth/token'),
  userInfoPath: z.string().startsWith('/').default('/oauth/userinfo'),
  revocationPath: z.string().startsWith('/').optional(),
  timeoutMs: z.coerce.number().int().positive().default(10000),
});

export type IdentityProviderConfig = z.infer<typeof identityProviderSchema>;

/**
 * Reads and validates identity provider settings
 *
 * @throws {InvalidArgumentError} naming the setting key that failed validation
 */
export function loadIdentityProviderConfig(
  settings: SettingsRepository
): IdentityProviderConfig {
  const raw: Partial<Record<SettingName, string>> = {};
  for (const name of SETTING_NAMES) {
    const value = settings.get(SettingKeys[name]);
    if (value !== undefined) {
      raw[name] = value;
    }
  }

  debug('Identity provider settings:');
  debug(`- ${SettingKeys.baseUrl}: ${raw.baseUrl ?? 'NOT SET'}`);
  debug(`- ${SettingKeys.clientId}: ${raw.clientId ? '***set***' : 'NOT SET'}`);
  debug(`- ${SettingKeys.scopes}: ${raw.scopes ?? '(default)'}`);

  const result = identityProviderSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = SETTING_NAMES.find(name => name === issue?.path[0]);
    const key = field ? SettingKeys[field] : 'settings';
    throw new InvalidArgumentError(
      key,
      `Invalid setting ${key}: ${issue?.message ?? 'validation failed'}`
    );
  }

  if (result.data.scopes.length === 0) {
    throw new InvalidArgumentError(
      SettingKeys.scopes,
      `Invalid setting ${SettingKeys.scopes}: at least one scope is required`
    );
  }

  debug('✓ Identity provider configuration validated');
  return result.data;
}

export {
  EnvironmentSettingsRepository,
  InMemorySettingsRepository,
  type EnvironmentSettingsOptions,
  type SettingsRepository,
} from './settings-repository.js';
