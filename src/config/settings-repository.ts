/**
 * Settings sources consumed by concrete authentication variants
 */

import dotenv from 'dotenv';
import createDebug from 'debug';

const debug = createDebug('auth-session:settings');

/**
 * Read-only key/value configuration source. Shared freely between clients.
 */
export interface SettingsRepository {
  get(key: string): string | undefined;
}

/**
 * Settings held in memory, typically for tests and embedded callers
 */
export class InMemorySettingsRepository implements SettingsRepository {
  private readonly values: ReadonlyMap<string, string>;

  constructor(values: Readonly<Record<string, string | undefined>> = {}) {
    const entries: Array<[string, string]> = [];
    for (const [key, value] of Object.entries(values)) {
      if (value !== undefined) {
        entries.push([key, value]);
      }
    }
    this.values = new Map(entries);
  }

  get(key: string): string | undefined {
    return this.values.get(key);
  }
}

export interface EnvironmentSettingsOptions {
  /**
   * Load a .env file into process.env first. Ignored in production and when
   * an explicit `env` is supplied.
   */
  loadDotEnv?: boolean;
  /** Path of the .env file, defaults to dotenv's lookup */
  dotEnvPath?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Settings read from environment variables
 */
export class EnvironmentSettingsRepository implements SettingsRepository {
  private readonly env: NodeJS.ProcessEnv;

  constructor(options: EnvironmentSettingsOptions = {}) {
    this.env = options.env ?? process.env;

    // dotenv only ever populates process.env
    if (
      options.loadDotEnv &&
      options.env === undefined &&
      process.env.NODE_ENV !== 'production'
    ) {
      const result = dotenv.config({ path: options.dotEnvPath });
      if (result.error) {
        // .env is optional
        debug('⚠ .env file not loaded: %s', result.error.message);
      } else {
        debug('✓ .env file loaded');
      }
    }
  }

  get(key: string): string | undefined {
    const value = this.env[key];
    return value === '' ? undefined : value;
  }
}
