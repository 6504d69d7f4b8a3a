/**
 * AuthenticationClient lifecycle against a scripted strategy
 */

import { describe, it, expect, beforeEach } from '@jest/globals';
import { Readable } from 'stream';
import { text } from 'stream/consumers';
import { AuthenticationClient } from '@/auth/authentication-client.js';
import { ConnectionStatus } from '@/auth/connection-status.js';
import { UserCredentials } from '@/auth/user-credentials.js';
import {
  InvalidArgumentError,
  InvalidOperationError,
  TransportFailureError,
} from '@/auth/auth-errors.js';
import type { AuthenticationContext, AuthenticationStrategy } from '@/auth/types.js';
import { InMemorySettingsRepository } from '@/config/settings-repository.js';
import type { Logger } from '@/utils/logger.js';
import {
  collectStatuses,
  createCapturingLogger,
  flushDeliveries,
  streamOf,
  type CapturedLog,
} from './test-utils.js';

class ScriptedStrategy implements AuthenticationStrategy {
  readonly authenticationMethod = 'scripted';
  readonly clientType = 'scripted-client';
  username: string | null = null;
  accessToken: string | null = null;

  loginGate: Promise<void> | null = null;
  loginError: Error | null = null;
  statusOnError: ConnectionStatus | null = null;
  logoutError: Error | null = null;
  credentialsSeen: UserCredentials[] = [];
  disposeCount = 0;

  async onBeginLogin(context: AuthenticationContext): Promise<void> {
    if (this.loginGate) {
      await this.loginGate;
    }
    if (this.loginError) {
      if (this.statusOnError) {
        context.setStatus(this.statusOnError);
      }
      throw this.loginError;
    }
    context.setStatus(ConnectionStatus.Connected);
  }

  async onLogout(): Promise<void> {
    if (this.logoutError) {
      throw this.logoutError;
    }
  }

  onSetCredentials(credentials: UserCredentials): void {
    this.credentialsSeen.push(credentials);
  }

  dispose(): void {
    this.disposeCount += 1;
  }
}

describe('AuthenticationClient', () => {
  let strategy: ScriptedStrategy;
  let records: CapturedLog[];
  let client: AuthenticationClient;

  beforeEach(() => {
    const capture = createCapturingLogger();
    records = capture.records;
    strategy = new ScriptedStrategy();
    client = new AuthenticationClient(strategy, {
      logger: capture.logger,
      settings: new InMemorySettingsRepository(),
    });
  });

  describe('construction', () => {
    it('should start disconnected without credentials', () => {
      expect(client.currentStatus).toBe(ConnectionStatus.Disconnected);
      expect(client.isConnected).toBe(false);
      expect(client.credentials).toBeNull();
      expect(client.authenticationMethod).toBe('scripted');
      expect(client.clientType).toBe('scripted-client');
    });

    it('should require a logger and settings', () => {
      const settings = new InMemorySettingsRepository();
      const withoutLogger = () =>
        new AuthenticationClient(new ScriptedStrategy(), {
          logger: undefined as unknown as Logger,
          settings,
        });
      const withoutSettings = () =>
        new AuthenticationClient(new ScriptedStrategy(), {
          logger: createCapturingLogger().logger,
          settings: undefined as unknown as InMemorySettingsRepository,
        });

      expect(withoutLogger).toThrow(InvalidArgumentError);
      expect(withoutLogger).toThrow("Argument 'logger' is required");
      expect(withoutSettings).toThrow("Argument 'settings' is required");
    });

    it('should read identity from the strategy', () => {
      strategy.username = 'alice';
      strategy.accessToken = 'token-1';

      expect(client.username).toBe('alice');
      expect(client.accessToken).toBe('token-1');
    });
  });

  describe('setCredentials', () => {
    it('should store the credentials and notify the strategy', async () => {
      const statuses = collectStatuses(client.statusStream);
      const credentials = UserCredentials.fromPassword('alice', 'test-secret');

      client.setCredentials(credentials);
      await flushDeliveries();

      expect(client.credentials).toBe(credentials);
      expect(strategy.credentialsSeen).toEqual([credentials]);
      expect(statuses).toEqual([ConnectionStatus.Disconnected]);
    });

    it('should reject missing credentials and keep the previous ones', () => {
      const credentials = UserCredentials.fromPassword('alice', 'test-secret');
      client.setCredentials(credentials);

      expect(() =>
        client.setCredentials(null as unknown as UserCredentials)
      ).toThrow(InvalidArgumentError);
      expect(client.credentials).toBe(credentials);
      expect(strategy.credentialsSeen).toHaveLength(1);
    });
  });

  describe('beginLogin', () => {
    it('should move through Connecting to the status chosen by the strategy', async () => {
      const statuses = collectStatuses(client.statusStream);

      await client.beginLogin();
      await flushDeliveries();

      expect(statuses).toEqual([
        ConnectionStatus.Disconnected,
        ConnectionStatus.Connecting,
        ConnectionStatus.Connected,
      ]);
      expect(client.isConnected).toBe(true);
      expect(records.map(record => record.msg)).toEqual([
        'Beginning login process for client type scripted-client for user [Anonymous]...',
        'Authentication client status changing to: connecting',
        'Authentication client status changing to: connected',
      ]);
    });

    it('should name the user in the login message', async () => {
      strategy.username = 'alice';

      await client.beginLogin();

      expect(records[0]).toMatchObject({
        level: 'info',
        msg: 'Beginning login process for client type scripted-client for user alice...',
      });
    });

    it('should report Connecting while the strategy is still working', async () => {
      let release: () => void = () => undefined;
      strategy.loginGate = new Promise<void>(resolve => {
        release = resolve;
      });

      const pending = client.beginLogin();
      expect(client.currentStatus).toBe(ConnectionStatus.Connecting);

      release();
      await pending;
      expect(client.currentStatus).toBe(ConnectionStatus.Connected);
    });

    it('should keep the terminal status set by a failing strategy', async () => {
      const failure = new TransportFailureError('User info request failed with HTTP 401', {
        statusCode: 401,
      });
      strategy.loginError = failure;
      strategy.statusOnError = ConnectionStatus.Disconnected;

      await expect(client.beginLogin()).rejects.toBe(failure);

      expect(client.currentStatus).toBe(ConnectionStatus.Disconnected);
      expect(records).toContainEqual(
        expect.objectContaining({
          level: 'error',
          msg: '[TRANSPORT_FAILURE] User info request failed with HTTP 401',
          statusCode: 401,
        })
      );
    });

    it('should fail a login the strategy abandoned in Connecting', async () => {
      const statuses = collectStatuses(client.statusStream);
      strategy.loginError = new Error('strategy crashed');

      await expect(client.beginLogin()).rejects.toThrow('strategy crashed');
      await flushDeliveries();

      expect(statuses).toEqual([
        ConnectionStatus.Disconnected,
        ConnectionStatus.Connecting,
        ConnectionStatus.Failed,
      ]);
      expect(records).toContainEqual(
        expect.objectContaining({
          level: 'warn',
          msg: 'Client type scripted-client left login without a final status',
        })
      );
    });
  });

  describe('logout', () => {
    it('should disconnect after a login', async () => {
      await client.beginLogin();

      await client.logout();

      expect(client.currentStatus).toBe(ConnectionStatus.Disconnected);
      expect(records).toContainEqual(
        expect.objectContaining({
          level: 'info',
          msg: 'Logging out client type scripted-client...',
        })
      );
    });

    it('should be accepted without a prior login', async () => {
      await expect(client.logout()).resolves.toBeUndefined();
      expect(client.currentStatus).toBe(ConnectionStatus.Disconnected);
    });

    it('should disconnect even when the strategy fails', async () => {
      await client.beginLogin();
      strategy.logoutError = new Error('revocation failed');

      await expect(client.logout()).rejects.toThrow('revocation failed');
      expect(client.currentStatus).toBe(ConnectionStatus.Disconnected);
    });
  });

  describe('save and load', () => {
    it('should save an empty stream when the strategy keeps no state', async () => {
      const stream = await client.save();

      expect(await text(stream)).toBe('');
      expect(records).toContainEqual(
        expect.objectContaining({
          msg: 'Saving security state for client type scripted-client...',
        })
      );
    });

    it('should load fresh empty credentials when the strategy keeps no state', async () => {
      const first = await client.load(await client.save());
      const second = await client.load(streamOf('anything'));

      expect(first.isEmpty).toBe(true);
      expect(second.isEmpty).toBe(true);
      expect(first).not.toBe(second);
      expect(client.credentials).toBeNull();
    });

    it('should reject a missing stream synchronously', () => {
      expect(() => client.load(null as unknown as Readable)).toThrow(
        "Argument 'stream' is required"
      );
    });
  });

  describe('status subscribers', () => {
    it('should log subscribers that throw and keep notifying the rest', async () => {
      const statuses = collectStatuses(client.statusStream);
      client.statusStream.subscribe(status => {
        if (status === ConnectionStatus.Connecting) {
          throw new Error('subscriber failed');
        }
      });

      await client.beginLogin();
      await flushDeliveries();

      expect(statuses).toEqual([
        ConnectionStatus.Disconnected,
        ConnectionStatus.Connecting,
        ConnectionStatus.Connected,
      ]);
      expect(records).toContainEqual(
        expect.objectContaining({
          level: 'warn',
          msg: 'Connection status subscriber threw',
          status: 'connecting',
        })
      );
    });
  });

  describe('dispose', () => {
    it('should complete subscribers once and release the strategy', async () => {
      let completions = 0;
      client.statusStream.subscribe({
        next: () => undefined,
        complete: () => {
          completions += 1;
        },
      });

      client.dispose();
      client.dispose();
      await flushDeliveries();

      expect(client.isDisposed).toBe(true);
      expect(completions).toBe(1);
      expect(strategy.disposeCount).toBe(1);
    });

    it('should refuse further operations', async () => {
      client.dispose();

      await expect(client.beginLogin()).rejects.toThrow(InvalidOperationError);
      await expect(client.logout()).rejects.toThrow(
        'Authentication client scripted-client has been disposed'
      );
      expect(() =>
        client.setCredentials(UserCredentials.fromPassword('alice', 'test-secret'))
      ).toThrow(InvalidOperationError);
    });
  });
});
