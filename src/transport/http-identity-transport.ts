/**
 * OAuth 2.0 identity provider transport over HTTP
 *
 * Password grant (RFC 6749 §4.3), bearer user-info lookup and token
 * revocation (RFC 7009). Endpoints and client identity come from
 * IdentityProviderConfig.
 */

import type { AxiosInstance } from 'axios';
import axios from 'axios';
import { z } from 'zod';
import type { Logger } from 'pino';
import type { IdentityProviderConfig } from '@/config/index.js';
import {
  InvalidOperationError,
  TransportFailureError,
} from '@/auth/auth-errors.js';
import { createChildLogger, redactAuthHeader } from '@/utils/logger.js';
import type {
  IdentityTransport,
  PasswordTokenRequest,
  TokenGrant,
  UserInfo,
} from './identity-transport.js';

const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
  token_type: z.string().min(1),
  refresh_token: z.string().min(1).optional(),
  expires_in: z.coerce.number().optional(),
  scope: z.string().optional(),
});

const userInfoResponseSchema = z.object({
  sub: z.string().min(1),
  preferred_username: z.string().optional(),
  name: z.string().optional(),
  email: z.string().optional(),
});

const oauthErrorSchema = z.object({
  error: z.string(),
  error_description: z.string().optional(),
});

const FORM_HEADERS = {
  'Content-Type': 'application/x-www-form-urlencoded',
};

export interface HttpIdentityTransportOptions {
  logger?: Logger;
  /**
   * Pre-built axios instance; its baseURL must point at the provider. Used
   * as given: no logging interceptors are added, so it may be shared.
   */
  httpClient?: AxiosInstance;
  userAgent?: string;
}

export class HttpIdentityTransport implements IdentityTransport {
  private readonly http: AxiosInstance;
  private readonly logger: Logger;

  constructor(
    private readonly config: IdentityProviderConfig,
    options: HttpIdentityTransportOptions = {}
  ) {
    this.logger =
      options.logger ?? createChildLogger({ component: 'identity-transport' });

    if (options.httpClient) {
      this.http = options.httpClient;
    } else {
      this.http = axios.create({
        baseURL: config.baseUrl,
        timeout: config.timeoutMs,
        headers: {
          Accept: 'application/json',
          'User-Agent': options.userAgent ?? 'auth-session-client/0.1.0',
        },
      });
      this.attachRequestLogging(this.http);
    }
  }

  private attachRequestLogging(http: AxiosInstance): void {
    http.interceptors.request.use(requestConfig => {
      const authorization = requestConfig.headers.get('Authorization');
      this.logger.debug(
        {
          url: requestConfig.url,
          method: requestConfig.method,
          authorization: redactAuthHeader(
            typeof authorization === 'string' ? authorization : undefined
          ),
        },
        'Identity provider request'
      );
      return requestConfig;
    });

    http.interceptors.response.use(response => {
      this.logger.debug(
        { status: response.status, url: response.config.url },
        'Identity provider response'
      );
      return response;
    });
  }

  get supportsRevocation(): boolean {
    return this.config.revocationPath !== undefined;
  }

  async requestPasswordToken(request: PasswordTokenRequest): Promise<TokenGrant> {
    const params = this.clientParams();
    params.set('grant_type', 'password');
    params.set('username', request.username);
    params.set('password', request.password);

    const scope = (request.scopes ?? this.config.scopes).join(' ');
    if (scope) {
      params.set('scope', scope);
    }

    try {
      const response = await this.http.post<unknown>(
        this.config.tokenPath,
        params.toString(),
        { headers: FORM_HEADERS }
      );
      const token = this.parseResponse(
        tokenResponseSchema,
        response.data,
        'Token request'
      );

      return {
        accessToken: token.access_token,
        tokenType: token.token_type,
        refreshToken: token.refresh_token,
        expiresIn: token.expires_in,
        scope: token.scope,
      };
    } catch (error) {
      throw this.toTransportFailure(error, 'Token request');
    }
  }

  async fetchUserInfo(accessToken: string): Promise<UserInfo> {
    try {
      const response = await this.http.get<unknown>(this.config.userInfoPath, {
        headers: { Authorization: `Bearer ${accessToken}` },
      });
      const info = this.parseResponse(
        userInfoResponseSchema,
        response.data,
        'User info request'
      );

      return {
        subject: info.sub,
        preferredUsername: info.preferred_username,
        name: info.name,
        email: info.email,
      };
    } catch (error) {
      throw this.toTransportFailure(error, 'User info request');
    }
  }

  async revokeToken(token: string): Promise<void> {
    const { revocationPath } = this.config;
    if (revocationPath === undefined) {
      throw new InvalidOperationError(
        'Token revocation endpoint is not configured'
      );
    }

    const params = this.clientParams();
    params.set('token', token);
    params.set('token_type_hint', 'access_token');

    try {
      await this.http.post(revocationPath, params.toString(), {
        headers: FORM_HEADERS,
      });
    } catch (error) {
      throw this.toTransportFailure(error, 'Token revocation');
    }
  }

  private clientParams(): URLSearchParams {
    const params = new URLSearchParams({ client_id: this.config.clientId });
    if (this.config.clientSecret) {
      params.set('client_secret', this.config.clientSecret);
    }
    return params;
  }

  private parseResponse<T>(
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    data: unknown,
    operation: string
  ): T {
    const result = schema.safeParse(data);
    if (!result.success) {
      throw new TransportFailureError(
        `${operation} returned an invalid response: ${result.error.issues[0]?.message ?? 'unknown shape'}`,
        { cause: result.error }
      );
    }
    return result.data;
  }

  /**
   * Maps axios failures onto TransportFailureError
   */
  private toTransportFailure(error: unknown, operation: string): TransportFailureError {
    if (error instanceof TransportFailureError) {
      return error;
    }

    if (axios.isAxiosError(error)) {
      if (error.response) {
        const { status, data } = error.response;
        const oauthError = oauthErrorSchema.safeParse(data);
        const providerError = oauthError.success ? oauthError.data.error : undefined;
        const description = oauthError.success
          ? oauthError.data.error_description ?? oauthError.data.error
          : undefined;

        return new TransportFailureError(
          `${operation} failed with HTTP ${status}${description ? `: ${description}` : ''}`,
          { statusCode: status, providerError, cause: error }
        );
      }

      return new TransportFailureError(
        `${operation} failed: unable to reach identity provider (${error.code ?? error.message})`,
        { cause: error }
      );
    }

    return new TransportFailureError(
      `${operation} failed: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error }
    );
  }
}
