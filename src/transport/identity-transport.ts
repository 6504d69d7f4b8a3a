/**
 * Network collaborator used by credentialed variants
 */

export interface PasswordTokenRequest {
  username: string;
  password: string;
  scopes?: string[];
}

/**
 * Tokens issued by the identity provider
 */
export interface TokenGrant {
  accessToken: string;
  tokenType: string;
  refreshToken?: string;
  expiresIn?: number;
  scope?: string;
}

export interface UserInfo {
  subject: string;
  preferredUsername?: string;
  name?: string;
  email?: string;
}

/**
 * Performs the request/response exchanges with the identity provider.
 * Implementations reject with TransportFailureError.
 */
export interface IdentityTransport {
  readonly supportsRevocation: boolean;
  requestPasswordToken(request: PasswordTokenRequest): Promise<TokenGrant>;
  fetchUserInfo(accessToken: string): Promise<UserInfo>;
  revokeToken(token: string): Promise<void>;
}
