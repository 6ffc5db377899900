import type {
  AuthorizationCodeResponse,
  CodeChallengeMethod,
  IdTokenResponse,
  ImplicitTokenResponse,
  OAuthErrorResponse,
  ResponseType,
} from '@grantwork/shared';

export type {
  GrantType,
  ResponseType,
  CodeChallengeMethod,
  TokenType,
  TokenTypeHint,
  TokenResponse,
  AuthorizationCodeResponse,
  ImplicitTokenResponse,
  IdTokenResponse,
  IntrospectionResponse,
  OAuthErrorResponse,
} from '@grantwork/shared';

/**
 * Form or query parameters as decoded by the web layer
 */
export type RequestParams = Record<string, string | undefined>;

/**
 * Inbound token endpoint request
 * The web layer hands over the decoded form body and the raw Authorization header.
 */
export interface TokenEndpointRequest {
  params: RequestParams;
  authorization?: string;
}

/**
 * Authorization Code Token Request
 * RFC 6749 Section 4.1.3
 */
export interface AuthorizationCodeTokenRequest {
  grant_type: 'authorization_code';
  code: string;
  redirect_uri: string;
  code_verifier?: string;
}

/**
 * Client Credentials Token Request
 * RFC 6749 Section 4.4.2
 */
export interface ClientCredentialsTokenRequest {
  grant_type: 'client_credentials';
  scope?: string;
}

/**
 * Refresh Token Request
 * RFC 6749 Section 6
 */
export interface RefreshTokenRequest {
  grant_type: 'refresh_token';
  refresh_token: string;
  scope?: string;
}

/**
 * Resource Owner Password Credentials Token Request
 * RFC 6749 Section 4.3.2
 */
export interface PasswordTokenRequest {
  grant_type: 'password';
  username: string;
  password: string;
  scope?: string;
}

export type TokenRequest =
  | AuthorizationCodeTokenRequest
  | ClientCredentialsTokenRequest
  | RefreshTokenRequest
  | PasswordTokenRequest;

/**
 * Authorization Request (after the resource owner has been authenticated)
 * RFC 6749 Sections 4.1.1, 4.2.1; RFC 7636 Section 4.3; OpenID Connect Core 3.1.2.1
 */
export interface AuthorizationRequest {
  response_type: ResponseType;
  client_id: string;
  redirect_uri?: string;
  scope?: string;
  state?: string;
  nonce?: string;
  code_challenge?: string;
  code_challenge_method?: CodeChallengeMethod;
}

/**
 * What the host knows about the resource owner's login
 */
export interface AuthorizationSession {
  /** When the resource owner last authenticated (`auth_time` in ID tokens) */
  authTime?: Date;
}

/**
 * Outcome of an engine operation, ready to be serialized by the web layer
 */
export type EngineResponse<T> =
  | { ok: true; status: 200; body: T }
  | { ok: false; status: 400 | 401 | 403 | 500; body: OAuthErrorResponse };

/**
 * Outcome of the authorization step
 *
 * `redirectUri` is null when the error must be shown to the resource owner
 * instead of being sent back to the client (unknown client, bad redirect URI).
 */
export type AuthorizationResult =
  | {
      ok: true;
      redirectUri: string;
      responseMode: 'query';
      params: AuthorizationCodeResponse;
    }
  | {
      ok: true;
      redirectUri: string;
      responseMode: 'fragment';
      params: ImplicitTokenResponse | IdTokenResponse;
    }
  | {
      ok: false;
      redirectUri: string | null;
      responseMode: 'query' | 'fragment';
      status: 400 | 401 | 403 | 500;
      body: OAuthErrorResponse;
    };
