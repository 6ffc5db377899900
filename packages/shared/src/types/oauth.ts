/**
 * OAuth 2.0 Grant Types
 * RFC 6749 Sections 4.1 - 4.4, 6
 *
 * `implicit` never appears as a token endpoint `grant_type`; it names the
 * permission a client needs to use `response_type=token`.
 */
export type GrantType =
  | 'authorization_code'
  | 'client_credentials'
  | 'refresh_token'
  | 'password'
  | 'implicit';

/**
 * Response types for the authorization endpoint
 * OpenID Connect Core 1.0 Section 3 adds `id_token` and `id_token token`.
 */
export type ResponseType = 'code' | 'token' | 'id_token' | 'id_token token';

/**
 * PKCE Code Challenge Methods
 * RFC 7636 Section 4.2
 */
export type CodeChallengeMethod = 'plain' | 'S256';

/**
 * Token types
 */
export type TokenType = 'Bearer';

/**
 * Token type hints for revocation and introspection
 * RFC 7009 Section 2.1
 */
export type TokenTypeHint = 'access_token' | 'refresh_token';

/**
 * Token Response
 * RFC 6749 Section 5.1
 */
export interface TokenResponse {
  access_token: string;
  token_type: TokenType;
  expires_in: number;
  refresh_token?: string;
  scope?: string;
  id_token?: string; // When `openid` was granted
}

/**
 * Authorization code response (redirect query parameters)
 * RFC 6749 Section 4.1.2
 */
export interface AuthorizationCodeResponse {
  code: string;
  state?: string;
}

/**
 * Implicit grant response (redirect fragment parameters)
 * RFC 6749 Section 4.2.2
 */
export interface ImplicitTokenResponse {
  access_token: string;
  token_type: TokenType;
  expires_in: number;
  scope?: string;
  id_token?: string;
  state?: string;
}

/**
 * ID token only response (redirect fragment parameters)
 * OpenID Connect Core 1.0 Section 3.2.2.5
 */
export interface IdTokenResponse {
  id_token: string;
  state?: string;
}

/**
 * Token Introspection Response
 * RFC 7662 Section 2.2
 */
export type IntrospectionResponse =
  | { active: false }
  | {
      active: true;
      client_id: string;
      scope: string;
      token_type: TokenType;
      exp: number;
      iat: number;
      sub?: string;
      jti?: string;
    };

/**
 * OAuth 2.0 error codes the engine emits
 * RFC 6749 Sections 4.1.2.1, 5.2
 */
export type OAuthErrorCode =
  | 'invalid_request'
  | 'invalid_client'
  | 'invalid_grant'
  | 'unauthorized_client'
  | 'unsupported_grant_type'
  | 'unsupported_response_type'
  | 'invalid_scope'
  | 'access_denied'
  | 'server_error';

/**
 * OAuth 2.0 Error Response
 * RFC 6749 Section 5.2
 */
export interface OAuthErrorResponse {
  error: OAuthErrorCode;
  error_description?: string;
  state?: string;
}
