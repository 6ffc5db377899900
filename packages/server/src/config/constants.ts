/**
 * OAuth 2.0 Constants
 */

// Grant types
export const GRANT_TYPE_AUTHORIZATION_CODE = 'authorization_code' as const;
export const GRANT_TYPE_CLIENT_CREDENTIALS = 'client_credentials' as const;
export const GRANT_TYPE_REFRESH_TOKEN = 'refresh_token' as const;
export const GRANT_TYPE_PASSWORD = 'password' as const;
export const GRANT_TYPE_IMPLICIT = 'implicit' as const;

// All grant types the engine knows about
export const SUPPORTED_GRANT_TYPES = [
  GRANT_TYPE_AUTHORIZATION_CODE,
  GRANT_TYPE_CLIENT_CREDENTIALS,
  GRANT_TYPE_REFRESH_TOKEN,
  GRANT_TYPE_PASSWORD,
  GRANT_TYPE_IMPLICIT,
] as const;

// Grant types accepted as grant_type at the token endpoint
export const TOKEN_ENDPOINT_GRANT_TYPES = [
  GRANT_TYPE_AUTHORIZATION_CODE,
  GRANT_TYPE_CLIENT_CREDENTIALS,
  GRANT_TYPE_REFRESH_TOKEN,
  GRANT_TYPE_PASSWORD,
] as const;

// Password and implicit are deprecated by RFC 9700 and stay off unless enabled
export const DEFAULT_ENABLED_GRANT_TYPES = [
  GRANT_TYPE_AUTHORIZATION_CODE,
  GRANT_TYPE_CLIENT_CREDENTIALS,
  GRANT_TYPE_REFRESH_TOKEN,
] as const;

// Response types (OpenID Connect adds the id_token variants)
export const RESPONSE_TYPE_CODE = 'code' as const;
export const RESPONSE_TYPE_TOKEN = 'token' as const;
export const RESPONSE_TYPE_ID_TOKEN = 'id_token' as const;
export const RESPONSE_TYPE_ID_TOKEN_TOKEN = 'id_token token' as const;

// Scope that turns an authorization request into an OpenID Connect one
export const SCOPE_OPENID = 'openid';

// Code challenge methods (RFC 7636)
export const CODE_CHALLENGE_METHOD_PLAIN = 'plain' as const;
export const CODE_CHALLENGE_METHOD_S256 = 'S256' as const;
export const SUPPORTED_CODE_CHALLENGE_METHODS = [
  CODE_CHALLENGE_METHOD_PLAIN,
  CODE_CHALLENGE_METHOD_S256,
] as const;

// Token types
export const TOKEN_TYPE_BEARER = 'Bearer' as const;
export const TOKEN_TYPE_HINT_ACCESS = 'access_token' as const;
export const TOKEN_TYPE_HINT_REFRESH = 'refresh_token' as const;

// Signing algorithms for self-contained access tokens
export const SUPPORTED_SIGNING_ALGORITHMS = [
  'RS256',
  'RS384',
  'RS512',
  'ES256',
  'ES384',
  'ES512',
] as const;

// Default TTLs (in seconds)
export const DEFAULT_ACCESS_TOKEN_TTL = 3600; // 1 hour
export const DEFAULT_REFRESH_TOKEN_TTL = 2592000; // 30 days
export const DEFAULT_AUTHORIZATION_CODE_TTL = 600; // 10 minutes
export const DEFAULT_ID_TOKEN_TTL = 3600; // 1 hour

// Token/code lengths
export const ACCESS_TOKEN_LENGTH = 32; // bytes
export const AUTHORIZATION_CODE_LENGTH = 32; // bytes
export const REFRESH_TOKEN_LENGTH = 32; // bytes
export const TOKEN_ID_LENGTH = 16; // bytes
export const CLIENT_ID_LENGTH = 16; // bytes
export const CLIENT_SECRET_LENGTH = 32; // bytes

// HTTP headers
export const HEADER_AUTHORIZATION = 'Authorization';
export const HEADER_WWW_AUTHENTICATE = 'WWW-Authenticate';
export const HEADER_CACHE_CONTROL = 'Cache-Control';
export const HEADER_PRAGMA = 'Pragma';

// Content types
export const CONTENT_TYPE_FORM = 'application/x-www-form-urlencoded';

// Cache control for token responses
export const TOKEN_CACHE_CONTROL = 'no-store';
export const TOKEN_PRAGMA = 'no-cache';
