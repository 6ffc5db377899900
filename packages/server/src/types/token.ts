import type { CodeChallengeMethod } from '@grantwork/shared';

/**
 * Claims carried by a self-contained (JWT) access token
 * RFC 9068 Section 2.2
 */
export interface AccessTokenClaims {
  iss: string;
  sub?: string; // Absent when no resource owner is involved
  client_id: string;
  scope: string;
  iat: number;
  exp: number;
  jti: string;
}

/**
 * Claims carried by an OpenID Connect ID token
 * OpenID Connect Core 1.0 Section 2
 */
export interface IdTokenClaims {
  iss: string;
  sub: string;
  aud: string;
  exp: number;
  iat: number;
  auth_time?: number;
  nonce?: string;
  at_hash?: string; // Left half of the access token's hash, base64url
}

/**
 * Authorization Code grant (stored)
 */
export interface AuthorizationGrant {
  code: string;
  clientId: string;
  subject: string;
  scopes: string[];
  redirectUri: string;
  codeChallenge?: string;
  codeChallengeMethod?: CodeChallengeMethod;
  state?: string;
  nonce?: string; // Echoed in the ID token
  authTime?: Date;
  expiresAt: Date;
  issuedAt: Date;
  consumedAt?: Date; // Single use tracking
}

/**
 * Access Token (stored)
 */
export interface AccessToken {
  token: string; // Opaque value or compact JWT, stored verbatim
  tokenId: string; // jti for signed tokens
  clientId: string;
  subject: string | null; // null for client_credentials
  scopes: string[];
  issuedAt: Date;
  expiresAt: Date;
  refreshToken?: string; // Parent refresh token
  revokedAt?: Date;
}

/**
 * Refresh Token (stored)
 */
export interface RefreshToken {
  token: string;
  clientId: string;
  subject: string | null;
  scopes: string[]; // Originally authorized scopes, carried across rotations
  accessToken: string | null; // The one live access token this refresh token backs
  issuedAt: Date;
  expiresAt: Date;
  revokedAt?: Date;
}

/**
 * Whether a stored token is still usable at the given instant
 */
export function isTokenLive(token: { expiresAt: Date; revokedAt?: Date }, now: Date): boolean {
  return !token.revokedAt && token.expiresAt.getTime() > now.getTime();
}
