import type { AccessToken, RefreshToken } from '../../types/token.js';

/**
 * Storage interface for issued tokens
 */
export interface ITokenStorage {
  getAccessToken(token: string): Promise<AccessToken | null>;

  getRefreshToken(token: string): Promise<RefreshToken | null>;

  /**
   * Mark an access token revoked and record its token id as revoked
   * Returns false when the token is unknown or already revoked.
   */
  revokeAccessToken(token: string, revokedAt: Date): Promise<boolean>;

  /**
   * Mark a refresh token revoked
   * Returns false when the token is unknown or already revoked.
   */
  revokeRefreshToken(token: string, revokedAt: Date): Promise<boolean>;

  /**
   * Check the revocation list for a self-contained token's jti
   */
  isTokenIdRevoked(tokenId: string): Promise<boolean>;
}
