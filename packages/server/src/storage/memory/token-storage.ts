import type { AccessToken, RefreshToken } from '../../types/token.js';
import type { ITokenStorage } from '../interfaces/token-storage.js';
import { StorageError, TransactionConflictError } from '../../errors/oauth-error.js';
import type { Undo } from './authorization-grant-storage.js';

/**
 * In-memory access and refresh token storage implementation
 */
export class MemoryTokenStorage implements ITokenStorage {
  private accessTokens = new Map<string, AccessToken>();
  private refreshTokens = new Map<string, RefreshToken>();
  private revokedTokenIds = new Set<string>(); // jti revocation list

  async getAccessToken(token: string): Promise<AccessToken | null> {
    const record = this.accessTokens.get(token);
    return record ? structuredClone(record) : null;
  }

  async getRefreshToken(token: string): Promise<RefreshToken | null> {
    const record = this.refreshTokens.get(token);
    return record ? structuredClone(record) : null;
  }

  async revokeAccessToken(token: string, revokedAt: Date): Promise<boolean> {
    return this.revokeAccess(token, revokedAt) !== null;
  }

  async revokeRefreshToken(token: string, revokedAt: Date): Promise<boolean> {
    return this.revokeRefresh(token, revokedAt) !== null;
  }

  async isTokenIdRevoked(tokenId: string): Promise<boolean> {
    return this.revokedTokenIds.has(tokenId);
  }

  /**
   * Fail if any of the given tokens is already stored
   * Checked before a commit writes anything.
   */
  assertFree(accessTokens: AccessToken[], refreshTokens: RefreshToken[]): void {
    for (const { token } of accessTokens) {
      if (this.accessTokens.has(token)) {
        throw new StorageError('Access token collision');
      }
    }
    for (const { token } of refreshTokens) {
      if (this.refreshTokens.has(token)) {
        throw new StorageError('Refresh token collision');
      }
    }
  }

  /**
   * Fail if an access token would be saved under a revoked refresh token
   * Parents saved by the same commit are live by construction.
   */
  assertParentsLive(accessTokens: AccessToken[], refreshTokens: RefreshToken[]): void {
    for (const { refreshToken } of accessTokens) {
      if (!refreshToken || refreshTokens.some(({ token }) => token === refreshToken)) {
        continue;
      }
      const parent = this.refreshTokens.get(refreshToken);
      if (!parent || parent.revokedAt) {
        throw new TransactionConflictError('Refresh token revoked during issuance');
      }
    }
  }

  putAccessToken(record: AccessToken): void {
    this.accessTokens.set(record.token, structuredClone(record));
  }

  putRefreshToken(record: RefreshToken): void {
    this.refreshTokens.set(record.token, structuredClone(record));
  }

  revokeAccess(token: string, revokedAt: Date): Undo | null {
    const record = this.accessTokens.get(token);
    if (!record || record.revokedAt) {
      return null;
    }

    const alreadyListed = this.revokedTokenIds.has(record.tokenId);
    this.accessTokens.set(token, { ...record, revokedAt });
    this.revokedTokenIds.add(record.tokenId);

    return () => {
      this.accessTokens.set(token, record);
      if (!alreadyListed) {
        this.revokedTokenIds.delete(record.tokenId);
      }
    };
  }

  revokeRefresh(token: string, revokedAt: Date): Undo | null {
    const record = this.refreshTokens.get(token);
    if (!record || record.revokedAt) {
      return null;
    }

    this.refreshTokens.set(token, { ...record, revokedAt });

    return () => {
      this.refreshTokens.set(token, record);
    };
  }

  relink(token: string, expected: string | null, next: string): Undo | null {
    const record = this.refreshTokens.get(token);
    if (!record || record.revokedAt || record.accessToken !== expected) {
      return null;
    }

    this.refreshTokens.set(token, { ...record, accessToken: next });

    return () => {
      this.refreshTokens.set(token, record);
    };
  }

  /**
   * Delete tokens that expired before `now` (cleanup)
   * Revocation list entries go with their access token.
   */
  async deleteExpired(now: Date): Promise<number> {
    let deleted = 0;

    for (const [token, record] of this.accessTokens) {
      if (record.expiresAt.getTime() <= now.getTime()) {
        this.accessTokens.delete(token);
        this.revokedTokenIds.delete(record.tokenId);
        deleted++;
      }
    }

    for (const [token, record] of this.refreshTokens) {
      if (record.expiresAt.getTime() <= now.getTime()) {
        this.refreshTokens.delete(token);
        deleted++;
      }
    }

    return deleted;
  }
}
