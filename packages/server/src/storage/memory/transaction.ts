import type { AccessToken, RefreshToken } from '../../types/token.js';
import type { IStorageTransaction } from '../interfaces/index.js';
import type { MemoryAuthorizationGrantStorage, Undo } from './authorization-grant-storage.js';
import type { MemoryTokenStorage } from './token-storage.js';

/**
 * Transaction over the in-memory stores
 *
 * Compare-and-set operations apply immediately, so reads outside any
 * transaction see them, and each records an undo. Saves are buffered and
 * written on commit. The store runs one transaction at a time.
 */
export class MemoryStorageTransaction implements IStorageTransaction {
  private undoLog: Undo[] = [];
  private pendingAccessTokens: AccessToken[] = [];
  private pendingRefreshTokens: RefreshToken[] = [];
  private finished = false;

  constructor(
    private readonly grants: MemoryAuthorizationGrantStorage,
    private readonly tokens: MemoryTokenStorage
  ) {}

  async getAccessToken(token: string): Promise<AccessToken | null> {
    this.assertOpen();
    return this.tokens.getAccessToken(token);
  }

  async getRefreshToken(token: string): Promise<RefreshToken | null> {
    this.assertOpen();
    return this.tokens.getRefreshToken(token);
  }

  async consumeGrant(code: string, consumedAt: Date): Promise<boolean> {
    return this.record(this.grants.consume(code, consumedAt));
  }

  async saveAccessToken(token: AccessToken): Promise<void> {
    this.assertOpen();
    this.pendingAccessTokens.push(structuredClone(token));
  }

  async saveRefreshToken(token: RefreshToken): Promise<void> {
    this.assertOpen();
    this.pendingRefreshTokens.push(structuredClone(token));
  }

  async revokeAccessToken(token: string, revokedAt: Date): Promise<boolean> {
    return this.record(this.tokens.revokeAccess(token, revokedAt));
  }

  async revokeRefreshToken(token: string, revokedAt: Date): Promise<boolean> {
    return this.record(this.tokens.revokeRefresh(token, revokedAt));
  }

  async relinkRefreshToken(token: string, expected: string | null, next: string): Promise<boolean> {
    return this.record(this.tokens.relink(token, expected, next));
  }

  commit(): void {
    this.assertOpen();
    this.tokens.assertFree(this.pendingAccessTokens, this.pendingRefreshTokens);
    this.tokens.assertParentsLive(this.pendingAccessTokens, this.pendingRefreshTokens);

    for (const record of this.pendingAccessTokens) {
      this.tokens.putAccessToken(record);
    }
    for (const record of this.pendingRefreshTokens) {
      this.tokens.putRefreshToken(record);
    }

    this.finished = true;
  }

  rollback(): void {
    if (this.finished) {
      return;
    }

    // Newest first
    for (const undo of this.undoLog.reverse()) {
      undo();
    }

    this.undoLog = [];
    this.pendingAccessTokens = [];
    this.pendingRefreshTokens = [];
    this.finished = true;
  }

  private record(undo: Undo | null): boolean {
    this.assertOpen();
    if (!undo) {
      return false;
    }
    this.undoLog.push(undo);
    return true;
  }

  private assertOpen(): void {
    if (this.finished) {
      throw new Error('Transaction already finished');
    }
  }
}
