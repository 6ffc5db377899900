export * from './client-registry.js';
export * from './authorization-grant-storage.js';
export * from './token-storage.js';

import type { AccessToken, RefreshToken } from '../../types/token.js';
import type { IClientRegistry } from './client-registry.js';
import type { IAuthorizationGrantStorage } from './authorization-grant-storage.js';
import type { ITokenStorage } from './token-storage.js';

/**
 * Writes performed while issuing tokens
 *
 * The compare-and-set operations (`consumeGrant`, `revoke*`, `relinkRefreshToken`)
 * report whether they won; the engine aborts the transaction when one did not.
 * Nothing written here may be observable if the transaction rolls back.
 */
export interface IStorageTransaction {
  getAccessToken(token: string): Promise<AccessToken | null>;

  /**
   * Read a refresh token, including the access token it currently backs
   */
  getRefreshToken(token: string): Promise<RefreshToken | null>;

  /**
   * Mark a grant consumed if it exists and is not consumed yet
   */
  consumeGrant(code: string, consumedAt: Date): Promise<boolean>;

  saveAccessToken(token: AccessToken): Promise<void>;

  saveRefreshToken(token: RefreshToken): Promise<void>;

  revokeAccessToken(token: string, revokedAt: Date): Promise<boolean>;

  revokeRefreshToken(token: string, revokedAt: Date): Promise<boolean>;

  /**
   * Point a live refresh token at a new access token, if it still backs `expected`
   */
  relinkRefreshToken(token: string, expected: string | null, next: string): Promise<boolean>;
}

/**
 * Complete storage interface for the OAuth engine
 */
export interface IOAuthStorage {
  clients: IClientRegistry;
  grants: IAuthorizationGrantStorage;
  tokens: ITokenStorage;

  /**
   * Run `work` atomically: commit when it resolves, roll back when it throws
   *
   * Transactions touching the same tokens must behave as if run one after
   * another. A commit that would save an access token under a refresh token
   * revoked in the meantime fails with `TransactionConflictError`.
   */
  transaction<T>(work: (tx: IStorageTransaction) => Promise<T>): Promise<T>;
}

/**
 * Resource-owner credential check for the password grant
 *
 * Resolves to the subject identifier, or null when the credentials are rejected.
 */
export interface PasswordVerifier {
  verify(username: string, password: string): Promise<string | null>;
}
