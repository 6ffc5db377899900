import type { AuthorizationGrant } from '../../types/token.js';
import type { IAuthorizationGrantStorage } from '../interfaces/authorization-grant-storage.js';
import { StorageError } from '../../errors/oauth-error.js';

export type Undo = () => void;

/**
 * In-memory authorization grant storage implementation
 */
export class MemoryAuthorizationGrantStorage implements IAuthorizationGrantStorage {
  private grants = new Map<string, AuthorizationGrant>();

  async saveGrant(grant: AuthorizationGrant): Promise<void> {
    if (this.grants.has(grant.code)) {
      throw new StorageError('Authorization code collision');
    }
    this.grants.set(grant.code, structuredClone(grant));
  }

  async getGrant(code: string): Promise<AuthorizationGrant | null> {
    const grant = this.grants.get(code);
    return grant ? structuredClone(grant) : null;
  }

  /**
   * Mark a grant consumed unless it already is (atomic in single-threaded JS)
   * Returns an undo callback on success, null when the grant was not consumable.
   */
  consume(code: string, consumedAt: Date): Undo | null {
    const grant = this.grants.get(code);
    if (!grant || grant.consumedAt) {
      return null;
    }

    this.grants.set(code, { ...grant, consumedAt });

    return () => {
      this.grants.set(code, grant);
    };
  }

  /**
   * Delete grants that expired before `now` (cleanup)
   */
  async deleteExpired(now: Date): Promise<number> {
    let deleted = 0;

    for (const [code, grant] of this.grants) {
      if (grant.expiresAt.getTime() <= now.getTime()) {
        this.grants.delete(code);
        deleted++;
      }
    }

    return deleted;
  }
}
