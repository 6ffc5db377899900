import type { AuthorizationGrant } from '../../types/token.js';

/**
 * Storage interface for authorization grants (codes)
 */
export interface IAuthorizationGrantStorage {
  /**
   * Persist a freshly issued grant
   */
  saveGrant(grant: AuthorizationGrant): Promise<void>;

  /**
   * Find a grant by its code, consumed or not
   */
  getGrant(code: string): Promise<AuthorizationGrant | null>;
}
