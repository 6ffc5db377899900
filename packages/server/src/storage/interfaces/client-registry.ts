import type { OAuthClient } from '../../types/client.js';

/**
 * Read access to registered OAuth clients
 */
export interface IClientRegistry {
  /**
   * Find a client by client_id
   * Returns disabled clients as stored; the engine decides how to treat them.
   */
  getClient(clientId: string): Promise<OAuthClient | null>;
}
