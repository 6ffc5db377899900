import type { OAuthClient, RegisterClientInput } from '../../types/client.js';
import type { IClientRegistry } from '../interfaces/client-registry.js';
import { StorageError } from '../../errors/oauth-error.js';
import { generateClientId, generateClientSecret, hashClientSecret } from '../../crypto/index.js';

/**
 * In-memory OAuth client registry
 */
export class MemoryClientStorage implements IClientRegistry {
  private clients = new Map<string, OAuthClient>();

  /**
   * Register a client
   * Returns the stored client and, for confidential clients, the plaintext
   * secret (the only time it is available).
   */
  async register(input: RegisterClientInput): Promise<{ client: OAuthClient; clientSecret?: string }> {
    const clientId = input.clientId ?? generateClientId();

    if (this.clients.has(clientId)) {
      throw new StorageError(`Client already registered: ${clientId}`);
    }
    if (input.clientType === 'public' && input.clientSecret !== undefined) {
      throw new StorageError('Public clients cannot hold a secret');
    }

    let clientSecret: string | undefined;
    let clientSecretHash: string | null = null;

    if (input.clientType === 'confidential') {
      clientSecret = input.clientSecret ?? generateClientSecret();
      clientSecretHash = await hashClientSecret(clientSecret);
    }

    const now = new Date();
    const client: OAuthClient = {
      clientId,
      clientSecretHash,
      clientType: input.clientType,
      name: input.name,
      redirectUris: input.redirectUris ?? [],
      redirectUriPolicy: input.redirectUriPolicy ?? 'exact',
      allowedGrants: input.allowedGrants,
      defaultScopes: [...new Set(input.defaultScopes ?? [])],
      allowedScopes: input.allowedScopes,
      disabled: input.disabled ?? false,
      createdAt: now,
      updatedAt: now,
    };

    this.clients.set(clientId, client);

    return { client: structuredClone(client), clientSecret };
  }

  async getClient(clientId: string): Promise<OAuthClient | null> {
    const client = this.clients.get(clientId);
    return client ? structuredClone(client) : null;
  }

  /**
   * Enable or disable a client
   */
  async setDisabled(clientId: string, disabled: boolean): Promise<OAuthClient> {
    const client = this.clients.get(clientId);
    if (!client) {
      throw new StorageError(`Client not found: ${clientId}`);
    }

    const updated: OAuthClient = { ...client, disabled, updatedAt: new Date() };
    this.clients.set(clientId, updated);

    return structuredClone(updated);
  }

  async delete(clientId: string): Promise<void> {
    this.clients.delete(clientId);
  }
}
