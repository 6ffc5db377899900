import type { OAuthClient, AuthenticatedClient, ClientAuthMethod } from '../types/client.js';
import type { RequestParams } from '../types/oauth.js';
import type { IClientRegistry } from '../storage/interfaces/index.js';
import { OAuthError } from '../errors/oauth-error.js';
import { verifyAgainstDummySecret, verifyClientSecret } from '../crypto/hash.js';

const AUTHENTICATION_FAILED = 'Client authentication failed';

/**
 * Extract client credentials from a Basic Authorization header
 * RFC 6749 Section 2.3.1: both parts are form-urlencoded before encoding.
 *
 * Returns undefined for other schemes and null for malformed Basic credentials.
 */
export function extractBasicAuth(
  authHeader: string
): { clientId: string; clientSecret: string } | null | undefined {
  const [scheme, credentials, ...rest] = authHeader.trim().split(/\s+/);

  if (!scheme || scheme.toLowerCase() !== 'basic') {
    return undefined;
  }
  if (!credentials || rest.length > 0) {
    return null;
  }

  const decoded = Buffer.from(credentials, 'base64').toString('utf-8');
  const colonIndex = decoded.indexOf(':');
  if (colonIndex === -1) {
    return null;
  }

  try {
    return {
      clientId: decodeURIComponent(decoded.slice(0, colonIndex).replace(/\+/g, ' ')),
      clientSecret: decodeURIComponent(decoded.slice(colonIndex + 1).replace(/\+/g, ' ')),
    };
  } catch (error) {
    if (error instanceof URIError) {
      return null;
    }
    throw error;
  }
}

/**
 * Authenticates OAuth clients at the token, revocation and introspection endpoints
 *
 * Supports:
 * - client_secret_basic: HTTP Basic authentication
 * - client_secret_post: Credentials in the form body
 * - none: Public clients identified by client_id alone
 */
export class ClientAuthenticator {
  constructor(private readonly clients: IClientRegistry) {}

  /**
   * Look up a client, treating disabled clients as unknown
   */
  async findActiveClient(clientId: string): Promise<OAuthClient | null> {
    const client = await this.clients.getClient(clientId);
    if (!client || client.disabled) {
      return null;
    }
    return client;
  }

  async authenticate(params: RequestParams, authorization?: string): Promise<AuthenticatedClient> {
    const bodySecret = params['client_secret'] ? params['client_secret'] : undefined;
    const bodyClientId = params['client_id'] ? params['client_id'] : undefined;

    // Try Basic authentication first
    const basic = authorization ? extractBasicAuth(authorization) : undefined;
    if (basic === null) {
      throw OAuthError.invalidClient('Malformed Basic credentials');
    }

    if (basic) {
      if (bodySecret !== undefined) {
        throw OAuthError.invalidRequest('Multiple client authentication methods used');
      }
      if (bodyClientId !== undefined && bodyClientId !== basic.clientId) {
        throw OAuthError.invalidClient('client_id does not match the authenticated client');
      }
      return this.verifySecret(basic.clientId, basic.clientSecret, 'client_secret_basic');
    }

    if (!bodyClientId) {
      throw OAuthError.invalidClient('Client authentication required');
    }

    if (bodySecret !== undefined) {
      return this.verifySecret(bodyClientId, bodySecret, 'client_secret_post');
    }

    // Public client (none)
    const client = await this.findActiveClient(bodyClientId);
    if (!client || client.clientType !== 'public') {
      throw OAuthError.invalidClient(AUTHENTICATION_FAILED);
    }

    return { client, authMethod: 'none' };
  }

  private async verifySecret(
    clientId: string,
    clientSecret: string,
    authMethod: ClientAuthMethod
  ): Promise<AuthenticatedClient> {
    const client = await this.findActiveClient(clientId);

    if (!client) {
      await verifyAgainstDummySecret(clientSecret);
      throw OAuthError.invalidClient(AUTHENTICATION_FAILED);
    }

    if (!client.clientSecretHash) {
      throw OAuthError.invalidClient('Public clients must not present a secret');
    }

    const isValid = await verifyClientSecret(clientSecret, client.clientSecretHash);
    if (!isValid) {
      throw OAuthError.invalidClient(AUTHENTICATION_FAILED);
    }

    return { client, authMethod };
  }
}
