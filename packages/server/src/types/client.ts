import type { ClientType, GrantType, RedirectUriPolicy } from '@grantwork/shared';

export type { ClientType, RedirectUriPolicy };

/**
 * Client Authentication Methods
 * RFC 6749 Section 2.3
 */
export type ClientAuthMethod = 'client_secret_basic' | 'client_secret_post' | 'none';

/**
 * OAuth 2.0 Client
 */
export interface OAuthClient {
  clientId: string; // Public identifier
  clientSecretHash: string | null; // Hashed secret (null for public clients)
  clientType: ClientType;
  name?: string;
  redirectUris: string[];
  redirectUriPolicy: RedirectUriPolicy;
  allowedGrants: GrantType[];
  defaultScopes: string[];
  allowedScopes?: string[]; // Falls back to the engine's available scopes
  disabled?: boolean; // Disabled clients are treated as unknown
  createdAt: Date;
  updatedAt: Date;
}

/**
 * Client registration input (memory registry, seeding)
 */
export interface RegisterClientInput {
  clientId?: string;
  clientSecret?: string; // Generated for confidential clients when omitted
  clientType: ClientType;
  name?: string;
  redirectUris?: string[];
  redirectUriPolicy?: RedirectUriPolicy;
  allowedGrants: GrantType[];
  defaultScopes?: string[];
  allowedScopes?: string[];
  disabled?: boolean;
}

/**
 * Authenticated client info
 */
export interface AuthenticatedClient {
  client: OAuthClient;
  authMethod: ClientAuthMethod;
}
