import type { EngineConfig } from '../config/index.js';
import type { GrantType } from '../types/oauth.js';
import type { IOAuthStorage, PasswordVerifier } from '../storage/interfaces/index.js';
import type { ScopePlan, ScopeService } from '../services/scope-service.js';

/**
 * Collaborators a grant may consult while validating
 */
export interface GrantDependencies {
  config: EngineConfig;
  storage: IOAuthStorage;
  scopes: ScopeService;
  passwordVerifier?: PasswordVerifier;
}

/**
 * Per-request view: dependencies plus the instant the request is judged at
 */
export interface GrantContext extends GrantDependencies {
  now: Date;
}

/**
 * Writes the issuance transaction performs before saving new tokens
 */
export type Persistence =
  | { kind: 'none' }
  | { kind: 'consume-grant'; code: string }
  | { kind: 'rotate-refresh'; refreshToken: string; previousAccessToken: string | null }
  | { kind: 'relink-refresh'; refreshToken: string; previousAccessToken: string | null };

/**
 * Login details of the resource owner behind a grant
 */
export interface GrantIdentity {
  nonce?: string;
  authTime?: Date;
}

/**
 * Result of a successful grant validation
 */
export interface GrantOutcome {
  grantType: GrantType;
  subject: string | null;
  scopePlan: ScopePlan;
  persistence: Persistence;
  /** Scopes a new refresh token carries; defaults to the granted scopes */
  refreshScopes?: string[];
  /** Resource-owner login details; present for grants that can yield an ID token */
  identity?: GrantIdentity;
}
