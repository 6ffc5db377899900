import type { OAuthClient } from '../types/client.js';
import type { EngineConfig } from '../config/index.js';
import { OAuthError } from '../errors/oauth-error.js';

/**
 * What a grant may be given
 *
 * `requested` is empty when the request carried no scope; `fallback` is used
 * then. Both are capped by `allowed`.
 */
export interface ScopePlan {
  requested: string[];
  allowed: string[];
  fallback: string[];
}

/**
 * Service for OAuth scope validation and manipulation
 */
export class ScopeService {
  constructor(private readonly config: EngineConfig['scopes']) {}

  /**
   * Parse a space-delimited scope string into a de-duplicated array
   */
  parseScopes(scopeString: string | undefined): string[] {
    if (!scopeString) {
      return [];
    }
    const scopes = scopeString
      .split(' ')
      .map((s) => s.trim())
      .filter((s) => s.length > 0);
    return [...new Set(scopes)];
  }

  /**
   * Convert scope array to space-delimited string
   */
  formatScopes(scopes: string[]): string {
    return scopes.join(' ');
  }

  /**
   * Check if every requested scope is in the allowed set
   */
  isSubset(requested: string[], allowed: string[]): boolean {
    return requested.every((scope) => allowed.includes(scope));
  }

  /**
   * Scopes granted when a client asks for nothing
   */
  defaultFor(client: OAuthClient): string[] {
    return client.defaultScopes.length > 0 ? client.defaultScopes : this.config.defaults;
  }

  /**
   * Ceiling for scopes delegated by a resource owner to this client
   */
  allowedFor(client: OAuthClient): string[] {
    const available = this.config.available;

    if (client.allowedScopes) {
      return available.length > 0
        ? client.allowedScopes.filter((scope) => available.includes(scope))
        : client.allowedScopes;
    }

    return available.length > 0 ? available : this.defaultFor(client);
  }

  /**
   * Turn a plan into the scopes to grant
   */
  resolve(plan: ScopePlan): string[] {
    if (plan.requested.length === 0) {
      return [...new Set(plan.fallback.filter((scope) => plan.allowed.includes(scope)))];
    }

    const invalidScopes = plan.requested.filter((scope) => !plan.allowed.includes(scope));

    if (invalidScopes.length > 0) {
      throw OAuthError.invalidScope(`Invalid or unauthorized scopes: ${invalidScopes.join(', ')}`);
    }

    return [...new Set(plan.requested)];
  }

  /**
   * Scopes a token needs to reach a protected resource (none for unknown resources)
   */
  requiredFor(resource: string): string[] {
    const { resources } = this.config;
    return Object.hasOwn(resources, resource) ? (resources[resource] ?? []) : [];
  }

  /**
   * Check if a token's scopes grant access to a protected resource
   */
  isSatisfied(tokenScopes: string[], resource: string): boolean {
    return this.isSubset(this.requiredFor(resource), tokenScopes);
  }
}
