import type { OAuthClient } from '../types/client.js';
import type { IntrospectionResponse, TokenTypeHint } from '../types/oauth.js';
import type { IOAuthStorage, IStorageTransaction } from '../storage/interfaces/index.js';
import type { Logger } from '../logging/logger.js';
import type { ActiveAccessToken, TokenCodec } from './token-codec.js';
import type { ScopeService } from './scope-service.js';
import { isTokenLive } from '../types/token.js';
import { TOKEN_TYPE_BEARER, TOKEN_TYPE_HINT_ACCESS, TOKEN_TYPE_HINT_REFRESH } from '../config/constants.js';

export interface IntrospectionServiceOptions {
  storage: IOAuthStorage;
  codec: TokenCodec;
  scopes: ScopeService;
  logger: Logger;
}

/**
 * What a resource server needs from a token before serving a request
 */
export type AccessRequirement = { resource: string } | { requiredScopes: string[] };

type ActiveIntrospection = Extract<IntrospectionResponse, { active: true }>;

type RevocationOutcome = 'revoked' | 'foreign' | 'unknown';

const toSeconds = (date: Date): number => Math.floor(date.getTime() / 1000);

/**
 * Introspection (RFC 7662), revocation (RFC 7009) and resource-side
 * access checks
 */
export class IntrospectionService {
  constructor(private readonly options: IntrospectionServiceOptions) {}

  /**
   * Describe a token; anything not currently usable is exactly `{active: false}`
   */
  async introspect(token: string, now: Date, hint?: TokenTypeHint): Promise<IntrospectionResponse> {
    const lookups =
      hint === TOKEN_TYPE_HINT_REFRESH
        ? [() => this.introspectRefreshToken(token, now), () => this.introspectAccessToken(token, now)]
        : [() => this.introspectAccessToken(token, now), () => this.introspectRefreshToken(token, now)];

    for (const lookup of lookups) {
      const response = await lookup();
      if (response) {
        return response;
      }
    }

    return { active: false };
  }

  /**
   * Revoke a token and, for a refresh token, the access token it backs
   *
   * Unknown or already revoked tokens, and tokens of other clients, are
   * ignored: the caller sees success either way (RFC 7009 Section 2.2).
   * The lookup and the revocation share one transaction, so the access
   * token revoked alongside a refresh token is the one it backs at commit.
   */
  async revoke(token: string, now: Date, hint?: TokenTypeHint, client?: OAuthClient): Promise<void> {
    const order =
      hint === TOKEN_TYPE_HINT_REFRESH
        ? [TOKEN_TYPE_HINT_REFRESH, TOKEN_TYPE_HINT_ACCESS]
        : [TOKEN_TYPE_HINT_ACCESS, TOKEN_TYPE_HINT_REFRESH];

    const outcome = await this.options.storage.transaction(async (tx): Promise<RevocationOutcome> => {
      for (const type of order) {
        const found =
          type === TOKEN_TYPE_HINT_ACCESS
            ? await this.revokeAccessToken(tx, token, now, client)
            : await this.revokeRefreshToken(tx, token, now, client);
        if (found !== 'unknown') {
          return found;
        }
      }
      return 'unknown';
    });

    const { logger } = this.options;
    if (outcome === 'foreign') {
      logger.warn("Revocation of another client's token ignored", { client_id: client?.clientId });
    } else if (outcome === 'unknown') {
      logger.debug('Revocation of unknown token ignored', { client_id: client?.clientId });
    }
  }

  /**
   * Check a bearer token against a resource's scope requirement
   * Returns the token when it is live and sufficient, null otherwise.
   */
  async verifyAccess(
    token: string,
    requirement: AccessRequirement,
    now: Date
  ): Promise<ActiveAccessToken | null> {
    const active = await this.options.codec.validate(token, now);
    if (!active) {
      return null;
    }

    const { scopes } = this.options;
    const satisfied =
      'resource' in requirement
        ? scopes.isSatisfied(active.scopes, requirement.resource)
        : scopes.isSubset(requirement.requiredScopes, active.scopes);

    return satisfied ? active : null;
  }

  private async introspectAccessToken(token: string, now: Date): Promise<IntrospectionResponse | null> {
    const active = await this.options.codec.validate(token, now);
    if (!active) {
      return null;
    }

    const response: ActiveIntrospection = {
      active: true,
      client_id: active.clientId,
      scope: this.options.scopes.formatScopes(active.scopes),
      token_type: TOKEN_TYPE_BEARER,
      exp: toSeconds(active.expiresAt),
      iat: toSeconds(active.issuedAt),
    };

    if (active.subject !== null) {
      response.sub = active.subject;
    }
    if (active.jti) {
      response.jti = active.jti;
    }

    return response;
  }

  private async introspectRefreshToken(token: string, now: Date): Promise<IntrospectionResponse | null> {
    const record = await this.options.storage.tokens.getRefreshToken(token);
    if (!record || !isTokenLive(record, now)) {
      return null;
    }

    const response: ActiveIntrospection = {
      active: true,
      client_id: record.clientId,
      scope: this.options.scopes.formatScopes(record.scopes),
      token_type: TOKEN_TYPE_BEARER,
      exp: toSeconds(record.expiresAt),
      iat: toSeconds(record.issuedAt),
    };

    if (record.subject !== null) {
      response.sub = record.subject;
    }

    return response;
  }

  private async revokeAccessToken(
    tx: IStorageTransaction,
    token: string,
    now: Date,
    client?: OAuthClient
  ): Promise<RevocationOutcome> {
    const record = await tx.getAccessToken(token);
    if (!record) {
      return 'unknown';
    }
    if (client && record.clientId !== client.clientId) {
      return 'foreign';
    }

    await tx.revokeAccessToken(token, now);
    return 'revoked';
  }

  private async revokeRefreshToken(
    tx: IStorageTransaction,
    token: string,
    now: Date,
    client?: OAuthClient
  ): Promise<RevocationOutcome> {
    const record = await tx.getRefreshToken(token);
    if (!record) {
      return 'unknown';
    }
    if (client && record.clientId !== client.clientId) {
      return 'foreign';
    }

    await tx.revokeRefreshToken(token, now);
    if (record.accessToken) {
      await tx.revokeAccessToken(record.accessToken, now);
    }
    return 'revoked';
  }
}
