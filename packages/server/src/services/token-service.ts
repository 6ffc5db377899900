import type { OAuthClient } from '../types/client.js';
import type { AccessToken, RefreshToken } from '../types/token.js';
import type { TokenEndpointRequest, TokenResponse } from '../types/oauth.js';
import type { IStorageTransaction } from '../storage/interfaces/index.js';
import type { Logger } from '../logging/logger.js';
import type { TokenCodec } from './token-codec.js';
import type { ClientAuthenticator } from './client-authenticator.js';
import type { IdTokenService } from './id-token-service.js';
import {
  validateGrant,
  type GrantDependencies,
  type GrantOutcome,
  type Persistence,
} from '../grants/index.js';
import { OAuthError, TransactionConflictError } from '../errors/oauth-error.js';
import { parseTokenRequest } from '../validation/token-request.js';
import { generateRefreshToken } from '../crypto/random.js';
import {
  GRANT_TYPE_REFRESH_TOKEN,
  SCOPE_OPENID,
  TOKEN_ENDPOINT_GRANT_TYPES,
  TOKEN_TYPE_BEARER,
} from '../config/constants.js';

type TokenEndpointGrantType = (typeof TOKEN_ENDPOINT_GRANT_TYPES)[number];

// Grants whose tokens act for a resource owner and may be refreshed
const REFRESHABLE_GRANTS: ReadonlySet<string> = new Set([
  'authorization_code',
  'password',
  'refresh_token',
]);

function isTokenEndpointGrantType(value: string): value is TokenEndpointGrantType {
  return TOKEN_ENDPOINT_GRANT_TYPES.some((grantType) => grantType === value);
}

export interface TokenServiceOptions extends GrantDependencies {
  codec: TokenCodec;
  clientAuthenticator: ClientAuthenticator;
  /** Null when ID tokens are not configured */
  idTokens: IdTokenService | null;
  logger: Logger;
}

/**
 * Token issuance: client authentication, grant selection and validation,
 * scope resolution, minting, and the transaction that persists the result
 */
export class TokenService {
  constructor(private readonly options: TokenServiceOptions) {}

  /**
   * Handle a token endpoint request
   * RFC 6749 Section 3.2
   */
  async exchange(request: TokenEndpointRequest, now: Date): Promise<TokenResponse> {
    const { client, authMethod } = await this.options.clientAuthenticator.authenticate(
      request.params,
      request.authorization
    );
    this.options.logger.debug('Client authenticated', {
      client_id: client.clientId,
      auth_method: authMethod,
    });

    this.selectGrantType(request.params['grant_type'], client);

    const tokenRequest = parseTokenRequest(request.params);
    const outcome = await validateGrant(tokenRequest, client, { ...this.options, now });

    return this.issue(client, outcome, now);
  }

  /**
   * Mint and persist the tokens for a validated grant
   */
  async issue(client: OAuthClient, outcome: GrantOutcome, now: Date): Promise<TokenResponse> {
    const { config, scopes: scopeService, codec, storage, logger } = this.options;

    const scopes = scopeService.resolve(outcome.scopePlan);

    // Whole seconds, so stored expiries agree with JWT claims
    const issuedAt = new Date(Math.floor(now.getTime() / 1000) * 1000);
    const expiresAt = new Date(issuedAt.getTime() + config.lifetimes.accessToken * 1000);

    const minted = await codec.mint({
      clientId: client.clientId,
      subject: outcome.subject,
      scopes,
      issuedAt,
      expiresAt,
    });

    const persistence = outcome.persistence;
    let refreshToken: RefreshToken | null = null;
    let responseRefreshToken: string | undefined;

    if (persistence.kind === 'relink-refresh') {
      responseRefreshToken = persistence.refreshToken;
    } else if (this.issuesRefreshToken(client, outcome)) {
      refreshToken = {
        token: generateRefreshToken(),
        clientId: client.clientId,
        subject: outcome.subject,
        scopes: outcome.refreshScopes ?? scopes,
        accessToken: minted.token,
        issuedAt,
        expiresAt: new Date(issuedAt.getTime() + config.lifetimes.refreshToken * 1000),
      };
      responseRefreshToken = refreshToken.token;
    }

    const accessToken: AccessToken = {
      token: minted.token,
      tokenId: minted.tokenId,
      clientId: client.clientId,
      subject: outcome.subject,
      scopes,
      issuedAt,
      expiresAt,
      refreshToken: responseRefreshToken,
    };

    const idToken = await this.mintIdToken(client, outcome, scopes, minted.token, issuedAt);

    try {
      await storage.transaction(async (tx) => {
        await this.applyPersistence(tx, persistence, minted.token, now);
        await tx.saveAccessToken(accessToken);
        if (refreshToken) {
          await tx.saveRefreshToken(refreshToken);
        }
      });
    } catch (error) {
      if (error instanceof TransactionConflictError) {
        throw OAuthError.invalidGrant('Invalid or expired refresh token');
      }
      throw error;
    }

    logger.info('Token issued', {
      client_id: client.clientId,
      grant_type: outcome.grantType,
      scope: scopeService.formatScopes(scopes),
      refresh_token_issued: refreshToken !== null,
      id_token_issued: idToken !== null,
    });

    const response: TokenResponse = {
      access_token: minted.token,
      token_type: TOKEN_TYPE_BEARER,
      expires_in: config.lifetimes.accessToken,
    };

    if (responseRefreshToken) {
      response.refresh_token = responseRefreshToken;
    }

    if (scopes.length > 0) {
      response.scope = scopeService.formatScopes(scopes);
    }

    if (idToken) {
      response.id_token = idToken;
    }

    return response;
  }

  /**
   * ID token for grants acting for a resource owner who granted `openid`
   */
  private async mintIdToken(
    client: OAuthClient,
    outcome: GrantOutcome,
    scopes: string[],
    accessToken: string,
    issuedAt: Date
  ): Promise<string | null> {
    const { idTokens } = this.options;
    if (!idTokens || !outcome.identity || outcome.subject === null || !scopes.includes(SCOPE_OPENID)) {
      return null;
    }

    return idTokens.mint({
      clientId: client.clientId,
      subject: outcome.subject,
      issuedAt,
      authTime: outcome.identity.authTime,
      nonce: outcome.identity.nonce,
      accessToken,
    });
  }

  /**
   * Check grant_type is known, enabled, and allowed for the client
   */
  private selectGrantType(value: string | undefined, client: OAuthClient): TokenEndpointGrantType {
    if (!value) {
      throw OAuthError.invalidRequest('Missing grant_type parameter');
    }

    if (!isTokenEndpointGrantType(value) || !this.options.config.enabledGrants.includes(value)) {
      throw OAuthError.unsupportedGrantType(`Unsupported grant_type: ${value}`);
    }

    if (!client.allowedGrants.includes(value)) {
      throw OAuthError.unauthorizedClient(`Client is not authorized for the ${value} grant`);
    }

    return value;
  }

  private issuesRefreshToken(client: OAuthClient, outcome: GrantOutcome): boolean {
    return (
      REFRESHABLE_GRANTS.has(outcome.grantType) &&
      this.options.config.enabledGrants.includes(GRANT_TYPE_REFRESH_TOKEN) &&
      client.allowedGrants.includes(GRANT_TYPE_REFRESH_TOKEN)
    );
  }

  private async applyPersistence(
    tx: IStorageTransaction,
    persistence: Persistence,
    accessToken: string,
    now: Date
  ): Promise<void> {
    switch (persistence.kind) {
      case 'none':
        return;

      case 'consume-grant':
        if (!(await tx.consumeGrant(persistence.code, now))) {
          throw OAuthError.invalidGrant('Invalid or expired authorization code');
        }
        return;

      case 'rotate-refresh':
        if (!(await tx.revokeRefreshToken(persistence.refreshToken, now))) {
          throw OAuthError.invalidGrant('Invalid or expired refresh token');
        }
        if (persistence.previousAccessToken) {
          await tx.revokeAccessToken(persistence.previousAccessToken, now);
        }
        return;

      case 'relink-refresh':
        if (
          !(await tx.relinkRefreshToken(
            persistence.refreshToken,
            persistence.previousAccessToken,
            accessToken
          ))
        ) {
          throw OAuthError.invalidGrant('Invalid or expired refresh token');
        }
        if (persistence.previousAccessToken) {
          await tx.revokeAccessToken(persistence.previousAccessToken, now);
        }
        return;

      default: {
        const unreachable: never = persistence;
        throw OAuthError.serverError(`Unhandled persistence: ${JSON.stringify(unreachable)}`);
      }
    }
  }
}
