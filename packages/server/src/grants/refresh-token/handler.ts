import type { RefreshTokenRequest } from '../../types/oauth.js';
import type { OAuthClient } from '../../types/client.js';
import type { GrantContext, GrantOutcome } from '../types.js';
import { OAuthError } from '../../errors/oauth-error.js';
import { isTokenLive } from '../../types/token.js';
import { GRANT_TYPE_REFRESH_TOKEN } from '../../config/constants.js';

/**
 * Validate a refresh token request
 * RFC 6749 Section 6
 *
 * The requested scope may narrow, never widen, the scope originally
 * authorized; that original scope stays on the refresh token across
 * rotations. Rotation (or relinking when rotation is off) happens inside
 * the issuance transaction as a compare-and-set.
 */
export async function validateRefreshTokenGrant(
  request: RefreshTokenRequest,
  client: OAuthClient,
  ctx: GrantContext
): Promise<GrantOutcome> {
  const record = await ctx.storage.tokens.getRefreshToken(request.refresh_token);

  if (!record || !isTokenLive(record, ctx.now)) {
    throw OAuthError.invalidGrant('Invalid or expired refresh token');
  }

  // Validate client matches
  if (record.clientId !== client.clientId) {
    throw OAuthError.invalidGrant('Refresh token was issued to a different client');
  }

  const link = { refreshToken: record.token, previousAccessToken: record.accessToken };

  return {
    grantType: GRANT_TYPE_REFRESH_TOKEN,
    subject: record.subject,
    scopePlan: {
      requested: ctx.scopes.parseScopes(request.scope),
      allowed: record.scopes,
      fallback: record.scopes,
    },
    persistence: ctx.config.rotateRefreshTokens
      ? { kind: 'rotate-refresh', ...link }
      : { kind: 'relink-refresh', ...link },
    refreshScopes: record.scopes,
  };
}
