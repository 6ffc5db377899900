import type { PasswordTokenRequest } from '../../types/oauth.js';
import type { OAuthClient } from '../../types/client.js';
import type { GrantContext, GrantOutcome } from '../types.js';
import { OAuthError } from '../../errors/oauth-error.js';
import { GRANT_TYPE_PASSWORD } from '../../config/constants.js';

/**
 * Validate a resource owner password credentials request
 * RFC 6749 Section 4.3
 */
export async function validatePasswordGrant(
  request: PasswordTokenRequest,
  client: OAuthClient,
  ctx: GrantContext
): Promise<GrantOutcome> {
  if (!ctx.passwordVerifier) {
    throw OAuthError.serverError('Password grant has no credential verifier');
  }

  const subject = await ctx.passwordVerifier.verify(request.username, request.password);
  if (subject === null) {
    throw OAuthError.invalidGrant('Invalid resource owner credentials');
  }

  return {
    grantType: GRANT_TYPE_PASSWORD,
    subject,
    scopePlan: {
      requested: ctx.scopes.parseScopes(request.scope),
      allowed: ctx.scopes.allowedFor(client),
      fallback: ctx.scopes.defaultFor(client),
    },
    persistence: { kind: 'none' },
  };
}
