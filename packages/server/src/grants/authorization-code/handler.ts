import type { AuthorizationCodeTokenRequest } from '../../types/oauth.js';
import type { OAuthClient } from '../../types/client.js';
import type { GrantContext, GrantOutcome } from '../types.js';
import { OAuthError } from '../../errors/oauth-error.js';
import { verifyCodeChallenge } from '../../crypto/pkce.js';
import { GRANT_TYPE_AUTHORIZATION_CODE } from '../../config/constants.js';

/**
 * Validate an authorization code exchange
 * RFC 6749 Section 4.1.3, RFC 7636 Section 4.6
 *
 * The code is only read here. It is consumed inside the issuance
 * transaction, so a concurrent exchange of the same code loses there.
 */
export async function validateAuthorizationCodeGrant(
  request: AuthorizationCodeTokenRequest,
  client: OAuthClient,
  ctx: GrantContext
): Promise<GrantOutcome> {
  const grant = await ctx.storage.grants.getGrant(request.code);

  if (
    !grant ||
    grant.consumedAt ||
    grant.expiresAt.getTime() <= ctx.now.getTime() ||
    grant.clientId !== client.clientId
  ) {
    throw OAuthError.invalidGrant('Invalid or expired authorization code');
  }

  // Validate redirect_uri matches (exact match required)
  if (grant.redirectUri !== request.redirect_uri) {
    throw OAuthError.invalidRequest('redirect_uri does not match');
  }

  // Verify PKCE code verifier
  if (grant.codeChallenge) {
    if (!request.code_verifier) {
      throw OAuthError.invalidRequest('Missing code_verifier parameter');
    }
    const method = grant.codeChallengeMethod ?? 'plain';
    if (!verifyCodeChallenge(request.code_verifier, grant.codeChallenge, method)) {
      throw OAuthError.invalidRequest('Invalid code_verifier');
    }
  } else if (request.code_verifier !== undefined) {
    throw OAuthError.invalidRequest('code_verifier supplied for a code issued without a code_challenge');
  }

  return {
    grantType: GRANT_TYPE_AUTHORIZATION_CODE,
    subject: grant.subject,
    scopePlan: { requested: [], allowed: grant.scopes, fallback: grant.scopes },
    persistence: { kind: 'consume-grant', code: grant.code },
    identity: { nonce: grant.nonce, authTime: grant.authTime },
  };
}
