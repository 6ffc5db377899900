import type { ClientCredentialsTokenRequest } from '../../types/oauth.js';
import type { OAuthClient } from '../../types/client.js';
import type { GrantContext, GrantOutcome } from '../types.js';
import { OAuthError } from '../../errors/oauth-error.js';
import { GRANT_TYPE_CLIENT_CREDENTIALS } from '../../config/constants.js';

/**
 * Validate a client credentials request
 * RFC 6749 Section 4.4
 *
 * The client acts on its own behalf: there is no subject, the scope is
 * capped by the client's default scope, and no refresh token is issued.
 */
export async function validateClientCredentialsGrant(
  request: ClientCredentialsTokenRequest,
  client: OAuthClient,
  ctx: GrantContext
): Promise<GrantOutcome> {
  // Client credentials grant requires a confidential client
  if (client.clientType !== 'confidential') {
    throw OAuthError.unauthorizedClient(
      'Client credentials grant requires a confidential client'
    );
  }

  const defaults = ctx.scopes.defaultFor(client);

  return {
    grantType: GRANT_TYPE_CLIENT_CREDENTIALS,
    subject: null,
    scopePlan: {
      requested: ctx.scopes.parseScopes(request.scope),
      allowed: defaults,
      fallback: defaults,
    },
    persistence: { kind: 'none' },
  };
}
