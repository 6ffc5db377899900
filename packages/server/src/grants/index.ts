import type { OAuthClient } from '../types/client.js';
import type { TokenRequest } from '../types/oauth.js';
import type { GrantContext, GrantOutcome } from './types.js';
import { OAuthError } from '../errors/oauth-error.js';
import { validateAuthorizationCodeGrant } from './authorization-code/handler.js';
import { validateClientCredentialsGrant } from './client-credentials/handler.js';
import { validateRefreshTokenGrant } from './refresh-token/handler.js';
import { validatePasswordGrant } from './password/handler.js';

export type { GrantContext, GrantDependencies, GrantOutcome, Persistence } from './types.js';
export { validateAuthorizationCodeGrant } from './authorization-code/handler.js';
export { validateClientCredentialsGrant } from './client-credentials/handler.js';
export { validateRefreshTokenGrant } from './refresh-token/handler.js';
export { validatePasswordGrant } from './password/handler.js';
export { createImplicitOutcome } from './implicit/handler.js';

/**
 * Run the validation for the request's grant type
 */
export function validateGrant(
  request: TokenRequest,
  client: OAuthClient,
  ctx: GrantContext
): Promise<GrantOutcome> {
  switch (request.grant_type) {
    case 'authorization_code':
      return validateAuthorizationCodeGrant(request, client, ctx);
    case 'client_credentials':
      return validateClientCredentialsGrant(request, client, ctx);
    case 'refresh_token':
      return validateRefreshTokenGrant(request, client, ctx);
    case 'password':
      return validatePasswordGrant(request, client, ctx);
    default: {
      const unreachable: never = request;
      throw OAuthError.serverError(`Unhandled grant: ${JSON.stringify(unreachable)}`);
    }
  }
}
