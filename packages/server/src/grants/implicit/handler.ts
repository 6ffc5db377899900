import type { GrantIdentity, GrantOutcome } from '../types.js';
import { GRANT_TYPE_IMPLICIT } from '../../config/constants.js';

/**
 * Outcome for an implicit grant (RFC 6749 Section 4.2)
 *
 * The authorization step has already checked the client and resolved the
 * scope against what the resource owner approved; the access token is
 * minted directly and never comes with a refresh token.
 */
export function createImplicitOutcome(
  subject: string,
  scopes: string[],
  identity?: GrantIdentity
): GrantOutcome {
  return {
    grantType: GRANT_TYPE_IMPLICIT,
    subject,
    scopePlan: { requested: scopes, allowed: scopes, fallback: scopes },
    persistence: { kind: 'none' },
    identity,
  };
}
