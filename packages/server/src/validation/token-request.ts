import { z } from 'zod';
import type { RequestParams, TokenRequest, TokenTypeHint } from '../types/oauth.js';
import { OAuthError } from '../errors/oauth-error.js';

const requiredParam = z.string().min(1);
const optionalParam = z.string().optional();

/**
 * Token endpoint request bodies, by grant type
 * RFC 6749 Sections 4.1.3, 4.3.2, 4.4.2, 6
 */
export const tokenRequestSchema = z.discriminatedUnion('grant_type', [
  z.object({
    grant_type: z.literal('authorization_code'),
    code: requiredParam,
    redirect_uri: requiredParam,
    code_verifier: optionalParam,
  }),
  z.object({
    grant_type: z.literal('client_credentials'),
    scope: optionalParam,
  }),
  z.object({
    grant_type: z.literal('refresh_token'),
    refresh_token: requiredParam,
    scope: optionalParam,
  }),
  z.object({
    grant_type: z.literal('password'),
    username: requiredParam,
    password: requiredParam,
    scope: optionalParam,
  }),
]);

/**
 * Revocation and introspection request bodies
 * RFC 7009 Section 2.1, RFC 7662 Section 2.1
 */
export const tokenLookupSchema = z.object({
  token: requiredParam,
  token_type_hint: optionalParam,
});

function describeIssue(error: z.ZodError): string {
  const [issue] = error.issues;
  const field = issue?.path.join('.');
  return field ? `Missing or invalid parameter: ${field}` : 'Malformed request';
}

/**
 * Parse a token request for a grant type already known to be supported
 */
export function parseTokenRequest(params: RequestParams): TokenRequest {
  const result = tokenRequestSchema.safeParse(params);
  if (!result.success) {
    throw OAuthError.invalidRequest(describeIssue(result.error));
  }
  return result.data;
}

/**
 * Parse a revocation or introspection request
 * Unknown hints are ignored (RFC 7662 Section 2.1).
 */
export function parseTokenLookup(params: RequestParams): { token: string; hint?: TokenTypeHint } {
  const result = tokenLookupSchema.safeParse(params);
  if (!result.success) {
    throw OAuthError.invalidRequest(describeIssue(result.error));
  }

  const { token, token_type_hint: hint } = result.data;
  if (hint === 'access_token' || hint === 'refresh_token') {
    return { token, hint };
  }
  return { token };
}
