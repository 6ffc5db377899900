import type { CodeChallengeMethod } from '@grantwork/shared';
import { constantTimeCompare, sha256Base64Url } from './hash.js';

const UNRESERVED_PATTERN = /^[A-Za-z0-9\-._~]{43,128}$/;
const S256_CHALLENGE_PATTERN = /^[A-Za-z0-9\-_]{43}$/;

/**
 * Generate a code challenge from a code verifier
 * RFC 7636 Section 4.2
 *
 * plain: code_challenge = code_verifier
 * S256:  code_challenge = BASE64URL(SHA256(code_verifier))
 */
export function generateCodeChallenge(
  codeVerifier: string,
  method: CodeChallengeMethod = 'S256'
): string {
  return method === 'S256' ? sha256Base64Url(codeVerifier) : codeVerifier;
}

/**
 * Verify a code verifier against a stored code challenge
 * RFC 7636 Section 4.6
 */
export function verifyCodeChallenge(
  codeVerifier: string,
  codeChallenge: string,
  method: CodeChallengeMethod
): boolean {
  if (!isValidCodeVerifier(codeVerifier)) {
    return false;
  }

  return constantTimeCompare(generateCodeChallenge(codeVerifier, method), codeChallenge);
}

/**
 * Validate code verifier format
 * RFC 7636 Section 4.1
 *
 * 43-128 characters from [A-Z] / [a-z] / [0-9] / "-" / "." / "_" / "~"
 */
export function isValidCodeVerifier(codeVerifier: string): boolean {
  return UNRESERVED_PATTERN.test(codeVerifier);
}

/**
 * Validate code challenge format for the given method
 *
 * A plain challenge is the verifier itself; an S256 challenge is a
 * 32-byte hash, i.e. 43 base64url characters without padding.
 */
export function isValidCodeChallenge(codeChallenge: string, method: CodeChallengeMethod): boolean {
  if (method === 'plain') {
    return UNRESERVED_PATTERN.test(codeChallenge);
  }
  return S256_CHALLENGE_PATTERN.test(codeChallenge);
}
