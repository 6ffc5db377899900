import * as jose from 'jose';
import type { AccessTokenClaims, IdTokenClaims } from '../types/token.js';

/**
 * JWT signing and verification utilities using jose library
 */

export type SigningAlgorithm = 'RS256' | 'RS384' | 'RS512' | 'ES256' | 'ES384' | 'ES512';

// RFC 9068 JWT Profile for OAuth 2.0 Access Tokens
const ACCESS_TOKEN_TYP = 'at+jwt';
const ID_TOKEN_TYP = 'JWT';

export interface SigningKeys {
  kid: string;
  algorithm: SigningAlgorithm;
  privateKey: jose.KeyLike;
  publicKey: jose.KeyLike;
}

export interface SigningKeyOptions {
  kid: string;
  algorithm: SigningAlgorithm;
  privateKey: string;
  publicKey: string;
}

/**
 * Import a PEM key pair (PKCS#8 private, SPKI public)
 */
export async function importSigningKeys(options: SigningKeyOptions): Promise<SigningKeys> {
  const [privateKey, publicKey] = await Promise.all([
    jose.importPKCS8(options.privateKey, options.algorithm),
    jose.importSPKI(options.publicKey, options.algorithm),
  ]);

  return { kid: options.kid, algorithm: options.algorithm, privateKey, publicKey };
}

/**
 * Import keys on first use and keep them
 * A failed import is not kept; the next call tries again.
 */
export function createSigningKeyLoader(options: SigningKeyOptions): () => Promise<SigningKeys> {
  let keys: Promise<SigningKeys> | null = null;

  return () => {
    keys ??= importSigningKeys(options).catch((error: unknown) => {
      keys = null;
      throw error;
    });
    return keys;
  };
}

/**
 * Sign a JWT access token
 */
export async function signAccessToken(
  claims: AccessTokenClaims,
  keys: SigningKeys
): Promise<string> {
  const jwt = new jose.SignJWT({ client_id: claims.client_id, scope: claims.scope })
    .setProtectedHeader({
      alg: keys.algorithm,
      kid: keys.kid,
      typ: ACCESS_TOKEN_TYP,
    })
    .setIssuer(claims.iss)
    .setIssuedAt(claims.iat)
    .setExpirationTime(claims.exp)
    .setJti(claims.jti);

  if (claims.sub !== undefined) {
    jwt.setSubject(claims.sub);
  }

  return jwt.sign(keys.privateKey);
}

/**
 * Verify a JWT access token and return its claims
 *
 * Returns null for anything that is not a live token issued by us:
 * bad signature, wrong issuer or type, expired, or malformed claims.
 * A key that cannot verify the configured algorithm throws.
 * `now` is the engine clock in milliseconds.
 */
export async function verifyAccessToken(
  token: string,
  keys: SigningKeys,
  options: { issuer: string; now: number }
): Promise<AccessTokenClaims | null> {
  let payload: jose.JWTPayload;

  try {
    const result = await jose.jwtVerify(token, keys.publicKey, {
      issuer: options.issuer,
      algorithms: [keys.algorithm],
      typ: ACCESS_TOKEN_TYP,
      currentDate: new Date(options.now),
      requiredClaims: ['exp', 'iat', 'jti'],
    });
    payload = result.payload;
  } catch (error) {
    if (error instanceof jose.errors.JOSEError) {
      return null;
    }
    throw error;
  }

  return toAccessTokenClaims(payload);
}

/**
 * Sign an OpenID Connect ID token
 */
export async function signIdToken(claims: IdTokenClaims, keys: SigningKeys): Promise<string> {
  const { iss, sub, aud, iat, exp, ...rest } = claims;

  return new jose.SignJWT(rest)
    .setProtectedHeader({ alg: keys.algorithm, kid: keys.kid, typ: ID_TOKEN_TYP })
    .setIssuer(iss)
    .setSubject(sub)
    .setAudience(aud)
    .setIssuedAt(iat)
    .setExpirationTime(exp)
    .sign(keys.privateKey);
}

/**
 * Verify an ID token we issued, optionally for one audience
 * Same failure rules as `verifyAccessToken`.
 */
export async function verifyIdToken(
  token: string,
  keys: SigningKeys,
  options: { issuer: string; audience?: string; now: number }
): Promise<IdTokenClaims | null> {
  let payload: jose.JWTPayload;

  try {
    const result = await jose.jwtVerify(token, keys.publicKey, {
      issuer: options.issuer,
      audience: options.audience,
      algorithms: [keys.algorithm],
      currentDate: new Date(options.now),
      requiredClaims: ['sub', 'aud', 'exp', 'iat'],
    });
    payload = result.payload;
  } catch (error) {
    if (error instanceof jose.errors.JOSEError) {
      return null;
    }
    throw error;
  }

  return toIdTokenClaims(payload);
}

function toIdTokenClaims(payload: jose.JWTPayload): IdTokenClaims | null {
  const { iss, sub, aud, iat, exp } = payload;
  const authTime = payload['auth_time'];
  const nonce = payload['nonce'];
  const atHash = payload['at_hash'];

  if (
    typeof iss !== 'string' ||
    typeof sub !== 'string' ||
    typeof aud !== 'string' ||
    typeof iat !== 'number' ||
    typeof exp !== 'number'
  ) {
    return null;
  }

  const claims: IdTokenClaims = { iss, sub, aud, iat, exp };
  if (typeof authTime === 'number') {
    claims.auth_time = authTime;
  }
  if (typeof nonce === 'string') {
    claims.nonce = nonce;
  }
  if (typeof atHash === 'string') {
    claims.at_hash = atHash;
  }
  return claims;
}

function toAccessTokenClaims(payload: jose.JWTPayload): AccessTokenClaims | null {
  const { iss, sub, iat, exp, jti } = payload;
  const clientId = payload['client_id'];
  const scope = payload['scope'];

  if (
    typeof iss !== 'string' ||
    typeof iat !== 'number' ||
    typeof exp !== 'number' ||
    typeof jti !== 'string' ||
    typeof clientId !== 'string' ||
    typeof scope !== 'string'
  ) {
    return null;
  }

  const claims: AccessTokenClaims = { iss, client_id: clientId, scope, iat, exp, jti };
  if (typeof sub === 'string') {
    claims.sub = sub;
  }
  return claims;
}

/**
 * Generate a new RSA key pair for signing
 */
export async function generateRsaKeyPair(
  algorithm: 'RS256' | 'RS384' | 'RS512' = 'RS256'
): Promise<{ publicKey: string; privateKey: string }> {
  const modulusLength = algorithm === 'RS512' ? 4096 : 2048;

  const { publicKey, privateKey } = await jose.generateKeyPair(algorithm, {
    modulusLength,
    extractable: true,
  });

  const publicKeyPem = await jose.exportSPKI(publicKey);
  const privateKeyPem = await jose.exportPKCS8(privateKey);

  return {
    publicKey: publicKeyPem,
    privateKey: privateKeyPem,
  };
}

/**
 * Generate a new EC key pair for signing
 */
export async function generateEcKeyPair(
  algorithm: 'ES256' | 'ES384' | 'ES512' = 'ES256'
): Promise<{ publicKey: string; privateKey: string }> {
  const { publicKey, privateKey } = await jose.generateKeyPair(algorithm, {
    extractable: true,
  });

  const publicKeyPem = await jose.exportSPKI(publicKey);
  const privateKeyPem = await jose.exportPKCS8(privateKey);

  return {
    publicKey: publicKeyPem,
    privateKey: privateKeyPem,
  };
}
