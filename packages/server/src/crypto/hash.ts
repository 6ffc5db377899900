import { createHash, timingSafeEqual, randomBytes, scrypt as scryptCallback } from 'node:crypto';
import type { SigningAlgorithm } from './jwt.js';

const SCRYPT_PREFIX = 'scrypt';
const SCRYPT_N = 16384; // CPU/memory cost
const SCRYPT_R = 8; // Block size
const SCRYPT_P = 1; // Parallelization
const SCRYPT_KEY_LENGTH = 64;

/**
 * Promisified scrypt function
 */
function scryptAsync(
  password: string,
  salt: Buffer,
  keyLength: number,
  options: { N: number; r: number; p: number }
): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    scryptCallback(password, salt, keyLength, options, (err, derivedKey) => {
      if (err) reject(err);
      else resolve(derivedKey);
    });
  });
}

/**
 * Hash a value using SHA-256 and return as base64url
 */
export function sha256Base64Url(value: string): string {
  return createHash('sha256').update(value, 'utf8').digest('base64url');
}

/**
 * `at_hash` / `c_hash` value for an ID token (OpenID Connect Core 3.1.3.6)
 * Left half of the value's digest under the signing algorithm's hash, base64url.
 */
export function idTokenHash(value: string, algorithm: SigningAlgorithm): string {
  const digest = createHash(`sha${algorithm.slice(2)}`).update(value, 'ascii').digest();
  return digest.subarray(0, digest.length / 2).toString('base64url');
}

/**
 * Compare two strings in constant time to prevent timing attacks
 *
 * Both sides are hashed first so that inputs of different lengths take
 * the same path through `timingSafeEqual`.
 */
export function constantTimeCompare(a: string, b: string): boolean {
  const bufA = createHash('sha256').update(a, 'utf8').digest();
  const bufB = createHash('sha256').update(b, 'utf8').digest();

  return timingSafeEqual(bufA, bufB) && a.length === b.length;
}

/**
 * Hash a client secret using scrypt
 * Returns format: $scrypt$N$r$p$salt$hash
 */
export async function hashClientSecret(secret: string): Promise<string> {
  const salt = randomBytes(16);

  const hash = await scryptAsync(secret, salt, SCRYPT_KEY_LENGTH, {
    N: SCRYPT_N,
    r: SCRYPT_R,
    p: SCRYPT_P,
  });

  return `$${SCRYPT_PREFIX}$${SCRYPT_N}$${SCRYPT_R}$${SCRYPT_P}$${salt.toString('base64')}$${hash.toString('base64')}`;
}

/**
 * Verify a client secret against its hash
 */
export async function verifyClientSecret(secret: string, hash: string): Promise<boolean> {
  // Expected format: $scrypt$N$r$p$salt$hash
  const [empty, prefix, nPart, rPart, pPart, saltPart, hashPart, ...rest] = hash.split('$');

  if (
    empty !== '' ||
    prefix !== SCRYPT_PREFIX ||
    !nPart ||
    !rPart ||
    !pPart ||
    !saltPart ||
    !hashPart ||
    rest.length > 0
  ) {
    return false;
  }

  const N = parseInt(nPart, 10);
  const r = parseInt(rPart, 10);
  const p = parseInt(pPart, 10);
  const salt = Buffer.from(saltPart, 'base64');
  const storedHash = Buffer.from(hashPart, 'base64');

  const derivedHash = await scryptAsync(secret, salt, storedHash.length, { N, r, p });

  return timingSafeEqual(storedHash, derivedHash);
}

// Burned on unknown clients so their rejection costs the same as a wrong secret
let dummySecretHash: Promise<string> | null = null;

/**
 * Run a full secret verification that always fails
 */
export async function verifyAgainstDummySecret(secret: string): Promise<false> {
  dummySecretHash ??= hashClientSecret(randomBytes(32).toString('base64url'));
  await verifyClientSecret(secret, await dummySecretHash);
  return false;
}
