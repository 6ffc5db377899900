import { describe, it, expect, beforeAll } from 'vitest';
import * as jose from 'jose';
import {
  constantTimeCompare,
  createSigningKeyLoader,
  generateCodeChallenge,
  generateEcKeyPair,
  hashClientSecret,
  idTokenHash,
  importSigningKeys,
  signAccessToken,
  verifyAccessToken,
  isValidCodeChallenge,
  isValidCodeVerifier,
  verifyAgainstDummySecret,
  verifyClientSecret,
  verifyCodeChallenge,
} from '../../crypto/index.js';

describe('PKCE', () => {
  // RFC 7636 Appendix B
  const verifier = 'dBjftJeZ4CVP-mB92K27uhbUJU1p1r_wW1gFWFOEjXk';
  const challenge = 'E9Melhoa2OwvFrEMTJguCHaoeK1t8URWbuGJSstw-cM';

  it('should derive the S256 challenge', () => {
    expect(generateCodeChallenge(verifier, 'S256')).toBe(challenge);
  });

  it('should use the verifier itself for plain', () => {
    expect(generateCodeChallenge(verifier, 'plain')).toBe(verifier);
  });

  it('should verify matching pairs only', () => {
    expect(verifyCodeChallenge(verifier, challenge, 'S256')).toBe(true);
    expect(verifyCodeChallenge(verifier, verifier, 'plain')).toBe(true);
    expect(verifyCodeChallenge(verifier, verifier, 'S256')).toBe(false);
  });

  it('should reject verifiers outside 43-128 unreserved characters', () => {
    expect(isValidCodeVerifier('a'.repeat(42))).toBe(false);
    expect(isValidCodeVerifier('a'.repeat(43))).toBe(true);
    expect(isValidCodeVerifier('a'.repeat(128))).toBe(true);
    expect(isValidCodeVerifier('a'.repeat(129))).toBe(false);
    expect(isValidCodeVerifier(`${'a'.repeat(42)}+`)).toBe(false);
    expect(verifyCodeChallenge('short', 'short', 'plain')).toBe(false);
  });

  it('should check challenge formats per method', () => {
    expect(isValidCodeChallenge(challenge, 'S256')).toBe(true);
    expect(isValidCodeChallenge(`${challenge}=`, 'S256')).toBe(false);
    expect(isValidCodeChallenge('a'.repeat(50), 'plain')).toBe(true);
    expect(isValidCodeChallenge('a'.repeat(20), 'plain')).toBe(false);
  });
});

describe('client secrets', () => {
  it('should verify a secret against its hash', async () => {
    const hash = await hashClientSecret('test-secret');

    expect(await verifyClientSecret('test-secret', hash)).toBe(true);
    expect(await verifyClientSecret('other-secret', hash)).toBe(false);
  });

  it('should salt every hash', async () => {
    expect(await hashClientSecret('test-secret')).not.toBe(await hashClientSecret('test-secret'));
  });

  it('should refuse hashes in another format', async () => {
    expect(await verifyClientSecret('test-secret', 'plain-text')).toBe(false);
    expect(await verifyClientSecret('test-secret', '$bcrypt$10$abc')).toBe(false);
  });

  it('should always fail against the dummy secret', async () => {
    expect(await verifyAgainstDummySecret('test-secret')).toBe(false);
  });

  it('should compare strings in constant time', () => {
    expect(constantTimeCompare('abc', 'abc')).toBe(true);
    expect(constantTimeCompare('abc', 'abd')).toBe(false);
    expect(constantTimeCompare('abc', 'abcd')).toBe(false);
  });
});

describe('JWT signing keys', () => {
  const issuer = 'https://auth.test';
  const now = Date.UTC(2026, 0, 1);
  let pem: { publicKey: string; privateKey: string };

  beforeAll(async () => {
    pem = await generateEcKeyPair('ES256');
  });

  const sign = async (): Promise<string> =>
    signAccessToken(
      { iss: issuer, client_id: 'c1', scope: 'read', iat: now / 1000, exp: now / 1000 + 60, jti: 'jti-1' },
      await importSigningKeys({ kid: 'k1', algorithm: 'ES256', ...pem })
    );

  it('should verify a token signed with the pair', async () => {
    const keys = await importSigningKeys({ kid: 'k1', algorithm: 'ES256', ...pem });

    expect(await verifyAccessToken(await sign(), keys, { issuer, now })).toMatchObject({
      client_id: 'c1',
      jti: 'jti-1',
    });
  });

  it('should return null for a token signed with another key', async () => {
    const other = await generateEcKeyPair('ES256');
    const keys = await importSigningKeys({ kid: 'k1', algorithm: 'ES256', ...other });

    expect(await verifyAccessToken(await sign(), keys, { issuer, now })).toBeNull();
  });

  it('should throw when the key cannot verify the configured algorithm', async () => {
    const keys = await importSigningKeys({ kid: 'k1', algorithm: 'ES256', ...pem });
    const secret = await jose.generateSecret('HS256');
    if (secret instanceof Uint8Array) {
      throw new Error('Expected a key object');
    }

    await expect(verifyAccessToken(await sign(), { ...keys, publicKey: secret }, { issuer, now })).rejects.toBeInstanceOf(
      TypeError
    );
  });

  it('should retry a key import that failed', async () => {
    const options = { kid: 'k1', algorithm: 'ES256' as const, privateKey: 'not-a-key', publicKey: 'not-a-key' };
    const load = createSigningKeyLoader(options);

    await expect(load()).rejects.toBeInstanceOf(TypeError);

    options.privateKey = pem.privateKey;
    options.publicKey = pem.publicKey;

    const keys = await load();
    expect(keys).toMatchObject({ kid: 'k1', algorithm: 'ES256' });
    expect(await load()).toBe(keys);
  });
});

describe('idTokenHash', () => {
  it('should take the left half of the digest for the algorithm', () => {
    // OpenID Connect Core 1.0 Appendix A.3
    expect(idTokenHash('jHkWEdUXMU1BwAsC4vtUsZwnNvTIxEl0z9K3vx5KF0Y', 'RS256')).toBe('77QmUPtjPfzWtF2AnpK9RQ');
  });

  it('should use a longer digest for larger algorithms', () => {
    expect(idTokenHash('token', 'ES384')).toHaveLength(32);
    expect(idTokenHash('token', 'ES512')).toHaveLength(43);
  });
});
