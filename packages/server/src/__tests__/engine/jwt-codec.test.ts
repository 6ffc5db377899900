import { describe, it, expect, beforeAll, beforeEach } from 'vitest';
import * as jose from 'jose';
import {
  setupTestContext,
  issueCodeTokens,
  confidentialAuth,
  expectOk,
  expectError,
  ISSUER,
  START_MS,
  START_SECONDS,
  type TestContext,
} from '../test-setup.js';
import type { EngineConfigInput } from '../../config/index.js';
import { generateEcKeyPair } from '../../crypto/jwt.js';

describe('JWT access tokens', () => {
  let keys: { publicKey: string; privateKey: string };
  let ctx: TestContext;

  const jwtConfig = (overrides: { checkRevocation?: boolean } = {}): EngineConfigInput => ({
    codec: {
      strategy: 'jwt',
      algorithm: 'ES256',
      kid: 'test-key',
      privateKey: keys.privateKey,
      publicKey: keys.publicKey,
      ...overrides,
    },
  });

  beforeAll(async () => {
    keys = await generateEcKeyPair('ES256');
  });

  beforeEach(async () => {
    ctx = await setupTestContext({ config: jwtConfig() });
  });

  it('should mint a signed at+jwt token', async () => {
    const tokens = await issueCodeTokens(ctx, 'read write');

    expect(jose.decodeProtectedHeader(tokens.access_token)).toEqual({
      alg: 'ES256',
      kid: 'test-key',
      typ: 'at+jwt',
    });

    const publicKey = await jose.importSPKI(keys.publicKey, 'ES256');
    const { payload } = await jose.jwtVerify(tokens.access_token, publicKey, {
      currentDate: new Date(START_MS),
    });

    expect(payload).toEqual({
      iss: ISSUER,
      sub: 'alice',
      client_id: 'c1',
      scope: 'read write',
      iat: START_SECONDS,
      exp: START_SECONDS + 3600,
      jti: expect.any(String),
    });
  });

  it('should leave out sub for client credentials', async () => {
    const tokens = expectOk(
      await ctx.engine.issue({ params: { grant_type: 'client_credentials' }, authorization: confidentialAuth() })
    );

    expect(jose.decodeJwt(tokens.access_token)).not.toHaveProperty('sub');
  });

  it('should introspect with the token id', async () => {
    const tokens = await issueCodeTokens(ctx);
    const { jti } = jose.decodeJwt(tokens.access_token);

    expect(expectOk(await ctx.engine.introspect(tokens.access_token))).toEqual({
      active: true,
      client_id: 'c1',
      scope: 'read write',
      token_type: 'Bearer',
      exp: START_SECONDS + 3600,
      iat: START_SECONDS,
      sub: 'alice',
      jti,
    });
  });

  it('should store the token id alongside the token', async () => {
    const tokens = await issueCodeTokens(ctx);
    const { jti } = jose.decodeJwt(tokens.access_token);

    const record = await ctx.storage.tokens.getAccessToken(tokens.access_token);
    expect(record?.tokenId).toBe(jti);
  });

  it('should treat an expired token as inactive', async () => {
    const tokens = await issueCodeTokens(ctx);

    ctx.clock.advance(3599);
    expect(expectOk(await ctx.engine.introspect(tokens.access_token))).toMatchObject({ active: true });

    ctx.clock.advance(1);
    expect(expectOk(await ctx.engine.introspect(tokens.access_token))).toEqual({ active: false });
  });

  it('should reject a token with a foreign signature', async () => {
    const first = await issueCodeTokens(ctx);
    const second = await issueCodeTokens(ctx);
    const [header, payload] = first.access_token.split('.');
    const [, , signature] = second.access_token.split('.');

    const forged = `${header}.${payload}.${signature}`;

    expect(expectOk(await ctx.engine.introspect(forged))).toEqual({ active: false });
  });

  it('should reject tokens from another issuer', async () => {
    const tokens = await issueCodeTokens(ctx);
    const elsewhere = await setupTestContext({ config: { ...jwtConfig(), issuer: 'https://other.test' } });

    expect(expectOk(await elsewhere.engine.introspect(tokens.access_token))).toEqual({ active: false });
  });

  it('should honour revocation when checking is on', async () => {
    const tokens = await issueCodeTokens(ctx);

    expectOk(await ctx.engine.revoke(tokens.access_token));

    expect(expectOk(await ctx.engine.introspect(tokens.access_token))).toEqual({ active: false });
    expect(await ctx.engine.verifyAccess(tokens.access_token, { requiredScopes: [] })).toBeNull();
  });

  it('should deactivate the previous token on refresh', async () => {
    const tokens = await issueCodeTokens(ctx);

    expectOk(
      await ctx.engine.issue({
        params: { grant_type: 'refresh_token', refresh_token: tokens.refresh_token ?? '' },
        authorization: confidentialAuth(),
      })
    );

    expect(expectOk(await ctx.engine.introspect(tokens.access_token))).toEqual({ active: false });
  });

  it('should stay self-contained when revocation checking is off', async () => {
    ctx = await setupTestContext({ config: jwtConfig({ checkRevocation: false }) });
    const tokens = await issueCodeTokens(ctx);

    expectOk(await ctx.engine.revoke(tokens.access_token));

    expect(expectOk(await ctx.engine.introspect(tokens.access_token))).toMatchObject({ active: true });
  });
  it('should report a server error when the signing keys cannot be loaded', async () => {
    ctx = await setupTestContext({
      config: {
        codec: { strategy: 'jwt', algorithm: 'ES256', kid: 'test-key', privateKey: 'not-a-key', publicKey: 'not-a-key' },
      },
    });

    const error = expectError(await ctx.engine.introspect('some-token'), 500);

    expect(error.error).toBe('server_error');
  });
});
