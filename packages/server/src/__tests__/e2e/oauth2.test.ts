import { describe, it, expect, beforeEach } from 'vitest';
import type { Hono } from 'hono';
import type { IntrospectionResponse, OAuthErrorResponse, TokenResponse } from '@grantwork/shared';
import {
  setupTestContext,
  issueCodeTokens,
  basicAuth,
  confidentialAuth,
  createCapturingLogger,
  type TestContext,
} from '../test-setup.js';
import { createOAuth2App } from '../../app.js';
import { silentLogger } from '../../logging/logger.js';
import type { OAuthVariables } from '../../types/hono.js';

type App = Hono<{ Variables: OAuthVariables }>;

function post(app: App, path: string, params: Record<string, string>, authorization?: string) {
  return app.request(path, {
    method: 'POST',
    headers: {
      'Content-Type': 'application/x-www-form-urlencoded',
      ...(authorization ? { Authorization: authorization } : {}),
    },
    body: new URLSearchParams(params),
  });
}

describe('OAuth 2.0 endpoints', () => {
  let ctx: TestContext;
  let app: App;

  beforeEach(async () => {
    ctx = await setupTestContext();
    app = createOAuth2App({ engine: ctx.engine, logger: silentLogger });
  });

  describe('POST /token', () => {
    it('should issue a token with no-store headers', async () => {
      const res = await post(app, '/token', { grant_type: 'client_credentials' }, confidentialAuth());

      expect(res.status).toBe(200);
      expect(res.headers.get('Cache-Control')).toBe('no-store');
      expect(res.headers.get('Pragma')).toBe('no-cache');
      expect(res.headers.get('X-Content-Type-Options')).toBe('nosniff');

      const body = (await res.json()) as TokenResponse;
      expect(body).toEqual({
        access_token: expect.any(String),
        token_type: 'Bearer',
        expires_in: 3600,
        scope: 'read',
      });
    });

    it('should accept client_secret_post', async () => {
      const res = await post(app, '/token', {
        grant_type: 'client_credentials',
        client_id: 'c1',
        client_secret: 's1',
      });

      expect(res.status).toBe(200);
    });

    it('should challenge failed client authentication', async () => {
      const res = await post(app, '/token', { grant_type: 'client_credentials' }, basicAuth('c1', 'wrong'));

      expect(res.status).toBe(401);
      expect(res.headers.get('WWW-Authenticate')).toBe('Basic realm="oauth"');
      expect(res.headers.get('Cache-Control')).toBe('no-store');
      expect(await res.json()).toEqual({
        error: 'invalid_client',
        error_description: 'Client authentication failed',
      });
    });

    it('should return 400 for grant errors', async () => {
      const res = await post(
        app,
        '/token',
        { grant_type: 'authorization_code', code: 'unknown', redirect_uri: 'https://client.test/callback' },
        confidentialAuth()
      );

      expect(res.status).toBe(400);
      expect(res.headers.get('WWW-Authenticate')).toBeNull();
      const body = (await res.json()) as OAuthErrorResponse;
      expect(body.error).toBe('invalid_grant');
    });

    it('should ignore bodies that are not form encoded', async () => {
      const res = await app.request('/token', {
        method: 'POST',
        headers: { 'Content-Type': 'application/json', Authorization: confidentialAuth() },
        body: JSON.stringify({ grant_type: 'client_credentials' }),
      });

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        error: 'invalid_request',
        error_description: 'Missing grant_type parameter',
      });
    });

    it('should complete the authorization code flow', async () => {
      const result = await ctx.engine.authorize(
        { response_type: 'code', client_id: 'c1', redirect_uri: 'https://client.test/callback', scope: 'write' },
        'alice'
      );
      if (!result.ok || result.responseMode !== 'query') {
        throw new Error('Authorization failed');
      }

      const res = await post(
        app,
        '/token',
        {
          grant_type: 'authorization_code',
          code: result.params.code,
          redirect_uri: 'https://client.test/callback',
        },
        confidentialAuth()
      );

      expect(res.status).toBe(200);
      const body = (await res.json()) as TokenResponse;
      expect(body.scope).toBe('write');
      expect(body.refresh_token).toEqual(expect.any(String));
    });
  });

  describe('POST /introspect', () => {
    it('should describe an active token', async () => {
      const tokens = await issueCodeTokens(ctx);

      const res = await post(app, '/introspect', { token: tokens.access_token }, confidentialAuth());

      expect(res.status).toBe(200);
      const body = (await res.json()) as IntrospectionResponse;
      expect(body).toMatchObject({ active: true, client_id: 'c1', scope: 'read write', sub: 'alice' });
    });

    it('should return only active: false for unknown tokens', async () => {
      const res = await post(app, '/introspect', { token: 'unknown' }, confidentialAuth());

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({ active: false });
    });

    it('should require a confidential client', async () => {
      const res = await post(app, '/introspect', { token: 'anything', client_id: 'spa' });

      expect(res.status).toBe(401);
      expect(await res.json()).toEqual({
        error: 'invalid_client',
        error_description: 'Confidential client authentication required',
      });
    });

    it('should require the token parameter', async () => {
      const res = await post(app, '/introspect', {}, confidentialAuth());

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        error: 'invalid_request',
        error_description: 'Missing or invalid parameter: token',
      });
    });
  });

  describe('POST /revoke', () => {
    it('should revoke with an empty 200 response', async () => {
      const tokens = await issueCodeTokens(ctx);

      const res = await post(
        app,
        '/revoke',
        { token: tokens.refresh_token ?? '', token_type_hint: 'refresh_token' },
        confidentialAuth()
      );

      expect(res.status).toBe(200);
      expect(await res.text()).toBe('');

      const check = await post(app, '/introspect', { token: tokens.access_token }, confidentialAuth());
      expect(await check.json()).toEqual({ active: false });
    });

    it('should answer 200 for unknown tokens', async () => {
      const res = await post(app, '/revoke', { token: 'never-issued' }, confidentialAuth());

      expect(res.status).toBe(200);
    });

    it('should let public clients revoke their own tokens', async () => {
      const res = await post(app, '/revoke', { token: 'never-issued', client_id: 'spa' });

      expect(res.status).toBe(200);
    });

    it('should ignore unknown token type hints', async () => {
      const tokens = await issueCodeTokens(ctx);

      const res = await post(
        app,
        '/revoke',
        { token: tokens.access_token, token_type_hint: 'id_token' },
        confidentialAuth()
      );

      expect(res.status).toBe(200);
      expect(await ctx.engine.verifyAccess(tokens.access_token, { requiredScopes: [] })).toBeNull();
    });
  });

  it('should log handled requests without token values', async () => {
    const { logger, records } = createCapturingLogger();
    const logged = createOAuth2App({ engine: ctx.engine, logger });

    const res = await post(logged, '/token', { grant_type: 'client_credentials' }, confidentialAuth());
    const body = (await res.json()) as TokenResponse;

    expect(records).toContainEqual(
      expect.objectContaining({ message: 'Request handled', method: 'POST', path: '/token', status: 200 })
    );
    expect(JSON.stringify(records)).not.toContain(body.access_token);
  });

  it('should return 404 for unknown paths', async () => {
    const res = await app.request('/authorize');

    expect(res.status).toBe(404);
  });
});
