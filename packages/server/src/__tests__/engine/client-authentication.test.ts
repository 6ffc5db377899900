import { describe, it, expect, beforeEach } from 'vitest';
import {
  setupTestContext,
  basicAuth,
  expectOk,
  expectError,
  type TestContext,
} from '../test-setup.js';
import { extractBasicAuth } from '../../services/client-authenticator.js';

describe('extractBasicAuth', () => {
  it('should decode form-encoded credentials', () => {
    expect(extractBasicAuth(basicAuth('svc:reports', 'p@ss word'))).toEqual({
      clientId: 'svc:reports',
      clientSecret: 'p@ss word',
    });
  });

  it('should turn + into a space', () => {
    const header = `Basic ${Buffer.from('my+client:a+b').toString('base64')}`;

    expect(extractBasicAuth(header)).toEqual({ clientId: 'my client', clientSecret: 'a b' });
  });

  it('should accept the scheme in any case', () => {
    expect(extractBasicAuth(`basic ${Buffer.from('c1:s1').toString('base64')}`)).toEqual({
      clientId: 'c1',
      clientSecret: 's1',
    });
  });

  it('should ignore other schemes', () => {
    expect(extractBasicAuth('Bearer abc')).toBeUndefined();
  });

  it('should flag malformed credentials', () => {
    expect(extractBasicAuth(`Basic ${Buffer.from('no-colon').toString('base64')}`)).toBeNull();
    expect(extractBasicAuth('Basic')).toBeNull();
    expect(extractBasicAuth(`Basic ${Buffer.from('c1:%E0%A4%A').toString('base64')}`)).toBeNull();
  });
});

describe('Client authentication', () => {
  let ctx: TestContext;

  beforeEach(async () => {
    ctx = await setupTestContext();
  });

  it('should authenticate with Basic credentials', async () => {
    const client = expectOk(await ctx.engine.authenticateClient({}, basicAuth('c1', 's1')));

    expect(client.clientId).toBe('c1');
  });

  it('should authenticate with body credentials', async () => {
    const client = expectOk(await ctx.engine.authenticateClient({ client_id: 'c1', client_secret: 's1' }));

    expect(client.clientId).toBe('c1');
  });

  it('should identify public clients by client_id', async () => {
    const client = expectOk(await ctx.engine.authenticateClient({ client_id: 'spa' }));

    expect(client.clientType).toBe('public');
  });

  it('should accept ids and secrets that need encoding', async () => {
    await ctx.storage.clients.register({
      clientId: 'svc:reports',
      clientSecret: 'p@ss word',
      clientType: 'confidential',
      allowedGrants: ['client_credentials'],
    });

    const client = expectOk(await ctx.engine.authenticateClient({}, basicAuth('svc:reports', 'p@ss word')));

    expect(client.clientId).toBe('svc:reports');
  });

  it('should reject a wrong secret', async () => {
    const error = expectError(await ctx.engine.authenticateClient({}, basicAuth('c1', 'wrong')), 401);

    expect(error).toEqual({ error: 'invalid_client', error_description: 'Client authentication failed' });
  });

  it('should reject unknown clients with the same message', async () => {
    const error = expectError(await ctx.engine.authenticateClient({}, basicAuth('ghost', 's1')), 401);

    expect(error).toEqual({ error: 'invalid_client', error_description: 'Client authentication failed' });
  });

  it('should not let a confidential client skip its secret', async () => {
    const error = expectError(await ctx.engine.authenticateClient({ client_id: 'c1' }), 401);

    expect(error.error).toBe('invalid_client');
  });

  it('should reject a secret presented by a public client', async () => {
    const error = expectError(
      await ctx.engine.authenticateClient({ client_id: 'spa', client_secret: 'test-secret' }),
      401
    );

    expect(error).toEqual({ error: 'invalid_client', error_description: 'Public clients must not present a secret' });
  });

  it('should reject two authentication methods at once', async () => {
    const error = expectError(
      await ctx.engine.authenticateClient({ client_secret: 's1' }, basicAuth('c1', 's1')),
      400
    );

    expect(error).toEqual({
      error: 'invalid_request',
      error_description: 'Multiple client authentication methods used',
    });
  });

  it('should reject a body client_id that disagrees with Basic', async () => {
    const error = expectError(
      await ctx.engine.authenticateClient({ client_id: 'spa' }, basicAuth('c1', 's1')),
      401
    );

    expect(error.error).toBe('invalid_client');
  });

  it('should treat disabled clients as unknown', async () => {
    await ctx.storage.clients.setDisabled('c1', true);

    const error = expectError(await ctx.engine.authenticateClient({}, basicAuth('c1', 's1')), 401);

    expect(error.error_description).toBe('Client authentication failed');
  });

  it('should require some credentials', async () => {
    const error = expectError(await ctx.engine.authenticateClient({}), 401);

    expect(error).toEqual({ error: 'invalid_client', error_description: 'Client authentication required' });
  });

  it('should treat empty values as absent', async () => {
    const client = expectOk(await ctx.engine.authenticateClient({ client_id: 'spa', client_secret: '' }));

    expect(client.clientId).toBe('spa');
  });
});
