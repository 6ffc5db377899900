import { describe, it, expect, beforeEach } from 'vitest';
import { createMemoryStorage, type MemoryStorage } from '../../storage/memory/index.js';
import { StorageError, TransactionConflictError } from '../../errors/oauth-error.js';
import type { IStorageTransaction } from '../../storage/interfaces/index.js';
import type { AccessToken, AuthorizationGrant, RefreshToken } from '../../types/token.js';

const issuedAt = new Date(Date.UTC(2026, 0, 1));
const expiresAt = new Date(Date.UTC(2026, 0, 1, 1));
const later = new Date(Date.UTC(2026, 0, 1, 0, 5));

const grant = (code: string): AuthorizationGrant => ({
  code,
  clientId: 'c1',
  subject: 'alice',
  scopes: ['read'],
  redirectUri: 'https://client.test/callback',
  issuedAt,
  expiresAt: new Date(Date.UTC(2026, 0, 1, 0, 10)),
});

const accessToken = (token: string, overrides: Partial<AccessToken> = {}): AccessToken => ({
  token,
  tokenId: `${token}-id`,
  clientId: 'c1',
  subject: 'alice',
  scopes: ['read'],
  issuedAt,
  expiresAt,
  ...overrides,
});

const refreshToken = (token: string, overrides: Partial<RefreshToken> = {}): RefreshToken => ({
  token,
  clientId: 'c1',
  subject: 'alice',
  scopes: ['read'],
  accessToken: null,
  issuedAt,
  expiresAt: new Date(Date.UTC(2026, 0, 31)),
  ...overrides,
});

describe('Memory storage', () => {
  let storage: MemoryStorage;

  beforeEach(() => {
    storage = createMemoryStorage();
  });

  describe('clients', () => {
    it('should hash the secret and return it once', async () => {
      const { client, clientSecret } = await storage.clients.register({
        clientType: 'confidential',
        allowedGrants: ['client_credentials'],
      });

      expect(clientSecret).toMatch(/^[A-Za-z0-9_-]{43}$/);
      expect(client.clientSecretHash).toMatch(/^\$scrypt\$16384\$8\$1\$/);
      expect(client.clientId).toMatch(/^[A-Za-z0-9_-]{22}$/);
    });

    it('should refuse duplicate client ids', async () => {
      await storage.clients.register({ clientId: 'dup', clientType: 'public', allowedGrants: ['implicit'] });

      await expect(
        storage.clients.register({ clientId: 'dup', clientType: 'public', allowedGrants: ['implicit'] })
      ).rejects.toThrow(StorageError);
    });

    it('should refuse a secret for a public client', async () => {
      await expect(
        storage.clients.register({
          clientId: 'spa',
          clientSecret: 'test-secret',
          clientType: 'public',
          allowedGrants: ['implicit'],
        })
      ).rejects.toThrow('Public clients cannot hold a secret');
    });

    it('should hand out copies', async () => {
      await storage.clients.register({ clientId: 'spa', clientType: 'public', allowedGrants: ['implicit'] });

      const first = await storage.clients.getClient('spa');
      first?.allowedGrants.push('password');

      expect((await storage.clients.getClient('spa'))?.allowedGrants).toEqual(['implicit']);
    });
  });

  describe('grants', () => {
    it('should consume a grant once', async () => {
      await storage.grants.saveGrant(grant('code-1'));

      expect(storage.grants.consume('code-1', later)).not.toBeNull();
      expect(storage.grants.consume('code-1', later)).toBeNull();
      expect((await storage.grants.getGrant('code-1'))?.consumedAt).toEqual(later);
    });

    it('should refuse a colliding code', async () => {
      await storage.grants.saveGrant(grant('code-1'));

      await expect(storage.grants.saveGrant(grant('code-1'))).rejects.toThrow('Authorization code collision');
    });

    it('should delete expired grants', async () => {
      await storage.grants.saveGrant(grant('code-1'));

      expect(await storage.grants.deleteExpired(later)).toBe(0);
      expect(await storage.grants.deleteExpired(new Date(Date.UTC(2026, 0, 1, 0, 10)))).toBe(1);
      expect(await storage.grants.getGrant('code-1')).toBeNull();
    });
  });

  describe('transactions', () => {
    it('should write saved tokens on commit', async () => {
      await storage.transaction(async (tx) => {
        await tx.saveAccessToken(accessToken('at-1'));
        await tx.saveRefreshToken(refreshToken('rt-1', { accessToken: 'at-1' }));
        expect(await storage.tokens.getAccessToken('at-1')).toBeNull();
      });

      expect(await storage.tokens.getAccessToken('at-1')).toEqual(accessToken('at-1'));
      expect((await storage.tokens.getRefreshToken('rt-1'))?.accessToken).toBe('at-1');
    });

    it('should undo every change when the work fails', async () => {
      await storage.grants.saveGrant(grant('code-1'));
      await storage.transaction(async (tx) => {
        await tx.saveAccessToken(accessToken('at-0'));
        await tx.saveRefreshToken(refreshToken('rt-0', { accessToken: 'at-0' }));
      });

      const failure = storage.transaction(async (tx) => {
        expect(await tx.consumeGrant('code-1', later)).toBe(true);
        expect(await tx.revokeRefreshToken('rt-0', later)).toBe(true);
        expect(await tx.revokeAccessToken('at-0', later)).toBe(true);
        await tx.saveAccessToken(accessToken('at-1'));
        throw new Error('boom');
      });

      await expect(failure).rejects.toThrow('boom');
      expect((await storage.grants.getGrant('code-1'))?.consumedAt).toBeUndefined();
      expect((await storage.tokens.getRefreshToken('rt-0'))?.revokedAt).toBeUndefined();
      expect((await storage.tokens.getAccessToken('at-0'))?.revokedAt).toBeUndefined();
      expect(await storage.tokens.isTokenIdRevoked('at-0-id')).toBe(false);
      expect(await storage.tokens.getAccessToken('at-1')).toBeNull();
    });

    it('should roll back when a save collides at commit', async () => {
      await storage.grants.saveGrant(grant('code-1'));
      await storage.transaction(async (tx) => {
        await tx.saveAccessToken(accessToken('at-1'));
      });

      const collision = storage.transaction(async (tx) => {
        await tx.consumeGrant('code-1', later);
        await tx.saveAccessToken(accessToken('at-1'));
      });

      await expect(collision).rejects.toThrow('Access token collision');
      expect((await storage.grants.getGrant('code-1'))?.consumedAt).toBeUndefined();
    });

    it('should report failed compare-and-set operations', async () => {
      await storage.transaction(async (tx) => {
        await tx.saveRefreshToken(refreshToken('rt-1', { accessToken: 'at-1' }));
      });

      await storage.transaction(async (tx) => {
        expect(await tx.consumeGrant('missing', later)).toBe(false);
        expect(await tx.relinkRefreshToken('rt-1', 'at-other', 'at-2')).toBe(false);
        expect(await tx.relinkRefreshToken('rt-1', 'at-1', 'at-2')).toBe(true);
        expect(await tx.revokeRefreshToken('rt-1', later)).toBe(true);
        expect(await tx.revokeRefreshToken('rt-1', later)).toBe(false);
      });

      expect(await storage.tokens.getRefreshToken('rt-1')).toMatchObject({ accessToken: 'at-2', revokedAt: later });
    });

    it('should refuse an access token whose refresh token was revoked meanwhile', async () => {
      await storage.transaction(async (tx) => {
        await tx.saveRefreshToken(refreshToken('rt-1', { accessToken: 'at-1' }));
      });

      const issuance = storage.transaction(async (tx) => {
        await tx.saveAccessToken(accessToken('at-2', { refreshToken: 'rt-1' }));
        await storage.tokens.revokeRefreshToken('rt-1', later);
      });

      await expect(issuance).rejects.toBeInstanceOf(TransactionConflictError);
      expect(await storage.tokens.getAccessToken('at-2')).toBeNull();
    });

    it('should accept a refresh token saved alongside its access token', async () => {
      await storage.transaction(async (tx) => {
        await tx.saveAccessToken(accessToken('at-1', { refreshToken: 'rt-1' }));
        await tx.saveRefreshToken(refreshToken('rt-1', { accessToken: 'at-1' }));
      });

      expect(await storage.tokens.getAccessToken('at-1')).toMatchObject({ refreshToken: 'rt-1' });
    });

    it('should run transactions one at a time', async () => {
      const order: string[] = [];

      const first = storage.transaction(async () => {
        order.push('first:start');
        await new Promise((resolve) => setTimeout(resolve, 10));
        order.push('first:end');
      });
      const second = storage.transaction(async () => {
        order.push('second');
      });

      await Promise.all([first, second]);
      expect(order).toEqual(['first:start', 'first:end', 'second']);
    });

    it('should start the next transaction after one fails', async () => {
      const failed = storage.transaction(async () => {
        throw new Error('boom');
      });
      const next = storage.transaction(async () => 'done');

      await expect(failed).rejects.toThrow('boom');
      await expect(next).resolves.toBe('done');
    });

    it('should refuse use after the transaction ends', async () => {
      const leaked: IStorageTransaction[] = [];
      await storage.transaction(async (tx) => {
        leaked.push(tx);
      });

      const [tx] = leaked;
      if (!tx) {
        throw new Error('Transaction was not started');
      }
      await expect(tx.saveAccessToken(accessToken('at-late'))).rejects.toThrow('Transaction already finished');
    });
  });

  describe('tokens', () => {
    it('should list revoked token ids', async () => {
      await storage.transaction(async (tx) => {
        await tx.saveAccessToken(accessToken('at-1'));
      });

      expect(await storage.tokens.revokeAccessToken('at-1', later)).toBe(true);
      expect(await storage.tokens.revokeAccessToken('at-1', later)).toBe(false);
      expect(await storage.tokens.isTokenIdRevoked('at-1-id')).toBe(true);
    });

    it('should delete expired tokens with their revocation entries', async () => {
      await storage.transaction(async (tx) => {
        await tx.saveAccessToken(accessToken('at-1'));
        await tx.saveRefreshToken(refreshToken('rt-1'));
      });
      await storage.tokens.revokeAccessToken('at-1', later);

      expect(await storage.tokens.deleteExpired(expiresAt)).toBe(1);
      expect(await storage.tokens.getAccessToken('at-1')).toBeNull();
      expect(await storage.tokens.isTokenIdRevoked('at-1-id')).toBe(false);
      expect(await storage.tokens.getRefreshToken('rt-1')).not.toBeNull();
    });
  });
});
