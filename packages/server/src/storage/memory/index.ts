import type { IOAuthStorage, IStorageTransaction } from '../interfaces/index.js';
import { MemoryClientStorage } from './client-storage.js';
import { MemoryAuthorizationGrantStorage } from './authorization-grant-storage.js';
import { MemoryTokenStorage } from './token-storage.js';
import { MemoryStorageTransaction } from './transaction.js';

export { MemoryClientStorage } from './client-storage.js';
export { MemoryAuthorizationGrantStorage } from './authorization-grant-storage.js';
export { MemoryTokenStorage } from './token-storage.js';
export { MemoryStorageTransaction } from './transaction.js';

/**
 * In-memory storage with concrete store types exposed
 * (client registration and cleanup are not part of the engine's interface)
 */
export interface MemoryStorage extends IOAuthStorage {
  clients: MemoryClientStorage;
  grants: MemoryAuthorizationGrantStorage;
  tokens: MemoryTokenStorage;
}

/**
 * Create a complete in-memory storage implementation
 */
export function createMemoryStorage(): MemoryStorage {
  const clients = new MemoryClientStorage();
  const grants = new MemoryAuthorizationGrantStorage();
  const tokens = new MemoryTokenStorage();

  // Transactions run one at a time, in the order they were started
  let transactionLock: Promise<void> = Promise.resolve();

  return {
    clients,
    grants,
    tokens,
    async transaction<T>(work: (tx: IStorageTransaction) => Promise<T>): Promise<T> {
      const previous = transactionLock;
      let releaseLock: () => void = () => {};
      transactionLock = new Promise((resolve) => {
        releaseLock = resolve;
      });

      await previous;
      const tx = new MemoryStorageTransaction(grants, tokens);

      try {
        const result = await work(tx);
        tx.commit();
        return result;
      } catch (error) {
        tx.rollback();
        throw error;
      } finally {
        releaseLock();
      }
    },
  };
}
