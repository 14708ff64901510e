/**
 * Ledger sessions: lock, load, run, flush if mutated, unlock
 */

import { getConfig } from '../../config/index.js';
import { logger } from '../../utils/logger.js';
import { withFileLock } from './files.js';
import { FileLedgerStore } from './ledger-store.js';
import type { LedgerStore } from './ledger-store.js';

export type LedgerStoreFactory = (path: string) => LedgerStore;

const defaultFactory: LedgerStoreFactory = (path) => new FileLedgerStore(path);
let storeFactory: LedgerStoreFactory = defaultFactory;

/**
 * Replace the store implementation (for testing); null restores the default
 */
export function setLedgerStoreFactory(factory: LedgerStoreFactory | null): void {
  storeFactory = factory ?? defaultFactory;
}

/**
 * Run fn against a freshly loaded ledger under the document lock.
 * A failed flush propagates and leaves the previous document in place.
 */
export async function withLedger<T>(fn: (store: LedgerStore) => T | Promise<T>): Promise<T> {
  const config = getConfig();
  const path = config.dataPath;

  return withFileLock(path, { timeoutMs: config.lock.timeoutMs, staleMs: config.lock.staleMs }, async () => {
    const store = storeFactory(path);
    await store.load();

    const result = await fn(store);

    if (store.dirty) {
      await store.flush();
      logger.debug(`Ledger ${path} saved`);
    }
    return result;
  });
}
