/**
 * Ledger storage services
 */

export {
  BaseLedgerStore,
  FileLedgerStore,
  MemoryLedgerStore,
  decodeLedger,
  encodeLedger,
  sortChronologically,
} from './ledger-store.js';
export type { LedgerStore } from './ledger-store.js';
export { writeFileAtomic, acquireLock, withFileLock } from './files.js';
export type { LockOptions, FileLock } from './files.js';
export { withLedger, setLedgerStoreFactory } from './session.js';
export type { LedgerStoreFactory } from './session.js';
export { ledgerDocumentSchema, parseLedgerDocument, emptyDocument } from './schema.js';
