export { hashFile, HASH_BLOCK_SIZE } from './file-hasher.js';
export type { HashAlgorithm } from './file-hasher.js';
export { LedgerStore } from './ledger-store.js';
export type { LedgerEntries } from './ledger-store.js';
export { Reconciler, substituteRoot, walkLocalFiles } from './reconciler.js';
export type { ReconcileOptions, ReconcileResult } from './reconciler.js';
