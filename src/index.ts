// Configuration
export { parseSyncConfig, validateSyncConfig, readJsonFile } from './config/index.js';
export type { RawSyncConfig, SyncConfig, ParseConfigOptions } from './config/index.js';

// Errors
export { ConfigurationError, TransportError, DeletionError } from './errors.js';

// Logging
export { createLogger } from './logger.js';
export type { CreateLoggerOptions } from './logger.js';

// Remote store
export {
  SftpRemoteStore,
  connectSftp,
  toConnectOptions,
  BoundedRemoteStore,
  DownloadCapReachedError,
  DEFAULT_SFTP_PORT,
} from './remote/index.js';

export type {
  SftpSession,
  RemoteEntry,
  RemoteEntryKind,
  RemoteCredentials,
  ConnectionOptions,
  RemoteStore,
  RemoteStoreConnector,
} from './remote/index.js';

// Selection
export { SelectionEngine } from './selection/index.js';
export type { CloneLayout, SelectionMode, SelectionModeKind, SelectedFile } from './selection/index.js';

// Deletion
export { DeletionBudget, DeletionBudgeter, emptyOutcome, addOutcomes } from './deletion/index.js';
export type { DeletionKind, DeletionOutcome, DeletionBudgeterOptions } from './deletion/index.js';

// Incremental ledger
export {
  hashFile,
  HASH_BLOCK_SIZE,
  LedgerStore,
  Reconciler,
  substituteRoot,
  walkLocalFiles,
} from './ledger/index.js';

export type { HashAlgorithm, LedgerEntries, ReconcileOptions, ReconcileResult } from './ledger/index.js';

// Orchestration
export { SyncOrchestrator, createRemotePathResolver } from './sync/index.js';
export type {
  TypedSyncOrchestratorEmitter,
  SyncPhase,
  SyncRunResult,
  SyncOrchestratorEvents,
  SyncOrchestratorOptions,
} from './sync/index.js';

// Command
export { executeSync, formatSummary, registerSyncCommand } from './commands/sync.js';
export type { SyncCommandOptions } from './commands/sync.js';
