export { SyncOrchestrator } from './sync-orchestrator.js';
export type { TypedSyncOrchestratorEmitter } from './sync-orchestrator.js';
export { createRemotePathResolver } from './remote-path.js';
export type {
  SyncPhase,
  SyncRunResult,
  SyncOrchestratorEvents,
  SyncOrchestratorOptions,
} from './types.js';
