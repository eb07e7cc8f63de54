/**
 * Types for the sync orchestrator.
 */

import type { DeletionOutcome } from '../deletion/types.js';
import type { ReconcileResult } from '../ledger/reconciler.js';
import type { RemoteStoreConnector } from '../remote/types.js';
import type { SelectedFile, SelectionModeKind } from '../selection/types.js';

/** Steps of a run, in order */
export type SyncPhase = 'connect' | 'download' | 'delete' | 'reconcile' | 'done';

export interface SyncOrchestratorOptions {
  /** Opens the remote session (default: SFTP) */
  connect?: RemoteStoreConnector;
}

/** Result of one complete run */
export interface SyncRunResult {
  mode: SelectionModeKind;

  /** Files fetched from the remote store */
  downloaded: number;

  /** Whether the download cap stopped selection before it was exhausted */
  downloadTruncated: boolean;

  /** Delete phase tally (zero when delete-after-sync is off) */
  deletion: DeletionOutcome;

  /** Reconcile phase result (null when incremental mode is off) */
  reconcile: ReconcileResult | null;

  /** Remote files removed across every phase */
  totalRemoved: number;

  /** Wall-clock duration of the run in milliseconds */
  durationMs: number;
}

/** Events emitted by the SyncOrchestrator */
export interface SyncOrchestratorEvents {
  /** A phase started */
  phaseStart: (phase: SyncPhase) => void;

  /** A file was downloaded */
  fileDownloaded: (file: SelectedFile) => void;

  /** The run finished and the ledger (if any) was saved */
  runComplete: (result: SyncRunResult) => void;

  /** The run aborted; nothing was committed to the ledger */
  runFailed: (phase: SyncPhase, error: Error) => void;
}
