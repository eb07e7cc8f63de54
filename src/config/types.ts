/**
 * Types for the sync configuration.
 *
 * RawSyncConfig mirrors the JSON config file; SyncConfig is the validated,
 * typed form the orchestrator runs from.
 */

import type { ConnectionOptions } from '../remote/types.js';
import type { SelectionMode } from '../selection/types.js';

/** Shape of the JSON config file (every key optional until validated) */
export interface RawSyncConfig {
  host?: unknown;
  port?: unknown;
  username?: unknown;
  password?: unknown;
  private_key?: unknown;
  path_prefix?: unknown;
  files?: unknown;
  target_dir?: unknown;
  recursive_clone?: unknown;
  exact_directory?: unknown;
  tables?: unknown;
  delete_after_sync?: unknown;
  max_file_count?: unknown;
  max_download_count?: unknown;
  prune_empty_directories?: unknown;
  incremental_mode?: unknown;
}

/** Validated configuration for one sync run */
export interface SyncConfig {
  connection: ConnectionOptions;

  /** Which remote files to fetch */
  mode: SelectionMode;

  /** Local root that downloads land under */
  targetDir: string;

  /** Remove remote sources once downloaded */
  deleteAfterSync: boolean;

  /** Cap on remote deletions for the whole run (null = unlimited) */
  maxFileCount: number | null;

  /** Cap on downloads per session (null = unlimited) */
  maxDownloadCount: number | null;

  /** Remove remote directories emptied by a tree deletion */
  pruneEmptyDirectories: boolean;

  /** Reconcile downloads against the content-hash ledger */
  incrementalMode: boolean;

  /** Ledger location (required when incrementalMode is on) */
  stateFilePath: string | null;
}

export interface ParseConfigOptions {
  /** Ledger path from the command line */
  stateFilePath?: string;
}
