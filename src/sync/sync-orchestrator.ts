/**
 * SyncOrchestrator - drives one pull run from the remote store.
 *
 * Integrates:
 * - SelectionEngine: decides which remote files to fetch
 * - DeletionBudgeter: removes remote sources under a run-wide budget
 * - Reconciler + LedgerStore: incremental keep/discard against content hashes
 *
 * Phases run strictly in order: connect, download, delete (when
 * delete-after-sync is on), reconcile (when incremental mode is on). Any
 * failure aborts the run and leaves the ledger file untouched.
 */

import { EventEmitter } from 'node:events';
import type { Logger } from 'pino';
import { validateSyncConfig } from '../config/config.js';
import type { SyncConfig } from '../config/types.js';
import { DeletionBudget } from '../deletion/deletion-budget.js';
import { DeletionBudgeter } from '../deletion/deletion-budgeter.js';
import { addOutcomes, emptyOutcome } from '../deletion/types.js';
import type { DeletionOutcome } from '../deletion/types.js';
import { ConfigurationError } from '../errors.js';
import { LedgerStore } from '../ledger/ledger-store.js';
import { Reconciler } from '../ledger/reconciler.js';
import type { ReconcileResult } from '../ledger/reconciler.js';
import { BoundedRemoteStore } from '../remote/bounded-store.js';
import { connectSftp } from '../remote/sftp-store.js';
import type { RemoteStore, RemoteStoreConnector } from '../remote/types.js';
import { SelectionEngine } from '../selection/selection-engine.js';
import type { SelectedFile } from '../selection/types.js';
import { createRemotePathResolver } from './remote-path.js';
import type {
  SyncOrchestratorEvents,
  SyncOrchestratorOptions,
  SyncPhase,
  SyncRunResult,
} from './types.js';

/**
 * Typed event emitter interface for the orchestrator.
 */
export interface TypedSyncOrchestratorEmitter {
  on<K extends keyof SyncOrchestratorEvents>(
    event: K,
    listener: SyncOrchestratorEvents[K]
  ): this;
  off<K extends keyof SyncOrchestratorEvents>(
    event: K,
    listener: SyncOrchestratorEvents[K]
  ): this;
  emit<K extends keyof SyncOrchestratorEvents>(
    event: K,
    ...args: Parameters<SyncOrchestratorEvents[K]>
  ): boolean;
}

interface DownloadPhaseResult {
  files: SelectedFile[];
  /** local path -> remote path, last download wins */
  sources: Map<string, string>;
  truncated: boolean;
}

export class SyncOrchestrator
  extends EventEmitter
  implements TypedSyncOrchestratorEmitter
{
  private readonly config: SyncConfig;
  private readonly logger: Logger;
  private readonly rootLogger: Logger;
  private readonly connect: RemoteStoreConnector;
  private phase: SyncPhase = 'connect';

  constructor(config: SyncConfig, logger: Logger, options: SyncOrchestratorOptions = {}) {
    super();

    const errors = validateSyncConfig(config);
    if (errors.length > 0) {
      throw new ConfigurationError(errors);
    }

    this.config = config;
    this.rootLogger = logger;
    this.logger = logger.child({ component: 'sync-orchestrator' });
    this.connect = options.connect ?? ((connection) => connectSftp(connection, logger));
  }

  /** Phase the current (or last) run reached */
  get currentPhase(): SyncPhase {
    return this.phase;
  }

  /**
   * Run one sync end to end.
   *
   * @throws ConfigurationError for an unreadable ledger, TransportError for
   *   connection, listing or download failures
   */
  async run(): Promise<SyncRunResult> {
    const startTime = Date.now();
    const { config } = this;

    // Read the ledger before connecting so a broken state file fails fast
    const ledger =
      config.incrementalMode && config.stateFilePath ? new LedgerStore(config.stateFilePath) : null;
    ledger?.load();

    this.enterPhase('connect');
    let session: RemoteStore;
    try {
      session = await this.connect(config.connection);
    } catch (err) {
      throw this.fail(err);
    }

    const bounded =
      config.maxDownloadCount !== null
        ? new BoundedRemoteStore(session, config.maxDownloadCount, this.rootLogger)
        : null;
    const store = bounded ?? session;

    try {
      const download = await this.downloadPhase(store, bounded);

      const budget = new DeletionBudget(config.maxFileCount);
      const budgeter = new DeletionBudgeter(
        store,
        budget,
        { enabled: config.deleteAfterSync, pruneEmptyDirectories: config.pruneEmptyDirectories },
        this.rootLogger
      );

      let deletion = emptyOutcome();
      if (config.deleteAfterSync) {
        this.enterPhase('delete');
        deletion = await this.deletePhase(budgeter, download);
      }

      let reconcile: ReconcileResult | null = null;
      if (ledger) {
        this.enterPhase('reconcile');
        reconcile = await new Reconciler(ledger, budgeter, this.rootLogger).reconcile({
          localRoot: config.targetDir,
          resolveRemotePath: createRemotePathResolver(config.mode, config.targetDir, download.sources),
          excludePaths: [ledger.path],
        });
        ledger.save();
        this.logger.info({ stateFilePath: ledger.path, entries: ledger.size }, 'Ledger saved');
      }

      this.enterPhase('done');
      const result: SyncRunResult = {
        mode: config.mode.kind,
        downloaded: download.files.length,
        downloadTruncated: download.truncated,
        deletion,
        reconcile,
        totalRemoved: budget.removedCount,
        durationMs: Date.now() - startTime,
      };

      this.logger.info(
        {
          mode: result.mode,
          downloaded: result.downloaded,
          totalRemoved: result.totalRemoved,
          durationMs: result.durationMs,
        },
        'Sync run complete'
      );
      this.emit('runComplete', result);
      return result;
    } catch (err) {
      throw this.fail(err);
    } finally {
      await this.closeSession(store);
    }
  }

  private async downloadPhase(
    store: RemoteStore,
    bounded: BoundedRemoteStore | null
  ): Promise<DownloadPhaseResult> {
    this.enterPhase('download');
    const engine = new SelectionEngine(store, this.rootLogger);
    const files: SelectedFile[] = [];
    const sources = new Map<string, string>();
    let truncated = false;

    for await (const file of engine.select(this.config.mode, this.config.targetDir)) {
      if (bounded?.capReached) {
        truncated = true;
        break;
      }

      this.logger.info({ remotePath: file.remotePath, localPath: file.localPath }, 'Downloading');
      await store.get(file.remotePath, file.localPath);

      files.push(file);
      sources.set(file.localPath, file.remotePath);
      this.emit('fileDownloaded', file);
    }

    this.logger.info({ downloaded: files.length, truncated }, 'Download phase complete');
    return { files, sources, truncated };
  }

  /**
   * Remove the remote sources of this run's downloads. A full recursive
   * clone removes the whole remote tree; everything else, including a clone
   * cut short by the download cap, removes exactly the files downloaded.
   */
  private async deletePhase(
    budgeter: DeletionBudgeter,
    download: DownloadPhaseResult
  ): Promise<DeletionOutcome> {
    const { mode } = this.config;

    if (mode.kind === 'recursive-clone' && !download.truncated) {
      return budgeter.apply('directory-tree', mode.root);
    }

    let outcome = emptyOutcome();
    for (const remotePath of new Set(download.files.map((f) => f.remotePath))) {
      outcome = addOutcomes(outcome, await budgeter.apply('single-file', remotePath));
    }

    this.logger.info({ ...outcome }, 'Delete phase complete');
    return outcome;
  }

  private enterPhase(phase: SyncPhase): void {
    this.phase = phase;
    this.logger.debug({ phase }, 'Entering phase');
    this.emit('phaseStart', phase);
  }

  private fail(err: unknown): Error {
    const error = err instanceof Error ? err : new Error(String(err));
    this.logger.error({ err: error, phase: this.phase }, 'Sync run failed');
    this.emit('runFailed', this.phase, error);
    return error;
  }

  private async closeSession(store: RemoteStore): Promise<void> {
    try {
      await store.close();
    } catch (err) {
      this.logger.warn({ err }, 'Failed to close remote session');
    }
  }
}
