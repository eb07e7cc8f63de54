/**
 * Incremental reconciliation of downloaded files against the ledger.
 *
 * Walks the local tree, hashes each file and compares it with the digest
 * recorded for its remote source:
 * - same digest: already captured by an earlier run, so the local copy is
 *   discarded and the remote copy left alone
 * - new or changed: the local copy is kept and the remote source removed
 *   through the deletion budgeter (when delete-after-sync is on)
 * Either way the fresh digest is written into the ledger.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import type { Logger } from 'pino';
import type { DeletionBudgeter } from '../deletion/deletion-budgeter.js';
import { addOutcomes, emptyOutcome } from '../deletion/types.js';
import type { DeletionOutcome } from '../deletion/types.js';
import { hashFile } from './file-hasher.js';
import type { LedgerStore } from './ledger-store.js';

export interface ReconcileOptions {
  /** Local tree to walk */
  localRoot: string;

  /** Maps a local file to the remote path it was synced from */
  resolveRemotePath: (localPath: string) => string;

  /** Absolute local paths that are never treated as synced content */
  excludePaths?: string[];
}

export interface ReconcileResult {
  /** Local files hashed */
  scanned: number;

  /** New or changed files left in place */
  kept: number;

  /** Unchanged files deleted locally */
  discarded: number;

  /** Remote deletions triggered by kept files */
  remoteDeletion: DeletionOutcome;
}

/**
 * Swap the first occurrence of localRoot in a local path for remoteRoot.
 * Both local paths are normalised (dot segments, separators to '/') first.
 */
export function substituteRoot(localPath: string, localRoot: string, remoteRoot: string): string {
  const normalized = path.normalize(localPath).split(path.sep).join('/');
  const from = path.normalize(localRoot).split(path.sep).join('/').replace(/\/+$/, '');
  const to = remoteRoot.replace(/\/+$/, '');
  return normalized.replace(from, () => to);
}

/** Every regular file below a local directory (order unspecified) */
export async function* walkLocalFiles(root: string): AsyncGenerator<string> {
  const entries = await fs.promises.readdir(root, { withFileTypes: true });

  for (const entry of entries) {
    const fullPath = path.join(root, entry.name);
    if (entry.isDirectory()) {
      yield* walkLocalFiles(fullPath);
    } else if (entry.isFile()) {
      yield fullPath;
    }
  }
}

export class Reconciler {
  private readonly ledger: LedgerStore;
  private readonly budgeter: DeletionBudgeter;
  private readonly logger: Logger;

  constructor(ledger: LedgerStore, budgeter: DeletionBudgeter, logger: Logger) {
    this.ledger = ledger;
    this.budgeter = budgeter;
    this.logger = logger.child({ component: 'reconciler' });
  }

  /**
   * Reconcile the local tree against the ledger, updating it in place.
   * The caller persists the ledger.
   */
  async reconcile(options: ReconcileOptions): Promise<ReconcileResult> {
    const result: ReconcileResult = {
      scanned: 0,
      kept: 0,
      discarded: 0,
      remoteDeletion: emptyOutcome(),
    };

    if (!fs.existsSync(options.localRoot)) {
      this.logger.info({ localRoot: options.localRoot }, 'Local root missing, nothing to reconcile');
      return result;
    }

    const excluded = new Set((options.excludePaths ?? []).map((p) => path.resolve(p)));

    for await (const localPath of walkLocalFiles(options.localRoot)) {
      if (excluded.has(path.resolve(localPath))) {
        continue;
      }

      const remotePath = options.resolveRemotePath(localPath);
      const digest = await hashFile(localPath);
      const previous = this.ledger.get(remotePath);
      result.scanned++;

      if (previous === digest) {
        await fs.promises.unlink(localPath);
        result.discarded++;
        this.logger.debug({ localPath, remotePath }, 'Unchanged since last run, discarded local copy');
      } else {
        result.kept++;
        const outcome = await this.budgeter.apply('single-file', remotePath);
        result.remoteDeletion = addOutcomes(result.remoteDeletion, outcome);
        this.logger.debug(
          { localPath, remotePath, changed: previous !== undefined },
          'New content, kept local copy'
        );
      }

      this.ledger.set(remotePath, digest);
    }

    this.logger.info(
      {
        scanned: result.scanned,
        kept: result.kept,
        discarded: result.discarded,
        remoteRemoved: result.remoteDeletion.removed,
      },
      'Reconciliation complete'
    );

    return result;
  }
}
