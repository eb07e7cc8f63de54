/**
 * Deletion budgeter - removes remote sources after a sync.
 *
 * Every removal goes through the run's DeletionBudget. A failed removal is
 * logged and tallied; it never aborts the rest of the deletion work.
 */

import type { Logger } from 'pino';
import { DeletionError } from '../errors.js';
import type { RemoteStore } from '../remote/types.js';
import { DeletionBudget } from './deletion-budget.js';
import { emptyOutcome } from './types.js';
import type { DeletionBudgeterOptions, DeletionKind, DeletionOutcome } from './types.js';

export class DeletionBudgeter {
  private readonly store: RemoteStore;
  private readonly budget: DeletionBudget;
  private readonly options: DeletionBudgeterOptions;
  private readonly logger: Logger;

  constructor(
    store: RemoteStore,
    budget: DeletionBudget,
    options: DeletionBudgeterOptions,
    logger: Logger
  ) {
    this.store = store;
    this.budget = budget;
    this.options = options;
    this.logger = logger.child({ component: 'deletion-budgeter' });
  }

  get enabled(): boolean {
    return this.options.enabled;
  }

  /**
   * Remove a single remote file or every file below a remote directory.
   *
   * Files already removed earlier in the run are not removed again and
   * are not counted.
   */
  async apply(kind: DeletionKind, target: string): Promise<DeletionOutcome> {
    const outcome = emptyOutcome();

    if (!this.options.enabled) {
      return outcome;
    }

    if (kind === 'single-file') {
      await this.removeFile(target, outcome);
    } else {
      await this.removeTree(target, outcome, true);

      this.logger.info(
        { target, ...outcome, remaining: this.budget.remaining },
        'Directory tree deletion complete'
      );
    }

    return outcome;
  }

  /**
   * Remove one file if the budget allows.
   * Returns true when the file is gone from the remote store.
   */
  private async removeFile(remotePath: string, outcome: DeletionOutcome): Promise<boolean> {
    if (this.budget.hasRemoved(remotePath)) {
      return true;
    }

    if (this.budget.exhausted) {
      outcome.skipped++;
      this.logger.debug({ remotePath, maxCount: this.budget.maxCount }, 'Deletion budget exhausted, skipping');
      return false;
    }

    try {
      await this.store.remove(remotePath);
    } catch (err) {
      const error = new DeletionError(remotePath, err);
      outcome.failed++;
      this.logger.warn({ err: error, remotePath }, 'Failed to remove remote file');
      return false;
    }

    this.budget.record(remotePath);
    outcome.removed++;
    this.logger.debug({ remotePath, removedCount: this.budget.removedCount }, 'Removed remote file');
    return true;
  }

  /**
   * Post-order walk in listing order. Returns true when every file below
   * the directory was removed, which is when it may be pruned.
   */
  private async removeTree(
    remoteDir: string,
    outcome: DeletionOutcome,
    isRoot: boolean
  ): Promise<boolean> {
    const entries = await this.store.list(remoteDir);
    let emptied = true;

    for (const entry of entries) {
      const gone =
        entry.kind === 'directory'
          ? await this.removeTree(entry.path, outcome, false)
          : await this.removeFile(entry.path, outcome);

      emptied = emptied && gone;
    }

    if (isRoot || !emptied || !this.options.pruneEmptyDirectories) {
      return emptied;
    }

    try {
      await this.store.removeDirectory(remoteDir);
    } catch (err) {
      this.logger.warn(
        { err: new DeletionError(remoteDir, err), remoteDir },
        'Failed to remove emptied remote directory'
      );
      return false;
    }

    outcome.directoriesRemoved++;
    return true;
  }
}
