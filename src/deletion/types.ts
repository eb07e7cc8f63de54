/**
 * Types for remote deletion after sync.
 */

/** What a deletion call targets */
export type DeletionKind = 'single-file' | 'directory-tree';

/** Tally of one or more deletion calls */
export interface DeletionOutcome {
  /** Remote files removed */
  removed: number;

  /** Remote files left in place because the budget was exhausted */
  skipped: number;

  /** Remote files whose removal failed */
  failed: number;

  /** Emptied remote directories removed (only with pruning enabled) */
  directoriesRemoved: number;
}

export interface DeletionBudgeterOptions {
  /** Delete-after-sync; when false every call is a no-op */
  enabled: boolean;

  /** Remove directories a tree deletion leaves empty, leaf-first */
  pruneEmptyDirectories: boolean;
}

export function emptyOutcome(): DeletionOutcome {
  return { removed: 0, skipped: 0, failed: 0, directoriesRemoved: 0 };
}

export function addOutcomes(a: DeletionOutcome, b: DeletionOutcome): DeletionOutcome {
  return {
    removed: a.removed + b.removed,
    skipped: a.skipped + b.skipped,
    failed: a.failed + b.failed,
    directoriesRemoved: a.directoriesRemoved + b.directoriesRemoved,
  };
}
