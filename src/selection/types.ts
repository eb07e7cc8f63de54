/**
 * Types for remote file selection.
 */

/**
 * Where a recursive clone lands locally:
 * - relative: paths below the remote root are reproduced under the target dir
 * - mirrored: the full remote path is reproduced under the target dir
 */
export type CloneLayout = 'relative' | 'mirrored';

/** Traversal mode, fixed for the whole run */
export type SelectionMode =
  | { kind: 'flat'; files: string[] }
  | { kind: 'recursive-clone'; root: string; layout: CloneLayout }
  | { kind: 'exact-directory'; root: string }
  | { kind: 'pattern-filtered'; root: string; prefixes: string[] };

export type SelectionModeKind = SelectionMode['kind'];

/** A remote file chosen for download and its local destination */
export interface SelectedFile {
  remotePath: string;
  localPath: string;
}
