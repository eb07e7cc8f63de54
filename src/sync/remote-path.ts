/**
 * Maps a local file back to the remote path it was synced from.
 */

import * as path from 'node:path';
import { substituteRoot } from '../ledger/reconciler.js';
import type { SelectionMode } from '../selection/types.js';

/**
 * Build the resolver the reconciler uses to key the ledger.
 *
 * Files fetched in this run resolve to their recorded source. Anything
 * else left over in the target directory resolves by the mode's layout.
 */
export function createRemotePathResolver(
  mode: SelectionMode,
  targetDir: string,
  downloaded: ReadonlyMap<string, string>
): (localPath: string) => string {
  const byLayout = layoutResolver(mode, targetDir);

  return (localPath: string): string => downloaded.get(localPath) ?? byLayout(localPath);
}

function layoutResolver(mode: SelectionMode, targetDir: string): (localPath: string) => string {
  switch (mode.kind) {
    case 'flat': {
      // Later entries win, matching which download overwrote the local file
      const byName = new Map<string, string>();
      for (const remotePath of mode.files) {
        byName.set(path.posix.basename(remotePath), remotePath);
      }
      return (localPath) =>
        byName.get(path.basename(localPath)) ?? substituteRoot(localPath, targetDir, '');
    }

    case 'recursive-clone':
      if (mode.layout === 'mirrored') {
        const leading = mode.root.startsWith('/') ? '/' : '';
        return (localPath) => leading + substituteRoot(localPath, targetDir, '').replace(/^\/+/, '');
      }
      return (localPath) => substituteRoot(localPath, targetDir, mode.root);

    case 'exact-directory':
    case 'pattern-filtered':
      return (localPath) => substituteRoot(localPath, targetDir, mode.root);
  }
}
