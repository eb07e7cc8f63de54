/**
 * Remote file selection.
 *
 * Turns the configured SelectionMode into a lazy sequence of files to
 * download, each paired with its local destination. Listing happens on
 * demand as the sequence is consumed, so a consumer that stops early
 * (e.g. on a download cap) never lists the rest of the tree.
 */

import * as path from 'node:path';
import type { Logger } from 'pino';
import { TransportError } from '../errors.js';
import type { RemoteEntry, RemoteStore } from '../remote/types.js';
import type { CloneLayout, SelectedFile, SelectionMode } from './types.js';

export class SelectionEngine {
  private readonly store: RemoteStore;
  private readonly logger: Logger;

  constructor(store: RemoteStore, logger: Logger) {
    this.store = store;
    this.logger = logger.child({ component: 'selection-engine' });
  }

  /**
   * Enumerate the files to fetch for a mode.
   *
   * Listing errors propagate and end the sequence.
   */
  async *select(mode: SelectionMode, targetDir: string): AsyncGenerator<SelectedFile> {
    this.logger.info({ mode: mode.kind, targetDir }, 'Selecting remote files');

    switch (mode.kind) {
      case 'flat':
        yield* this.selectFlat(mode.files, targetDir);
        break;

      case 'recursive-clone':
        await this.requireDirectory(mode.root);
        yield* this.selectTree(mode.root, mode.layout, targetDir);
        break;

      case 'exact-directory':
        await this.requireDirectory(mode.root);
        yield* this.selectDirectChildren(mode.root, targetDir);
        break;

      case 'pattern-filtered':
        await this.requireDirectory(mode.root);
        yield* this.selectByPrefix(mode.root, mode.prefixes, targetDir);
        break;
    }
  }

  /**
   * Walk every file below a remote directory, in listing order,
   * descending into each subdirectory as it is listed.
   */
  async *walkFiles(remoteDir: string): AsyncGenerator<RemoteEntry> {
    const entries = await this.store.list(remoteDir);

    for (const entry of entries) {
      if (entry.kind === 'directory') {
        yield* this.walkFiles(entry.path);
      } else {
        yield entry;
      }
    }
  }

  /** Base name only: sources sharing a name land on the same local path */
  private *selectFlat(files: string[], targetDir: string): Generator<SelectedFile> {
    for (const remotePath of files) {
      yield {
        remotePath,
        localPath: path.join(targetDir, path.posix.basename(remotePath)),
      };
    }
  }

  private async *selectTree(
    root: string,
    layout: CloneLayout,
    targetDir: string
  ): AsyncGenerator<SelectedFile> {
    for await (const entry of this.walkFiles(root)) {
      const localPath =
        layout === 'mirrored'
          ? path.join(targetDir, entry.path)
          : path.join(targetDir, path.posix.relative(root, entry.path));

      yield { remotePath: entry.path, localPath };
    }
  }

  private async *selectDirectChildren(root: string, targetDir: string): AsyncGenerator<SelectedFile> {
    const entries = await this.store.list(root);

    for (const entry of entries) {
      if (entry.kind === 'file') {
        yield { remotePath: entry.path, localPath: path.join(targetDir, entry.name) };
      }
    }
  }

  /**
   * Collect files whose name starts with a prefix, plus every file below a
   * directory whose name starts with one. Every subdirectory is descended
   * into whether it matches or not; each file is emitted at most once.
   */
  private async *selectByPrefix(
    root: string,
    prefixes: string[],
    targetDir: string
  ): AsyncGenerator<SelectedFile> {
    const emitted = new Set<string>();

    for await (const entry of this.walkMatching(root, prefixes, false)) {
      if (emitted.has(entry.path)) {
        continue;
      }
      emitted.add(entry.path);

      yield {
        remotePath: entry.path,
        localPath: path.join(targetDir, path.posix.relative(root, entry.path)),
      };
    }

    this.logger.debug({ root, prefixes, matched: emitted.size }, 'Prefix walk complete');
  }

  private async *walkMatching(
    remoteDir: string,
    prefixes: string[],
    insideMatch: boolean
  ): AsyncGenerator<RemoteEntry> {
    const entries = await this.store.list(remoteDir);

    for (const entry of entries) {
      const matches = insideMatch || prefixes.some((prefix) => entry.name.startsWith(prefix));

      if (entry.kind === 'directory') {
        yield* this.walkMatching(entry.path, prefixes, matches);
      } else if (matches) {
        yield entry;
      }
    }
  }

  private async requireDirectory(remotePath: string): Promise<void> {
    if (!(await this.store.isDirectory(remotePath))) {
      throw new TransportError('select', `${remotePath} is not a remote directory`);
    }
  }
}
