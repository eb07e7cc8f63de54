/**
 * Download cap for a remote store session.
 *
 * Decorates any RemoteStore and refuses further fetches once the cap has
 * been reached. Every other operation passes straight through.
 */

import type { Logger } from 'pino';
import type { RemoteEntry, RemoteStore } from './types.js';

export class DownloadCapReachedError extends Error {
  public readonly maxDownloads: number;

  constructor(maxDownloads: number) {
    super(`Download cap of ${maxDownloads} file(s) reached`);
    this.name = 'DownloadCapReachedError';
    this.maxDownloads = maxDownloads;
  }
}

export class BoundedRemoteStore implements RemoteStore {
  private readonly inner: RemoteStore;
  private readonly maxDownloads: number;
  private readonly logger: Logger;
  private _downloads = 0;

  constructor(inner: RemoteStore, maxDownloads: number, logger: Logger) {
    this.inner = inner;
    this.maxDownloads = maxDownloads;
    this.logger = logger.child({ component: 'bounded-store' });
  }

  /** Files fetched through this session so far */
  get downloads(): number {
    return this._downloads;
  }

  /** Whether further get() calls will be refused */
  get capReached(): boolean {
    return this._downloads >= this.maxDownloads;
  }

  list(remotePath: string): Promise<RemoteEntry[]> {
    return this.inner.list(remotePath);
  }

  isDirectory(remotePath: string): Promise<boolean> {
    return this.inner.isDirectory(remotePath);
  }

  async get(remotePath: string, localPath: string): Promise<void> {
    if (this.capReached) {
      throw new DownloadCapReachedError(this.maxDownloads);
    }

    await this.inner.get(remotePath, localPath);
    this._downloads++;

    if (this.capReached) {
      this.logger.info({ maxDownloads: this.maxDownloads }, 'Download cap reached');
    }
  }

  remove(remotePath: string): Promise<void> {
    return this.inner.remove(remotePath);
  }

  removeDirectory(remotePath: string): Promise<void> {
    return this.inner.removeDirectory(remotePath);
  }

  close(): Promise<void> {
    return this.inner.close();
  }
}
