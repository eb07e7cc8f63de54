/**
 * SFTP-backed remote store.
 *
 * Wraps ssh2-sftp-client behind the RemoteStore interface. Listing,
 * download and connection failures are rethrown as TransportError so the
 * orchestrator can abort the run on them.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import SftpClient from 'ssh2-sftp-client';
import type { Logger } from 'pino';
import { TransportError, errorMessage } from '../errors.js';
import type { ConnectionOptions, RemoteEntry, RemoteStore } from './types.js';

/** The subset of ssh2-sftp-client a store session uses */
export type SftpSession = Pick<SftpClient, 'list' | 'exists' | 'fastGet' | 'delete' | 'rmdir' | 'end'>;

export function toConnectOptions(options: ConnectionOptions): SftpClient.ConnectOptions {
  const connectOptions: SftpClient.ConnectOptions = {
    host: options.host,
    port: options.port,
    username: options.username,
  };

  if (options.credentials.type === 'password') {
    connectOptions.password = options.credentials.password;
  } else {
    connectOptions.privateKey = options.credentials.privateKey;
  }

  return connectOptions;
}

export class SftpRemoteStore implements RemoteStore {
  private readonly client: SftpSession;
  private readonly logger: Logger;

  constructor(client: SftpSession, logger: Logger) {
    this.client = client;
    this.logger = logger.child({ component: 'sftp-store' });
  }

  async list(remotePath: string): Promise<RemoteEntry[]> {
    try {
      const items = await this.client.list(remotePath);
      return items.map((item): RemoteEntry => ({
        path: path.posix.join(remotePath, item.name),
        name: item.name,
        kind: item.type === 'd' ? 'directory' : 'file',
      }));
    } catch (err) {
      throw new TransportError('list', `${remotePath}: ${errorMessage(err)}`, err);
    }
  }

  async isDirectory(remotePath: string): Promise<boolean> {
    try {
      return (await this.client.exists(remotePath)) === 'd';
    } catch (err) {
      throw new TransportError('stat', `${remotePath}: ${errorMessage(err)}`, err);
    }
  }

  async get(remotePath: string, localPath: string): Promise<void> {
    try {
      await fs.promises.mkdir(path.dirname(localPath), { recursive: true });
      await this.client.fastGet(remotePath, localPath);
      this.logger.debug({ remotePath, localPath }, 'File downloaded');
    } catch (err) {
      throw new TransportError('download', `${remotePath}: ${errorMessage(err)}`, err);
    }
  }

  async remove(remotePath: string): Promise<void> {
    await this.client.delete(remotePath);
  }

  async removeDirectory(remotePath: string): Promise<void> {
    await this.client.rmdir(remotePath, false);
  }

  async close(): Promise<void> {
    await this.client.end();
  }
}

/**
 * Open an SFTP session.
 *
 * Private key material is passed to the SSH layer in memory.
 */
export async function connectSftp(
  options: ConnectionOptions,
  logger: Logger
): Promise<RemoteStore> {
  const client = new SftpClient();

  try {
    await client.connect(toConnectOptions(options));
  } catch (err) {
    throw new TransportError(
      'connect',
      `${options.username}@${options.host}:${options.port}: ${errorMessage(err)}`,
      err
    );
  }

  logger.info(
    { host: options.host, port: options.port, auth: options.credentials.type },
    'Connected to remote store'
  );

  return new SftpRemoteStore(client, logger);
}
