import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import type { Logger } from 'pino';
import { SftpRemoteStore, toConnectOptions } from '../remote/sftp-store.js';
import type { SftpSession } from '../remote/sftp-store.js';
import { TransportError } from '../errors.js';

function createMockLogger(): Logger {
  return {
    child: () => createMockLogger(),
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  } as unknown as Logger;
}

function createMockSession() {
  return {
    list: vi.fn().mockResolvedValue([
      { type: 'd', name: 'archive' },
      { type: '-', name: 'orders.csv' },
      { type: 'l', name: 'latest.csv' },
    ]),
    exists: vi.fn().mockResolvedValue('d'),
    fastGet: vi.fn().mockResolvedValue('ok'),
    delete: vi.fn().mockResolvedValue('ok'),
    rmdir: vi.fn().mockResolvedValue('ok'),
    end: vi.fn().mockResolvedValue(true),
  };
}

describe('toConnectOptions', () => {
  it('should pass a password through', () => {
    expect(
      toConnectOptions({
        host: 'sftp.example.test',
        port: 2222,
        username: 'sync',
        credentials: { type: 'password', password: 'test-secret' },
      })
    ).toEqual({ host: 'sftp.example.test', port: 2222, username: 'sync', password: 'test-secret' });
  });

  it('should pass key material through in memory', () => {
    expect(
      toConnectOptions({
        host: 'sftp.example.test',
        port: 22,
        username: 'sync',
        credentials: { type: 'private-key', privateKey: 'test-key-material' },
      })
    ).toEqual({ host: 'sftp.example.test', port: 22, username: 'sync', privateKey: 'test-key-material' });
  });
});

describe('SftpRemoteStore', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'sftp-store-test-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('should map listing entries to remote entries', async () => {
    const session = createMockSession();
    const store = new SftpRemoteStore(session as unknown as SftpSession, createMockLogger());

    const entries = await store.list('/exports/');

    expect(session.list).toHaveBeenCalledWith('/exports/');
    expect(entries).toEqual([
      { path: '/exports/archive', name: 'archive', kind: 'directory' },
      { path: '/exports/orders.csv', name: 'orders.csv', kind: 'file' },
      { path: '/exports/latest.csv', name: 'latest.csv', kind: 'file' },
    ]);
  });

  it('should wrap listing failures in TransportError', async () => {
    const session = createMockSession();
    session.list.mockRejectedValue(new Error('No such file'));
    const store = new SftpRemoteStore(session as unknown as SftpSession, createMockLogger());

    await expect(store.list('/nope')).rejects.toThrow(TransportError);
    await expect(store.list('/nope')).rejects.toThrow('list failed: /nope: No such file');
  });

  it('should report directories from exists()', async () => {
    const session = createMockSession();
    session.exists.mockResolvedValueOnce('d').mockResolvedValueOnce('-').mockResolvedValueOnce(false);
    const store = new SftpRemoteStore(session as unknown as SftpSession, createMockLogger());

    expect(await store.isDirectory('/exports')).toBe(true);
    expect(await store.isDirectory('/exports/orders.csv')).toBe(false);
    expect(await store.isDirectory('/missing')).toBe(false);
  });

  it('should create the local parent directory before downloading', async () => {
    const session = createMockSession();
    const store = new SftpRemoteStore(session as unknown as SftpSession, createMockLogger());
    const localPath = path.join(tmpDir, 'a', 'b', 'orders.csv');

    await store.get('/exports/orders.csv', localPath);

    expect(fs.existsSync(path.join(tmpDir, 'a', 'b'))).toBe(true);
    expect(session.fastGet).toHaveBeenCalledWith('/exports/orders.csv', localPath);
  });

  it('should wrap download failures in TransportError', async () => {
    const session = createMockSession();
    session.fastGet.mockRejectedValue(new Error('Permission denied'));
    const store = new SftpRemoteStore(session as unknown as SftpSession, createMockLogger());

    await expect(store.get('/exports/orders.csv', path.join(tmpDir, 'orders.csv'))).rejects.toThrow(
      'download failed: /exports/orders.csv: Permission denied'
    );
  });

  it('should let removal failures through unwrapped', async () => {
    const session = createMockSession();
    session.delete.mockRejectedValue(new Error('Permission denied'));
    const store = new SftpRemoteStore(session as unknown as SftpSession, createMockLogger());

    const failure = store.remove('/exports/orders.csv');

    await expect(failure).rejects.toThrow('Permission denied');
    await expect(failure).rejects.not.toBeInstanceOf(TransportError);
  });

  it('should remove directories non-recursively and end the session', async () => {
    const session = createMockSession();
    const store = new SftpRemoteStore(session as unknown as SftpSession, createMockLogger());

    await store.removeDirectory('/exports/archive');
    await store.close();

    expect(session.rmdir).toHaveBeenCalledWith('/exports/archive', false);
    expect(session.end).toHaveBeenCalledTimes(1);
  });
});
