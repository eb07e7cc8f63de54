/**
 * Types for the remote file store capability.
 */

export type RemoteEntryKind = 'file' | 'directory';

/** One entry of a remote directory listing */
export interface RemoteEntry {
  /** Full remote path of the entry */
  path: string;

  /** Base name of the entry */
  name: string;

  kind: RemoteEntryKind;
}

export type RemoteCredentials =
  | { type: 'password'; password: string }
  | { type: 'private-key'; privateKey: string };

/** Everything needed to open a session against the remote host */
export interface ConnectionOptions {
  host: string;
  port: number;
  username: string;
  credentials: RemoteCredentials;
}

/**
 * An open session against a remote file store.
 *
 * Listing, download and connection failures reject with TransportError.
 * remove/removeDirectory reject with the underlying error; callers decide
 * whether the failure is fatal.
 */
export interface RemoteStore {
  /** List the direct children of a remote directory */
  list(remotePath: string): Promise<RemoteEntry[]>;

  /** Whether the remote path exists and is a directory */
  isDirectory(remotePath: string): Promise<boolean>;

  /** Download one remote file, creating the local parent directory if missing */
  get(remotePath: string, localPath: string): Promise<void>;

  /** Remove one remote file */
  remove(remotePath: string): Promise<void>;

  /** Remove an empty remote directory; fails if it still has children */
  removeDirectory(remotePath: string): Promise<void>;

  /** End the session */
  close(): Promise<void>;
}

/** Opens sessions; swapped for an in-process fake in tests */
export type RemoteStoreConnector = (options: ConnectionOptions) => Promise<RemoteStore>;

export const DEFAULT_SFTP_PORT = 22;
