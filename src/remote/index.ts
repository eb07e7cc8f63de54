export { SftpRemoteStore, connectSftp, toConnectOptions } from './sftp-store.js';
export type { SftpSession } from './sftp-store.js';
export { BoundedRemoteStore, DownloadCapReachedError } from './bounded-store.js';
export type {
  RemoteEntry,
  RemoteEntryKind,
  RemoteCredentials,
  ConnectionOptions,
  RemoteStore,
  RemoteStoreConnector,
} from './types.js';
export { DEFAULT_SFTP_PORT } from './types.js';
