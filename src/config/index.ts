export { parseSyncConfig, validateSyncConfig, readJsonFile } from './config.js';
export type { RawSyncConfig, SyncConfig, ParseConfigOptions } from './types.js';
