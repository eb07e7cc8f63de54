/**
 * Sync configuration parsing and validation.
 *
 * parseSyncConfig turns the raw JSON object into a SyncConfig, throwing a
 * ConfigurationError that lists every problem found. Nothing here touches
 * the network, so a bad config always fails before a connection attempt.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { ConfigurationError, errorMessage } from '../errors.js';
import { DEFAULT_SFTP_PORT } from '../remote/types.js';
import type { RemoteCredentials } from '../remote/types.js';
import type { SelectionMode } from '../selection/types.js';
import type { ParseConfigOptions, RawSyncConfig, SyncConfig } from './types.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function readString(
  raw: RawSyncConfig,
  key: keyof RawSyncConfig,
  problems: string[]
): string | undefined {
  const value = raw[key];
  if (value === undefined || value === null || value === '') {
    return undefined;
  }
  if (typeof value !== 'string') {
    problems.push(`${key} must be a string`);
    return undefined;
  }
  return value;
}

function readBoolean(raw: RawSyncConfig, key: keyof RawSyncConfig, problems: string[]): boolean {
  const value = raw[key];
  if (value === undefined || value === null) {
    return false;
  }
  if (typeof value !== 'boolean') {
    problems.push(`${key} must be a boolean`);
    return false;
  }
  return value;
}

function readPositiveInteger(
  raw: RawSyncConfig,
  key: keyof RawSyncConfig,
  problems: string[]
): number | null {
  const value = raw[key];
  if (value === undefined || value === null) {
    return null;
  }
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 1) {
    problems.push(`${key} must be a positive integer`);
    return null;
  }
  return value;
}

function readStringList(
  raw: RawSyncConfig,
  key: keyof RawSyncConfig,
  problems: string[]
): string[] {
  const value = raw[key];
  if (value === undefined || value === null) {
    return [];
  }
  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === 'string')) {
    problems.push(`${key} must be a list of strings`);
    return [];
  }
  return value;
}

function readPort(raw: RawSyncConfig, problems: string[]): number {
  const value = raw.port;
  if (value === undefined || value === null || value === '') {
    return DEFAULT_SFTP_PORT;
  }

  const port = typeof value === 'string' ? Number(value) : value;
  if (typeof port !== 'number' || !Number.isInteger(port) || port < 1 || port > 65_535) {
    problems.push('port must be an integer between 1 and 65535');
    return DEFAULT_SFTP_PORT;
  }
  return port;
}

/**
 * Resolve the selection mode. An explicit file list wins over path_prefix;
 * under path_prefix, tables > recursive_clone > exact_directory > mirrored clone.
 */
function resolveMode(raw: RawSyncConfig, problems: string[]): SelectionMode | null {
  const files = readStringList(raw, 'files', problems);
  const root = readString(raw, 'path_prefix', problems);
  const prefixes = readStringList(raw, 'tables', problems);
  const recursiveClone = readBoolean(raw, 'recursive_clone', problems);
  const exactDirectory = readBoolean(raw, 'exact_directory', problems);

  if (files.length > 0) {
    return { kind: 'flat', files };
  }

  if (root === undefined) {
    problems.push('one of path_prefix or files must be defined');
    return null;
  }

  if (prefixes.length > 0) {
    return { kind: 'pattern-filtered', root, prefixes };
  }
  if (recursiveClone) {
    return { kind: 'recursive-clone', root, layout: 'relative' };
  }
  if (exactDirectory) {
    return { kind: 'exact-directory', root };
  }
  return { kind: 'recursive-clone', root, layout: 'mirrored' };
}

function resolveCredentials(raw: RawSyncConfig, problems: string[]): RemoteCredentials | null {
  const password = readString(raw, 'password', problems);
  if (password !== undefined) {
    return { type: 'password', password };
  }

  const privateKey = readString(raw, 'private_key', problems);
  if (privateKey !== undefined) {
    return { type: 'private-key', privateKey };
  }

  problems.push('one of password or private_key is required');
  return null;
}

/**
 * Check cross-field rules on an already typed config.
 * Returns an array of error messages (empty = valid).
 */
export function validateSyncConfig(config: SyncConfig): string[] {
  const errors: string[] = [];

  if (!config.connection.host) {
    errors.push('host is required');
  }

  if (!config.connection.username) {
    errors.push('username is required');
  }

  if (!config.targetDir) {
    errors.push('target_dir is required');
  }

  if (config.maxFileCount !== null && !config.deleteAfterSync) {
    errors.push('max_file_count requires delete_after_sync to be enabled');
  }

  if (config.maxFileCount !== null && config.maxFileCount < 1) {
    errors.push('max_file_count must be at least 1');
  }

  if (config.maxDownloadCount !== null && config.maxDownloadCount < 1) {
    errors.push('max_download_count must be at least 1');
  }

  if (config.pruneEmptyDirectories && !config.deleteAfterSync) {
    errors.push('prune_empty_directories requires delete_after_sync to be enabled');
  }

  if (config.incrementalMode && !config.stateFilePath) {
    errors.push('incremental_mode requires a state file path');
  }

  if (config.mode.kind === 'pattern-filtered' && config.mode.prefixes.some((p) => p === '')) {
    errors.push('tables must not contain empty prefixes');
  }

  return errors;
}

/**
 * Parse and validate a raw config object.
 *
 * @throws ConfigurationError listing every problem found
 */
export function parseSyncConfig(raw: unknown, options: ParseConfigOptions = {}): SyncConfig {
  if (!isRecord(raw)) {
    throw new ConfigurationError(['config must be a JSON object']);
  }

  const rawConfig: RawSyncConfig = raw;
  const problems: string[] = [];

  const host = readString(rawConfig, 'host', problems);
  const username = readString(rawConfig, 'username', problems);
  const targetDir = readString(rawConfig, 'target_dir', problems);
  const port = readPort(rawConfig, problems);
  const credentials = resolveCredentials(rawConfig, problems);
  const mode = resolveMode(rawConfig, problems);
  const deleteAfterSync = readBoolean(rawConfig, 'delete_after_sync', problems);
  const maxFileCount = readPositiveInteger(rawConfig, 'max_file_count', problems);
  const maxDownloadCount = readPositiveInteger(rawConfig, 'max_download_count', problems);
  const pruneEmptyDirectories = readBoolean(rawConfig, 'prune_empty_directories', problems);
  const incrementalMode = readBoolean(rawConfig, 'incremental_mode', problems);

  if (credentials === null || mode === null || problems.length > 0) {
    throw new ConfigurationError(problems);
  }

  const config: SyncConfig = {
    connection: {
      host: host ?? '',
      port,
      username: username ?? '',
      credentials,
    },
    mode,
    targetDir: targetDir ? path.normalize(targetDir) : '',
    deleteAfterSync,
    maxFileCount,
    maxDownloadCount,
    pruneEmptyDirectories,
    incrementalMode,
    stateFilePath: options.stateFilePath ?? null,
  };

  const errors = validateSyncConfig(config);
  if (errors.length > 0) {
    throw new ConfigurationError(errors);
  }

  return config;
}

/**
 * Read a JSON file from disk.
 *
 * @throws ConfigurationError if the file is missing or not valid JSON
 */
export function readJsonFile(filePath: string): unknown {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, 'utf-8');
  } catch (err) {
    throw new ConfigurationError([`cannot read ${filePath}: ${errorMessage(err)}`]);
  }

  try {
    return JSON.parse(raw) as unknown;
  } catch (err) {
    throw new ConfigurationError([`${filePath} is not valid JSON: ${errorMessage(err)}`]);
  }
}
