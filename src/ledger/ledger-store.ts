/**
 * Persistent content-hash ledger.
 *
 * Maps each remote path ever observed to the digest of its content at the
 * time it was last downloaded. Entries are added or overwritten, never
 * pruned. The file is read once at run start and written once at run end.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { ConfigurationError, errorMessage } from '../errors.js';

export type LedgerEntries = Record<string, string>;

function isLedgerEntries(value: unknown): value is LedgerEntries {
  return (
    value !== null &&
    typeof value === 'object' &&
    !Array.isArray(value) &&
    Object.values(value).every((digest) => typeof digest === 'string')
  );
}

export class LedgerStore {
  private entries = new Map<string, string>();
  private readonly filePath: string;

  constructor(filePath: string) {
    this.filePath = filePath;
  }

  /** Number of tracked remote paths */
  get size(): number {
    return this.entries.size;
  }

  get path(): string {
    return this.filePath;
  }

  /**
   * Load the ledger from disk. A missing file means an empty ledger.
   *
   * @throws ConfigurationError if the file exists but is not a JSON object of digests
   */
  load(): void {
    if (!fs.existsSync(this.filePath)) {
      this.entries = new Map();
      return;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(fs.readFileSync(this.filePath, 'utf-8'));
    } catch (err) {
      throw new ConfigurationError([`state file ${this.filePath} is not valid JSON: ${errorMessage(err)}`]);
    }

    if (!isLedgerEntries(parsed)) {
      throw new ConfigurationError([
        `state file ${this.filePath} must be a JSON object of remote path to digest`,
      ]);
    }

    this.entries = new Map(Object.entries(parsed));
  }

  /** Write the ledger as indented JSON, creating the parent directory if needed */
  save(): void {
    const dir = path.dirname(this.filePath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }

    fs.writeFileSync(this.filePath, JSON.stringify(this.toJSON(), null, 2), 'utf-8');
  }

  get(remotePath: string): string | undefined {
    return this.entries.get(remotePath);
  }

  set(remotePath: string, digest: string): void {
    this.entries.set(remotePath, digest);
  }

  toJSON(): LedgerEntries {
    return Object.fromEntries(this.entries);
  }
}
