import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import { LedgerStore } from '../ledger/ledger-store.js';
import { ConfigurationError } from '../errors.js';

describe('LedgerStore', () => {
  let tmpDir: string;
  let stateFilePath: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'sftp-ledger-test-'));
    stateFilePath = path.join(tmpDir, 'state.json');
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('should start empty when the state file is missing', () => {
    const ledger = new LedgerStore(stateFilePath);
    ledger.load();

    expect(ledger.size).toBe(0);
    expect(ledger.get('/a.csv')).toBeUndefined();
  });

  it('should overwrite an existing digest', () => {
    const ledger = new LedgerStore(stateFilePath);
    ledger.set('/a.csv', 'aaa');
    ledger.set('/a.csv', 'bbb');

    expect(ledger.size).toBe(1);
    expect(ledger.get('/a.csv')).toBe('bbb');
  });

  it('should write indented JSON', () => {
    const ledger = new LedgerStore(stateFilePath);
    ledger.set('/a.csv', 'aaa');
    ledger.save();

    expect(fs.readFileSync(stateFilePath, 'utf-8')).toBe('{\n  "/a.csv": "aaa"\n}');
  });

  it('should reproduce the same mapping after save and load', () => {
    const first = new LedgerStore(stateFilePath);
    first.set('/x/1.csv', '5eb63bbbe01eeed093cb22bb8f5acdc3');
    first.set('/y/2.csv', 'd41d8cd98f00b204e9800998ecf8427e');
    first.save();

    const second = new LedgerStore(stateFilePath);
    second.load();

    expect(second.toJSON()).toEqual(first.toJSON());
  });

  it('should create the parent directory on save', () => {
    const nestedPath = path.join(tmpDir, 'nested', 'dir', 'state.json');
    const ledger = new LedgerStore(nestedPath);
    ledger.set('/a.csv', 'aaa');
    ledger.save();

    expect(fs.existsSync(nestedPath)).toBe(true);
  });

  it('should reject a state file that is not valid JSON', () => {
    fs.writeFileSync(stateFilePath, '{oops');
    const ledger = new LedgerStore(stateFilePath);

    expect(() => ledger.load()).toThrow(ConfigurationError);
  });

  it('should reject a state file with non-string digests', () => {
    fs.writeFileSync(stateFilePath, JSON.stringify({ '/a.csv': 12 }));
    const ledger = new LedgerStore(stateFilePath);

    expect(() => ledger.load()).toThrow(ConfigurationError);
  });

  it('should reject a state file holding an array', () => {
    fs.writeFileSync(stateFilePath, '[]');
    const ledger = new LedgerStore(stateFilePath);

    expect(() => ledger.load()).toThrow(ConfigurationError);
  });
});
