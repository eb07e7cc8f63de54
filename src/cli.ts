#!/usr/bin/env node

/**
 * sftp-file-sync - pull files from an SFTP store onto local disk
 */

import { Command } from 'commander';
import { createRequire } from 'node:module';
import { registerSyncCommand } from './commands/sync.js';

const require = createRequire(import.meta.url);
const pkg = require('../package.json') as { version: string };

const program = new Command();

program
  .name('sftp-file-sync')
  .description('Download files from an SFTP store, optionally pruning the remote after sync')
  .version(pkg.version);

registerSyncCommand(program);

await program.parseAsync();
