/**
 * sftp-file-sync run command
 *
 * Loads the JSON config, builds the run's logger and drives one
 * SyncOrchestrator run. Exit status is non-zero on any failure.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import type { Logger } from 'pino';
import { parseSyncConfig, readJsonFile } from '../config/config.js';
import { errorMessage } from '../errors.js';
import { createLogger } from '../logger.js';
import type { RemoteStoreConnector } from '../remote/types.js';
import { SyncOrchestrator } from '../sync/sync-orchestrator.js';
import type { SyncRunResult } from '../sync/types.js';

export interface SyncCommandOptions {
  config: string;
  state?: string;
}

function plural(count: number, noun: string): string {
  return `${count} ${noun}${count !== 1 ? 's' : ''}`;
}

/** One-line summary printed after a successful run */
export function formatSummary(result: SyncRunResult): string {
  const parts = [`Downloaded ${plural(result.downloaded, 'file')} (${result.mode})`];

  if (result.downloadTruncated) {
    parts.push('download cap reached');
  }

  if (result.totalRemoved > 0) {
    parts.push(`removed ${plural(result.totalRemoved, 'remote file')}`);
  }

  if (result.deletion.skipped > 0) {
    parts.push(`${result.deletion.skipped} left by deletion limit`);
  }

  if (result.deletion.failed > 0) {
    parts.push(`${result.deletion.failed} failed to delete`);
  }

  if (result.reconcile) {
    parts.push(`kept ${result.reconcile.kept} new, discarded ${result.reconcile.discarded} unchanged`);
  }

  return parts.join(', ');
}

/**
 * Load config and state paths from the command line and run one sync.
 *
 * @throws ConfigurationError before any connection when the config is bad
 */
export async function executeSync(
  options: SyncCommandOptions,
  logger: Logger,
  connect?: RemoteStoreConnector
): Promise<SyncRunResult> {
  const config = parseSyncConfig(readJsonFile(options.config), {
    stateFilePath: options.state,
  });

  const orchestrator = new SyncOrchestrator(config, logger, { connect });
  return orchestrator.run();
}

export function registerSyncCommand(program: Command): void {
  program
    .requiredOption('-c, --config <path>', 'Path to the JSON sync config')
    .option('-s, --state <path>', 'Path to the incremental state file')
    .action(async (options: SyncCommandOptions) => {
      const logger = createLogger({ pretty: process.stdout.isTTY });

      try {
        const result = await executeSync(options, logger);
        console.log(chalk.green(formatSummary(result)));
      } catch (error) {
        console.error(chalk.red('Sync failed:'), errorMessage(error));
        process.exitCode = 1;
      }
    });
}
