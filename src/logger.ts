/**
 * Logger factory for a sync run.
 *
 * One root logger is built per process invocation and handed to each
 * component, which derives its own child with a `component` binding.
 */

import { pino } from 'pino';
import type { Logger, LoggerOptions } from 'pino';

export interface CreateLoggerOptions {
  /** Minimum level to emit (default: LOG_LEVEL env or 'info') */
  level?: string;

  /** Human-readable output through pino-pretty instead of JSON lines */
  pretty?: boolean;
}

export function createLogger(options: CreateLoggerOptions = {}): Logger {
  const loggerOptions: LoggerOptions = {
    name: 'sftp-file-sync',
    level: options.level ?? process.env['LOG_LEVEL'] ?? 'info',
    transport: options.pretty
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
          },
        }
      : undefined,
  };

  return pino(loggerOptions);
}
