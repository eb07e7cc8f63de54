/**
 * Error taxonomy for a sync run.
 *
 * Configuration and transport errors abort the run. Deletion errors are
 * caught by the deletion budgeter, logged, and never abort the run.
 */

export class ConfigurationError extends Error {
  public readonly problems: string[];

  constructor(problems: string[]) {
    super(`Invalid sync config: ${problems.join('; ')}`);
    this.name = 'ConfigurationError';
    this.problems = problems;
  }
}

export class TransportError extends Error {
  public readonly operation: string;

  constructor(operation: string, message: string, cause?: unknown) {
    super(`${operation} failed: ${message}`, { cause });
    this.name = 'TransportError';
    this.operation = operation;
  }
}

export class DeletionError extends Error {
  public readonly target: string;

  constructor(target: string, cause: unknown) {
    super(`Failed to remove ${target}: ${errorMessage(cause)}`, { cause });
    this.name = 'DeletionError';
    this.target = target;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
