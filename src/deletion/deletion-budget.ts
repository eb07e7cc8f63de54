/**
 * Run-scoped cap on remote file deletions.
 *
 * One instance is created per run and shared by every deletion path, so
 * removedCount never exceeds maxCount however the removals are split
 * between phases.
 */
export class DeletionBudget {
  /** Maximum removals for the run (null = unlimited) */
  readonly maxCount: number | null;

  private _removedCount = 0;
  private readonly removedPaths = new Set<string>();

  constructor(maxCount: number | null = null) {
    this.maxCount = maxCount;
  }

  get removedCount(): number {
    return this._removedCount;
  }

  /** Removals left before exhaustion (null = unlimited) */
  get remaining(): number | null {
    return this.maxCount === null ? null : Math.max(0, this.maxCount - this._removedCount);
  }

  get exhausted(): boolean {
    return this.maxCount !== null && this._removedCount >= this.maxCount;
  }

  /** Whether a path was already removed during this run */
  hasRemoved(remotePath: string): boolean {
    return this.removedPaths.has(remotePath);
  }

  /**
   * Count a successful removal.
   *
   * @throws If the budget is already exhausted
   */
  record(remotePath: string): void {
    if (this.exhausted) {
      throw new Error(`Deletion budget of ${this.maxCount} exhausted`);
    }
    this._removedCount++;
    this.removedPaths.add(remotePath);
  }
}
