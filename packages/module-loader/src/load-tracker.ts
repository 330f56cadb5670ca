/**
 * Playhost Module Loader — Load Result Tracker
 *
 * Accumulates one load pass: modules that loaded and modules that dropped
 * out, each in the order they were recorded. All writes go through this
 * object, so builds run in parallel would still append to one ordered
 * result. finish() freezes the result; later writes throw.
 */

import type { FailureStage, GameModule, LoadedModule, LoadFailure, LoadResult } from '@playhost/kernel';

export class LoadResultTracker {
  private readonly loaded: LoadedModule[] = [];
  private readonly failed: LoadFailure[] = [];
  private finished: LoadResult | null = null;

  recordLoaded(name: string, module: GameModule): void {
    this.assertOpen();
    this.loaded.push({ name, module });
  }

  recordFailure(name: string, stage: FailureStage, reason: string, details?: string): void {
    this.assertOpen();
    this.failed.push({ name, stage, reason, ...(details !== undefined ? { details } : {}) });
  }

  get loadedCount(): number {
    return this.loaded.length;
  }

  get failureCount(): number {
    return this.failed.length;
  }

  /** Close the pass. Calling it again returns the same result. */
  finish(): LoadResult {
    if (this.finished === null) {
      this.finished = Object.freeze({
        loadedModules: Object.freeze([...this.loaded]),
        failures: Object.freeze([...this.failed]),
      });
    }
    return this.finished;
  }

  private assertOpen(): void {
    if (this.finished !== null) {
      throw new Error('LoadResultTracker: the load pass is already finished');
    }
  }
}
