/**
 * Playhost Kernel — Pipeline Outcomes
 *
 * Every lifecycle stage returns a discriminated union on `ok`. Recoverable
 * failures are data: a failed build or load is recorded and the pass moves
 * on to the next module. Only discovery failure is surfaced to the caller
 * as a hard result.
 */

import type { GameModule, ModuleDescriptor } from './module.js';

// ---------------------------------------------------------------------------
// Discovery
// ---------------------------------------------------------------------------

/**
 * Result of scanning one modules root.
 *
 * `ok: false` means the root itself is unusable (missing, unreadable, not a
 * directory). It is distinct from `ok: true` with zero descriptors, which
 * means there is simply nothing to load.
 */
export type DiscoveryResult =
  | { readonly ok: true; readonly rootPath: string; readonly descriptors: ReadonlyArray<ModuleDescriptor> }
  | {
      readonly ok: false;
      readonly kind: 'DiscoveryFailed';
      readonly rootPath: string;
      readonly reason: string;
    };

// ---------------------------------------------------------------------------
// Build
// ---------------------------------------------------------------------------

export type BuildOutcome =
  | { readonly ok: true; readonly name: string; readonly durationMs: number }
  | {
      readonly ok: false;
      readonly name: string;
      readonly reason: string;
      readonly details?: string | undefined;
    };

// ---------------------------------------------------------------------------
// Load
// ---------------------------------------------------------------------------

export type LoadOutcome =
  | { readonly ok: true; readonly name: string; readonly module: GameModule; readonly exportName: string }
  | { readonly ok: false; readonly name: string; readonly reason: string };

// ---------------------------------------------------------------------------
// Load Pass Result
// ---------------------------------------------------------------------------

/** The stage at which a module dropped out of a load pass. */
export type FailureStage = 'build' | 'load';

export interface LoadedModule {
  readonly name: string;
  readonly module: GameModule;
}

export interface LoadFailure {
  readonly name: string;
  readonly stage: FailureStage;
  /** One line, suitable for a warning list. */
  readonly reason: string;
  /** Tail of build output, when there is any. */
  readonly details?: string | undefined;
}

/**
 * Everything one discovery → build → load pass produced, in discovery order.
 * Ownership passes to the caller that requested the pass.
 */
export interface LoadResult {
  readonly loadedModules: ReadonlyArray<LoadedModule>;
  readonly failures: ReadonlyArray<LoadFailure>;
}
