/**
 * Playhost Module Loader — Module Class Loader
 *
 * Locates a module's entry export and hands it to the instantiator.
 *
 * Lookup order:
 *   (a) the in-process catalog: exports of modules bundled with the host,
 *       keyed by module name. Catalog modules are also discovered on their
 *       own (see catalogDescriptors), ahead of any module directory;
 *   (b) the module's own compiled output (the output entry, else the
 *       packaged bundle), loaded in an isolated scope.
 *
 * Isolation: each module is loaded through a `require` created for its own
 * directory, and every cached file under that directory is evicted first.
 * Two modules may therefore ship same-named internal classes without ever
 * seeing each other's, and reloading a module after a rebuild yields fresh
 * classes. Only the GameModule contract crosses the boundary.
 *
 * Candidate export names, first match wins:
 *   manifest `entry` (alone, when declared)
 *   otherwise: <Pascal>Module, Main, <Pascal>, default
 * where <Pascal> is the module name with each `-`, `_` or space separated
 * word capitalized (`tic-tac-toe` → `TicTacToe`).
 */

import { existsSync, realpathSync } from 'node:fs';
import { createRequire } from 'node:module';
import { sep } from 'node:path';
import {
  createLogger,
  describeError,
  type LoadOutcome,
  type Logger,
  type ModuleDescriptor,
} from '@playhost/kernel';
import { ModuleInstantiator } from './instantiator.js';

/** Exports of one module as seen by the host. */
export type ModuleExports = Readonly<Record<string, unknown>>;

/** Modules already visible in the host process, keyed by module name. */
export type ModuleCatalog = Readonly<Record<string, ModuleExports>>;

export type EntryResolution =
  | {
      readonly ok: true;
      readonly exportName: string;
      readonly entry: unknown;
      readonly origin: 'catalog' | 'output' | 'bundle';
    }
  | { readonly ok: false; readonly reason: string };

export interface ModuleClassLoaderOptions {
  readonly catalog?: ModuleCatalog | undefined;
  readonly instantiator?: ModuleInstantiator | undefined;
  readonly log?: Logger | undefined;
}

// ---------------------------------------------------------------------------
// Naming conventions
// ---------------------------------------------------------------------------

export function pascalCase(name: string): string {
  return name
    .split(/[-_\s]+/)
    .filter((word) => word !== '')
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join('');
}

/** Export names probed for `descriptor`, in order. */
export function candidateExportNames(descriptor: ModuleDescriptor): ReadonlyArray<string> {
  const declared = descriptor.manifest?.entry;
  if (declared !== undefined) return [declared];
  const pascal = pascalCase(descriptor.name);
  return [`${pascal}Module`, 'Main', pascal, 'default'];
}

// ---------------------------------------------------------------------------
// Class loader
// ---------------------------------------------------------------------------

export class ModuleClassLoader {
  private readonly catalog: ModuleCatalog;
  private readonly instantiator: ModuleInstantiator;
  private readonly log: Logger;

  constructor(options?: ModuleClassLoaderOptions) {
    this.catalog = options?.catalog ?? {};
    this.log = options?.log ?? createLogger('class-loader');
    this.instantiator = options?.instantiator ?? new ModuleInstantiator(this.log.child('instantiate'));
  }

  /** True when the catalog can supply this module without touching its directory. */
  inCatalog(name: string): boolean {
    const exports = this.catalog[name];
    return exports !== undefined;
  }

  /** One descriptor per catalog module, in name order. */
  catalogDescriptors(): ReadonlyArray<ModuleDescriptor> {
    return Object.keys(this.catalog)
      .sort((a, b) => (a < b ? -1 : a > b ? 1 : 0))
      .map((name) => ({
        name,
        rootPath: `catalog:${name}`,
        hasSource: false,
        hasBuildOutput: false,
        hasBundle: false,
        outputEntry: '',
        bundlePath: '',
        fromCatalog: true,
      }));
  }

  /** Locate, check and construct the module's entry. Never throws. */
  load(descriptor: ModuleDescriptor): LoadOutcome {
    const resolution = this.resolve(descriptor);
    if (!resolution.ok) {
      this.log.warn('Entry resolution failed', { module: descriptor.name, reason: resolution.reason });
      return { ok: false, name: descriptor.name, reason: resolution.reason };
    }
    this.log.debug('Resolved entry export', {
      module: descriptor.name,
      export: resolution.exportName,
      origin: resolution.origin,
    });
    return this.instantiator.instantiate(descriptor.name, resolution.exportName, resolution.entry);
  }

  resolve(descriptor: ModuleDescriptor): EntryResolution {
    const candidates = candidateExportNames(descriptor);

    const fromCatalog = this.catalog[descriptor.name];
    if (fromCatalog !== undefined) {
      const found = probe(fromCatalog, candidates);
      if (found !== undefined) return { ok: true, ...found, origin: 'catalog' };
    }
    if (descriptor.fromCatalog === true) {
      return { ok: false, reason: `No entry export found in catalog (tried: ${candidates.join(', ')})` };
    }

    const file = existsSync(descriptor.outputEntry)
      ? { path: descriptor.outputEntry, origin: 'output' as const }
      : existsSync(descriptor.bundlePath)
        ? { path: descriptor.bundlePath, origin: 'bundle' as const }
        : undefined;
    if (file === undefined) {
      return { ok: false, reason: `Cannot load ${descriptor.name}: no compiled output or bundle` };
    }

    let exports: ModuleExports;
    try {
      exports = loadIsolated(descriptor.rootPath, file.path);
    } catch (err: unknown) {
      return { ok: false, reason: `Cannot load ${descriptor.name}: ${describeError(err)}` };
    }

    const found = probe(exports, candidates);
    if (found === undefined) {
      return { ok: false, reason: `No entry export found (tried: ${candidates.join(', ')})` };
    }
    return { ok: true, ...found, origin: file.origin };
  }
}

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

function probe(
  exports: ModuleExports,
  candidates: ReadonlyArray<string>,
): { exportName: string; entry: unknown } | undefined {
  for (const exportName of candidates) {
    const entry = exports[exportName];
    if (typeof entry === 'function') return { exportName, entry };
  }
  return undefined;
}

/**
 * Load `file` with a require scoped to `moduleDir`, after evicting every
 * cached file under that directory.
 */
function loadIsolated(moduleDir: string, file: string): ModuleExports {
  const scopedRequire = createRequire(file);
  // Cache keys are real paths; the module directory may sit behind a symlink.
  const prefixes = [moduleDir, realpathSync(moduleDir)].map((dir) => (dir.endsWith(sep) ? dir : dir + sep));
  for (const key of Object.keys(scopedRequire.cache)) {
    if (prefixes.some((prefix) => key.startsWith(prefix))) {
      delete scopedRequire.cache[key];
    }
  }

  const loaded: unknown = scopedRequire(file);
  if (typeof loaded === 'function') {
    // `module.exports = SomeClass`
    return { default: loaded };
  }
  if (loaded === null || typeof loaded !== 'object') {
    return {};
  }
  return Object.fromEntries(Object.keys(loaded).map((key) => [key, Reflect.get(loaded, key)]));
}
