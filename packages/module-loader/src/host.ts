/**
 * Playhost Module Loader — Module Host
 *
 * Owns the current ModuleRegistry and replaces it on refresh():
 *
 *   discover every root → loadAll → new registry → swap
 *
 * Catalog modules are placed ahead of every root's descriptors, so a module
 * directory whose name a catalog module already uses is skipped as a
 * duplicate.
 *
 * The swap is a single reference assignment, so readers see either the old
 * registry or the new one. Overlapping refresh() calls share the pass that
 * is already running instead of starting a second one.
 *
 * When every root fails discovery the refresh reports DiscoveryFailed, keeps
 * the current registry, and does not start a load pass.
 */

import {
  createLogger,
  DiscoveryFailedError,
  type DiscoveryResult,
  type ExecAdapter,
  type LoadFailure,
  type LoadResult,
  type Logger,
  type ModuleDescriptor,
} from '@playhost/kernel';
import { DEFAULT_HOST_CONFIG, type HostConfig } from '@playhost/runtime-host';
import { ModuleBuilder } from './builder.js';
import { ModuleClassLoader, type ModuleCatalog } from './class-loader.js';
import { ModuleLoader } from './loader.js';
import { ModuleRegistry } from './registry.js';
import { ModuleScanner } from './scanner.js';
import { ModuleValidator } from './validator.js';

export type RefreshResult =
  | {
      readonly ok: true;
      readonly registry: ModuleRegistry;
      readonly result: LoadResult;
      readonly discovery: ReadonlyArray<DiscoveryResult>;
    }
  | {
      readonly ok: false;
      readonly error: DiscoveryFailedError;
      readonly discovery: ReadonlyArray<DiscoveryResult>;
    };

export interface ModuleHostOptions {
  readonly roots: ReadonlyArray<string>;
  readonly scanner: ModuleScanner;
  readonly loader: ModuleLoader;
  readonly log?: Logger | undefined;
}

/** Inputs for {@link ModuleHost.create}. */
export interface CreateModuleHostOptions {
  readonly roots: ReadonlyArray<string>;
  readonly exec: ExecAdapter;
  readonly config?: HostConfig | undefined;
  readonly catalog?: ModuleCatalog | undefined;
  readonly log?: Logger | undefined;
}

export class ModuleHost {
  private readonly roots: ReadonlyArray<string>;
  private readonly scanner: ModuleScanner;
  private readonly loader: ModuleLoader;
  private readonly log: Logger;
  private current: ModuleRegistry = new ModuleRegistry();
  private failures: ReadonlyArray<LoadFailure> = [];
  private inFlight: Promise<RefreshResult> | null = null;

  constructor(options: ModuleHostOptions) {
    this.roots = options.roots;
    this.scanner = options.scanner;
    this.loader = options.loader;
    this.log = options.log ?? createLogger('host');
  }

  /** Wire the default pipeline from host configuration. */
  static create(options: CreateModuleHostOptions): ModuleHost {
    const config = options.config ?? DEFAULT_HOST_CONFIG;
    const log = options.log ?? createLogger('host');
    const scanner = new ModuleScanner({
      validator: new ModuleValidator(config.layout),
      log: log.child('scanner'),
    });
    const builder = new ModuleBuilder(options.exec, {
      build: config.build,
      layout: config.layout,
      log: log.child('builder'),
    });
    const classLoader = new ModuleClassLoader({ catalog: options.catalog, log: log.child('class-loader') });
    const loader = new ModuleLoader({ builder, classLoader, log: log.child('loader') });
    return new ModuleHost({ roots: options.roots, scanner, loader, log });
  }

  get registry(): ModuleRegistry {
    return this.current;
  }

  /** Failures of the last completed load pass. */
  lastFailures(): ReadonlyArray<LoadFailure> {
    return this.failures;
  }

  refresh(): Promise<RefreshResult> {
    if (this.inFlight !== null) {
      this.log.debug('Refresh already running; joining it');
      return this.inFlight;
    }
    const pass = this.runPass().finally(() => {
      this.inFlight = null;
    });
    this.inFlight = pass;
    return pass;
  }

  private async runPass(): Promise<RefreshResult> {
    const discovery = this.scanner.discoverAll(this.roots);

    const descriptors: ModuleDescriptor[] = [...this.loader.catalogDescriptors()];
    const failedRoots: { rootPath: string; reason: string }[] = [];
    for (const result of discovery) {
      if (result.ok) {
        descriptors.push(...result.descriptors);
      } else {
        failedRoots.push({ rootPath: result.rootPath, reason: result.reason });
      }
    }

    if (discovery.length > 0 && failedRoots.length === discovery.length) {
      const error = new DiscoveryFailedError(failedRoots);
      this.log.error('Refresh aborted', { error: error.message });
      return { ok: false, error, discovery };
    }

    const result = await this.loader.loadAll(descriptors);
    const registry = ModuleRegistry.fromLoadResult(result);
    this.current = registry;
    this.failures = result.failures;
    this.log.info('Registry replaced', { modules: registry.size, failures: result.failures.length });
    return { ok: true, registry, result, discovery };
  }
}
