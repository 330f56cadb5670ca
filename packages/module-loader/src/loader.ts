/**
 * Playhost Module Loader — Module Loader
 *
 * Runs one load pass over discovered descriptors, in discovery order:
 *
 * 1. Skip a name that was already claimed earlier in the pass (first found wins)
 * 2. Reject a descriptor whose module.json is invalid          → failure, stage 'load'
 * 3. Build if the output is missing or stale                   → failure, stage 'build'
 * 4. Resolve the entry export and instantiate it               → failure, stage 'load'
 * 5. Record the loaded module
 *
 * Builds run one module at a time. A failure at any step is recorded and the
 * pass moves on; nothing a module does can abort the pass.
 */

import {
  createLogger,
  describeError,
  type LoadResult,
  type Logger,
  type ModuleDescriptor,
} from '@playhost/kernel';
import type { ModuleBuilder } from './builder.js';
import { ModuleClassLoader } from './class-loader.js';
import { LoadResultTracker } from './load-tracker.js';

export interface ModuleLoaderOptions {
  readonly builder: ModuleBuilder;
  readonly classLoader?: ModuleClassLoader | undefined;
  readonly log?: Logger | undefined;
}

export class ModuleLoader {
  private readonly builder: ModuleBuilder;
  private readonly classLoader: ModuleClassLoader;
  private readonly log: Logger;

  constructor(options: ModuleLoaderOptions) {
    this.builder = options.builder;
    this.log = options.log ?? createLogger('loader');
    this.classLoader = options.classLoader ?? new ModuleClassLoader({ log: this.log.child('class-loader') });
  }

  /** Catalog modules, discovered without a directory. */
  catalogDescriptors(): ReadonlyArray<ModuleDescriptor> {
    return this.classLoader.catalogDescriptors();
  }

  async loadAll(descriptors: ReadonlyArray<ModuleDescriptor>): Promise<LoadResult> {
    const tracker = new LoadResultTracker();
    const claimed = new Map<string, string>();

    for (const descriptor of descriptors) {
      const { name, rootPath } = descriptor;
      const firstPath = claimed.get(name);
      if (firstPath !== undefined) {
        this.log.info('Skipped duplicate module', { module: name, rootPath, keptFrom: firstPath });
        continue;
      }
      claimed.set(name, rootPath);

      try {
        await this.loadOne(descriptor, tracker);
      } catch (err: unknown) {
        // Unexpected I/O error (e.g. the directory vanished mid-pass).
        tracker.recordFailure(name, 'load', `Unexpected error: ${describeError(err)}`);
      }
    }

    const result = tracker.finish();
    this.log.info('Load pass finished', {
      loaded: result.loadedModules.length,
      failed: result.failures.length,
    });
    return result;
  }

  private async loadOne(descriptor: ModuleDescriptor, tracker: LoadResultTracker): Promise<void> {
    const { name } = descriptor;

    if (descriptor.manifestError !== undefined) {
      tracker.recordFailure(name, 'load', `Invalid module.json: ${descriptor.manifestError}`);
      return;
    }

    if (!this.classLoader.inCatalog(name) && this.builder.needsBuild(descriptor)) {
      const built = await this.builder.build(descriptor);
      if (!built.ok) {
        tracker.recordFailure(name, 'build', built.reason, built.details);
        return;
      }
    }

    const outcome = this.classLoader.load(descriptor);
    if (!outcome.ok) {
      tracker.recordFailure(name, 'load', outcome.reason);
      return;
    }

    tracker.recordLoaded(name, outcome.module);
    this.log.info('Loaded module', { module: name, export: outcome.exportName });
  }
}
