/**
 * Playhost Module Loader — Module Registry
 *
 * The loaded modules of one load pass, keyed by name. A registry is never
 * patched: a refresh builds a new one and swaps it in, so a module removed
 * from disk cannot linger and readers never see a half-updated registry.
 *
 * Names are unique. If the same name is offered twice the first one stays,
 * matching the loader's first-found-wins rule.
 */

import { ModuleNotFoundError, type GameModule, type LoadedModule, type LoadResult } from '@playhost/kernel';

export class ModuleRegistry {
  private readonly byName: ReadonlyMap<string, GameModule>;
  private readonly ordered: ReadonlyArray<LoadedModule>;

  constructor(modules: ReadonlyArray<LoadedModule> = []) {
    const byName = new Map<string, GameModule>();
    const ordered: LoadedModule[] = [];
    for (const entry of modules) {
      if (byName.has(entry.name)) continue;
      byName.set(entry.name, entry.module);
      ordered.push(entry);
    }
    this.byName = byName;
    this.ordered = Object.freeze(ordered);
  }

  static fromLoadResult(result: LoadResult): ModuleRegistry {
    return new ModuleRegistry(result.loadedModules);
  }

  get(name: string): GameModule | undefined {
    return this.byName.get(name);
  }

  /**
   * @throws {ModuleNotFoundError} If no module with that name is loaded
   */
  require(name: string): GameModule {
    const module = this.byName.get(name);
    if (module === undefined) {
      throw new ModuleNotFoundError(name, this.names());
    }
    return module;
  }

  has(name: string): boolean {
    return this.byName.has(name);
  }

  /** Loaded modules in load order. */
  all(): ReadonlyArray<LoadedModule> {
    return this.ordered;
  }

  names(): ReadonlyArray<string> {
    return this.ordered.map((e) => e.name);
  }

  get size(): number {
    return this.ordered.length;
  }
}
