/**
 * @playhost/module-loader
 *
 * The game-module lifecycle pipeline: discovery, validation, build,
 * isolated loading, instantiation, the load-pass tracker, the registry and
 * the host that refreshes it.
 */

export type { ManifestParseResult } from './validator.js';
export { BUNDLE_FILE, MANIFEST_FILE, ModuleValidator, parseManifest } from './validator.js';

export type { ModuleScannerOptions } from './scanner.js';
export { ModuleScanner } from './scanner.js';

export type { ModuleBuilderOptions } from './builder.js';
export { ModuleBuilder } from './builder.js';

export type {
  EntryResolution,
  ModuleCatalog,
  ModuleClassLoaderOptions,
  ModuleExports,
} from './class-loader.js';
export { candidateExportNames, ModuleClassLoader, pascalCase } from './class-loader.js';

export { isGameModule, missingMethods, ModuleInstantiator } from './instantiator.js';

export { LoadResultTracker } from './load-tracker.js';
export { ModuleRegistry } from './registry.js';

export type { ModuleLoaderOptions } from './loader.js';
export { ModuleLoader } from './loader.js';

export type { CreateModuleHostOptions, ModuleHostOptions, RefreshResult } from './host.js';
export { ModuleHost } from './host.js';
