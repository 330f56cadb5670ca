/**
 * Playhost Kernel — Module Types
 *
 * Defines the plugin contract (GameModule), the handle a launched module
 * returns, and the descriptors produced by discovery.
 *
 * The host only ever depends on the GameModule interface. Concrete module
 * classes live in independently built bundles and are located at runtime;
 * conformance is checked structurally, never by registration.
 */

import type { Logger } from '../logging/logger.js';
import type { MessagingBridge } from '../messaging/bridge.js';
import type { Message } from './message.js';
import type { ModuleMetadata } from './metadata.js';

// ---------------------------------------------------------------------------
// Plugin Contract
// ---------------------------------------------------------------------------

/**
 * An opaque handle the embedding UI knows how to show.
 *
 * `kind` tells the embedder what it is holding. `render` is optional and
 * returns a text rendition, which is what the CLI prints.
 */
export interface DisplaySurface {
  readonly kind: string;
  render?(): string;
}

/**
 * What the host hands a module when launching it. The bridge is the explicitly
 * owned instance for this host; there is no process-wide bridge.
 */
export interface LaunchContext {
  readonly bridge: MessagingBridge;
  readonly log: Logger;
}

/**
 * The capability set every loaded module implements.
 *
 * Lifecycle: constructed with zero arguments → `launch` exactly once →
 * any number of `handleMessage` calls → `stop` exactly once.
 */
export interface GameModule {
  /** Start the module. Must not block indefinitely. */
  launch(context?: LaunchContext): DisplaySurface;

  /** Release everything the module acquired. */
  stop(): void;

  /**
   * Synchronous request/response hook. Distinct from the bridge: the host
   * calls it directly and may use the return value.
   */
  handleMessage(message: Message): Message | null;

  metadata(): ModuleMetadata;
}

/** Method names a candidate must expose to be treated as a GameModule. */
export const GAME_MODULE_METHODS = ['launch', 'stop', 'handleMessage', 'metadata'] as const;

// ---------------------------------------------------------------------------
// Manifest
// ---------------------------------------------------------------------------

/**
 * Optional `module.json` a module directory may carry.
 *
 * When `entry` is declared the loader looks up exactly that export and skips
 * naming-convention probing.
 */
export interface ModuleManifest {
  /** Registry name. Defaults to the directory name. */
  readonly name?: string | undefined;
  /** Export name of the GameModule class. */
  readonly entry?: string | undefined;
  /** Compiled entry file, relative to the module directory. */
  readonly main?: string | undefined;
}

// ---------------------------------------------------------------------------
// Descriptor
// ---------------------------------------------------------------------------

/**
 * A candidate module found during discovery. Immutable; discarded once its
 * load attempt completes.
 */
export interface ModuleDescriptor {
  /** Registry key. */
  readonly name: string;
  /** Absolute path of the module directory; `catalog:<name>` for a catalog module. */
  readonly rootPath: string;
  /** A source tree is present (the module can be built). */
  readonly hasSource: boolean;
  /** The compiled output entry exists. */
  readonly hasBuildOutput: boolean;
  /** A prebuilt single-file bundle exists at the module root. */
  readonly hasBundle: boolean;
  /** Absolute path of the compiled output entry (may not exist yet). */
  readonly outputEntry: string;
  /** Absolute path of the prebuilt bundle (may not exist). */
  readonly bundlePath: string;
  readonly manifest?: ModuleManifest | undefined;
  /** Set when `module.json` exists but could not be parsed or validated. */
  readonly manifestError?: string | undefined;
  /** Supplied by the in-process catalog; there is no directory to build or load from. */
  readonly fromCatalog?: boolean | undefined;
}
