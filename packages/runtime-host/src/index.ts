/**
 * @playhost/runtime-host
 *
 * Playhost runtime host — side-effectful adapter implementations, home and
 * configuration resolution, persistence, and session orchestration. Depends
 * on @playhost/kernel (interfaces); implements them with Node.js built-ins.
 *
 * No kernel code imports from this package.
 */

// Adapter implementations
export { NodeExecAdapter } from './adapters/exec.js';

// Logging
export type { FileLogSinkOptions } from './logging/file-log-sink.js';
export { FileLogSink, HOST_LOG_FILE } from './logging/file-log-sink.js';
export { ulid } from './logging/ulid.js';

// StateIO — home-scoped I/O abstraction
export type { StateIO } from './state/state-io.js';
export { FileStateIO, MemoryStateIO, isNodeError } from './state/state-io.js';

// Home and modules roots
export type { ResolveHomeOptions, ResolveModulesRootsOptions } from './home.js';
export {
  getOsConfigPath,
  readHomeFromConfig,
  resolveModulesRoots,
  resolvePlayhostHome,
  writeHomeToConfig,
} from './home.js';

// Host configuration
export type { BuildConfig, HostConfig, LayoutConfig } from './config/host-config.js';
export {
  DEFAULT_HOST_CONFIG,
  HOST_CONFIG_FILE,
  loadHostConfig,
  saveHostConfig,
} from './config/host-config.js';

// Transcripts
export type { SavedTranscript } from './transcript/transcript-store.js';
export {
  formatTranscriptLine,
  slugify,
  TRANSCRIPTS_DIR,
  TranscriptStore,
} from './transcript/transcript-store.js';

// Sessions
export type { GameSessionOptions, SessionState } from './session/game-session.js';
export { GameSession } from './session/game-session.js';
