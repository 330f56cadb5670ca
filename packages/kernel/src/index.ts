/**
 * @playhost/kernel
 *
 * Playhost kernel — the plugin contract every game module implements, the
 * message protocol, the messaging bridge, and the logger contract.
 *
 * This package is side-effect free. It contains no imports of node:fs,
 * node:child_process or any other I/O API. Subprocesses, files and consoles
 * are reached through interfaces implemented in @playhost/runtime-host and
 * @playhost/cli.
 */

// Types
export type { Message, MessageValue } from './types/message.js';
export { FUNCTION_KEY, MessageFunction, START_FUNCTIONS } from './types/message.js';

export type { ModuleMetadata } from './types/metadata.js';
export { DIFFICULTY_RANK, DifficultyLevel, GameMode } from './types/metadata.js';

export type {
  DisplaySurface,
  GameModule,
  LaunchContext,
  ModuleDescriptor,
  ModuleManifest,
} from './types/module.js';
export { GAME_MODULE_METHODS } from './types/module.js';

export type {
  BuildOutcome,
  DiscoveryResult,
  FailureStage,
  LoadedModule,
  LoadFailure,
  LoadOutcome,
  LoadResult,
} from './types/outcome.js';

// Adapter interfaces (implementations live in runtime-host)
export type { ExecAdapter, ExecOptions, ExecResult } from './adapters/index.js';

// Errors
export { DiscoveryFailedError, MessageValidationError, ModuleNotFoundError } from './errors.js';

// Logging
export type { LogEntry, Logger, LogLevel, LogSink } from './logging/logger.js';
export {
  BufferedLogSink,
  createLogger,
  describeError,
  FanOutLogSink,
  LOG_LEVEL_ORDER,
  NULL_LOG_SINK,
} from './logging/logger.js';

// Metadata helpers
export {
  difficultyRank,
  isEasierThan,
  isHarderThan,
  maxDifficulty,
  metadataToMessage,
  minDifficulty,
} from './metadata/metadata.js';

// Messaging
export type {
  MessageConsumer,
  MessagingBridgeOptions,
  ReturnCallback,
  Subscription,
} from './messaging/bridge.js';
export { MessagingBridge } from './messaging/bridge.js';
export {
  checkIfMessageIsStartMessage,
  createDefaultStartMessage,
  isEndMessage,
  isMessage,
  isMessageValue,
  isMetadataRequest,
  isStartMessage,
  messageFunction,
  withLocalPlayerId,
} from './messaging/start-message.js';
export type { Clock, TranscriptDirection, TranscriptEntry } from './messaging/transcript.js';
export { Transcript } from './messaging/transcript.js';
