/**
 * @playhost/cli
 *
 * The `playhost` command: list, metadata, message, launch, config.
 * Exported for embedding and for tests; the executable lives in bin/.
 */

export { createProgram } from './commands/index.js';
export type { CliIO, GlobalOptions, Runtime } from './commands/runtime.js';
export { buildRuntime, processIO } from './commands/runtime.js';
export type { ConsoleLogSinkOptions } from './logging/console-log-sink.js';
export { ConsoleLogSink, formatLogLine } from './logging/console-log-sink.js';
export type { ModuleRow } from './output/report.js';
export { describeModules, formatConfig, formatFailures, formatModuleList, playersLabel } from './output/report.js';
export type { Paint, Theme } from './output/theme.js';
export { colorTheme, plainTheme } from './output/theme.js';
