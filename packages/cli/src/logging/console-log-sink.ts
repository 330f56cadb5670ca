/**
 * Playhost CLI — Console Log Sink
 *
 * Human-readable log lines on stderr, so command output on stdout stays
 * machine-readable under --json:
 *
 *   warn  loader  Build failed {"module":"chess"}
 */

import { LOG_LEVEL_ORDER, type LogEntry, type LogLevel, type LogSink } from '@playhost/kernel';
import { levelColor, plainTheme, type Theme } from '../output/theme.js';

export interface ConsoleLogSinkOptions {
  /** Entries below this level are dropped. Default: 'warn'. */
  readonly minLevel?: LogLevel | undefined;
  /** Receives one formatted line at a time. Default: process.stderr. */
  readonly write?: ((line: string) => void) | undefined;
  readonly theme?: Theme | undefined;
}

export class ConsoleLogSink implements LogSink {
  private readonly minLevel: LogLevel;
  private readonly write: (line: string) => void;
  private readonly theme: Theme;

  constructor(options?: ConsoleLogSinkOptions) {
    this.minLevel = options?.minLevel ?? 'warn';
    this.write = options?.write ?? ((line) => { process.stderr.write(line + '\n'); });
    this.theme = options?.theme ?? plainTheme;
  }

  append(entry: LogEntry): void {
    if (LOG_LEVEL_ORDER[entry.level] < LOG_LEVEL_ORDER[this.minLevel]) return;
    this.write(formatLogLine(entry, this.theme));
  }
}

export function formatLogLine(entry: LogEntry, theme: Theme = plainTheme): string {
  const level = levelColor(theme, entry.level)(entry.level.padEnd(5));
  const data = entry.data !== undefined && Object.keys(entry.data).length > 0
    ? ' ' + theme.muted(JSON.stringify(entry.data))
    : '';
  return `${level} ${theme.muted(entry.scope)}  ${entry.message}${data}`;
}
