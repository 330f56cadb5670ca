/**
 * Playhost Runtime Host — File-backed Log Sink
 *
 * Implements the LogSink interface from @playhost/kernel by appending one
 * JSON line per entry to `<PLAYHOST_HOME>/logs/host.jsonl`.
 *
 * The kernel owns the contract; this is the only place in the system that
 * writes host log entries to disk. Writes are synchronous, so an entry is on
 * disk before the logging call returns.
 */

import type { LogEntry, LogLevel, LogSink } from '@playhost/kernel';
import { LOG_LEVEL_ORDER } from '@playhost/kernel';
import type { StateIO } from '../state/state-io.js';
import { ulid } from './ulid.js';

export const HOST_LOG_FILE = 'host.jsonl';

export interface FileLogSinkOptions {
  /** Entries below this level are not written. Default: 'debug'. */
  readonly minLevel?: LogLevel | undefined;
  /** Log file name under logs/. Default: host.jsonl. */
  readonly filename?: string | undefined;
}

export class FileLogSink implements LogSink {
  private readonly minLevel: LogLevel;
  private readonly filename: string;

  constructor(
    private readonly stateIO: StateIO,
    options?: FileLogSinkOptions,
  ) {
    this.minLevel = options?.minLevel ?? 'debug';
    this.filename = options?.filename ?? HOST_LOG_FILE;
  }

  append(entry: LogEntry): void {
    if (LOG_LEVEL_ORDER[entry.level] < LOG_LEVEL_ORDER[this.minLevel]) return;

    const line = JSON.stringify({
      event_id: ulid(),
      timestamp: entry.timestamp,
      level: entry.level,
      scope: entry.scope,
      message: entry.message,
      ...(entry.data !== undefined ? { data: entry.data } : {}),
    });
    this.stateIO.appendLine(this.filename, line);
  }
}
