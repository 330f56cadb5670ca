/**
 * Playhost Kernel — Logger and Log Sink Contract
 *
 * The kernel owns the contract; sinks that write somewhere (console, JSONL
 * file) are injected by the runtime host or the CLI. Components default to
 * {@link NULL_LOG_SINK} so nothing in the kernel performs I/O on its own.
 */

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVEL_ORDER: Readonly<Record<LogLevel, number>> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface LogEntry {
  readonly level: LogLevel;
  /** Component that emitted the entry (e.g. 'bridge', 'loader'). */
  readonly scope: string;
  readonly message: string;
  readonly data?: Readonly<Record<string, unknown>> | undefined;
  /** ISO-8601. */
  readonly timestamp: string;
}

/**
 * Receives log entries. `append` must not throw back into the caller.
 */
export interface LogSink {
  append(entry: LogEntry): void;
}

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
  /** Logger for a nested scope, e.g. `loader` → `loader:tictactoe`. */
  child(scope: string): Logger;
}

// ---------------------------------------------------------------------------
// Sinks
// ---------------------------------------------------------------------------

export const NULL_LOG_SINK: LogSink = {
  append(): void {
    // discards
  },
};

/**
 * Keeps entries in memory. Used by tests and by embedders that mirror the
 * host log into a view.
 */
export class BufferedLogSink implements LogSink {
  private readonly buffer: LogEntry[] = [];

  append(entry: LogEntry): void {
    this.buffer.push(entry);
  }

  entries(level?: LogLevel): ReadonlyArray<LogEntry> {
    return level === undefined ? [...this.buffer] : this.buffer.filter((e) => e.level === level);
  }

  messages(level?: LogLevel): ReadonlyArray<string> {
    return this.entries(level).map((e) => e.message);
  }

  clear(): void {
    this.buffer.length = 0;
  }
}

/** Delivers each entry to several sinks; one failing sink does not starve the rest. */
export class FanOutLogSink implements LogSink {
  private readonly sinks: ReadonlyArray<LogSink>;

  constructor(...sinks: LogSink[]) {
    this.sinks = sinks;
  }

  append(entry: LogEntry): void {
    for (const sink of this.sinks) {
      try {
        sink.append(entry);
      } catch (err: unknown) {
        // eslint-disable-next-line no-console
        console.error('[playhost] log sink failed:', err);
      }
    }
  }
}

// ---------------------------------------------------------------------------
// Logger factory
// ---------------------------------------------------------------------------

export function createLogger(scope: string, sink: LogSink = NULL_LOG_SINK): Logger {
  const emit = (level: LogLevel, message: string, data?: Record<string, unknown>): void => {
    sink.append({
      level,
      scope,
      message,
      ...(data !== undefined ? { data } : {}),
      timestamp: new Date().toISOString(),
    });
  };

  return {
    debug: (message, data) => emit('debug', message, data),
    info: (message, data) => emit('info', message, data),
    warn: (message, data) => emit('warn', message, data),
    error: (message, data) => emit('error', message, data),
    child: (childScope) => createLogger(`${scope}:${childScope}`, sink),
  };
}

/** Render an unknown thrown value as a short string for log data. */
export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
