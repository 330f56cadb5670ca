/**
 * Playhost Runtime Host — StateIO Interface
 *
 * An injectable I/O abstraction rooted at the Playhost home directory, for
 * reading/writing JSON state, appending JSONL log lines and writing
 * exported files (transcripts).
 *
 * Two implementations are provided:
 *   - FileStateIO   — durable file I/O under the home directory
 *   - MemoryStateIO — in-memory I/O for tests and embedded (non-persistent) use
 *
 * Layout under the home directory:
 *   state/<filename>        JSON state (config.json)
 *   logs/<logfilename>      append-only JSONL (host.jsonl)
 *   <dir>/<filename>        exported text files (transcripts/...)
 */

import { appendFileSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { dirname, join, normalize, isAbsolute } from 'node:path';

// ---------------------------------------------------------------------------
// StateIO Interface
// ---------------------------------------------------------------------------

export interface StateIO {
  /**
   * Read a JSON file from `state/` and parse it.
   *
   * Returns `fallback` if the file does not exist or cannot be parsed.
   * The parsed value is returned as `unknown`; callers validate its shape.
   */
  readJson(filename: string, fallback: unknown): unknown;

  /** Serialize a value as JSON into `state/`, creating the directory on demand. */
  writeJson(filename: string, value: unknown): void;

  /** Append one line (a newline is added) to `logs/<logfilename>`. */
  appendLine(logfilename: string, line: string): void;

  /**
   * Write a text file at a relative path under the home directory,
   * creating parent directories on demand. Returns the path as written.
   *
   * @throws {Error} If the path is absolute or escapes the home directory
   */
  writeText(relativePath: string, content: string): string;
}

// ---------------------------------------------------------------------------
// FileStateIO
// ---------------------------------------------------------------------------

/**
 * Durable file-system StateIO implementation bound to one home directory.
 *
 * ENOENT and SyntaxError on read are recoverable (return fallback).
 * Other I/O errors are rethrown (the operator must address them).
 */
export class FileStateIO implements StateIO {
  constructor(private readonly homeDir: string) {}

  readJson(filename: string, fallback: unknown): unknown {
    const filePath = join(this.homeDir, 'state', filename);
    try {
      const raw = readFileSync(filePath, 'utf-8');
      return JSON.parse(raw) as unknown;
    } catch (err: unknown) {
      if (err instanceof SyntaxError || isNodeError(err, 'ENOENT')) {
        return fallback;
      }
      throw err;
    }
  }

  writeJson(filename: string, value: unknown): void {
    const subDir = join(this.homeDir, 'state');
    mkdirSync(subDir, { recursive: true });
    writeFileSync(join(subDir, filename), JSON.stringify(value, null, 2), 'utf-8');
  }

  appendLine(logfilename: string, line: string): void {
    const logsDir = join(this.homeDir, 'logs');
    mkdirSync(logsDir, { recursive: true });
    appendFileSync(join(logsDir, logfilename), line + '\n', 'utf-8');
  }

  writeText(relativePath: string, content: string): string {
    const safe = checkRelativePath(relativePath);
    const target = join(this.homeDir, safe);
    mkdirSync(dirname(target), { recursive: true });
    writeFileSync(target, content, 'utf-8');
    return safe;
  }
}

// ---------------------------------------------------------------------------
// MemoryStateIO
// ---------------------------------------------------------------------------

/**
 * In-memory StateIO implementation. No file system access.
 *
 * readJson round-trips through JSON serialization to match FileStateIO
 * semantics (undefined values disappear, Sets become objects, etc.).
 */
export class MemoryStateIO implements StateIO {
  private readonly store: Map<string, string> = new Map();
  private readonly logs: Map<string, string[]> = new Map();
  private readonly files: Map<string, string> = new Map();

  readJson(filename: string, fallback: unknown): unknown {
    const raw = this.store.get(filename);
    if (raw === undefined) {
      return fallback;
    }
    return JSON.parse(raw) as unknown;
  }

  writeJson(filename: string, value: unknown): void {
    this.store.set(filename, JSON.stringify(value));
  }

  appendLine(logfilename: string, line: string): void {
    const lines = this.logs.get(logfilename) ?? [];
    lines.push(line);
    this.logs.set(logfilename, lines);
  }

  /**
   * All lines appended to a log file. Specific to MemoryStateIO; tests use
   * it to inspect output without touching the file system.
   */
  readLines(logfilename: string): ReadonlyArray<string> {
    return this.logs.get(logfilename) ?? [];
  }

  writeText(relativePath: string, content: string): string {
    const safe = checkRelativePath(relativePath);
    this.files.set(safe, content);
    return safe;
  }

  /** Content written by writeText, or undefined. */
  readText(relativePath: string): string | undefined {
    return this.files.get(normalize(relativePath));
  }
}

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

function checkRelativePath(relativePath: string): string {
  const normalized = normalize(relativePath);
  if (isAbsolute(normalized) || normalized === '..' || normalized.startsWith('../') || normalized.startsWith('..\\')) {
    throw new Error(`StateIO: path must stay under the home directory: ${relativePath}`);
  }
  return normalized;
}

/** Narrow an unknown error to a Node.js errno exception with a specific code. */
export function isNodeError(err: unknown, code: string): boolean {
  return (
    err !== null &&
    typeof err === 'object' &&
    'code' in err &&
    err.code === code
  );
}
