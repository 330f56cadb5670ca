/**
 * Playhost Runtime Host — Host Configuration
 *
 * Reads and writes `state/config.json` under the Playhost home through
 * StateIO. The stored document may be partial or hand-edited: every field is
 * merged over DEFAULT_HOST_CONFIG individually, and a field with the wrong
 * type falls back to its default with a warning.
 *
 *   {
 *     "build":  { "command": "npm", "args": ["run", "build"], "timeoutMs": 120000 },
 *     "layout": { "sourceDir": "src", "outputDir": "dist", "outputEntry": "index.cjs" },
 *     "modulesRoots": ["/path/to/modules"]
 *   }
 */

import { createLogger, type Logger } from '@playhost/kernel';
import type { StateIO } from '../state/state-io.js';

export const HOST_CONFIG_FILE = 'config.json';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface BuildConfig {
  readonly command: string;
  readonly args: ReadonlyArray<string>;
  /** Upper bound for one module build. */
  readonly timeoutMs: number;
}

/** Where a module keeps its sources and its compiled entry. */
export interface LayoutConfig {
  readonly sourceDir: string;
  readonly outputDir: string;
  readonly outputEntry: string;
}

export interface HostConfig {
  readonly build: BuildConfig;
  readonly layout: LayoutConfig;
  /** Empty means "not configured"; see resolveModulesRoots(). */
  readonly modulesRoots: ReadonlyArray<string>;
}

export const DEFAULT_HOST_CONFIG: HostConfig = {
  build: { command: 'npm', args: ['run', 'build'], timeoutMs: 120_000 },
  layout: { sourceDir: 'src', outputDir: 'dist', outputEntry: 'index.cjs' },
  modulesRoots: [],
};

// ---------------------------------------------------------------------------
// Load / save
// ---------------------------------------------------------------------------

/**
 * Effective host configuration. A missing or unparseable file yields the
 * defaults; nothing here throws for content problems.
 */
export function loadHostConfig(stateIO: StateIO, log: Logger = createLogger('config')): HostConfig {
  const raw = stateIO.readJson(HOST_CONFIG_FILE, null);
  if (raw === null) return DEFAULT_HOST_CONFIG;
  if (!isRecord(raw)) {
    log.warn('Ignoring host config: top level is not an object');
    return DEFAULT_HOST_CONFIG;
  }

  const fields = new FieldReader(log);
  const build = fields.section(raw, 'build');
  const layout = fields.section(raw, 'layout');
  const d = DEFAULT_HOST_CONFIG;

  return {
    build: {
      command: fields.string(build, 'build.command', d.build.command),
      args: fields.stringArray(build, 'build.args', d.build.args),
      timeoutMs: fields.positiveInt(build, 'build.timeoutMs', d.build.timeoutMs),
    },
    layout: {
      sourceDir: fields.string(layout, 'layout.sourceDir', d.layout.sourceDir),
      outputDir: fields.string(layout, 'layout.outputDir', d.layout.outputDir),
      outputEntry: fields.string(layout, 'layout.outputEntry', d.layout.outputEntry),
    },
    modulesRoots: fields.stringArray(raw, 'modulesRoots', d.modulesRoots),
  };
}

export function saveHostConfig(stateIO: StateIO, config: HostConfig): void {
  stateIO.writeJson(HOST_CONFIG_FILE, config);
}

// ---------------------------------------------------------------------------
// Field validation
// ---------------------------------------------------------------------------

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function leaf(path: string): string {
  return path.slice(path.lastIndexOf('.') + 1);
}

class FieldReader {
  constructor(private readonly log: Logger) {}

  section(raw: Record<string, unknown>, key: string): Record<string, unknown> {
    const value = raw[key];
    if (value === undefined) return {};
    if (isRecord(value)) return value;
    this.reject(key, 'an object');
    return {};
  }

  string(obj: Record<string, unknown>, path: string, fallback: string): string {
    const value = obj[leaf(path)];
    if (value === undefined) return fallback;
    if (typeof value === 'string' && value !== '') return value;
    this.reject(path, 'a non-empty string');
    return fallback;
  }

  stringArray(
    obj: Record<string, unknown>,
    path: string,
    fallback: ReadonlyArray<string>,
  ): ReadonlyArray<string> {
    const value = obj[leaf(path)];
    if (value === undefined) return fallback;
    if (Array.isArray(value) && value.every((v): v is string => typeof v === 'string')) {
      return value;
    }
    this.reject(path, 'an array of strings');
    return fallback;
  }

  positiveInt(obj: Record<string, unknown>, path: string, fallback: number): number {
    const value = obj[leaf(path)];
    if (value === undefined) return fallback;
    if (typeof value === 'number' && Number.isInteger(value) && value > 0) return value;
    this.reject(path, 'a positive integer');
    return fallback;
  }

  private reject(path: string, expected: string): void {
    this.log.warn(`Invalid host config field '${path}': expected ${expected}; using default`);
  }
}
