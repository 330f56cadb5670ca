/**
 * Playhost Runtime Host — Home and Modules Root Resolution
 *
 * Resolves the Playhost home directory using the following precedence:
 *
 *   1. Explicit `home` option (e.g. from --home CLI flag)
 *   2. PLAYHOST_HOME environment variable
 *   3. OS application config file (stores a home chosen with --home --persist)
 *   4. Default: ~/.playhost
 *
 *   <PLAYHOST_HOME>/
 *     state/config.json       host configuration
 *     logs/host.jsonl         host log
 *     transcripts/            saved session transcripts
 *
 * The modules roots (where game module directories live) are resolved
 * separately and are never created here: a missing root must reach the
 * scanner so it can report DiscoveryFailed.
 *
 *   1. Explicit `modulesDirs` option (--modules-dir, repeatable)
 *   2. PLAYHOST_MODULES_DIR (path-delimiter separated list)
 *   3. `modulesRoots` from the host configuration
 *   4. Default: <cwd>/modules
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { delimiter, dirname, join, resolve } from 'node:path';
import { homedir, platform } from 'node:os';

// ---------------------------------------------------------------------------
// OS Config File Location
// ---------------------------------------------------------------------------

/**
 * Platform-specific path to the Playhost application config file.
 *
 * Locations:
 *   macOS:   ~/Library/Preferences/playhost/config.json
 *   Windows: %APPDATA%\playhost\config.json (fallback: ~/AppData/Roaming/playhost/config.json)
 *   Linux:   ~/.config/playhost/config.json
 */
export function getOsConfigPath(): string {
  const home = homedir();
  switch (platform()) {
    case 'darwin':
      return join(home, 'Library', 'Preferences', 'playhost', 'config.json');
    case 'win32': {
      const appData = process.env['APPDATA'] ?? join(home, 'AppData', 'Roaming');
      return join(appData, 'playhost', 'config.json');
    }
    default:
      return join(process.env['XDG_CONFIG_HOME'] ?? join(home, '.config'), 'playhost', 'config.json');
  }
}

// ---------------------------------------------------------------------------
// OS Config Read / Write
// ---------------------------------------------------------------------------

/**
 * Read the persisted home path from the OS application config file.
 *
 * Returns null if the file does not exist, cannot be read, or does not
 * contain a non-empty `home` string.
 */
export function readHomeFromConfig(configPath: string = getOsConfigPath()): string | null {
  try {
    const parsed: unknown = JSON.parse(readFileSync(configPath, 'utf-8'));
    if (parsed === null || typeof parsed !== 'object') return null;
    const home: unknown = Reflect.get(parsed, 'home');
    return typeof home === 'string' && home !== '' ? home : null;
  } catch {
    return null;
  }
}

/** Persist the home path to the OS application config file. */
export function writeHomeToConfig(home: string, configPath: string = getOsConfigPath()): void {
  mkdirSync(dirname(configPath), { recursive: true });
  writeFileSync(configPath, JSON.stringify({ home }, null, 2), 'utf-8');
}

// ---------------------------------------------------------------------------
// Home resolution
// ---------------------------------------------------------------------------

export interface ResolveHomeOptions {
  /** Explicit override; highest precedence. */
  readonly home?: string | undefined;
  /**
   * Persist an explicit override to the OS config file so later invocations
   * without --home use it. Default: false.
   */
  readonly persist?: boolean | undefined;
  /** Environment to read; defaults to process.env. */
  readonly env?: NodeJS.ProcessEnv | undefined;
  /** OS config file to read/write; defaults to getOsConfigPath(). */
  readonly configPath?: string | undefined;
}

/**
 * Resolve the Playhost home directory and create it if missing.
 */
export function resolvePlayhostHome(opts?: ResolveHomeOptions): string {
  const env = opts?.env ?? process.env;
  const configPath = opts?.configPath ?? getOsConfigPath();
  let home: string;

  if (typeof opts?.home === 'string' && opts.home !== '') {
    home = resolve(opts.home);
  } else if (typeof env['PLAYHOST_HOME'] === 'string' && env['PLAYHOST_HOME'] !== '') {
    home = resolve(env['PLAYHOST_HOME']);
  } else {
    home = readHomeFromConfig(configPath) ?? join(homedir(), '.playhost');
  }

  if (!existsSync(home)) {
    mkdirSync(home, { recursive: true });
  }

  if (opts?.persist === true && typeof opts.home === 'string' && opts.home !== '') {
    writeHomeToConfig(home, configPath);
  }

  return home;
}

// ---------------------------------------------------------------------------
// Modules roots resolution
// ---------------------------------------------------------------------------

export interface ResolveModulesRootsOptions {
  /** Explicit roots, e.g. from repeated --modules-dir flags. */
  readonly modulesDirs?: ReadonlyArray<string> | undefined;
  /** Roots from the host configuration. */
  readonly configured?: ReadonlyArray<string> | undefined;
  readonly env?: NodeJS.ProcessEnv | undefined;
  /** Base for relative paths and the default root; defaults to process.cwd(). */
  readonly cwd?: string | undefined;
}

/**
 * Resolve the ordered list of modules roots as absolute paths.
 * Order matters: when two roots contain a module of the same name, the one
 * from the earlier root wins.
 */
export function resolveModulesRoots(opts?: ResolveModulesRootsOptions): ReadonlyArray<string> {
  const env = opts?.env ?? process.env;
  const cwd = opts?.cwd ?? process.cwd();
  const absolute = (dirs: ReadonlyArray<string>): string[] =>
    dedupe(dirs.filter((d) => d !== '').map((d) => resolve(cwd, d)));

  if (opts?.modulesDirs !== undefined && opts.modulesDirs.length > 0) {
    return absolute(opts.modulesDirs);
  }

  const fromEnv = env['PLAYHOST_MODULES_DIR'];
  if (typeof fromEnv === 'string' && fromEnv !== '') {
    return absolute(fromEnv.split(delimiter));
  }

  if (opts?.configured !== undefined && opts.configured.length > 0) {
    return absolute(opts.configured);
  }

  return [join(cwd, 'modules')];
}

function dedupe(paths: ReadonlyArray<string>): string[] {
  return [...new Set(paths)];
}
