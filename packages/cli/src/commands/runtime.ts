/**
 * Playhost CLI — Runtime assembly shared by every command
 *
 * One invocation, one runtime:
 *
 *   home (--home / PLAYHOST_HOME / OS config / ~/.playhost)
 *     → FileStateIO → host config (state/config.json)
 *     → log: logs/host.jsonl + stderr
 *     → modules roots (--modules-dir / PLAYHOST_MODULES_DIR / config / ./modules)
 *     → ModuleHost
 *
 * Output goes through {@link CliIO} so tests can capture it and set the
 * exit code without touching the real process.
 */

import type { Command } from 'commander';
import {
  createLogger,
  FanOutLogSink,
  type GameModule,
  type Logger,
  ModuleNotFoundError,
} from '@playhost/kernel';
import { ModuleHost, type RefreshResult } from '@playhost/module-loader';
import {
  FileLogSink,
  FileStateIO,
  loadHostConfig,
  NodeExecAdapter,
  resolveModulesRoots,
  resolvePlayhostHome,
  TranscriptStore,
  type HostConfig,
  type StateIO,
} from '@playhost/runtime-host';
import { ConsoleLogSink } from '../logging/console-log-sink.js';
import { defaultTheme, type Theme } from '../output/theme.js';

// ---------------------------------------------------------------------------
// I/O seam
// ---------------------------------------------------------------------------

export interface CliIO {
  out(line: string): void;
  err(line: string): void;
  setExitCode(code: number): void;
  readonly env: NodeJS.ProcessEnv;
  readonly cwd: string;
  readonly theme: Theme;
  /** OS config file holding a persisted home; default: the platform location. */
  readonly osConfigPath?: string | undefined;
}

export function processIO(): CliIO {
  return {
    out: (line) => { process.stdout.write(line + '\n'); },
    err: (line) => { process.stderr.write(line + '\n'); },
    setExitCode: (code) => { process.exitCode = code; },
    env: process.env,
    cwd: process.cwd(),
    theme: defaultTheme(),
  };
}

// ---------------------------------------------------------------------------
// Global options
// ---------------------------------------------------------------------------

export type GlobalOptions = {
  home?: string | undefined;
  modulesDir?: string[] | undefined;
  verbose?: boolean | undefined;
};

export function globalsOf(command: Command): GlobalOptions {
  return command.optsWithGlobals<GlobalOptions>();
}

// ---------------------------------------------------------------------------
// Runtime
// ---------------------------------------------------------------------------

export interface Runtime {
  readonly home: string;
  readonly stateIO: StateIO;
  readonly config: HostConfig;
  readonly modulesRoots: ReadonlyArray<string>;
  readonly log: Logger;
  readonly host: ModuleHost;
  readonly transcripts: TranscriptStore;
}

export function buildRuntime(globals: GlobalOptions, io: CliIO, options?: { persistHome?: boolean }): Runtime {
  const home = resolvePlayhostHome({
    home: globals.home,
    persist: options?.persistHome === true,
    env: io.env,
    configPath: io.osConfigPath,
  });
  const stateIO = new FileStateIO(home);
  const sink = new FanOutLogSink(
    new FileLogSink(stateIO),
    new ConsoleLogSink({
      minLevel: globals.verbose === true ? 'debug' : 'warn',
      write: io.err,
      theme: io.theme,
    }),
  );
  const log = createLogger('playhost', sink);
  const config = loadHostConfig(stateIO, log.child('config'));
  const modulesRoots = resolveModulesRoots({
    modulesDirs: globals.modulesDir,
    configured: config.modulesRoots,
    env: io.env,
    cwd: io.cwd,
  });
  const host = ModuleHost.create({ roots: modulesRoots, exec: new NodeExecAdapter(), config, log });
  return { home, stateIO, config, modulesRoots, log, host, transcripts: new TranscriptStore(stateIO) };
}

export type LoadedPass = Extract<RefreshResult, { ok: true }>;

/** Run one load pass. Discovery failure is reported and exits with 2. */
export async function loadModules(runtime: Runtime, io: CliIO): Promise<LoadedPass | null> {
  const result = await runtime.host.refresh();
  if (!result.ok) {
    io.err(io.theme.error(result.error.message));
    io.setExitCode(2);
    return null;
  }
  return result;
}

/** Look a module up by name. An unknown name is reported and exits with 1. */
export function findModule(pass: LoadedPass, name: string, io: CliIO): GameModule | null {
  try {
    return pass.registry.require(name);
  } catch (err: unknown) {
    if (!(err instanceof ModuleNotFoundError)) throw err;
    io.err(io.theme.error(err.message));
    const failure = pass.result.failures.find((f) => f.name === name);
    if (failure !== undefined) {
      io.err(`  ${name} failed to ${failure.stage}: ${failure.reason}`);
    }
    io.setExitCode(1);
    return null;
  }
}
