/**
 * Playhost Module Loader — Module Builder
 *
 * Rebuilds a module whose compiled output is missing or older than its
 * sources, by running the configured build command in the module directory.
 *
 * Staleness is by modification time: the newest file anywhere under the
 * source tree against the output entry. Content hashes are not compared.
 *
 * build() never throws. A non-zero exit, a timeout, a command that cannot be
 * started, or a build that leaves no output entry all become a failed
 * BuildOutcome, so one broken module cannot stop the rest of a load pass.
 * The builder writes nothing itself; the build tool writes into the module's
 * own directory.
 */

import { readdirSync, statSync } from 'node:fs';
import { join, relative } from 'node:path';
import {
  createLogger,
  describeError,
  type BuildOutcome,
  type ExecAdapter,
  type ExecResult,
  type Logger,
  type ModuleDescriptor,
} from '@playhost/kernel';
import { DEFAULT_HOST_CONFIG, type BuildConfig, type LayoutConfig } from '@playhost/runtime-host';

/** Lines of build output kept in a failure's details. */
const DETAIL_LINES = 20;

export interface ModuleBuilderOptions {
  readonly build?: BuildConfig | undefined;
  readonly layout?: LayoutConfig | undefined;
  readonly log?: Logger | undefined;
}

export class ModuleBuilder {
  private readonly buildConfig: BuildConfig;
  private readonly layout: LayoutConfig;
  private readonly log: Logger;

  constructor(
    private readonly exec: ExecAdapter,
    options?: ModuleBuilderOptions,
  ) {
    this.buildConfig = options?.build ?? DEFAULT_HOST_CONFIG.build;
    this.layout = options?.layout ?? DEFAULT_HOST_CONFIG.layout;
    this.log = options?.log ?? createLogger('builder');
  }

  /**
   * True when the module has sources and its output entry is missing or
   * older than the newest source file. Modules without sources (bundle or
   * prebuilt output only) never need a build.
   */
  needsBuild(descriptor: ModuleDescriptor): boolean {
    if (!descriptor.hasSource) return false;

    const output = statSync(descriptor.outputEntry, { throwIfNoEntry: false });
    if (output === undefined) return true;

    return newestMtimeMs(join(descriptor.rootPath, this.layout.sourceDir)) > output.mtimeMs;
  }

  async build(descriptor: ModuleDescriptor): Promise<BuildOutcome> {
    const { name, rootPath } = descriptor;
    const { command, args, timeoutMs } = this.buildConfig;
    const fail = (reason: string, details?: string): BuildOutcome => {
      this.log.warn('Build failed', { module: name, reason });
      return { ok: false, name, reason, ...(details !== undefined && details !== '' ? { details } : {}) };
    };

    this.log.info('Building module', { module: name, command: [command, ...args].join(' ') });

    let result: ExecResult;
    try {
      result = await this.exec.run(command, args, { cwd: rootPath, timeoutMs });
    } catch (err: unknown) {
      return fail(`Build could not start: ${describeError(err)}`);
    }

    if (result.timedOut) {
      return fail(`Build timed out after ${timeoutMs} ms`, outputTail(result));
    }
    if (result.exitCode === null) {
      return fail('Build was terminated by a signal', outputTail(result));
    }
    if (result.exitCode !== 0) {
      return fail(`Build exited with code ${result.exitCode}`, outputTail(result));
    }
    if (statSync(descriptor.outputEntry, { throwIfNoEntry: false }) === undefined) {
      return fail('Build produced no output entry', `expected ${relative(rootPath, descriptor.outputEntry)}`);
    }

    this.log.info('Build succeeded', { module: name, durationMs: result.durationMs });
    return { ok: true, name, durationMs: result.durationMs };
  }
}

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

/** Newest mtime of any file under `dir`; 0 when the tree is empty or missing. */
function newestMtimeMs(dir: string): number {
  let newest = 0;
  const pending = [dir];
  while (pending.length > 0) {
    const current = pending.pop();
    if (current === undefined) break;
    const entries = readdirSync(current, { withFileTypes: true });
    for (const entry of entries) {
      if (entry.name === 'node_modules') continue;
      const path = join(current, entry.name);
      if (entry.isDirectory()) {
        pending.push(path);
      } else if (entry.isFile()) {
        newest = Math.max(newest, statSync(path).mtimeMs);
      }
    }
  }
  return newest;
}

/** Last lines of stderr, or of stdout when stderr is empty. */
function outputTail(result: ExecResult): string {
  const text = result.stderr.trim() !== '' ? result.stderr : result.stdout;
  return text
    .split(/\r?\n/)
    .filter((line) => line.trim() !== '')
    .slice(-DETAIL_LINES)
    .join('\n');
}
