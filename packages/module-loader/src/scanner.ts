/**
 * Playhost Module Loader — Module Scanner
 *
 * Turns a modules root into candidate descriptors. Lists the immediate
 * subdirectories of the root (symlinks to directories included), skips hidden
 * directories and node_modules, and keeps those the validator recognizes as
 * modules. A subdirectory that cannot be inspected is logged and skipped.
 *
 * Descriptors are sorted by directory name (code-unit order) so that a pass
 * is reproducible regardless of the order the file system lists entries in.
 *
 * A root that is missing, unreadable or not a directory yields an explicit
 * DiscoveryFailed result, never an empty list.
 */

import { readdirSync, statSync, type Dirent, type Stats } from 'node:fs';
import { join, resolve } from 'node:path';
import {
  createLogger,
  describeError,
  type DiscoveryResult,
  type Logger,
  type ModuleDescriptor,
} from '@playhost/kernel';
import { ModuleValidator } from './validator.js';

export interface ModuleScannerOptions {
  readonly validator?: ModuleValidator | undefined;
  readonly log?: Logger | undefined;
}

export class ModuleScanner {
  private readonly validator: ModuleValidator;
  private readonly log: Logger;

  constructor(options?: ModuleScannerOptions) {
    this.validator = options?.validator ?? new ModuleValidator();
    this.log = options?.log ?? createLogger('scanner');
  }

  discover(rootPath: string): DiscoveryResult {
    const root = resolve(rootPath);
    const failed = (reason: string): DiscoveryResult => {
      this.log.warn('Discovery failed', { rootPath: root, reason });
      return { ok: false, kind: 'DiscoveryFailed', rootPath: root, reason };
    };

    let stat: Stats | undefined;
    try {
      stat = statSync(root, { throwIfNoEntry: false });
    } catch (err: unknown) {
      return failed(`Cannot read modules root: ${describeError(err)}`);
    }
    if (stat === undefined) return failed('Modules root does not exist');
    if (!stat.isDirectory()) return failed('Modules root is not a directory');

    let entries: Dirent[];
    try {
      entries = readdirSync(root, { withFileTypes: true });
    } catch (err: unknown) {
      return failed(`Cannot read modules root: ${describeError(err)}`);
    }

    const dirNames = entries
      .filter((e) => !e.name.startsWith('.') && e.name !== 'node_modules' && isDirectoryEntry(root, e))
      .map((e) => e.name)
      .sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));

    const descriptors: ModuleDescriptor[] = [];
    for (const dirName of dirNames) {
      let descriptor: ModuleDescriptor | null;
      try {
        descriptor = this.validator.inspect(join(root, dirName));
      } catch (err: unknown) {
        this.log.warn('Skipped unreadable directory', { dir: dirName, error: describeError(err) });
        continue;
      }
      if (descriptor === null) {
        this.log.debug('Skipped directory without module markers', { dir: dirName });
        continue;
      }
      descriptors.push(descriptor);
    }

    this.log.info('Discovered modules', { rootPath: root, count: descriptors.length });
    return { ok: true, rootPath: root, descriptors };
  }

  /** Discover each root in order; one failing root does not hide the others. */
  discoverAll(roots: ReadonlyArray<string>): ReadonlyArray<DiscoveryResult> {
    return roots.map((root) => this.discover(root));
  }
}

/** A directory, or a symlink that resolves to one; dangling links are not. */
function isDirectoryEntry(root: string, entry: Dirent): boolean {
  if (entry.isDirectory()) return true;
  if (!entry.isSymbolicLink()) return false;
  try {
    return statSync(join(root, entry.name), { throwIfNoEntry: false })?.isDirectory() ?? false;
  } catch {
    // ELOOP and friends: not a usable module directory.
    return false;
  }
}
