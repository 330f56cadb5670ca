/**
 * Playhost Module Loader — Module Validator
 *
 * Decides whether one directory looks like a game module and, if so,
 * describes it. Read-only: nothing here builds, loads or writes.
 *
 * A directory is a module when it has at least one marker:
 *   - a source tree            <dir>/<sourceDir>/           (default src/)
 *   - a compiled output entry  <dir>/<outputDir>/<entry>    (default dist/index.cjs)
 *                              or the manifest's `main`
 *   - a prebuilt bundle        <dir>/module.cjs
 *
 * A directory without markers is not a module and is skipped silently.
 * An optional `module.json` may rename the module, name its entry export,
 * or point at a different compiled entry.
 */

import { existsSync, readFileSync, statSync } from 'node:fs';
import { basename, isAbsolute, join, normalize, resolve } from 'node:path';
import { describeError, type ModuleDescriptor, type ModuleManifest } from '@playhost/kernel';
import { DEFAULT_HOST_CONFIG, type LayoutConfig } from '@playhost/runtime-host';

export const MANIFEST_FILE = 'module.json';
export const BUNDLE_FILE = 'module.cjs';

export type ManifestParseResult =
  | { readonly ok: true; readonly manifest: ModuleManifest }
  | { readonly ok: false; readonly error: string };

// ---------------------------------------------------------------------------
// Manifest parsing
// ---------------------------------------------------------------------------

const MANIFEST_STRING_FIELDS = ['name', 'entry', 'main'] as const;

/**
 * Validate an unknown value as a ModuleManifest.
 *
 * Every field is optional; a present field must be a non-empty string.
 * `main` must be a relative path that stays inside the module directory.
 * Unknown keys are ignored so the file can carry other tooling metadata.
 */
export function parseManifest(raw: unknown): ManifestParseResult {
  if (raw === null || typeof raw !== 'object' || Array.isArray(raw)) {
    return { ok: false, error: 'manifest must be a JSON object' };
  }

  const fields: { name?: string; entry?: string; main?: string } = {};
  for (const key of MANIFEST_STRING_FIELDS) {
    const value: unknown = Reflect.get(raw, key);
    if (value === undefined) continue;
    if (typeof value !== 'string' || value.trim() === '') {
      return { ok: false, error: `"${key}" must be a non-empty string` };
    }
    fields[key] = value;
  }

  if (fields.main !== undefined) {
    const main = normalize(fields.main);
    if (isAbsolute(main) || main === '..' || main.startsWith('../') || main.startsWith('..\\')) {
      return { ok: false, error: '"main" must be a relative path inside the module directory' };
    }
  }

  return { ok: true, manifest: fields };
}

// ---------------------------------------------------------------------------
// Validator
// ---------------------------------------------------------------------------

export class ModuleValidator {
  constructor(private readonly layout: LayoutConfig = DEFAULT_HOST_CONFIG.layout) {}

  /**
   * Describe the module in `dir`, or return null when the directory carries
   * no module marker.
   */
  inspect(dir: string): ModuleDescriptor | null {
    const rootPath = resolve(dir);
    const manifestFile = join(rootPath, MANIFEST_FILE);
    const parsed = existsSync(manifestFile) ? readManifest(manifestFile) : null;
    const manifest = parsed?.ok === true ? parsed.manifest : undefined;

    const outputEntry =
      manifest?.main !== undefined
        ? join(rootPath, manifest.main)
        : join(rootPath, this.layout.outputDir, this.layout.outputEntry);
    const bundlePath = join(rootPath, BUNDLE_FILE);

    const hasSource = isDirectory(join(rootPath, this.layout.sourceDir));
    const hasBuildOutput = isFile(outputEntry);
    const hasBundle = isFile(bundlePath);

    if (!hasSource && !hasBuildOutput && !hasBundle) {
      return null;
    }

    return {
      name: manifest?.name ?? basename(rootPath),
      rootPath,
      hasSource,
      hasBuildOutput,
      hasBundle,
      outputEntry,
      bundlePath,
      ...(manifest !== undefined ? { manifest } : {}),
      ...(parsed?.ok === false ? { manifestError: parsed.error } : {}),
    };
  }
}

function readManifest(file: string): ManifestParseResult {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(file, 'utf-8'));
  } catch (err: unknown) {
    return { ok: false, error: `cannot read ${MANIFEST_FILE}: ${describeError(err)}` };
  }
  return parseManifest(raw);
}

function isDirectory(path: string): boolean {
  return statSync(path, { throwIfNoEntry: false })?.isDirectory() ?? false;
}

function isFile(path: string): boolean {
  return statSync(path, { throwIfNoEntry: false })?.isFile() ?? false;
}
