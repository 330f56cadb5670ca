/**
 * Playhost Module Loader — Test Fixtures
 *
 * Builds throwaway module trees under the OS temp dir. Module code is
 * written as CommonJS so the loader can require it directly; "builds" are
 * small scripts run by the node binary executing the tests.
 */

import { mkdirSync, mkdtempSync, utimesSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';
import type { BuildConfig } from '@playhost/runtime-host';

export function tempRoot(prefix: string): string {
  return mkdtempSync(join(tmpdir(), `playhost-${prefix}-`));
}

/** Write `files` (relative path → content) under `<root>/<dir>` and return the module path. */
export function writeModule(root: string, dir: string, files: Readonly<Record<string, string>>): string {
  const moduleDir = join(root, dir);
  for (const [relativePath, content] of Object.entries(files)) {
    const target = join(moduleDir, relativePath);
    mkdirSync(dirname(target), { recursive: true });
    writeFileSync(target, content, 'utf-8');
  }
  mkdirSync(moduleDir, { recursive: true });
  return moduleDir;
}

/** Push a file's mtime one hour into the past. */
export function makeOlder(path: string): void {
  const past = new Date(Date.now() - 3_600_000);
  utimesSync(path, past, past);
}

/**
 * CommonJS source of a class satisfying GameModule. `handleMessage` answers
 * `{function: "whoami"}` with `{ module, tag }` so tests can tell which copy
 * was loaded.
 */
export function gameClassSource(className: string, moduleName: string, tag = moduleName): string {
  return `
class ${className} {
  launch() { return { kind: 'text', render: () => ${JSON.stringify(moduleName)} }; }
  stop() {}
  handleMessage(message) {
    if (message.function === 'whoami') return { module: ${JSON.stringify(moduleName)}, tag: ${JSON.stringify(tag)} };
    return null;
  }
  metadata() {
    return {
      name: ${JSON.stringify(moduleName)},
      version: '1.0.0',
      author: 'Test',
      description: 'fixture',
      minPlayers: 1,
      maxPlayers: 2,
      estimatedDurationMinutes: 5,
      supportedModes: new Set(['single_player']),
      supportedDifficulties: new Set(['easy']),
    };
  }
}
`;
}

/** A complete CommonJS entry file exporting one game class. */
export function gameEntry(className: string, moduleName: string, tag?: string): string {
  return `'use strict';\n${gameClassSource(className, moduleName, tag)}\nexports.${className} = ${className};\n`;
}

/** A module with only prebuilt output (no sources, never built). */
export function writePrebuiltModule(root: string, dir: string, entry: string): string {
  return writeModule(root, dir, { 'dist/index.cjs': entry });
}

/**
 * A module with sources and a build script that writes `entry` to
 * dist/index.cjs. The source file is backdated so later checks see the
 * build output as fresh.
 */
export function writeBuildableModule(root: string, dir: string, entry: string): string {
  const moduleDir = writeModule(root, dir, {
    'src/index.ts': '// sources\n',
    'build.cjs': [
      "const fs = require('node:fs');",
      "fs.mkdirSync('dist', { recursive: true });",
      `fs.writeFileSync('dist/index.cjs', ${JSON.stringify(entry)});`,
    ].join('\n'),
  });
  makeOlder(join(moduleDir, 'src', 'index.ts'));
  return moduleDir;
}

/** A module with sources whose build script prints `message` to stderr and exits 1. */
export function writeBrokenModule(root: string, dir: string, message: string): string {
  return writeModule(root, dir, {
    'src/index.ts': '// sources\n',
    'build.cjs': `process.stderr.write(${JSON.stringify(message + '\n')}); process.exit(1);`,
  });
}

/** Build settings that run each module's build.cjs with the current node binary. */
export function scriptBuild(timeoutMs = 20_000): BuildConfig {
  return { command: process.execPath, args: ['build.cjs'], timeoutMs };
}
