/**
 * Playhost Module Loader — ModuleBuilder Tests
 *
 * Coverage:
 *   BLD1: needsBuild — no sources, missing output, stale output, fresh output
 *   BLD2: a successful build reports ok and leaves the output entry
 *   BLD3: a non-zero exit is a failure with the exit code and stderr tail
 *   BLD4: a hung build is killed and reported as timed out
 *   BLD5: exit 0 without an output entry is a failure
 *   BLD6: a command that cannot start is a failure, not a throw
 *
 * Builds run the node binary executing the tests; no network, no npm.
 */

import { describe, it, expect } from 'vitest';
import { existsSync } from 'node:fs';
import { join } from 'node:path';
import type { ModuleDescriptor } from '@playhost/kernel';
import { NodeExecAdapter } from '@playhost/runtime-host';
import { ModuleBuilder } from '../src/builder.js';
import { ModuleValidator } from '../src/validator.js';
import {
  gameEntry,
  makeOlder,
  scriptBuild,
  tempRoot,
  writeBrokenModule,
  writeBuildableModule,
  writeModule,
  writePrebuiltModule,
} from './fixtures.js';

function describeDir(dir: string): ModuleDescriptor {
  const descriptor = new ModuleValidator().inspect(dir);
  if (descriptor === null) throw new Error(`not a module: ${dir}`);
  return descriptor;
}

describe('ModuleBuilder.needsBuild', () => {
  const builder = new ModuleBuilder(new NodeExecAdapter());

  it('BLD1: modules without sources never need a build', () => {
    const root = tempRoot('bld1a');
    expect(builder.needsBuild(describeDir(writePrebuiltModule(root, 'x', gameEntry('Main', 'x'))))).toBe(false);
  });

  it('BLD1: a missing output entry needs a build', () => {
    const root = tempRoot('bld1b');
    expect(builder.needsBuild(describeDir(writeModule(root, 'x', { 'src/index.ts': '' })))).toBe(true);
  });

  it('BLD1: output older than any source file needs a build', () => {
    const root = tempRoot('bld1c');
    const dir = writeModule(root, 'x', {
      'src/index.ts': '',
      'src/nested/rules.ts': '',
      'dist/index.cjs': gameEntry('Main', 'x'),
    });
    makeOlder(join(dir, 'src', 'index.ts'));
    makeOlder(join(dir, 'dist', 'index.cjs'));
    // src/nested/rules.ts keeps its current mtime

    expect(builder.needsBuild(describeDir(dir))).toBe(true);
  });

  it('BLD1: output newer than every source file is fresh', () => {
    const root = tempRoot('bld1d');
    const dir = writeModule(root, 'x', { 'src/index.ts': '', 'dist/index.cjs': gameEntry('Main', 'x') });
    makeOlder(join(dir, 'src', 'index.ts'));

    expect(builder.needsBuild(describeDir(dir))).toBe(false);
  });
});

describe('ModuleBuilder.build', () => {
  it('BLD2: a successful build reports ok and leaves the output entry', async () => {
    const root = tempRoot('bld2');
    const dir = writeBuildableModule(root, 'chess', gameEntry('ChessModule', 'chess'));
    const builder = new ModuleBuilder(new NodeExecAdapter(), { build: scriptBuild() });

    const outcome = await builder.build(describeDir(dir));

    expect(outcome.ok).toBe(true);
    expect(outcome.name).toBe('chess');
    expect(existsSync(join(dir, 'dist', 'index.cjs'))).toBe(true);
  });

  it('BLD3: a non-zero exit is a failure with the exit code and stderr tail', async () => {
    const root = tempRoot('bld3');
    const dir = writeBrokenModule(root, 'broken', 'src/index.ts(3,1): error TS1005');
    const builder = new ModuleBuilder(new NodeExecAdapter(), { build: scriptBuild() });

    const outcome = await builder.build(describeDir(dir));

    expect(outcome).toEqual({
      ok: false,
      name: 'broken',
      reason: 'Build exited with code 1',
      details: 'src/index.ts(3,1): error TS1005',
    });
  });

  it('BLD4: a hung build is killed and reported as timed out', async () => {
    const root = tempRoot('bld4');
    const dir = writeModule(root, 'slow', {
      'src/index.ts': '',
      'build.cjs': 'setInterval(() => {}, 1000);',
    });
    const builder = new ModuleBuilder(new NodeExecAdapter(), { build: scriptBuild(300) });

    const outcome = await builder.build(describeDir(dir));

    expect(outcome.ok).toBe(false);
    expect(outcome.ok === false && outcome.reason).toBe('Build timed out after 300 ms');
  });

  it('BLD5: exit 0 without an output entry is a failure', async () => {
    const root = tempRoot('bld5');
    const dir = writeModule(root, 'lazy', { 'src/index.ts': '', 'build.cjs': 'process.exit(0);' });
    const builder = new ModuleBuilder(new NodeExecAdapter(), { build: scriptBuild() });

    const outcome = await builder.build(describeDir(dir));

    expect(outcome).toEqual({
      ok: false,
      name: 'lazy',
      reason: 'Build produced no output entry',
      details: `expected ${join('dist', 'index.cjs')}`,
    });
  });

  it('BLD6: a command that cannot start is a failure', async () => {
    const root = tempRoot('bld6');
    const dir = writeModule(root, 'x', { 'src/index.ts': '' });
    const builder = new ModuleBuilder(new NodeExecAdapter(), {
      build: { command: 'playhost-no-such-build-tool', args: [], timeoutMs: 5_000 },
    });

    const outcome = await builder.build(describeDir(dir));

    expect(outcome.ok).toBe(false);
    expect(outcome.ok === false && outcome.reason).toMatch(/^Build could not start: /);
  });
});
