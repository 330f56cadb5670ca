/**
 * Playhost Runtime Host — Host Configuration Tests
 *
 *   CFG-U1: missing config yields the defaults
 *   CFG-U2: partial config is merged field by field over the defaults
 *   CFG-U3: invalid fields fall back to defaults with a warning each
 *   CFG-U4: saveHostConfig then loadHostConfig round-trips
 *
 * Isolation: uses MemoryStateIO — no filesystem I/O.
 */

import { describe, it, expect } from 'vitest';
import { BufferedLogSink, createLogger } from '@playhost/kernel';
import {
  DEFAULT_HOST_CONFIG,
  loadHostConfig,
  saveHostConfig,
  type HostConfig,
} from '../src/config/host-config.js';
import { MemoryStateIO } from '../src/state/state-io.js';

describe('loadHostConfig', () => {
  it('CFG-U1: missing config yields the defaults', () => {
    const config = loadHostConfig(new MemoryStateIO());

    expect(config).toEqual({
      build: { command: 'npm', args: ['run', 'build'], timeoutMs: 120_000 },
      layout: { sourceDir: 'src', outputDir: 'dist', outputEntry: 'index.cjs' },
      modulesRoots: [],
    });
  });

  it('CFG-U2: partial config is merged over the defaults', () => {
    const stateIO = new MemoryStateIO();
    stateIO.writeJson('config.json', {
      build: { timeoutMs: 30_000 },
      layout: { outputEntry: 'main.cjs' },
      modulesRoots: ['/srv/games'],
    });

    const config = loadHostConfig(stateIO);

    expect(config.build).toEqual({ command: 'npm', args: ['run', 'build'], timeoutMs: 30_000 });
    expect(config.layout).toEqual({ sourceDir: 'src', outputDir: 'dist', outputEntry: 'main.cjs' });
    expect(config.modulesRoots).toEqual(['/srv/games']);
  });

  it('CFG-U3: invalid fields fall back to defaults with a warning each', () => {
    const stateIO = new MemoryStateIO();
    stateIO.writeJson('config.json', {
      build: { command: '', timeoutMs: -5, args: 'run build' },
      layout: 'dist',
      modulesRoots: [1, 2],
    });
    const sink = new BufferedLogSink();

    const config = loadHostConfig(stateIO, createLogger('config', sink));

    expect(config).toEqual(DEFAULT_HOST_CONFIG);
    expect(sink.messages('warn')).toEqual([
      "Invalid host config field 'layout': expected an object; using default",
      "Invalid host config field 'build.command': expected a non-empty string; using default",
      "Invalid host config field 'build.args': expected an array of strings; using default",
      "Invalid host config field 'build.timeoutMs': expected a positive integer; using default",
      "Invalid host config field 'modulesRoots': expected an array of strings; using default",
    ]);
  });

  it('CFG-U4: saveHostConfig then loadHostConfig round-trips', () => {
    const stateIO = new MemoryStateIO();
    const custom: HostConfig = {
      build: { command: 'node', args: ['build.mjs'], timeoutMs: 10_000 },
      layout: { sourceDir: 'lib', outputDir: 'out', outputEntry: 'game.cjs' },
      modulesRoots: ['/a', '/b'],
    };

    saveHostConfig(stateIO, custom);

    expect(loadHostConfig(stateIO)).toEqual(custom);
  });
});
