/**
 * Playhost Runtime Host — StateIO Tests
 *
 *   SIO-U1: readJson returns the fallback for a missing or corrupt file
 *   SIO-U2: writeJson then readJson round-trips under state/
 *   SIO-U3: appendLine writes one line per call under logs/
 *   SIO-U4: writeText writes under the home and returns the relative path
 *   SIO-U5: writeText refuses absolute and escaping paths
 *
 * Isolation: MemoryStateIO tests have no I/O. FileStateIO tests use temp dirs.
 */

import { describe, it, expect } from 'vitest';
import { mkdirSync, mkdtempSync, readFileSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { FileStateIO, MemoryStateIO } from '../src/state/state-io.js';

function tempHome(prefix: string): string {
  return mkdtempSync(join(tmpdir(), `playhost-${prefix}-`));
}

describe('StateIO.readJson', () => {
  it('SIO-U1: returns the fallback when the file is missing', () => {
    expect(new FileStateIO(tempHome('sio-u1')).readJson('config.json', 'none')).toBe('none');
    expect(new MemoryStateIO().readJson('config.json', 'none')).toBe('none');
  });

  it('SIO-U1: returns the fallback when the file is not valid JSON', () => {
    const home = tempHome('sio-u1b');
    mkdirSync(join(home, 'state'));
    writeFileSync(join(home, 'state', 'config.json'), '{ not json', 'utf-8');

    expect(new FileStateIO(home).readJson('config.json', null)).toBeNull();
  });

  it('SIO-U2: writeJson then readJson round-trips under state/', () => {
    const home = tempHome('sio-u2');
    const io = new FileStateIO(home);

    io.writeJson('config.json', { build: { timeoutMs: 5000 } });

    expect(io.readJson('config.json', null)).toEqual({ build: { timeoutMs: 5000 } });
    expect(JSON.parse(readFileSync(join(home, 'state', 'config.json'), 'utf-8'))).toEqual({
      build: { timeoutMs: 5000 },
    });
  });
});

describe('StateIO log lines', () => {
  it('SIO-U3: appendLine writes one line per call under logs/', () => {
    const home = tempHome('sio-u3');
    const fileIO = new FileStateIO(home);
    const memIO = new MemoryStateIO();

    for (const line of ['{"event_id":"A"}', '{"event_id":"B"}']) {
      fileIO.appendLine('host.jsonl', line);
      memIO.appendLine('host.jsonl', line);
    }

    expect(readFileSync(join(home, 'logs', 'host.jsonl'), 'utf-8')).toBe('{"event_id":"A"}\n{"event_id":"B"}\n');
    expect(memIO.readLines('host.jsonl')).toEqual(['{"event_id":"A"}', '{"event_id":"B"}']);
  });
});

describe('StateIO.writeText', () => {
  it('SIO-U4: writes under the home directory and creates parents', () => {
    const home = tempHome('sio-u4');
    const io = new FileStateIO(home);

    const written = io.writeText('transcripts/game.txt', 'hello\n');

    expect(written).toBe(join('transcripts', 'game.txt'));
    expect(readFileSync(join(home, 'transcripts', 'game.txt'), 'utf-8')).toBe('hello\n');
  });

  it('SIO-U4: MemoryStateIO keeps the content for readText', () => {
    const io = new MemoryStateIO();
    io.writeText('transcripts/game.txt', 'hello\n');
    expect(io.readText('transcripts/game.txt')).toBe('hello\n');
  });

  it('SIO-U5: refuses absolute and escaping paths', () => {
    const io = new MemoryStateIO();
    expect(() => io.writeText('/etc/passwd', 'x')).toThrow(/must stay under the home directory/);
    expect(() => io.writeText('../outside.txt', 'x')).toThrow(/must stay under the home directory/);
    expect(() => io.writeText('transcripts/../../outside.txt', 'x')).toThrow(
      /must stay under the home directory/,
    );
  });
});
