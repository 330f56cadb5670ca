/**
 * Playhost CLI — Report Formatting Tests
 *
 * Coverage:
 *   RP1: describeModules turns a throwing metadata() into an error row
 *   RP2: module list lines (players, duration, description, sorted modes and difficulties)
 *   RP3: an empty registry prints "(none)"
 *   RP4: failures list stage, reason and indented details; nothing when empty
 *   RP5: playersLabel
 *   RP6: config view lines
 *   RP7: listReport carries flat metadata for loaded modules
 */

import { describe, it, expect } from 'vitest';
import {
  DifficultyLevel,
  GameMode,
  type GameModule,
  type LoadFailure,
  type ModuleMetadata,
} from '@playhost/kernel';
import { DEFAULT_HOST_CONFIG } from '@playhost/runtime-host';
import {
  describeModules,
  formatConfig,
  formatFailures,
  formatModuleList,
  listReport,
  playersLabel,
} from '../src/output/report.js';
import { plainTheme } from '../src/output/theme.js';

const CHESS: ModuleMetadata = {
  name: 'chess',
  version: '1.2.0',
  author: 'Test',
  description: 'Classic chess',
  minPlayers: 2,
  maxPlayers: 2,
  estimatedDurationMinutes: 30,
  supportedModes: new Set([GameMode.LocalMultiplayer, GameMode.AiVersus]),
  supportedDifficulties: new Set([DifficultyLevel.Hard, DifficultyLevel.Easy]),
};

function fakeModule(metadata: () => ModuleMetadata): GameModule {
  return {
    launch: () => ({ kind: 'text' }),
    stop: () => undefined,
    handleMessage: () => null,
    metadata,
  };
}

const rows = describeModules([
  { name: 'chess', module: fakeModule(() => CHESS) },
  {
    name: 'broken',
    module: fakeModule(() => {
      throw new Error('nope');
    }),
  },
]);

describe('describeModules', () => {
  it('RP1: a throwing metadata() becomes an error row', () => {
    expect(rows[0]).toEqual({ name: 'chess', ok: true, metadata: CHESS });
    expect(rows[1]).toEqual({ name: 'broken', ok: false, error: 'metadata() threw: nope' });
  });
});

describe('formatModuleList', () => {
  it('RP2: prints one block per module', () => {
    expect(formatModuleList(rows, plainTheme)).toEqual([
      'Loaded modules (2):',
      '  chess  v1.2.0  2 players  ~30 min',
      '    Classic chess',
      '    modes: ai_versus, local_multiplayer  difficulties: easy, hard',
      '  broken  metadata() threw: nope',
    ]);
  });

  it('RP3: an empty registry prints (none)', () => {
    expect(formatModuleList([], plainTheme)).toEqual(['Loaded modules (0):', '  (none)']);
  });
});

describe('formatFailures', () => {
  it('RP4: lists stage, reason and indented details', () => {
    const failures: LoadFailure[] = [
      { name: 'a', stage: 'build', reason: 'Build exited with code 1', details: 'line1\nline2' },
      { name: 'b', stage: 'load', reason: 'No entry export found (tried: BModule, Main, B, default)' },
    ];

    expect(formatFailures(failures, plainTheme)).toEqual([
      'Failed modules (2):',
      '  a  [build]  Build exited with code 1',
      '      line1',
      '      line2',
      '  b  [load]  No entry export found (tried: BModule, Main, B, default)',
    ]);
    expect(formatFailures([], plainTheme)).toEqual([]);
  });
});

describe('playersLabel', () => {
  it('RP5: singular, fixed and ranged counts', () => {
    expect(playersLabel(1, 1)).toBe('1 player');
    expect(playersLabel(3, 3)).toBe('3 players');
    expect(playersLabel(2, 4)).toBe('2-4 players');
  });
});

describe('formatConfig', () => {
  it('RP6: aligns labels and lists every root', () => {
    const lines = formatConfig(
      { home: '/h', modulesRoots: ['/a', '/b'], config: DEFAULT_HOST_CONFIG },
      plainTheme,
    );

    expect(lines).toEqual([
      'home:          /h',
      'modules roots: /a',
      '               /b',
      'build:         npm run build  (timeout 120000 ms)',
      'layout:        src -> dist/index.cjs',
    ]);
  });
});

describe('listReport', () => {
  it('RP7: loaded modules carry flat metadata, broken ones their error', () => {
    const report = listReport(rows, []);

    expect(report.modules[0]?.metadata?.['supported_modes']).toEqual(['ai_versus', 'local_multiplayer']);
    expect(report.modules[0]?.metadata?.['min_difficulty']).toBe('easy');
    expect(report.modules[1]).toEqual({ name: 'broken', error: 'metadata() threw: nope' });
    expect(report.failures).toEqual([]);
  });
});
