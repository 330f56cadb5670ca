/**
 * Playhost Kernel — Metadata Helper Tests
 *
 * Coverage:
 *   D1: min/max difficulty are computed over ranked levels only
 *   D2: min/max difficulty are undefined when nothing ranked is supported
 *   D3: harder/easier comparisons ignore unranked levels
 *   D4: metadataToMessage produces the flat wire mapping
 */

import { describe, it, expect } from 'vitest';
import {
  isEasierThan,
  isHarderThan,
  maxDifficulty,
  metadataToMessage,
  minDifficulty,
} from '../src/metadata/metadata.js';
import { DifficultyLevel, GameMode, type ModuleMetadata } from '../src/types/metadata.js';

const CHESS: ModuleMetadata = {
  name: 'Chess',
  version: '2.1.0',
  author: 'Test Author',
  description: 'Two-player chess',
  minPlayers: 1,
  maxPlayers: 2,
  estimatedDurationMinutes: 30,
  supportedModes: new Set([GameMode.LocalMultiplayer, GameMode.AiVersus]),
  supportedDifficulties: new Set([
    DifficultyLevel.Expert,
    DifficultyLevel.Adaptive,
    DifficultyLevel.Normal,
  ]),
};

describe('difficulty helpers', () => {
  it('D1: min/max difficulty skip unranked levels', () => {
    expect(minDifficulty(CHESS)).toBe(DifficultyLevel.Normal);
    expect(maxDifficulty(CHESS)).toBe(DifficultyLevel.Expert);
  });

  it('D2: min/max difficulty are undefined with only unranked levels', () => {
    const adaptiveOnly: ModuleMetadata = {
      ...CHESS,
      supportedDifficulties: new Set([DifficultyLevel.Adaptive]),
    };
    expect(minDifficulty(adaptiveOnly)).toBeUndefined();
    expect(maxDifficulty(adaptiveOnly)).toBeUndefined();
  });

  it('D3: comparisons involving Adaptive are always false', () => {
    expect(isHarderThan(DifficultyLevel.Hard, DifficultyLevel.Easy)).toBe(true);
    expect(isEasierThan(DifficultyLevel.Easy, DifficultyLevel.Expert)).toBe(true);
    expect(isHarderThan(DifficultyLevel.Adaptive, DifficultyLevel.Easy)).toBe(false);
    expect(isEasierThan(DifficultyLevel.Easy, DifficultyLevel.Adaptive)).toBe(false);
    expect(isHarderThan(DifficultyLevel.Hard, DifficultyLevel.Hard)).toBe(false);
  });
});

describe('metadataToMessage', () => {
  it('D4: produces the flat mapping with sorted sets', () => {
    expect(metadataToMessage(CHESS)).toEqual({
      name: 'Chess',
      version: '2.1.0',
      description: 'Two-player chess',
      author: 'Test Author',
      min_players: 1,
      max_players: 2,
      estimated_duration_minutes: 30,
      min_difficulty: 'normal',
      max_difficulty: 'expert',
      supported_modes: ['ai_versus', 'local_multiplayer'],
      supported_difficulties: ['adaptive', 'normal', 'expert'],
    });
  });

  it('D4: absent difficulty bounds become null', () => {
    const msg = metadataToMessage({ ...CHESS, supportedDifficulties: new Set() });
    expect(msg['min_difficulty']).toBeNull();
    expect(msg['max_difficulty']).toBeNull();
    expect(msg['supported_difficulties']).toEqual([]);
  });
});
