/**
 * Playhost Kernel — Metadata Helpers
 *
 * Derived metadata values and the wire form returned for a `metadata`
 * request. Modules that build against the kernel may use these; modules that
 * do not must produce the same mapping themselves.
 */

import type { Message } from '../types/message.js';
import {
  DIFFICULTY_RANK,
  type DifficultyLevel,
  type GameMode,
  type ModuleMetadata,
} from '../types/metadata.js';

// ---------------------------------------------------------------------------
// Difficulty ranking
// ---------------------------------------------------------------------------

/** Rank of a difficulty, or undefined when it is unranked (Adaptive). */
export function difficultyRank(level: DifficultyLevel): number | undefined {
  return DIFFICULTY_RANK[level];
}

/**
 * True when `a` is strictly harder than `b`. Comparisons involving an
 * unranked level are always false.
 */
export function isHarderThan(a: DifficultyLevel, b: DifficultyLevel): boolean {
  const ra = difficultyRank(a);
  const rb = difficultyRank(b);
  if (ra === undefined || rb === undefined) return false;
  return ra > rb;
}

export function isEasierThan(a: DifficultyLevel, b: DifficultyLevel): boolean {
  const ra = difficultyRank(a);
  const rb = difficultyRank(b);
  if (ra === undefined || rb === undefined) return false;
  return ra < rb;
}

function rankedDifficulties(meta: ModuleMetadata): DifficultyLevel[] {
  return [...meta.supportedDifficulties]
    .filter((d) => difficultyRank(d) !== undefined)
    .sort((a, b) => (difficultyRank(a) ?? 0) - (difficultyRank(b) ?? 0));
}

/** Easiest ranked difficulty the module supports. */
export function minDifficulty(meta: ModuleMetadata): DifficultyLevel | undefined {
  return rankedDifficulties(meta)[0];
}

/** Hardest ranked difficulty the module supports. */
export function maxDifficulty(meta: ModuleMetadata): DifficultyLevel | undefined {
  const ranked = rankedDifficulties(meta);
  return ranked[ranked.length - 1];
}

// ---------------------------------------------------------------------------
// Wire form
// ---------------------------------------------------------------------------

/**
 * Flat mapping returned for `{ function: 'metadata' }`. Sets become sorted
 * arrays; an absent min/max difficulty becomes null.
 */
export function metadataToMessage(meta: ModuleMetadata): Message {
  const modes: GameMode[] = [...meta.supportedModes].sort();
  const difficulties = [...meta.supportedDifficulties].sort(
    (a, b) => (difficultyRank(a) ?? 0) - (difficultyRank(b) ?? 0),
  );
  return {
    name: meta.name,
    version: meta.version,
    description: meta.description,
    author: meta.author,
    min_players: meta.minPlayers,
    max_players: meta.maxPlayers,
    estimated_duration_minutes: meta.estimatedDurationMinutes,
    min_difficulty: minDifficulty(meta) ?? null,
    max_difficulty: maxDifficulty(meta) ?? null,
    supported_modes: modes,
    supported_difficulties: difficulties,
  };
}
