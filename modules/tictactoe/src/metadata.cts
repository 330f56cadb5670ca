import type { Message, Metadata } from './protocol.cjs';

/** A fresh copy on every call; callers may keep or change theirs. */
export function createMetadata(): Metadata {
  return {
    name: 'Tic Tac Toe',
    version: '1.0.0',
    author: 'Playhost',
    description: 'Three in a row for two players sharing one screen.',
    minPlayers: 2,
    maxPlayers: 2,
    estimatedDurationMinutes: 3,
    supportedModes: new Set(['local_multiplayer', 'hot_seat']),
    supportedDifficulties: new Set(['easy']),
  };
}

/** Reply to `{ function: "metadata" }`. Difficulties are declared easiest first. */
export function metadataMessage(meta: Metadata = createMetadata()): Message {
  const difficulties = [...meta.supportedDifficulties];
  return {
    name: meta.name,
    version: meta.version,
    description: meta.description,
    author: meta.author,
    min_players: meta.minPlayers,
    max_players: meta.maxPlayers,
    estimated_duration_minutes: meta.estimatedDurationMinutes,
    min_difficulty: difficulties[0] ?? null,
    max_difficulty: difficulties[difficulties.length - 1] ?? null,
    supported_modes: [...meta.supportedModes].sort(),
    supported_difficulties: difficulties,
  };
}
