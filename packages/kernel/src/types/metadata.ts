/**
 * Playhost Kernel — Module Metadata Types
 *
 * Metadata is owned by the module and immutable once constructed. Derived
 * values (minimum / maximum difficulty) are computed on read by the helpers
 * in `metadata/metadata.ts`; they are never stored on the record.
 */

// ---------------------------------------------------------------------------
// Game Modes
// ---------------------------------------------------------------------------

/**
 * Play modes a module may declare support for.
 * String values are the wire spelling used in metadata messages.
 */
export enum GameMode {
  SinglePlayer = 'single_player',
  StoryMode = 'story_mode',
  Campaign = 'campaign',
  Practice = 'practice',
  Tutorial = 'tutorial',
  LocalMultiplayer = 'local_multiplayer',
  HotSeat = 'hot_seat',
  SplitScreen = 'split_screen',
  CouchCoop = 'couch_coop',
  LocalVersus = 'local_versus',
  OnlineMultiplayer = 'online_multiplayer',
  Ranked = 'ranked',
  Casual = 'casual',
  Tournament = 'tournament',
  TeamBased = 'team_based',
  TimeTrial = 'time_trial',
  Survival = 'survival',
  Puzzle = 'puzzle',
  Creative = 'creative',
  Sandbox = 'sandbox',
  AiVersus = 'ai_versus',
  AiCoop = 'ai_coop',
  AiTraining = 'ai_training',
}

// ---------------------------------------------------------------------------
// Difficulty
// ---------------------------------------------------------------------------

export enum DifficultyLevel {
  Easy = 'easy',
  Normal = 'normal',
  Hard = 'hard',
  Expert = 'expert',
  /** Scales with the player; has no place in the ranking. */
  Adaptive = 'adaptive',
}

/**
 * Rank of each ranked difficulty. A higher rank is harder.
 * Unranked levels are absent from this table.
 */
export const DIFFICULTY_RANK: Readonly<Partial<Record<DifficultyLevel, number>>> = {
  [DifficultyLevel.Easy]: 1,
  [DifficultyLevel.Normal]: 2,
  [DifficultyLevel.Hard]: 3,
  [DifficultyLevel.Expert]: 4,
};

// ---------------------------------------------------------------------------
// Metadata
// ---------------------------------------------------------------------------

/**
 * Descriptive metadata every game module provides through `metadata()`.
 */
export interface ModuleMetadata {
  /** Display name shown by the host. */
  readonly name: string;
  readonly version: string;
  readonly author: string;
  readonly description: string;
  readonly minPlayers: number;
  readonly maxPlayers: number;
  readonly estimatedDurationMinutes: number;
  readonly supportedModes: ReadonlySet<GameMode>;
  readonly supportedDifficulties: ReadonlySet<DifficultyLevel>;
}
