export const UNIVERSES = ['marvel', 'dc', 'image'] as const;

/**
 * A fixed content category; puzzles are generated independently per universe.
 */
export type Universe = (typeof UNIVERSES)[number];

/**
 * One selectable character in a universe's pool.
 */
export type CharacterEntry = {
  character: string; // canonical name, the correct answer
  aliases: string[]; // other accepted names
  imageKey: string; // object-store path, always under '<universe>/'
};

export type CharacterPools = Record<Universe, CharacterEntry[]>;

/**
 * The single daily selection of one character for one universe and date.
 */
export type Puzzle = {
  id: string; // 'YYYYMMDD-universe'
  universe: Universe;
  date: string; // 'YYYY-MM-DD', UTC
  character: string;
  aliases: string[];
  imageKey: string;
  createdAt: number;
  hotfixedAt?: number; // set when the character was replaced by a hotfix
};

/**
 * What a client may see of a puzzle before solving it.
 */
export type PuzzleMetadata = {
  id: string;
  universe: Universe;
  date: string;
  createdAt: number;
  hasAliases: boolean;
  aliasCount: number;
};

export type HotfixReplacement = {
  character: string;
  aliases?: string[];
  imageKey?: string;
};

export type UniverseGenerationResult =
  | { universe: Universe; status: 'created' | 'existing'; puzzleId: string; character: string }
  | { universe: Universe; status: 'failed'; error: string };

export type DailyGenerationReport = {
  date: string;
  created: number;
  results: UniverseGenerationResult[];
};

/**
 * Storage for puzzles. Implementations may throw RepositoryUnavailableError.
 */
export interface PuzzleRepository {
  getByKey(universe: Universe, date: string): Promise<Puzzle | undefined>;
  /**
   * Stores the puzzle unless one already exists for its (universe, date);
   * returns whichever puzzle is stored afterwards.
   */
  createIfAbsent(puzzle: Puzzle): Promise<Puzzle>;
  /** Hotfix only. Returns undefined when no puzzle exists for the key. */
  updateCharacter(universe: Universe, date: string, replacement: CharacterEntry): Promise<Puzzle | undefined>;
  /** Retention cleanup: drops puzzles dated before the cutoff, returns the count. */
  deleteBefore(cutoffDate: string): Promise<number>;
}
