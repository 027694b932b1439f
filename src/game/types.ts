import { Universe } from '../puzzle/types';

/**
 * Attempt ceiling for a single puzzle.
 */
export const MAX_ATTEMPTS = 6;

/**
 * Longest raw guess accepted, in characters.
 */
export const MAX_GUESS_LENGTH = 100;

/**
 * One recorded guess. Attempt numbers per (user, puzzle) run 1..N without gaps.
 */
export type GuessAttempt = {
  userId: string;
  puzzleId: string;
  attemptNumber: number;
  guess: string; // raw text as submitted
  normalized: string; // comparison form
  correct: boolean;
  submittedAt: number;
};

/**
 * Per (user, puzzle) game state.
 */
export type GameState =
  | { status: 'NotStarted' }
  | { status: 'InProgress'; attemptsUsed: number }
  | { status: 'Solved'; attemptsUsed: number }
  | { status: 'Exhausted'; attemptsUsed: number };

export type SubmitGuessResult = {
  puzzleId: string;
  correct: boolean;
  character?: string; // only when correct
  imageUrl?: string; // only when correct
  attemptNumber: number;
  attemptsRemaining: number;
  maxAttempts: number;
  gameOver: boolean;
  streak: number; // current streak for the universe after this guess
};

export type PuzzleStatus = {
  puzzleId: string;
  universe: Universe;
  date: string;
  canGuess: boolean;
  isSolved: boolean;
  attemptsUsed: number;
  attemptsRemaining: number;
  maxAttempts: number;
};

export type GuessHistory = {
  puzzleId: string;
  guesses: string[];
  isSolved: boolean;
};

export type UniverseProgress =
  | { puzzleAvailable: false; puzzleId: string }
  | {
      puzzleAvailable: true;
      puzzleId: string;
      isSolved: boolean;
      attemptsUsed: number;
      attemptsRemaining: number;
      canGuess: boolean;
      guesses: string[];
    };

export type StreakRisk =
  | { status: 'no_puzzle'; message: string }
  | { status: 'completed'; message: string }
  | { status: 'pending'; message: string; attemptsRemaining: number }
  | { status: 'failed'; message: string };

/**
 * Storage for guess attempts. Implementations may throw RepositoryUnavailableError.
 */
export interface GuessRepository {
  /**
   * Appends an attempt. Rejects with AttemptConflict unless its attemptNumber
   * is exactly one more than the attempts already stored for (user, puzzle).
   */
  appendAttempt(attempt: GuessAttempt): Promise<void>;
  countAttempts(userId: string, puzzleId: string): Promise<number>;
  hasSolved(userId: string, puzzleId: string): Promise<boolean>;
  listAttempts(userId: string, puzzleId: string): Promise<GuessAttempt[]>;
}
