import { Universe } from '../puzzle/types';

/**
 * Consecutive-day record for one user in one universe. Invariant: current <= longest.
 */
export type UserStreak = {
  current: number; // consecutive successful days
  longest: number; // historical maximum of current
  lastPlayedDate: string; // 'YYYY-MM-DD' of the last recorded outcome
};

export type StreakMap = Partial<Record<Universe, UserStreak>>;

export type User = {
  id: string;
  username: string;
  createdAt: number;
  streaks: StreakMap;
};

/**
 * Storage for users. Implementations may throw RepositoryUnavailableError.
 */
export interface UserRepository {
  getById(userId: string): Promise<User | undefined>;
  /** Replaces the user's whole streak map. */
  updateStreaks(userId: string, streaks: StreakMap): Promise<void>;
}
