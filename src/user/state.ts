import { GameError } from '../errors';
import { StreakMap, User, UserRepository } from './types';

/**
 * In-memory user store.
 * NOTE: stands in for the managed database; nothing survives a restart.
 */
export class InMemoryUserRepository implements UserRepository {
    private users = new Map<string, User>();
    private idsByUsername = new Map<string, string>();

    async getById(userId: string): Promise<User | undefined> {
        const user = this.users.get(userId);
        // Hand out copies so callers can't mutate stored state.
        return user ? { ...user, streaks: { ...user.streaks } } : undefined;
    }

    async updateStreaks(userId: string, streaks: StreakMap): Promise<void> {
        const user = this.users.get(userId);
        if (!user) {
            throw new GameError('UserNotFound', `User ${userId} not found`);
        }
        this.users.set(userId, { ...user, streaks: { ...streaks } });
    }

    /**
     * Creates a new user.
     * @param userId The unique ID for the user.
     * @param username A display name, unique case-insensitively.
     */
    async create(userId: string, username: string, now: number = Date.now()): Promise<User> {
        const user: User = { id: userId, username, createdAt: now, streaks: {} };
        this.users.set(userId, user);
        this.idsByUsername.set(username.toLowerCase(), userId);
        return { ...user, streaks: {} };
    }

    /**
     * Checks if a username is already taken.
     */
    usernameExists(username: string): boolean {
        return this.idsByUsername.has(username.toLowerCase());
    }
}
