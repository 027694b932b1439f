import { assertCalendarDate, previousDay } from '../date';
import { GameError } from '../errors';
import { KeyedMutex } from '../lock';
import { logger as rootLogger, Logger } from '../logger';
import { Universe, UNIVERSES } from '../puzzle/types';
import { StreakMap, User, UserRepository, UserStreak } from '../user/types';

export type StreakStatistics = {
    streaks: StreakMap;
    totalCurrent: number;
    bestUniverse?: Universe;
    bestCurrent: number;
    bestLongest: number;
};

/**
 * Applies one day's outcome to a streak.
 * Success continues the streak only when the previous record is exactly the day before;
 * a gap or a same-day re-record restarts it at 1. Failure resets it to 0.
 */
export function nextStreak(prev: UserStreak | undefined, date: string, success: boolean): UserStreak {
    if (!prev) {
        const current = success ? 1 : 0;
        return { current, longest: current, lastPlayedDate: date };
    }

    let current = 0;
    if (success) {
        current = prev.lastPlayedDate === previousDay(date) ? prev.current + 1 : 1;
    }
    return {
        current,
        longest: Math.max(prev.longest, current),
        lastPlayedDate: date,
    };
}

/**
 * Keeps per-user, per-universe streaks. Callers invoke recordOutcome once per
 * terminal puzzle result, never on intermediate attempts.
 * Writes for one user run one at a time, since each rewrites the whole streak map.
 */
export class StreakTracker {
    private log: Logger;
    private readonly locks = new KeyedMutex();

    constructor(private readonly users: UserRepository, log: Logger = rootLogger) {
        this.log = log.child({ module: 'streak-tracker' });
    }

    private async requireUser(userId: string): Promise<User> {
        const user = await this.users.getById(userId);
        if (!user) {
            throw new GameError('UserNotFound', `User ${userId} not found`);
        }
        return user;
    }

    async recordOutcome(userId: string, universe: Universe, date: string, success: boolean): Promise<UserStreak> {
        assertCalendarDate(date);
        return this.locks.runExclusive(userId, async () => {
            const user = await this.requireUser(userId);
            const prev = user.streaks[universe];
            const next = nextStreak(prev, date, success);

            await this.users.updateStreaks(userId, { ...user.streaks, [universe]: next });
            this.log.debug({ userId, universe, date, success, prev, next }, 'streak updated');
            return next;
        });
    }

    async getStreaks(userId: string): Promise<StreakMap> {
        return (await this.requireUser(userId)).streaks;
    }

    async getStreakStatistics(userId: string): Promise<StreakStatistics> {
        const streaks = await this.getStreaks(userId);
        let totalCurrent = 0;
        let bestUniverse: Universe | undefined;
        let bestCurrent = 0;
        let bestLongest = 0;
        for (const universe of UNIVERSES) {
            const streak = streaks[universe];
            if (!streak) continue;
            totalCurrent += streak.current;
            bestLongest = Math.max(bestLongest, streak.longest);
            if (bestUniverse === undefined || streak.current > bestCurrent) {
                bestUniverse = universe;
                bestCurrent = streak.current;
            }
        }
        return { streaks, totalCurrent, bestUniverse, bestCurrent, bestLongest };
    }

    /**
     * Sets the current streak for a universe back to 0, keeping the longest.
     */
    async resetStreak(userId: string, universe: Universe): Promise<UserStreak | undefined> {
        return this.locks.runExclusive(userId, async () => {
            const user = await this.requireUser(userId);
            const prev = user.streaks[universe];
            if (!prev) return undefined;
            const next: UserStreak = { ...prev, current: 0 };
            await this.users.updateStreaks(userId, { ...user.streaks, [universe]: next });
            this.log.info({ userId, universe }, 'streak reset');
            return next;
        });
    }
}
