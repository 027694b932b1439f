import { GameError } from '../errors';
import { InMemoryUserRepository } from '../user/state';
import { nextStreak, StreakTracker } from './tracker';

describe('nextStreak', () => {
    it('starts a new streak at 1 on success and 0 on failure', () => {
        expect(nextStreak(undefined, '2024-01-15', true)).toEqual({ current: 1, longest: 1, lastPlayedDate: '2024-01-15' });
        expect(nextStreak(undefined, '2024-01-15', false)).toEqual({ current: 0, longest: 0, lastPlayedDate: '2024-01-15' });
    });

    it('continues only from the previous calendar day', () => {
        const prev = { current: 4, longest: 4, lastPlayedDate: '2024-02-28' };
        expect(nextStreak(prev, '2024-02-29', true)).toEqual({ current: 5, longest: 5, lastPlayedDate: '2024-02-29' });
        expect(nextStreak(prev, '2024-03-02', true)).toEqual({ current: 1, longest: 4, lastPlayedDate: '2024-03-02' });
    });

    it('restarts at 1 when the same day is recorded twice', () => {
        const prev = { current: 3, longest: 3, lastPlayedDate: '2024-01-15' };
        expect(nextStreak(prev, '2024-01-15', true).current).toBe(1);
    });

    it('resets on failure but keeps the longest', () => {
        const prev = { current: 7, longest: 9, lastPlayedDate: '2024-01-14' };
        expect(nextStreak(prev, '2024-01-15', false)).toEqual({ current: 0, longest: 9, lastPlayedDate: '2024-01-15' });
    });
});

describe('StreakTracker', () => {
    let users: InMemoryUserRepository;
    let tracker: StreakTracker;

    beforeEach(async () => {
        users = new InMemoryUserRepository();
        tracker = new StreakTracker(users);
        await users.create('user-1', 'tester');
    });

    it('builds a streak over consecutive days', async () => {
        await tracker.recordOutcome('user-1', 'dc', '2024-01-15', true);
        await tracker.recordOutcome('user-1', 'dc', '2024-01-16', true);
        const third = await tracker.recordOutcome('user-1', 'dc', '2024-01-17', true);

        expect(third).toEqual({ current: 3, longest: 3, lastPlayedDate: '2024-01-17' });
        expect(await tracker.getStreaks('user-1')).toEqual({ dc: third });
    });

    it('restarts after a skipped day', async () => {
        await tracker.recordOutcome('user-1', 'dc', '2024-01-15', true);
        await tracker.recordOutcome('user-1', 'dc', '2024-01-16', true);
        const afterGap = await tracker.recordOutcome('user-1', 'dc', '2024-01-19', true);

        expect(afterGap).toEqual({ current: 1, longest: 2, lastPlayedDate: '2024-01-19' });
    });

    it('never lowers the longest streak', async () => {
        const days = ['2024-01-01', '2024-01-02', '2024-01-03', '2024-01-04'];
        const outcomes = [true, true, false, true];
        const longest: number[] = [];
        for (let i = 0; i < days.length; i++) {
            longest.push((await tracker.recordOutcome('user-1', 'image', days[i], outcomes[i])).longest);
        }
        expect(longest).toEqual([1, 2, 2, 2]);
    });

    it('tracks universes independently', async () => {
        await tracker.recordOutcome('user-1', 'marvel', '2024-01-15', true);
        await tracker.recordOutcome('user-1', 'dc', '2024-01-15', false);

        const streaks = await tracker.getStreaks('user-1');
        expect(streaks.marvel?.current).toBe(1);
        expect(streaks.dc?.current).toBe(0);
        expect(streaks.image).toBeUndefined();
    });

    it('keeps every universe when outcomes for one user land together', async () => {
        await Promise.all([
            tracker.recordOutcome('user-1', 'marvel', '2024-01-15', true),
            tracker.recordOutcome('user-1', 'dc', '2024-01-15', true),
            tracker.recordOutcome('user-1', 'image', '2024-01-15', false),
            tracker.resetStreak('user-1', 'marvel'),
        ]);

        expect(await tracker.getStreaks('user-1')).toEqual({
            marvel: { current: 0, longest: 1, lastPlayedDate: '2024-01-15' },
            dc: { current: 1, longest: 1, lastPlayedDate: '2024-01-15' },
            image: { current: 0, longest: 0, lastPlayedDate: '2024-01-15' },
        });
    });

    it('rejects unknown users and malformed dates', async () => {
        await expect(tracker.recordOutcome('ghost', 'marvel', '2024-01-15', true)).rejects.toMatchObject({
            kind: 'UserNotFound',
        });
        await expect(tracker.recordOutcome('user-1', 'marvel', '2024-02-30', true)).rejects.toBeInstanceOf(GameError);
        await expect(tracker.getStreaks('ghost')).rejects.toMatchObject({ kind: 'UserNotFound' });
    });

    it('summarizes streaks across universes', async () => {
        await tracker.recordOutcome('user-1', 'marvel', '2024-01-14', true);
        await tracker.recordOutcome('user-1', 'marvel', '2024-01-15', true);
        await tracker.recordOutcome('user-1', 'dc', '2024-01-15', true);

        expect(await tracker.getStreakStatistics('user-1')).toEqual({
            streaks: {
                marvel: { current: 2, longest: 2, lastPlayedDate: '2024-01-15' },
                dc: { current: 1, longest: 1, lastPlayedDate: '2024-01-15' },
            },
            totalCurrent: 3,
            bestUniverse: 'marvel',
            bestCurrent: 2,
            bestLongest: 2,
        });
    });

    it('reports no best universe before anything is played', async () => {
        expect(await tracker.getStreakStatistics('user-1')).toEqual({
            streaks: {},
            totalCurrent: 0,
            bestUniverse: undefined,
            bestCurrent: 0,
            bestLongest: 0,
        });
    });

    it('resets the current streak and keeps the longest', async () => {
        await tracker.recordOutcome('user-1', 'marvel', '2024-01-14', true);
        await tracker.recordOutcome('user-1', 'marvel', '2024-01-15', true);

        expect(await tracker.resetStreak('user-1', 'marvel')).toEqual({
            current: 0,
            longest: 2,
            lastPlayedDate: '2024-01-15',
        });
        expect(await tracker.resetStreak('user-1', 'dc')).toBeUndefined();
        expect((await tracker.getStreaks('user-1')).marvel?.current).toBe(0);
    });
});
