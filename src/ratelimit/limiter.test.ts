import { RateLimiter, SlidingWindow } from './limiter';
import { RateLimitConfig } from './types';

const T0 = 1_700_000_000_000;

const limits: RateLimitConfig = {
    guess: {
        ip: { maxRequests: 3, windowSeconds: 5 },
        user: { maxRequests: 2, windowSeconds: 5 },
    },
    general: {
        ip: { maxRequests: 10, windowSeconds: 60 },
        user: { maxRequests: 10, windowSeconds: 60 },
    },
};

describe('SlidingWindow', () => {
    it('expires timestamps exactly one window later', () => {
        const window = new SlidingWindow({ maxRequests: 1, windowSeconds: 5 });
        window.record('k', T0);

        expect(window.check('k', T0 + 4999)).toEqual({ allowed: false, count: 1, retryAfterMs: 1 });
        expect(window.check('k', T0 + 5000)).toEqual({ allowed: true, count: 0, retryAfterMs: 0 });
        expect(window.size).toBe(0);
    });
});

describe('RateLimiter', () => {
    let limiter: RateLimiter;

    beforeEach(() => {
        limiter = new RateLimiter(limits);
    });

    it('admits up to the limit, then reports when the oldest request expires', () => {
        const client = { network: '10.0.0.1' };

        expect(limiter.admit(client, 'guess', T0)).toEqual({ admitted: true, limit: 3, remaining: 2 });
        expect(limiter.admit(client, 'guess', T0 + 1000)).toEqual({ admitted: true, limit: 3, remaining: 1 });
        expect(limiter.admit(client, 'guess', T0 + 2000)).toEqual({ admitted: true, limit: 3, remaining: 0 });
        expect(limiter.admit(client, 'guess', T0 + 3000)).toEqual({
            admitted: false,
            limitType: 'ip',
            limit: 3,
            retryAfterSeconds: 2,
        });
        expect(limiter.admit(client, 'guess', T0 + 5000)).toEqual({ admitted: true, limit: 3, remaining: 0 });
    });

    it('does not count denied requests', () => {
        const client = { network: '10.0.0.1' };
        for (let i = 0; i < 3; i++) limiter.admit(client, 'guess', T0);
        for (let i = 0; i < 5; i++) limiter.admit(client, 'guess', T0 + 1000);

        expect(limiter.inspect(client, 'guess', T0 + 1000).ip.current).toBe(3);
        expect(limiter.admit(client, 'guess', T0 + 5000).admitted).toBe(true);
    });

    it('limits a user across network addresses', () => {
        expect(limiter.admit({ network: 'a', user: 'u1' }, 'guess', T0).admitted).toBe(true);
        expect(limiter.admit({ network: 'b', user: 'u1' }, 'guess', T0 + 100).admitted).toBe(true);
        expect(limiter.admit({ network: 'c', user: 'u1' }, 'guess', T0 + 200)).toEqual({
            admitted: false,
            limitType: 'user',
            limit: 2,
            retryAfterSeconds: 4.8,
        });

        // The rejected request was not charged to its network address either.
        expect(limiter.inspect({ network: 'c' }, 'guess', T0 + 200).ip.current).toBe(0);
        expect(limiter.admit({ network: 'c', user: 'u2' }, 'guess', T0 + 200).admitted).toBe(true);
    });

    it('checks the network dimension first', () => {
        const client = { network: 'shared', user: 'u1' };
        for (let i = 0; i < 3; i++) limiter.admit({ network: 'shared' }, 'guess', T0);

        const decision = limiter.admit(client, 'guess', T0);
        expect(decision).toMatchObject({ admitted: false, limitType: 'ip' });
        expect(limiter.inspect(client, 'guess', T0).user?.current).toBe(0);
    });

    it('skips the user dimension for anonymous requests', () => {
        limiter.admit({ network: 'a' }, 'guess', T0);
        expect(limiter.inspect({ network: 'a' }, 'guess', T0)).toEqual({
            ip: { current: 1, limit: 3, remaining: 2, windowSeconds: 5 },
            user: undefined,
        });
    });

    it('keeps endpoint classes independent', () => {
        const client = { network: '10.0.0.1', user: 'u1' };
        limiter.admit(client, 'guess', T0);
        limiter.admit(client, 'guess', T0);
        expect(limiter.admit(client, 'guess', T0).admitted).toBe(false);

        expect(limiter.admit(client, 'general', T0)).toEqual({ admitted: true, limit: 10, remaining: 9 });
    });

    it('sweeps keys whose requests have all expired', () => {
        limiter.admit({ network: 'a', user: 'u1' }, 'guess', T0);
        limiter.admit({ network: 'b' }, 'general', T0);

        expect(limiter.sweep(T0 + 4999)).toBe(0);
        expect(limiter.sweep(T0 + 5000)).toBe(2);
        expect(limiter.sweep(T0 + 60_000)).toBe(1);
    });

    it('checks against the current time', () => {
        jest.useFakeTimers();
        jest.setSystemTime(T0);
        try {
            const client = { network: '10.0.0.9' };
            for (let i = 0; i < 3; i++) limiter.checkRateLimit(client, 'guess');
            expect(limiter.checkRateLimit(client, 'guess')).toMatchObject({ admitted: false, retryAfterSeconds: 5 });

            jest.setSystemTime(T0 + 5000);
            expect(limiter.checkRateLimit(client, 'guess')).toEqual({ admitted: true, limit: 3, remaining: 2 });
        } finally {
            jest.useRealTimers();
        }
    });

    describe('background sweep', () => {
        afterEach(() => {
            jest.useRealTimers();
        });

        it('runs on the configured interval until stopped', () => {
            jest.useFakeTimers();
            const swept = new RateLimiter(limits, { sweepIntervalSeconds: 1 });
            const sweep = jest.spyOn(swept, 'sweep');

            swept.start();
            swept.start();
            jest.advanceTimersByTime(3000);
            expect(sweep).toHaveBeenCalledTimes(3);

            swept.stop();
            jest.advanceTimersByTime(3000);
            expect(sweep).toHaveBeenCalledTimes(3);
        });

        it('does nothing without an interval', () => {
            jest.useFakeTimers();
            const sweep = jest.spyOn(limiter, 'sweep');
            limiter.start();
            jest.advanceTimersByTime(10_000);
            expect(sweep).not.toHaveBeenCalled();
        });
    });
});
