import { logger as rootLogger, Logger } from '../logger';
import {
    ClientKey,
    DimensionUsage,
    EndpointClass,
    LimitDimension,
    RateDecision,
    RateLimitConfig,
    RateUsage,
    WindowLimit,
} from './types';

type WindowCheck = {
    allowed: boolean;
    count: number; // timestamps retained after the purge
    retryAfterMs: number; // 0 when allowed
};

/**
 * Ordered timestamps (ms) of admitted requests per key, over a trailing window.
 * Every operation purges expired entries for its key before reading it.
 */
export class SlidingWindow {
    private windows = new Map<string, number[]>();
    private readonly windowMs: number;

    constructor(readonly limit: WindowLimit) {
        this.windowMs = limit.windowSeconds * 1000;
    }

    /**
     * Drops timestamps at or before now - window. Returns the retained list, if any.
     */
    private purge(key: string, now: number): number[] | undefined {
        const timestamps = this.windows.get(key);
        if (!timestamps) return undefined;
        const cutoff = now - this.windowMs;
        let expired = 0;
        while (expired < timestamps.length && timestamps[expired] <= cutoff) expired++;
        if (expired > 0) timestamps.splice(0, expired);
        if (timestamps.length === 0) {
            this.windows.delete(key);
            return undefined;
        }
        return timestamps;
    }

    check(key: string, now: number): WindowCheck {
        const timestamps = this.purge(key, now);
        const count = timestamps?.length ?? 0;
        if (!timestamps || count < this.limit.maxRequests) {
            return { allowed: true, count, retryAfterMs: 0 };
        }
        // Admission reopens once the oldest retained request leaves the window.
        return { allowed: false, count, retryAfterMs: Math.max(0, timestamps[0] + this.windowMs - now) };
    }

    record(key: string, now: number): void {
        const timestamps = this.windows.get(key);
        if (timestamps) {
            timestamps.push(now);
        } else {
            this.windows.set(key, [now]);
        }
    }

    usage(key: string, now: number): DimensionUsage {
        const current = this.purge(key, now)?.length ?? 0;
        return {
            current,
            limit: this.limit.maxRequests,
            remaining: Math.max(0, this.limit.maxRequests - current),
            windowSeconds: this.limit.windowSeconds,
        };
    }

    /**
     * Purges every key. Returns the number of keys dropped.
     */
    sweep(now: number): number {
        let dropped = 0;
        for (const key of [...this.windows.keys()]) {
            if (!this.purge(key, now)) dropped++;
        }
        return dropped;
    }

    get size(): number {
        return this.windows.size;
    }
}

export type RateLimiterOptions = {
    logger?: Logger;
    sweepIntervalSeconds?: number; // 0 or absent: no background sweep
};

/**
 * Sliding-window limiter keyed by (client identity, endpoint class).
 *
 * Each (endpoint class, dimension) pair owns its own SlidingWindow, so unrelated
 * keys never share state. admit() runs start to finish without awaiting, which
 * makes each key's update a single critical section on the event loop.
 * State is process-local: behind N processes a client gets up to N times the limit.
 */
export class RateLimiter {
    private readonly windows: Record<EndpointClass, Record<LimitDimension, SlidingWindow>>;
    private readonly log: Logger;
    private readonly sweepIntervalSeconds: number;
    private sweepTimer: NodeJS.Timeout | undefined;

    constructor(limits: RateLimitConfig, options: RateLimiterOptions = {}) {
        this.windows = {
            guess: { ip: new SlidingWindow(limits.guess.ip), user: new SlidingWindow(limits.guess.user) },
            general: { ip: new SlidingWindow(limits.general.ip), user: new SlidingWindow(limits.general.user) },
        };
        this.log = (options.logger ?? rootLogger).child({ module: 'rate-limiter' });
        this.sweepIntervalSeconds = options.sweepIntervalSeconds ?? 0;
    }

    /**
     * Admits the request only if both the network and (when present) user
     * dimensions are under their limits; only then is it counted in each.
     * A denied request consumes nothing.
     */
    admit(client: ClientKey, endpointClass: EndpointClass, now: number): RateDecision {
        const { ip, user } = this.windows[endpointClass];

        const ipCheck = ip.check(client.network, now);
        if (!ipCheck.allowed) {
            this.log.warn({ endpointClass, limitType: 'ip', key: client.network }, 'rate limit exceeded');
            return {
                admitted: false,
                limitType: 'ip',
                limit: ip.limit.maxRequests,
                retryAfterSeconds: ipCheck.retryAfterMs / 1000,
            };
        }

        if (client.user !== undefined) {
            const userCheck = user.check(client.user, now);
            if (!userCheck.allowed) {
                this.log.warn({ endpointClass, limitType: 'user', key: client.user }, 'rate limit exceeded');
                return {
                    admitted: false,
                    limitType: 'user',
                    limit: user.limit.maxRequests,
                    retryAfterSeconds: userCheck.retryAfterMs / 1000,
                };
            }
            user.record(client.user, now);
        }
        ip.record(client.network, now);

        return {
            admitted: true,
            limit: ip.limit.maxRequests,
            remaining: ip.limit.maxRequests - (ipCheck.count + 1),
        };
    }

    /**
     * admit() at the current time.
     */
    checkRateLimit(client: ClientKey, endpointClass: EndpointClass): RateDecision {
        return this.admit(client, endpointClass, Date.now());
    }

    /**
     * Current usage without counting a request.
     */
    inspect(client: ClientKey, endpointClass: EndpointClass, now: number): RateUsage {
        const { ip, user } = this.windows[endpointClass];
        return {
            ip: ip.usage(client.network, now),
            user: client.user !== undefined ? user.usage(client.user, now) : undefined,
        };
    }

    /**
     * Drops expired keys from every window. Returns how many keys were removed.
     */
    sweep(now: number): number {
        let dropped = 0;
        for (const byDimension of Object.values(this.windows)) {
            dropped += byDimension.ip.sweep(now) + byDimension.user.sweep(now);
        }
        return dropped;
    }

    /**
     * Starts the periodic sweep, if one is configured. The timer never keeps the process alive.
     */
    start(): void {
        if (this.sweepTimer || this.sweepIntervalSeconds <= 0) return;
        this.sweepTimer = setInterval(() => {
            const dropped = this.sweep(Date.now());
            if (dropped > 0) this.log.debug({ dropped }, 'rate limit windows swept');
        }, this.sweepIntervalSeconds * 1000);
        this.sweepTimer.unref();
    }

    stop(): void {
        if (this.sweepTimer) {
            clearInterval(this.sweepTimer);
            this.sweepTimer = undefined;
        }
    }
}
