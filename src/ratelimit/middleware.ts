import { NextFunction, Request, RequestHandler, Response } from 'express';
import { RateLimitedError } from '../errors';
import { deriveClientKey, TokenVerifier } from './identity';
import { RateLimiter } from './limiter';
import { EndpointClass } from './types';

/**
 * Whole seconds a client should wait, never less than one.
 */
export function retryAfterHeader(retryAfterSeconds: number): number {
    return Math.max(1, Math.ceil(retryAfterSeconds));
}

/**
 * Express middleware applying the limiter to one endpoint class.
 * A denial is passed on as a RateLimitedError, which the error handler renders
 * as a 429 carrying Retry-After.
 */
export function rateLimit(
    limiter: RateLimiter,
    endpointClass: EndpointClass,
    verify: TokenVerifier,
    clock: () => number = Date.now,
): RequestHandler {
    return (req: Request, res: Response, next: NextFunction) => {
        const client = deriveClientKey(req, verify);
        const decision = limiter.admit(client, endpointClass, clock());

        res.setHeader('X-RateLimit-Limit', String(decision.limit));
        if (!decision.admitted) {
            res.setHeader('X-RateLimit-Remaining', '0');
            res.setHeader('X-RateLimit-Type', decision.limitType);
            const message =
                decision.limitType === 'ip' ? 'Too many requests from this IP address' : 'Too many requests for this user';
            next(new RateLimitedError(decision.retryAfterSeconds, decision.limitType, message));
            return;
        }

        res.setHeader('X-RateLimit-Remaining', String(decision.remaining));
        next();
    };
}
