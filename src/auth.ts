import { timingSafeEqual } from 'crypto';
import { NextFunction, Request, RequestHandler, Response } from 'express';
import { GameError } from './errors';
import { TokenVerifier, userKeyOf } from './ratelimit/identity';

/**
 * Requires a valid session token. The verified user id is stored in res.locals.userId.
 */
export function requireUser(verify: TokenVerifier): RequestHandler {
    return (req: Request, res: Response, next: NextFunction) => {
        const userId = userKeyOf(req, verify);
        if (!userId) {
            next(new GameError('Unauthorized', 'Authorization header with a valid Bearer token is required'));
            return;
        }
        res.locals.userId = userId;
        next();
    };
}

/**
 * The user id placed by requireUser.
 */
export function authenticatedUserId(res: Response): string {
    const userId: unknown = res.locals.userId;
    if (typeof userId !== 'string') {
        throw new GameError('Unauthorized', 'Request is not authenticated');
    }
    return userId;
}

/**
 * Constant-time check of the admin bearer key. Always false when no key is configured.
 */
export function isAdminKey(req: Request, adminKey: string | undefined): boolean {
    if (!adminKey) return false;
    const header = req.headers.authorization ?? '';
    if (!header.startsWith('Bearer ')) return false;
    const given = Buffer.from(header.slice('Bearer '.length).trim(), 'utf8');
    const expected = Buffer.from(adminKey, 'utf8');
    return given.length === expected.length && timingSafeEqual(given, expected);
}
