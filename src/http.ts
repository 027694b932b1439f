import { ErrorRequestHandler, NextFunction, Request, RequestHandler, Response } from 'express';
import { ZodError } from 'zod';
import { GameError, httpStatusFor, RateLimitedError } from './errors';
import { logger as rootLogger, Logger } from './logger';
import { retryAfterHeader } from './ratelimit/middleware';

/**
 * Wraps an async route so a rejected promise reaches the error handler.
 */
export function asyncHandler(
    handler: (req: Request, res: Response, next: NextFunction) => Promise<void>,
): RequestHandler {
    return (req, res, next) => {
        handler(req, res, next).catch(next);
    };
}

type ClientHttpError = {
    status: number;
    type?: string;
};

/**
 * Errors raised by Express's body parsing carry an HTTP status below 500 and a `type`.
 */
function clientHttpErrorOf(err: unknown): ClientHttpError | undefined {
    if (typeof err !== 'object' || err === null || !('status' in err)) return undefined;
    const { status } = err;
    if (typeof status !== 'number' || status < 400 || status >= 500) return undefined;
    const type = 'type' in err && typeof err.type === 'string' ? err.type : undefined;
    return { status, type };
}

/**
 * Renders GameErrors as `{ error: kind, message }` with the kind's status.
 * Unreadable bodies answer 400 (413 when over the size limit).
 * Anything else is logged and answered with a generic 500.
 */
export function errorHandler(log: Logger = rootLogger): ErrorRequestHandler {
    return (err: unknown, _req, res, _next) => {
        if (err instanceof ZodError) {
            res.status(400).json({
                error: 'InvalidRequest',
                message: err.issues.map((issue) => `${issue.path.join('.') || 'body'}: ${issue.message}`).join('; '),
            });
            return;
        }
        if (err instanceof RateLimitedError) {
            const retryAfter = retryAfterHeader(err.retryAfterSeconds);
            res.setHeader('Retry-After', String(retryAfter));
            res.status(429).json({ error: err.kind, message: err.message, retryAfter, limitType: err.limitType });
            return;
        }
        if (err instanceof GameError) {
            const status = httpStatusFor(err.kind);
            if (status >= 500) log.error({ err }, 'request failed');
            res.status(status).json({ error: err.kind, message: err.message });
            return;
        }
        const clientError = clientHttpErrorOf(err);
        if (clientError) {
            if (clientError.status === 413) {
                res.status(413).json({ error: 'PayloadTooLarge', message: 'Request body is too large' });
            } else if (clientError.type === 'entity.parse.failed') {
                res.status(400).json({ error: 'InvalidRequest', message: 'Request body is not valid JSON' });
            } else {
                res.status(clientError.status).json({ error: 'InvalidRequest', message: 'Request could not be read' });
            }
            return;
        }
        log.error({ err }, 'unhandled error');
        res.status(500).json({ error: 'Internal', message: 'Internal server error' });
    };
}
