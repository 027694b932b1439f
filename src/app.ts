import express, { Express } from 'express';
import { createGameRouter } from './game/routes';
import { errorHandler } from './http';
import { createPuzzleRouter } from './puzzle/routes';
import { rateLimit } from './ratelimit/middleware';
import { AppServices } from './services';
import { createUserRouter } from './user/routes';

/**
 * Builds the Express application around a set of services.
 */
export function createApp(services: AppServices): Express {
    const app = express();
    // Forwarded-for is read by the rate limiter itself; keep Express from rewriting req.ip.
    app.set('trust proxy', false);
    // Middleware to parse JSON bodies.
    app.use(express.json({ limit: '16kb' }));

    // A simple health check endpoint, outside the rate limiter.
    app.get('/health', (_req, res) => {
        res.status(200).json({ ok: true });
    });

    // Every other route counts against the 'general' class.
    app.use(rateLimit(services.limiter, 'general', services.verifyToken, services.clock));

    app.use('/user', createUserRouter(services));
    app.use('/puzzle', createPuzzleRouter(services));
    app.use('/game', createGameRouter(services));

    app.use(errorHandler(services.log));
    return app;
}
