import { Router, Request, Response } from 'express';
import { z } from 'zod';
import { authenticatedUserId, requireUser } from '../auth';
import { asyncHandler } from '../http';
import { rateLimit } from '../ratelimit/middleware';
import { AppServices } from '../services';

const guessBody = z.object({
    universe: z.string().min(1),
    guess: z.string(),
});

const dateQuery = z.object({
    date: z.string().optional(),
});

export function createGameRouter(services: AppServices): Router {
    const { validator, limiter, verifyToken, clock } = services;
    const router = Router();
    const auth = requireUser(verifyToken);

    /**
     * @route POST /game/guess
     * Submits a character guess for today's puzzle in a universe.
     * Requires a session token; limited by the 'guess' rate class on top of 'general'.
     */
    router.post(
        '/guess',
        rateLimit(limiter, 'guess', verifyToken, clock),
        auth,
        asyncHandler(async (req: Request, res: Response) => {
            const { universe, guess } = guessBody.parse(req.body);
            const result = await validator.submitGuess(authenticatedUserId(res), universe, guess);
            res.setHeader('Cache-Control', 'no-store');
            res.status(200).json(result);
        }),
    );

    /**
     * @route GET /game/progress
     * Per-universe progress for a day (today by default).
     */
    router.get(
        '/progress',
        auth,
        asyncHandler(async (req: Request, res: Response) => {
            const { date } = dateQuery.parse(req.query);
            const progress = await validator.getDailyProgress(authenticatedUserId(res), date);
            res.status(200).json({ progress });
        }),
    );

    /**
     * @route GET /game/streak-status
     * Whether each universe's streak is kept, pending or lost today.
     */
    router.get(
        '/streak-status',
        auth,
        asyncHandler(async (_req: Request, res: Response) => {
            const status = await validator.getStreakStatus(authenticatedUserId(res));
            res.status(200).json({ status });
        }),
    );

    return router;
}
