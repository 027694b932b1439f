import { Router, Request, Response } from 'express';
import { z } from 'zod';
import { authenticatedUserId, requireUser } from '../auth';
import { cryptoRandomId, issueSessionToken } from '../crypto';
import { asyncHandler } from '../http';
import { parseUniverse } from '../puzzle/selector';
import { AppServices } from '../services';

const registerBody = z.object({
    username: z
        .string()
        .trim()
        .min(3)
        .max(32)
        .regex(/^[A-Za-z0-9_-]+$/, 'username may only contain letters, digits, _ and -'),
});

export function createUserRouter(services: AppServices): Router {
    const { users, streaks, verifyToken, config, clock } = services;
    const router = Router();
    const auth = requireUser(verifyToken);

    /**
     * @route POST /user/register
     * Registers a new user and returns a session token for them.
     * NOTE: stands in for a real identity provider.
     */
    router.post(
        '/register',
        asyncHandler(async (req: Request, res: Response) => {
            const { username } = registerBody.parse(req.body);
            if (users.usernameExists(username)) {
                res.status(409).json({ error: 'UsernameTaken', message: 'A user with this username already exists' });
                return;
            }

            const userId = cryptoRandomId();
            await users.create(userId, username, clock());
            const token = issueSessionToken(userId, config.sessionKey, config.sessionTtlSeconds, clock());
            res.status(201).json({ userId, username, token });
        }),
    );

    /**
     * @route GET /user/streaks
     * The authenticated user's streaks with totals.
     */
    router.get(
        '/streaks',
        auth,
        asyncHandler(async (_req: Request, res: Response) => {
            res.status(200).json(await streaks.getStreakStatistics(authenticatedUserId(res)));
        }),
    );

    /**
     * @route POST /user/streaks/:universe/reset
     * Sets the current streak for a universe back to 0.
     */
    router.post(
        '/streaks/:universe/reset',
        auth,
        asyncHandler(async (req: Request, res: Response) => {
            const universe = parseUniverse(req.params.universe);
            const streak = await streaks.resetStreak(authenticatedUserId(res), universe);
            res.status(200).json({ universe, streak: streak ?? null });
        }),
    );

    return router;
}
