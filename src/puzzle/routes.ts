import { Router, Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { authenticatedUserId, isAdminKey, requireUser } from '../auth';
import { utcDay } from '../date';
import { asyncHandler } from '../http';
import { AppServices } from '../services';
import { parseUniverse, toMetadata } from './selector';

const todayQuery = z.object({
    universe: z.string().min(1),
});

const hotfixBody = z.object({
    character: z.string().trim().min(1).max(100),
    aliases: z.array(z.string().trim().min(1)).optional(),
    imageKey: z.string().min(1).optional(),
});

const generateBody = z.object({
    date: z.string().optional(),
});

const rangeQuery = z.object({
    start: z.string(),
    end: z.string(),
});

export function createPuzzleRouter(services: AppServices): Router {
    const { selector, validator, verifyToken, config, clock } = services;
    const router = Router();
    const auth = requireUser(verifyToken);

    // Admin routes don't exist at all unless ADMIN_KEY is configured.
    const admin = (req: Request, res: Response, next: NextFunction) => {
        if (!config.adminKey) {
            res.status(404).json({ error: 'NotFound', message: 'Not found' });
            return;
        }
        if (!isAdminKey(req, config.adminKey)) {
            res.status(403).json({ error: 'Forbidden', message: 'Invalid admin key' });
            return;
        }
        next();
    };

    /**
     * @route GET /puzzle/today?universe=marvel
     * Today's puzzle for a universe, created on first access. The answer is never included.
     */
    router.get(
        '/today',
        asyncHandler(async (req: Request, res: Response) => {
            const { universe } = todayQuery.parse(req.query);
            const puzzle = await selector.getOrCreatePuzzle(parseUniverse(universe), utcDay(clock()));
            res.status(200).json(toMetadata(puzzle));
        }),
    );

    /**
     * @route GET /puzzle/missing?start=YYYY-MM-DD&end=YYYY-MM-DD
     * Dates without a stored puzzle, per universe. Admin only.
     */
    router.get(
        '/missing',
        admin,
        asyncHandler(async (req: Request, res: Response) => {
            const { start, end } = rangeQuery.parse(req.query);
            res.status(200).json({ missing: await selector.findMissingPuzzles(start, end) });
        }),
    );

    /**
     * @route POST /puzzle/generate
     * Pre-creates every universe's puzzle for a date (today by default). Admin only.
     */
    router.post(
        '/generate',
        admin,
        asyncHandler(async (req: Request, res: Response) => {
            const { date } = generateBody.parse(req.body ?? {});
            res.status(200).json(await selector.generateDailyPuzzles(date ?? utcDay(clock())));
        }),
    );

    /**
     * @route GET /puzzle/:puzzleId
     * Puzzle metadata, without the answer.
     */
    router.get(
        '/:puzzleId',
        asyncHandler(async (req: Request, res: Response) => {
            res.status(200).json(await selector.getPuzzleMetadata(req.params.puzzleId));
        }),
    );

    /**
     * @route GET /puzzle/:puzzleId/status
     * Whether the authenticated user can still guess on this puzzle.
     */
    router.get(
        '/:puzzleId/status',
        auth,
        asyncHandler(async (req: Request, res: Response) => {
            res.status(200).json(await validator.getPuzzleStatus(authenticatedUserId(res), req.params.puzzleId));
        }),
    );

    /**
     * @route GET /puzzle/:puzzleId/history
     * The authenticated user's guesses on this puzzle, in order.
     */
    router.get(
        '/:puzzleId/history',
        auth,
        asyncHandler(async (req: Request, res: Response) => {
            res.status(200).json(await validator.getGuessHistory(authenticatedUserId(res), req.params.puzzleId));
        }),
    );

    /**
     * @route POST /puzzle/:puzzleId/hotfix
     * Replaces the character of an existing puzzle. Admin only; logged with before/after values.
     */
    router.post(
        '/:puzzleId/hotfix',
        admin,
        asyncHandler(async (req: Request, res: Response) => {
            const replacement = hotfixBody.parse(req.body);
            const puzzle = await selector.hotfix(req.params.puzzleId, replacement);
            res.status(200).json({ ...toMetadata(puzzle), character: puzzle.character, hotfixedAt: puzzle.hotfixedAt });
        }),
    );

    return router;
}
