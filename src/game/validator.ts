import { utcDay } from '../date';
import { GameError } from '../errors';
import { KeyedMutex } from '../lock';
import { logger as rootLogger, Logger } from '../logger';
import { parseUniverse, puzzleIdFor, PuzzleSelector } from '../puzzle/selector';
import { Puzzle, Universe, UNIVERSES } from '../puzzle/types';
import { StreakTracker } from '../streak/tracker';
import { User, UserRepository } from '../user/types';
import { matchesCharacter, normalizeGuess } from './normalize';
import {
    GameState,
    GuessHistory,
    GuessRepository,
    MAX_ATTEMPTS,
    MAX_GUESS_LENGTH,
    PuzzleStatus,
    StreakRisk,
    SubmitGuessResult,
    UniverseProgress,
} from './types';

export type GuessValidatorOptions = {
    imageBaseUrl?: string;
    logger?: Logger;
    clock?: () => number;
};

/**
 * Rejects guesses that are empty after trimming or longer than the limit.
 * Returns the guess unchanged.
 * @throws GameError InvalidGuess
 */
export function validateGuessText(rawGuess: unknown): string {
    if (typeof rawGuess !== 'string') {
        throw new GameError('InvalidGuess', 'Guess must be a string');
    }
    const trimmed = rawGuess.trim();
    if (!trimmed) {
        throw new GameError('InvalidGuess', 'Guess must not be empty');
    }
    if (trimmed.length > MAX_GUESS_LENGTH) {
        throw new GameError('InvalidGuess', `Guess must be at most ${MAX_GUESS_LENGTH} characters`);
    }
    return rawGuess;
}

function stateOf(attemptsUsed: number, solved: boolean): GameState {
    if (solved) return { status: 'Solved', attemptsUsed };
    if (attemptsUsed >= MAX_ATTEMPTS) return { status: 'Exhausted', attemptsUsed };
    if (attemptsUsed === 0) return { status: 'NotStarted' };
    return { status: 'InProgress', attemptsUsed };
}

function attemptsUsedIn(state: GameState): number {
    return state.status === 'NotStarted' ? 0 : state.attemptsUsed;
}

/**
 * Runs the per (user, puzzle) attempt state machine:
 * NotStarted -> InProgress(n) -> Solved | Exhausted.
 */
export class GuessValidator {
    private readonly locks = new KeyedMutex();
    private readonly log: Logger;
    private readonly imageBaseUrl: string;
    private readonly clock: () => number;

    constructor(
        private readonly guesses: GuessRepository,
        private readonly users: UserRepository,
        private readonly selector: PuzzleSelector,
        private readonly streaks: StreakTracker,
        options: GuessValidatorOptions = {},
    ) {
        this.log = (options.logger ?? rootLogger).child({ module: 'guess-validator' });
        this.imageBaseUrl = (options.imageBaseUrl ?? '').replace(/\/+$/, '');
        this.clock = options.clock ?? Date.now;
    }

    async getGameState(userId: string, puzzleId: string): Promise<GameState> {
        const [attemptsUsed, solved] = await Promise.all([
            this.guesses.countAttempts(userId, puzzleId),
            this.guesses.hasSolved(userId, puzzleId),
        ]);
        return stateOf(attemptsUsed, solved);
    }

    /**
     * Evaluates a guess against today's (UTC) puzzle for the universe.
     * Submissions for the same (user, puzzle) are serialized; once the game is
     * Solved or Exhausted every further call is rejected without recording anything.
     */
    async submitGuess(userId: string, universe: string, rawGuess: unknown): Promise<SubmitGuessResult> {
        const target = parseUniverse(universe);
        const guess = validateGuessText(rawGuess);
        await this.requireUser(userId);

        const now = this.clock();
        const puzzle = await this.selector.getOrCreatePuzzle(target, utcDay(now));
        return this.locks.runExclusive(`${userId}|${puzzle.id}`, () => this.evaluate(userId, puzzle, guess, now));
    }

    private async evaluate(userId: string, puzzle: Puzzle, guess: string, now: number): Promise<SubmitGuessResult> {
        const state = await this.getGameState(userId, puzzle.id);
        if (state.status === 'Solved') {
            throw new GameError('AlreadySolved', 'Puzzle already solved');
        }
        if (state.status === 'Exhausted') {
            throw new GameError('AttemptsExhausted', `Maximum attempts (${MAX_ATTEMPTS}) reached`);
        }

        const attemptNumber = attemptsUsedIn(state) + 1;
        const correct = matchesCharacter(guess, puzzle.character, puzzle.aliases);
        await this.guesses.appendAttempt({
            userId,
            puzzleId: puzzle.id,
            attemptNumber,
            guess,
            normalized: normalizeGuess(guess),
            correct,
            submittedAt: now,
        });

        const gameOver = correct || attemptNumber >= MAX_ATTEMPTS;
        let streak: number;
        if (gameOver) {
            // Terminal transition: the only place a streak is recorded.
            const updated = await this.streaks.recordOutcome(userId, puzzle.universe, puzzle.date, correct);
            streak = updated.current;
        } else {
            const user = await this.requireUser(userId);
            streak = user.streaks[puzzle.universe]?.current ?? 0;
        }

        this.log.info({ userId, puzzleId: puzzle.id, attemptNumber, correct, gameOver }, 'guess evaluated');

        const result: SubmitGuessResult = {
            puzzleId: puzzle.id,
            correct,
            attemptNumber,
            attemptsRemaining: correct ? 0 : MAX_ATTEMPTS - attemptNumber,
            maxAttempts: MAX_ATTEMPTS,
            gameOver,
            streak,
        };
        if (correct) {
            result.character = puzzle.character;
            result.imageUrl = `${this.imageBaseUrl}/${puzzle.imageKey}`;
        }
        return result;
    }

    /**
     * Whether the user may still guess on a stored puzzle.
     * @throws GameError InvalidPuzzleId | PuzzleNotFound
     */
    async getPuzzleStatus(userId: string, puzzleId: string): Promise<PuzzleStatus> {
        const puzzle = await this.selector.getPuzzle(puzzleId);
        const state = await this.getGameState(userId, puzzle.id);
        const attemptsUsed = attemptsUsedIn(state);
        return {
            puzzleId: puzzle.id,
            universe: puzzle.universe,
            date: puzzle.date,
            canGuess: state.status === 'NotStarted' || state.status === 'InProgress',
            isSolved: state.status === 'Solved',
            attemptsUsed,
            attemptsRemaining: Math.max(0, MAX_ATTEMPTS - attemptsUsed),
            maxAttempts: MAX_ATTEMPTS,
        };
    }

    async getGuessHistory(userId: string, puzzleId: string): Promise<GuessHistory> {
        const puzzle = await this.selector.getPuzzle(puzzleId);
        const attempts = await this.guesses.listAttempts(userId, puzzle.id);
        return {
            puzzleId: puzzle.id,
            guesses: attempts.map((a) => a.guess),
            isSolved: attempts.some((a) => a.correct),
        };
    }

    /**
     * Per universe: whether a puzzle exists for the date and how far the user got.
     * Does not create puzzles.
     */
    async getDailyProgress(userId: string, date: string = utcDay(this.clock())): Promise<Record<Universe, UniverseProgress>> {
        const [marvel, dc, image] = await Promise.all([
            this.progressFor(userId, 'marvel', date),
            this.progressFor(userId, 'dc', date),
            this.progressFor(userId, 'image', date),
        ]);
        return { marvel, dc, image };
    }

    private async progressFor(userId: string, universe: Universe, date: string): Promise<UniverseProgress> {
        const puzzle = await this.selector.findPuzzle(universe, date);
        if (!puzzle) return { puzzleAvailable: false, puzzleId: puzzleIdFor(universe, date) };

        const attempts = await this.guesses.listAttempts(userId, puzzle.id);
        const isSolved = attempts.some((a) => a.correct);
        const attemptsUsed = attempts.length;
        return {
            puzzleAvailable: true,
            puzzleId: puzzle.id,
            isSolved,
            attemptsUsed,
            attemptsRemaining: Math.max(0, MAX_ATTEMPTS - attemptsUsed),
            canGuess: !isSolved && attemptsUsed < MAX_ATTEMPTS,
            guesses: attempts.map((a) => a.guess),
        };
    }

    /**
     * Per universe: whether today's play keeps the streak alive.
     */
    async getStreakStatus(userId: string, date: string = utcDay(this.clock())): Promise<Record<Universe, StreakRisk>> {
        await this.requireUser(userId);
        const progress = await this.getDailyProgress(userId, date);
        const status: Record<Universe, StreakRisk> = {
            marvel: { status: 'no_puzzle', message: 'No puzzle available today' },
            dc: { status: 'no_puzzle', message: 'No puzzle available today' },
            image: { status: 'no_puzzle', message: 'No puzzle available today' },
        };
        for (const universe of UNIVERSES) {
            const p = progress[universe];
            if (!p.puzzleAvailable) continue;
            if (p.isSolved) {
                status[universe] = { status: 'completed', message: 'Puzzle solved - streak maintained' };
            } else if (p.canGuess) {
                status[universe] = {
                    status: 'pending',
                    message: 'Puzzle not finished - streak at risk',
                    attemptsRemaining: p.attemptsRemaining,
                };
            } else {
                status[universe] = { status: 'failed', message: 'Puzzle failed - streak reset' };
            }
        }
        return status;
    }

    private async requireUser(userId: string): Promise<User> {
        const user = await this.users.getById(userId);
        if (!user) {
            throw new GameError('UserNotFound', `User ${userId} not found`);
        }
        return user;
    }
}
