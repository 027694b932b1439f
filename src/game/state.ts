import { GameError } from '../errors';
import { GuessAttempt, GuessRepository } from './types';

// A simple in-memory store of guess attempts, keyed by (user, puzzle).
// In a production environment, this would be replaced with a persistent database.

function keyOf(userId: string, puzzleId: string): string {
    return `${userId}|${puzzleId}`;
}

export class InMemoryGuessRepository implements GuessRepository {
    private attempts = new Map<string, GuessAttempt[]>();

    /**
     * Conditional append: the attempt number must continue the stored sequence.
     * A second writer racing on the same number is rejected.
     */
    async appendAttempt(attempt: GuessAttempt): Promise<void> {
        const key = keyOf(attempt.userId, attempt.puzzleId);
        const list = this.attempts.get(key) ?? [];
        if (attempt.attemptNumber !== list.length + 1) {
            throw new GameError(
                'AttemptConflict',
                `Attempt ${attempt.attemptNumber} conflicts with ${list.length} stored attempts for ${attempt.puzzleId}`,
            );
        }
        list.push({ ...attempt });
        this.attempts.set(key, list);
    }

    async countAttempts(userId: string, puzzleId: string): Promise<number> {
        return this.attempts.get(keyOf(userId, puzzleId))?.length ?? 0;
    }

    async hasSolved(userId: string, puzzleId: string): Promise<boolean> {
        return this.attempts.get(keyOf(userId, puzzleId))?.some((a) => a.correct) ?? false;
    }

    async listAttempts(userId: string, puzzleId: string): Promise<GuessAttempt[]> {
        return (this.attempts.get(keyOf(userId, puzzleId)) ?? []).map((a) => ({ ...a }));
    }
}
