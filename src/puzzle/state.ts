import { CharacterEntry, Puzzle, PuzzleRepository, Universe } from './types';

// In-memory puzzle store keyed by (universe, date).
// In a production environment, this would be replaced with a persistent database.

function keyOf(universe: Universe, date: string): string {
    return `${universe}|${date}`;
}

export class InMemoryPuzzleRepository implements PuzzleRepository {
    private puzzles = new Map<string, Puzzle>();

    async getByKey(universe: Universe, date: string): Promise<Puzzle | undefined> {
        return this.puzzles.get(keyOf(universe, date));
    }

    /**
     * Create-if-absent: the check and the insert happen without yielding,
     * so concurrent creators for the same key converge on the first insert.
     */
    async createIfAbsent(puzzle: Puzzle): Promise<Puzzle> {
        const key = keyOf(puzzle.universe, puzzle.date);
        const existing = this.puzzles.get(key);
        if (existing) return existing;
        this.puzzles.set(key, puzzle);
        return puzzle;
    }

    async updateCharacter(universe: Universe, date: string, replacement: CharacterEntry): Promise<Puzzle | undefined> {
        const key = keyOf(universe, date);
        const existing = this.puzzles.get(key);
        if (!existing) return undefined;
        const updated: Puzzle = {
            ...existing,
            character: replacement.character,
            aliases: [...replacement.aliases],
            imageKey: replacement.imageKey,
            hotfixedAt: Date.now(),
        };
        this.puzzles.set(key, updated);
        return updated;
    }

    /**
     * Removes puzzles dated before the cutoff. Returns how many were dropped.
     */
    async deleteBefore(cutoffDate: string): Promise<number> {
        let removed = 0;
        for (const [key, puzzle] of this.puzzles) {
            if (puzzle.date < cutoffDate) {
                this.puzzles.delete(key);
                removed++;
            }
        }
        return removed;
    }
}
