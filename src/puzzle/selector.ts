import { seedFromString } from '../crypto';
import { addDays, assertCalendarDate, compactDate, eachDay, expandDate, isCalendarDate } from '../date';
import { GameError } from '../errors';
import { logger as rootLogger, Logger } from '../logger';
import {
    CharacterEntry,
    CharacterPools,
    DailyGenerationReport,
    HotfixReplacement,
    Puzzle,
    PuzzleMetadata,
    PuzzleRepository,
    Universe,
    UniverseGenerationResult,
    UNIVERSES,
} from './types';

/**
 * Parses a universe name, case-insensitively ('DC' is accepted for 'dc').
 * @throws GameError InvalidUniverse
 */
export function parseUniverse(value: string): Universe {
    const lowered = value.trim().toLowerCase();
    const match = UNIVERSES.find((universe) => universe === lowered);
    if (!match) {
        throw new GameError('InvalidUniverse', `Universe must be one of: ${UNIVERSES.join(', ')}`);
    }
    return match;
}

/** '2024-01-15', 'marvel' -> '20240115-marvel' */
export function puzzleIdFor(universe: Universe, date: string): string {
    return `${compactDate(date)}-${universe}`;
}

/**
 * Splits a puzzle id into its universe and date.
 * @throws GameError InvalidPuzzleId
 */
export function parsePuzzleId(puzzleId: string): { universe: Universe; date: string } {
    const match = /^(\d{8})-([A-Za-z]+)$/.exec(puzzleId);
    const date = match ? expandDate(match[1]) : '';
    if (!match || !isCalendarDate(date)) {
        throw new GameError('InvalidPuzzleId', 'Invalid puzzle ID format. Expected YYYYMMDD-universe');
    }
    try {
        return { universe: parseUniverse(match[2]), date };
    } catch (err) {
        throw new GameError('InvalidPuzzleId', 'Invalid universe in puzzle ID', { cause: err });
    }
}

export function toMetadata(puzzle: Puzzle): PuzzleMetadata {
    return {
        id: puzzle.id,
        universe: puzzle.universe,
        date: puzzle.date,
        createdAt: puzzle.createdAt,
        hasAliases: puzzle.aliases.length > 0,
        aliasCount: puzzle.aliases.length,
    };
}

/**
 * Picks and lazily persists the one puzzle per (universe, date).
 */
export class PuzzleSelector {
    private log: Logger;

    constructor(
        private readonly repository: PuzzleRepository,
        private readonly pools: CharacterPools,
        log: Logger = rootLogger,
    ) {
        this.log = log.child({ module: 'puzzle-selector' });
    }

    /**
     * Deterministic choice for (universe, date): the SHA-256 seed of
     * '{date}-{universe}' reduced modulo the pool size. No generator state is
     * shared, so the mapping is the same in every process.
     * @throws GameError EmptyPool when the universe has no characters.
     */
    selectCharacter(universe: Universe, date: string): CharacterEntry {
        const pool = this.pools[universe];
        if (pool.length === 0) {
            this.log.fatal({ universe }, 'character pool is empty');
            throw new GameError('EmptyPool', `No characters available for universe: ${universe}`);
        }
        const index = seedFromString(`${date}-${universe}`) % pool.length;
        return pool[index];
    }

    /**
     * Returns the stored puzzle for (universe, date), creating it on first access.
     */
    async getOrCreatePuzzle(universe: Universe, date: string): Promise<Puzzle> {
        if (!UNIVERSES.includes(universe)) {
            throw new GameError('InvalidUniverse', `Universe must be one of: ${UNIVERSES.join(', ')}`);
        }
        assertCalendarDate(date);

        const existing = await this.repository.getByKey(universe, date);
        if (existing) return existing;

        const entry = this.selectCharacter(universe, date);
        const candidate: Puzzle = {
            id: puzzleIdFor(universe, date),
            universe,
            date,
            character: entry.character,
            aliases: [...entry.aliases],
            imageKey: entry.imageKey,
            createdAt: Date.now(),
        };
        const stored = await this.repository.createIfAbsent(candidate);
        if (stored === candidate) {
            this.log.info({ puzzleId: stored.id }, 'created daily puzzle');
        }
        return stored;
    }

    /**
     * The stored puzzle for (universe, date), if any. Never creates one.
     */
    async findPuzzle(universe: Universe, date: string): Promise<Puzzle | undefined> {
        return this.repository.getByKey(universe, assertCalendarDate(date));
    }

    /**
     * The stored puzzle for an id, without creating one.
     * @throws GameError PuzzleNotFound
     */
    async getPuzzle(puzzleId: string): Promise<Puzzle> {
        const { universe, date } = parsePuzzleId(puzzleId);
        const puzzle = await this.repository.getByKey(universe, date);
        if (!puzzle) {
            throw new GameError('PuzzleNotFound', `Puzzle ${puzzleId} not found`);
        }
        return puzzle;
    }

    async getPuzzleMetadata(puzzleId: string): Promise<PuzzleMetadata> {
        return toMetadata(await this.getPuzzle(puzzleId));
    }

    /**
     * Emergency override: replaces the character of an existing puzzle.
     * Bypasses selection entirely; the before/after values are logged.
     * Omitted aliases clear the list; an omitted image key keeps the current one.
     */
    async hotfix(puzzleId: string, replacement: HotfixReplacement): Promise<Puzzle> {
        const before = await this.getPuzzle(puzzleId);
        const entry: CharacterEntry = {
            character: replacement.character.split(/\s+/).filter(Boolean).join(' '),
            aliases: replacement.aliases ?? [],
            imageKey: replacement.imageKey ?? before.imageKey,
        };
        if (!entry.character) {
            throw new GameError('InvalidRequest', 'Replacement character must not be empty');
        }
        if (!entry.imageKey.startsWith(`${before.universe}/`)) {
            throw new GameError('InvalidRequest', `Image key must start with '${before.universe}/'`);
        }

        const after = await this.repository.updateCharacter(before.universe, before.date, entry);
        if (!after) {
            throw new GameError('PuzzleNotFound', `Puzzle ${puzzleId} not found`);
        }
        this.log.warn(
            {
                puzzleId,
                before: { character: before.character, aliases: before.aliases, imageKey: before.imageKey },
                after: { character: after.character, aliases: after.aliases, imageKey: after.imageKey },
            },
            'hotfix applied',
        );
        return after;
    }

    /**
     * Scheduled pre-creation of every universe's puzzle for a date.
     * A failure in one universe is reported and does not stop the others.
     */
    async generateDailyPuzzles(date: string): Promise<DailyGenerationReport> {
        assertCalendarDate(date);
        const results: UniverseGenerationResult[] = [];
        for (const universe of UNIVERSES) {
            try {
                const existed = await this.repository.getByKey(universe, date);
                const puzzle = existed ?? (await this.getOrCreatePuzzle(universe, date));
                results.push({
                    universe,
                    status: existed ? 'existing' : 'created',
                    puzzleId: puzzle.id,
                    character: puzzle.character,
                });
            } catch (err) {
                const message = err instanceof Error ? err.message : String(err);
                this.log.error({ universe, date, err }, 'puzzle generation failed');
                results.push({ universe, status: 'failed', error: message });
            }
        }
        const created = results.filter((r) => r.status === 'created').length;
        this.log.info({ date, created }, 'daily puzzle generation finished');
        return { date, created, results };
    }

    /**
     * Dates in [start, end] with no stored puzzle, per universe.
     */
    async findMissingPuzzles(start: string, end: string): Promise<Record<Universe, string[]>> {
        const missing: Record<Universe, string[]> = { marvel: [], dc: [], image: [] };
        for (const date of eachDay(start, end)) {
            for (const universe of UNIVERSES) {
                if (!(await this.repository.getByKey(universe, date))) {
                    missing[universe].push(date);
                }
            }
        }
        return missing;
    }

    /**
     * Retention cleanup: removes puzzles older than `daysToKeep` days before `today`.
     */
    async cleanupOldPuzzles(today: string, daysToKeep = 365): Promise<number> {
        const cutoff = addDays(today, -daysToKeep);
        const removed = await this.repository.deleteBefore(cutoff);
        this.log.info({ cutoff, removed }, 'old puzzles removed');
        return removed;
    }
}
