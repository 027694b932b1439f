import { readFileSync } from 'fs';
import { join } from 'path';
import { z } from 'zod';
import { CharacterEntry, CharacterPools, UNIVERSES } from './types';

const DEFAULT_POOL_FILE = join(__dirname, '..', '..', 'data', 'characters.json');

const entrySchema = z.object({
    character: z.string().trim().min(1).max(100),
    aliases: z.array(z.string()).default([]),
    imageKey: z.string().min(1),
});

const poolsSchema = z.object({
    marvel: z.array(entrySchema),
    dc: z.array(entrySchema),
    image: z.array(entrySchema),
});

/**
 * Collapses whitespace in names and drops empty or duplicate aliases.
 */
function cleanEntry(entry: z.infer<typeof entrySchema>): CharacterEntry {
    const character = entry.character.split(/\s+/).filter(Boolean).join(' ');
    const aliases: string[] = [];
    for (const alias of entry.aliases) {
        const cleaned = alias.split(/\s+/).filter(Boolean).join(' ');
        if (cleaned && !aliases.includes(cleaned)) aliases.push(cleaned);
    }
    return { character, aliases, imageKey: entry.imageKey };
}

/**
 * Validates raw pool data. Every image key must live under its universe's folder.
 * An empty pool is accepted here; selecting from it fails with EmptyPool.
 * @throws Error describing the first invalid entry.
 */
export function parseCharacterPools(raw: unknown): CharacterPools {
    const parsed = poolsSchema.safeParse(raw);
    if (!parsed.success) {
        const issue = parsed.error.issues[0];
        throw new Error(`Invalid character pool at ${issue.path.join('.')}: ${issue.message}`);
    }

    const pools: CharacterPools = { marvel: [], dc: [], image: [] };
    for (const universe of UNIVERSES) {
        pools[universe] = parsed.data[universe].map((entry, index) => {
            if (!entry.imageKey.startsWith(`${universe}/`)) {
                throw new Error(`Invalid character pool at ${universe}.${index}: image key must start with '${universe}/'`);
            }
            return cleanEntry(entry);
        });
    }
    return pools;
}

/**
 * Reads and validates the character pools shipped in data/characters.json.
 */
export function loadCharacterPools(file: string = DEFAULT_POOL_FILE): CharacterPools {
    return parseCharacterPools(JSON.parse(readFileSync(file, 'utf8')));
}
