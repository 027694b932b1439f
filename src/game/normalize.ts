// Matching folds case, punctuation and hyphen/space variants only.
// Diacritics are compared as written: 'Nuñez' does not match 'Nunez'.
// Input is composed (NFC) first, so decomposed accents are kept rather than stripped.

/**
 * Comparison form of a name or guess: lowercase, punctuation other than hyphens
 * stripped, hyphens read as word breaks, whitespace collapsed.
 *
 * 'Spider-Man ' -> 'spider man'
 */
export function normalizeGuess(value: string): string {
    return value
        .normalize('NFC')
        .toLowerCase()
        .replace(/[^\p{L}\p{N}\s-]/gu, '')
        .replace(/-/g, ' ')
        .split(/\s+/)
        .filter(Boolean)
        .join(' ');
}

/**
 * The normalized form with every space removed, so 'spider man' and 'spiderman' agree.
 */
export function compactGuess(value: string): string {
    return normalizeGuess(value).replace(/ /g, '');
}

/**
 * True when the guess names the character or one of its aliases.
 */
export function matchesCharacter(guess: string, character: string, aliases: readonly string[]): boolean {
    const normalized = normalizeGuess(guess);
    if (!normalized) return false;
    const compact = normalized.replace(/ /g, '');

    for (const name of [character, ...aliases]) {
        const candidate = normalizeGuess(name);
        if (!candidate) continue;
        if (normalized === candidate || compact === candidate.replace(/ /g, '')) {
            return true;
        }
    }
    return false;
}
