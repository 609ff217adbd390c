/**
 * Name matching between what a registrant typed and what the ERP holds.
 */

/** Lowercase and collapse whitespace */
export function normalizeName(name: string): string {
    return name.toLowerCase().split(/\s+/).filter(Boolean).join(' ');
}

/**
 * Levenshtein edit distance (insertions, deletions, substitutions).
 * Two-row dynamic programming table.
 */
export function levenshteinDistance(a: string, b: string): number {
    if (a.length === 0) return b.length;
    if (b.length === 0) return a.length;

    let previous = Array.from({ length: b.length + 1 }, (_, j) => j);
    let current = new Array<number>(b.length + 1).fill(0);

    for (let i = 1; i <= a.length; i++) {
        current[0] = i;
        for (let j = 1; j <= b.length; j++) {
            const cost = a[i - 1] === b[j - 1] ? 0 : 1;
            current[j] = Math.min(
                previous[j] + 1,
                current[j - 1] + 1,
                previous[j - 1] + cost
            );
        }
        [previous, current] = [current, previous];
    }

    return previous[b.length];
}

/**
 * Similarity percentage (0-100, floored) of two names after normalisation.
 * Empty input on either side scores 0.
 */
export function calculateNameSimilarity(provided: string, recorded: string): number {
    const a = normalizeName(provided);
    const b = normalizeName(recorded);

    if (!a || !b) return 0;
    if (a === b) return 100;

    const distance = levenshteinDistance(a, b);
    const maxLength = Math.max(a.length, b.length);
    const ratio = 1 - distance / maxLength;

    return Math.max(0, Math.min(100, Math.floor(ratio * 100)));
}
