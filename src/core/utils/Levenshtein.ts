/**
 * Computes Levenshtein Distance between two strings.
 * Used for fuzzy matching search hits against the queried title and artist.
 */
export function levenshteinDistance(s: string, t: string): number {
    const n = s.length;
    const m = t.length;

    if (n === 0) return m;
    if (m === 0) return n;

    // Two rolling rows instead of the full matrix
    let previous: number[] = Array.from({ length: m + 1 }, (_, j) => j);
    let current: number[] = new Array<number>(m + 1).fill(0);

    for (let i = 1; i <= n; i++) {
        current[0] = i;
        for (let j = 1; j <= m; j++) {
            const cost = (t[j - 1] === s[i - 1]) ? 0 : 1;
            current[j] = Math.min(
                previous[j] + 1,     // deletion
                current[j - 1] + 1,  // insertion
                previous[j - 1] + cost // substitution
            );
        }
        [previous, current] = [current, previous];
    }

    return previous[m];
}

/**
 * Lowercases, folds accents and collapses punctuation to single spaces.
 */
export function normalizeForMatch(str: string): string {
    return str
        .normalize("NFD")
        .replace(/[\u0300-\u036f]/g, "")
        .toLowerCase()
        .replace(/[^\p{L}\p{N}]+/gu, " ")
        .trim();
}

/**
 * Calculates similarity ratio (0.0 to 1.0).
 * 1.0 = exact match after normalization.
 */
export function calculateSimilarity(s: string, t: string): number {
    const sNorm = normalizeForMatch(s);
    const tNorm = normalizeForMatch(t);

    const maxLen = Math.max(sNorm.length, tNorm.length);
    if (maxLen === 0) return 1.0;

    const dist = levenshteinDistance(sNorm, tNorm);
    return 1.0 - (dist / maxLen);
}
