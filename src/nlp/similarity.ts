import type { SimilarityAlgorithm } from '../types/index.js';

/**
 * Pluggable similarity scorer. Must return a value in [0, 1],
 * 1 meaning identical.
 */
export type SimilarityFn = (a: string, b: string) => number;

/**
 * Levenshtein edit distance (two-row dynamic programming).
 */
export function levenshteinDistance(a: string, b: string): number {
    const m = a.length;
    const n = b.length;

    if (m === 0) return n;
    if (n === 0) return m;

    let previous = Array.from({ length: n + 1 }, (_, j) => j);
    let current = new Array<number>(n + 1).fill(0);

    for (let i = 1; i <= m; i++) {
        current[0] = i;
        for (let j = 1; j <= n; j++) {
            const cost = a[i - 1] === b[j - 1] ? 0 : 1;
            current[j] = Math.min(
                (previous[j] ?? 0) + 1,        // deletion
                (current[j - 1] ?? 0) + 1,     // insertion
                (previous[j - 1] ?? 0) + cost  // substitution
            );
        }
        [previous, current] = [current, previous];
    }

    return previous[n] ?? 0;
}

/**
 * Normalised Levenshtein similarity: 1 - distance / longer length.
 */
export function levenshteinSimilarity(a: string, b: string): number {
    if (a === b) return 1.0;

    const maxLen = Math.max(a.length, b.length);
    if (maxLen === 0) return 1.0;

    return 1.0 - levenshteinDistance(a, b) / maxLen;
}

/**
 * Longest common substring of a[aLo, aHi) and b[bLo, bHi).
 * Ties go to the block starting earliest in `a`, then earliest in `b`.
 */
function longestMatch(
    a: string,
    b: string,
    aLo: number,
    aHi: number,
    bLo: number,
    bHi: number
): { i: number; j: number; size: number } {
    let best = { i: aLo, j: bLo, size: 0 };
    let previous = new Array<number>(bHi - bLo + 1).fill(0);

    for (let i = aLo; i < aHi; i++) {
        const current = new Array<number>(bHi - bLo + 1).fill(0);
        for (let j = bLo; j < bHi; j++) {
            if (a[i] !== b[j]) continue;

            const size = (previous[j - bLo] ?? 0) + 1;
            current[j - bLo + 1] = size;

            if (size > best.size) {
                best = { i: i - size + 1, j: j - size + 1, size };
            }
        }
        previous = current;
    }

    return best;
}

function matchingCharacters(a: string, b: string, aLo: number, aHi: number, bLo: number, bHi: number): number {
    if (aLo >= aHi || bLo >= bHi) return 0;

    const { i, j, size } = longestMatch(a, b, aLo, aHi, bLo, bHi);
    if (size === 0) return 0;

    return size
        + matchingCharacters(a, b, aLo, i, bLo, j)
        + matchingCharacters(a, b, i + size, aHi, j + size, bHi);
}

/**
 * Ratcliff/Obershelp sequence ratio: 2 * matches / (|a| + |b|).
 */
export function sequenceRatio(a: string, b: string): number {
    const total = a.length + b.length;
    if (total === 0) return 1.0;

    return (2 * matchingCharacters(a, b, 0, a.length, 0, b.length)) / total;
}

const SCORERS: Record<SimilarityAlgorithm, SimilarityFn> = {
    levenshtein: levenshteinSimilarity,
    sequence: sequenceRatio,
};

/**
 * Look up a scorer by its configured name.
 */
export function getSimilarity(algorithm: SimilarityAlgorithm): SimilarityFn {
    return SCORERS[algorithm];
}
