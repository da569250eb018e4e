import { TITLE_STOPWORDS } from './title-stopwords.js';

/** Minimum share of the smaller title's content words found in the other title */
export const WORD_OVERLAP_THRESHOLD = 0.7;

/**
 * Canonical form of a title for comparison.
 * - Lowercase
 * - Punctuation becomes whitespace (letters, digits and underscores are kept, in any script)
 * - Whitespace collapsed and trimmed
 */
export function normalizeTitle(title: string): string {
    return title
        .toLowerCase()
        .replace(/[^\p{L}\p{N}_\s]/gu, ' ')
        .replace(/\s+/g, ' ')
        .trim();
}

function contentWords(normalized: string): Set<string> {
    const words = new Set(normalized.split(' '));
    for (const stopword of TITLE_STOPWORDS) {
        words.delete(stopword);
    }
    words.delete('');
    return words;
}

/**
 * Share of the smaller content-word set that also appears in the other set.
 * Returns null when either title has no content words.
 */
export function wordOverlap(a: string, b: string): number | null {
    const wordsA = contentWords(normalizeTitle(a));
    const wordsB = contentWords(normalizeTitle(b));

    if (wordsA.size === 0 || wordsB.size === 0) return null;

    let shared = 0;
    for (const word of wordsA) {
        if (wordsB.has(word)) shared++;
    }

    return shared / Math.min(wordsA.size, wordsB.size);
}

/**
 * Decide whether two titles from different indexes name the same paper.
 *
 * Checks run from strictest to loosest: exact match after normalization,
 * containment either way (subtitles, truncation), then content-word overlap
 * strictly above {@link WORD_OVERLAP_THRESHOLD}.
 */
export function titlesMatch(a: string, b: string): boolean {
    const normA = normalizeTitle(a);
    const normB = normalizeTitle(b);

    if (normA.length === 0 || normB.length === 0) return false;

    if (normA === normB) return true;

    if (normA.includes(normB) || normB.includes(normA)) return true;

    const overlap = wordOverlap(normA, normB);
    return overlap !== null && overlap > WORD_OVERLAP_THRESHOLD;
}
