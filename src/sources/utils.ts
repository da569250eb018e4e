/**
 * Shared utilities for source clients.
 */

/**
 * Strip DOI prefix URLs to get just the DOI identifier.
 * "https://doi.org/10.1234/test" → "10.1234/test"
 */
export function stripDoiPrefix(doi: string | null | undefined): string | null {
    if (!doi) return null;
    return doi
        .replace('https://doi.org/', '')
        .replace('http://doi.org/', '')
        .trim() || null;
}

/**
 * Extract arXiv ID from abstract or PDF URLs.
 * "https://arxiv.org/abs/2401.01234v2" → "2401.01234v2"
 * "http://arxiv.org/pdf/2401.01234.pdf" → "2401.01234"
 */
export function extractArxivId(input: string | null | undefined): string | null {
    if (!input) return null;

    const match = input.match(/arxiv\.org\/(?:abs|pdf)\/(\d{4}\.\d{4,5}(?:v\d+)?)/i);
    return match?.[1] ?? null;
}

/**
 * Turn an arXiv URL into a direct PDF URL.
 * URLs already under /pdf/ are returned unchanged; abstract pages are rewritten.
 * "http://arxiv.org/abs/2401.01234v1" → "http://arxiv.org/pdf/2401.01234v1.pdf"
 */
export function toPdfUrl(url: string | null | undefined): string | null {
    if (!url) return null;
    if (url.includes('/pdf/')) return url;
    if (url.includes('/abs/')) return `${url.replace('/abs/', '/pdf/')}.pdf`;
    return null;
}

/**
 * Prepare a title for use inside a search expression:
 * punctuation becomes whitespace, whitespace is collapsed, length is capped.
 */
export function cleanQueryTitle(title: string, maxLength = 100): string {
    return title
        .replace(/[^\p{L}\p{N}_\s]/gu, ' ')
        .replace(/\s+/g, ' ')
        .trim()
        .slice(0, maxLength)
        .trim();
}

/**
 * Last name of an author as printed by DBLP.
 * DBLP disambiguates homonyms with a 4-digit suffix ("Wei Wang 0001"), which is dropped.
 */
export function lastName(author: string): string | null {
    const parts = author
        .replace(/\s+\d{4}$/, '')
        .trim()
        .split(/\s+/)
        .filter((part) => part.length > 0);
    return parts[parts.length - 1] ?? null;
}

/**
 * Normalize a field that an index may return either as a single string or as a list.
 */
export function firstOf(value: string | string[] | null | undefined): string | null {
    if (Array.isArray(value)) return value.find((v) => v.length > 0) ?? null;
    return value ? value : null;
}
