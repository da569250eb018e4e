import type { CandidateRecord } from './paper.js';
import type { Result } from './result.js';

/**
 * A bibliographic index that maps keyword/venue/year queries to publication records.
 */
export interface BibliographicSearchClient {
    /** Human-readable source name */
    readonly name: string;

    /**
     * Search `targetYear` and `targetYear - 1`.
     * A failed year contributes no records; it never rejects.
     */
    search(keyword: string, venue: string, targetYear: number): Promise<CandidateRecord[]>;
}

/**
 * An index of freely available preprints, queried by title and authors.
 */
export interface OpenAccessResolver {
    readonly name: string;

    /**
     * Find a direct PDF URL for the paper, or null when nothing matches.
     */
    resolve(title: string, authors: readonly string[]): Promise<string | null>;

    /**
     * Same lookup with the failure reason kept.
     */
    tryResolve(title: string, authors: readonly string[]): Promise<Result<string>>;
}

/**
 * Options for source client initialization.
 */
export interface SourceClientOptions {
    /** Request timeout in milliseconds */
    timeoutMs?: number;
}
