/**
 * Log level options.
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug' | 'silent';

/**
 * Fixed pauses inserted between requests to the same external service.
 */
export interface PolitenessConfig {
    /** Pause between consecutive open-access query variants */
    queryDelayMs: number;
    /** Pause after every successful download */
    downloadDelayMs: number;
}

/**
 * Upper bounds for each kind of external call.
 */
export interface TimeoutConfig {
    searchMs: number;
    resolverMs: number;
    downloadMs: number;
}

/**
 * URL substrings that steer the source selection policy.
 */
export interface SourcePatternConfig {
    /** Links that already point straight at open-access PDFs */
    directPdfPatterns: string[];
    /** Links that lead to paywalled proceedings and are never attempted */
    paywalledPatterns: string[];
}

/**
 * Full crawler configuration merged from CLI flags, env vars, and config file.
 */
export interface CrawlerConfig {
    // Query
    keyword: string;
    venue: string;
    year: number;

    // Output
    out: string;

    // Index limits
    maxHits: number;
    maxResolverResults: number;

    politeness: PolitenessConfig;
    timeouts: TimeoutConfig;
    sources: SourcePatternConfig;

    /** Contact address sent in the User-Agent header */
    email?: string;

    // Logging
    logLevel: LogLevel;
    jsonLogs: boolean;
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: CrawlerConfig = {
    keyword: 'knowledge graph',
    venue: 'AAAI',
    year: 2025,
    out: 'papers',
    maxHits: 1000,
    maxResolverResults: 5,
    politeness: {
        queryDelayMs: 500,
        downloadDelayMs: 2000,
    },
    timeouts: {
        searchMs: 30000,
        resolverMs: 30000,
        downloadMs: 30000,
    },
    sources: {
        directPdfPatterns: ['arxiv.org/pdf'],
        paywalledPatterns: ['ojs.aaai.org', 'doi.org/10.1609'],
    },
    logLevel: 'info',
    jsonLogs: false,
};
