/**
 * Barrel export for all shared types.
 */
export { Provenance, PROVENANCE_LABELS } from './paper.js';
export type { CandidateRecord, ResolvedSource, ArtifactMetadata } from './paper.js';
export { CrawlErrorKind, ok, fail, describeError } from './result.js';
export type { CrawlError, Result } from './result.js';
export type { DownloadOutcome, FailureRecord, CrawlSummary } from './outcome.js';
export { DEFAULT_CONFIG } from './config.js';
export type {
    CrawlerConfig,
    LogLevel,
    PolitenessConfig,
    TimeoutConfig,
    SourcePatternConfig,
} from './config.js';
export type { BibliographicSearchClient, OpenAccessResolver, SourceClientOptions } from './source-adapter.js';
