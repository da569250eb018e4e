import type { CandidateRecord } from './paper.js';
import type { CrawlErrorKind } from './result.js';

/**
 * Result of one download attempt for one candidate.
 */
export interface DownloadOutcome {
    /** 1-based position of the candidate within the run */
    index: number;
    title: string;
    succeeded: boolean;
    /** True when an artifact from an earlier run satisfied the request */
    skipped: boolean;
    failure_kind: CrawlErrorKind | null;
    failure_reason: string | null;
    source_url: string | null;
    file_path: string | null;
}

/**
 * Entry of `failed_downloads.json`.
 */
export interface FailureRecord {
    index: number;
    title: string;
    kind: CrawlErrorKind;
    reason: string;
    url?: string;
}

/**
 * Everything a crawl produced, returned to the caller instead of held in process state.
 */
export interface CrawlSummary {
    outDir: string;
    candidates: CandidateRecord[];
    outcomes: DownloadOutcome[];
    /** Unsuccessful outcomes, in processing order */
    failures: FailureRecord[];
    succeeded: number;
    failed: number;
}
