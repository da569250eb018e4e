import { mkdirSync } from 'node:fs';
import type {
    BibliographicSearchClient,
    CrawlerConfig,
    CrawlSummary,
    DownloadOutcome,
    FailureRecord,
    OpenAccessResolver,
} from '../types/index.js';
import { DblpClient } from '../sources/dblp.js';
import { ArxivResolver } from '../sources/arxiv.js';
import { SourceSelectionPolicy } from '../policy/source-selection.js';
import { DownloadEngine } from '../storage/download-engine.js';
import { toFailureRecord, writeReports } from '../exporters/report.js';
import { getHttpClient, type HttpClient } from '../utils/http-client.js';
import { getLogger } from '../utils/logger.js';

/**
 * Collaborators of a crawl. Anything omitted is built from the config.
 */
export interface CrawlerDeps {
    search: BibliographicSearchClient;
    resolver: OpenAccessResolver;
    engine: DownloadEngine;
    /** Shared client injected into the default collaborators */
    httpClient: HttpClient;
    now: () => Date;
}

function buildDeps(config: CrawlerConfig, overrides: Partial<CrawlerDeps>): Omit<CrawlerDeps, 'httpClient'> {
    const { httpClient } = overrides;

    let search = overrides.search;
    if (!search) {
        const dblp = new DblpClient({ timeoutMs: config.timeouts.searchMs, maxHits: config.maxHits });
        if (httpClient) dblp.setHttpClient(httpClient);
        search = dblp;
    }

    let resolver = overrides.resolver;
    if (!resolver) {
        const arxiv = new ArxivResolver({
            timeoutMs: config.timeouts.resolverMs,
            maxResults: config.maxResolverResults,
            queryDelayMs: config.politeness.queryDelayMs,
        });
        if (httpClient) arxiv.setHttpClient(httpClient);
        resolver = arxiv;
    }

    const now = overrides.now ?? (() => new Date());

    let engine = overrides.engine;
    if (!engine) {
        engine = new DownloadEngine(config.out, {
            timeoutMs: config.timeouts.downloadMs,
            delayMs: config.politeness.downloadDelayMs,
            now,
        });
        if (httpClient) engine.setHttpClient(httpClient);
    }

    return { search, resolver, engine, now };
}

/**
 * Main crawl — orchestrates the full pipeline:
 *
 * 1. Search the bibliographic index (target year and the year before)
 * 2. For each candidate, in order: skip finished work, select a source, download
 * 3. Write aggregate reports
 *
 * Candidates are processed one at a time. Per-candidate failures are collected
 * in the returned summary; only a failure to write the reports rejects.
 */
export async function runCrawl(config: CrawlerConfig, overrides: Partial<CrawlerDeps> = {}): Promise<CrawlSummary> {
    const logger = getLogger('crawl');
    mkdirSync(config.out, { recursive: true });

    const { search, resolver, engine, now } = buildDeps(config, overrides);
    const policy = new SourceSelectionPolicy(resolver, config.sources);

    logger.info(
        { keyword: config.keyword, venue: config.venue, years: [config.year, config.year - 1], out: config.out },
        'Starting crawl'
    );

    // ──────────────────────────────────────────────────
    // Step 1: Discover candidates
    // ──────────────────────────────────────────────────
    const candidates = await search.search(config.keyword, config.venue, config.year);

    if (candidates.length === 0) {
        logger.warn('No papers found');
    } else {
        logger.info({ total: candidates.length }, 'Total papers found');
    }

    // ──────────────────────────────────────────────────
    // Step 2: Resolve and download, one candidate at a time
    // ──────────────────────────────────────────────────
    const outcomes: DownloadOutcome[] = [];
    const failures: FailureRecord[] = [];
    let succeeded = 0;

    for (const [i, candidate] of candidates.entries()) {
        const index = i + 1;
        logger.info({ index, title: candidate.title }, 'Processing');

        const outcome =
            engine.existingOutcome(candidate, index) ??
            (await engine.fetchAndStore(candidate, await policy.select(candidate), index));

        outcomes.push(outcome);
        const failure = toFailureRecord(outcome);
        if (failure) {
            failures.push(failure);
        } else {
            succeeded++;
        }

        logger.info(
            { processed: `${index}/${candidates.length}`, downloaded: succeeded, failed: failures.length },
            'Progress'
        );
    }

    // ──────────────────────────────────────────────────
    // Step 3: Reports
    // ──────────────────────────────────────────────────
    writeReports(config.out, candidates, failures, now());

    const requests = (overrides.httpClient ?? getHttpClient()).getAllRequestCounts();
    logger.info(
        { downloaded: `${succeeded}/${candidates.length}`, out: config.out, requests },
        'Download complete'
    );

    if (failures.length > 0) {
        logger.info(
            {
                failed: failures.length,
                commonReasons: [
                    'paper is behind the publisher paywall (try institutional access)',
                    'paper is not on arXiv yet',
                    'proceedings are not published yet',
                ],
            },
            'Some downloads failed, see failed_downloads.json'
        );
    }

    return {
        outDir: config.out,
        candidates,
        outcomes,
        failures,
        succeeded,
        failed: failures.length,
    };
}
