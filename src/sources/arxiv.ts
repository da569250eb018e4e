import * as cheerio from 'cheerio';
import { titlesMatch } from '../nlp/title-matcher.js';
import {
    CrawlErrorKind,
    describeError,
    fail,
    ok,
    type OpenAccessResolver,
    type Result,
    type SourceClientOptions,
} from '../types/index.js';
import { getHttpClient, sleep, type HttpClient } from '../utils/http-client.js';
import { getLogger } from '../utils/logger.js';
import { cleanQueryTitle, extractArxivId, lastName, toPdfUrl } from './utils.js';

const ARXIV_QUERY_URL = 'https://export.arxiv.org/api/query';

/**
 * One entry of an arXiv Atom feed, reduced to what resolution needs.
 */
export interface ArxivEntry {
    title: string;
    /** Direct PDF URL, or null when neither a PDF link nor an abstract URL is present */
    pdfUrl: string | null;
}

/**
 * Parse an arXiv Atom feed.
 * The PDF link is the `<link title="pdf">`; failing that, it is derived from the abstract page.
 */
export function parseFeed(xml: string): ArxivEntry[] {
    const $ = cheerio.load(xml, { xml: true });

    return $('entry')
        .toArray()
        .map((entry) => {
            const $entry = $(entry);
            const title = $entry.children('title').first().text().trim();

            const pdfHref = $entry.children('link[title="pdf"]').attr('href');
            const abstractHref =
                $entry.children('link[rel="alternate"]').attr('href') ?? $entry.children('id').first().text().trim();

            return { title, pdfUrl: toPdfUrl(pdfHref) ?? toPdfUrl(abstractHref) };
        });
}

/**
 * Search expressions tried in order: exact phrase, title words, title words plus first author.
 */
export function buildQueries(title: string, authors: readonly string[]): string[] {
    const searchTitle = cleanQueryTitle(title);
    const queries = [`ti:"${searchTitle}"`, `ti:${searchTitle}`];

    const firstAuthor = authors[0];
    const surname = firstAuthor ? lastName(firstAuthor) : null;
    if (surname) {
        queries.push(`ti:${searchTitle} AND au:${surname}`);
    }

    return queries;
}

export interface ArxivResolverOptions extends SourceClientOptions {
    /** Ranked results inspected per query */
    maxResults?: number;
    /** Pause between consecutive query variants */
    queryDelayMs?: number;
}

/**
 * arXiv open-access resolver.
 * Finds a freely downloadable PDF for a paper known only by title and authors.
 *
 * @see https://info.arxiv.org/help/api/user-manual.html
 */
export class ArxivResolver implements OpenAccessResolver {
    readonly name = 'arXiv';
    private httpClient: HttpClient;
    private readonly timeoutMs: number;
    private readonly maxResults: number;
    private readonly queryDelayMs: number;

    constructor(options?: ArxivResolverOptions) {
        this.timeoutMs = options?.timeoutMs ?? 30000;
        this.maxResults = options?.maxResults ?? 5;
        this.queryDelayMs = options?.queryDelayMs ?? 500;
        this.httpClient = getHttpClient();
    }

    /**
     * For dependency injection in tests.
     */
    setHttpClient(client: HttpClient): void {
        this.httpClient = client;
    }

    async resolve(title: string, authors: readonly string[]): Promise<string | null> {
        const result = await this.tryResolve(title, authors);
        if (result.ok) return result.value;

        getLogger('arxiv').debug({ title, error: result.error.message }, 'No arXiv match');
        return null;
    }

    async tryResolve(title: string, authors: readonly string[]): Promise<Result<string>> {
        const logger = getLogger('arxiv');
        const queries = buildQueries(title, authors);

        for (const [i, query] of queries.entries()) {
            if (i > 0) {
                await sleep(this.queryDelayMs);
            }

            let entries: ArxivEntry[];
            try {
                entries = await this.query(query);
            } catch (error) {
                // A transport error ends resolution for this title
                logger.warn({ title, query, error: describeError(error) }, 'arXiv search failed');
                return fail(CrawlErrorKind.ResolutionFailure, `arXiv search failed: ${describeError(error)}`);
            }

            for (const entry of entries) {
                if (!entry.pdfUrl || !titlesMatch(title, entry.title)) continue;

                logger.info({ arxivId: extractArxivId(entry.pdfUrl), url: entry.pdfUrl }, 'Found on arXiv');
                return ok(entry.pdfUrl);
            }
        }

        return fail(CrawlErrorKind.ResolutionFailure, `No arXiv entry matches "${title}"`);
    }

    private async query(searchQuery: string): Promise<ArxivEntry[]> {
        const response = await this.httpClient.getText(ARXIV_QUERY_URL, {
            query: {
                search_query: searchQuery,
                max_results: this.maxResults,
                sortBy: 'relevance',
            },
            timeout: this.timeoutMs,
            source: 'arxiv',
        });

        return parseFeed(response.data).slice(0, this.maxResults);
    }
}
