import { z } from 'zod';
import {
    CrawlErrorKind,
    describeError,
    fail,
    ok,
    type BibliographicSearchClient,
    type CandidateRecord,
    type Result,
    type SourceClientOptions,
} from '../types/index.js';
import { getHttpClient, type HttpClient } from '../utils/http-client.js';
import { getLogger } from '../utils/logger.js';
import { firstOf, stripDoiPrefix } from './utils.js';

const DBLP_SEARCH_URL = 'https://dblp.org/search/publ/api';

/**
 * DBLP search API response (subset of relevant fields).
 */
const dblpAuthorSchema = z.union([
    z.string(),
    z.object({ text: z.string(), '@pid': z.string().optional() }),
]);

const dblpInfoSchema = z.object({
    title: z.string().default(''),
    authors: z
        .object({ author: z.union([dblpAuthorSchema, z.array(dblpAuthorSchema)]).optional() })
        .optional(),
    year: z.union([z.string(), z.number()]).optional(),
    venue: z.union([z.string(), z.array(z.string())]).optional(),
    url: z.string().optional(),
    ee: z.union([z.string(), z.array(z.string())]).optional(),
    key: z.string().optional(),
    doi: z.string().optional(),
});

const dblpResponseSchema = z.object({
    result: z.object({
        hits: z.object({
            hit: z.array(z.object({ info: dblpInfoSchema })).optional(),
        }),
    }),
});

export type DblpInfo = z.infer<typeof dblpInfoSchema>;
type DblpAuthor = z.infer<typeof dblpAuthorSchema>;

/**
 * The three shapes DBLP uses for the author field, made explicit.
 * A single author arrives unwrapped; several arrive as a list.
 */
export type AuthorField =
    | { kind: 'absent' }
    | { kind: 'name'; name: string }
    | { kind: 'record'; name: string; pid: string | null }
    | { kind: 'list'; entries: AuthorField[] };

export function classifyAuthors(raw: DblpAuthor | DblpAuthor[] | undefined): AuthorField {
    if (raw === undefined) return { kind: 'absent' };
    if (Array.isArray(raw)) return { kind: 'list', entries: raw.map((entry) => classifyAuthors(entry)) };
    if (typeof raw === 'string') return { kind: 'name', name: raw };
    return { kind: 'record', name: raw.text, pid: raw['@pid'] ?? null };
}

/**
 * Collapse any author shape into an ordered list of display names.
 */
export function authorNames(field: AuthorField): string[] {
    switch (field.kind) {
        case 'absent':
            return [];
        case 'name':
        case 'record':
            return field.name ? [field.name] : [];
        case 'list':
            return field.entries.flatMap(authorNames);
    }
}

/**
 * Build a CandidateRecord from a validated DBLP hit.
 */
export function toCandidate(info: DblpInfo): CandidateRecord {
    const venue = Array.isArray(info.venue) ? info.venue.join(', ') : info.venue ?? '';

    return {
        title: info.title,
        authors: authorNames(classifyAuthors(info.authors?.author)),
        year: info.year === undefined ? '' : String(info.year),
        venue,
        canonical_url: info.url ?? '',
        direct_link: firstOf(info.ee),
        unique_key: info.key ?? '',
        doi: stripDoiPrefix(info.doi),
        source_tag: 'bibliographic-index',
    };
}

/**
 * Keep records whose title contains the keyword and whose venue contains the requested venue.
 * Both checks ignore case.
 */
export function matchesQuery(record: CandidateRecord, keyword: string, venue: string): boolean {
    return (
        record.title.toLowerCase().includes(keyword.toLowerCase()) &&
        record.venue.toLowerCase().includes(venue.toLowerCase())
    );
}

export interface DblpClientOptions extends SourceClientOptions {
    /** Hits requested per query (DBLP `h` parameter) */
    maxHits?: number;
}

/**
 * DBLP bibliographic search client.
 *
 * Proceedings are often indexed under the year before the one printed on them,
 * so every search covers the target year and the year before it.
 *
 * @see https://dblp.org/faq/How+to+use+the+dblp+search+API.html
 */
export class DblpClient implements BibliographicSearchClient {
    readonly name = 'DBLP';
    private httpClient: HttpClient;
    private readonly timeoutMs: number;
    private readonly maxHits: number;

    constructor(options?: DblpClientOptions) {
        this.timeoutMs = options?.timeoutMs ?? 30000;
        this.maxHits = options?.maxHits ?? 1000;
        this.httpClient = getHttpClient();
    }

    /**
     * For dependency injection in tests.
     */
    setHttpClient(client: HttpClient): void {
        this.httpClient = client;
    }

    async search(keyword: string, venue: string, targetYear: number): Promise<CandidateRecord[]> {
        const logger = getLogger('dblp');
        const records: CandidateRecord[] = [];

        for (const year of [targetYear, targetYear - 1]) {
            logger.info({ keyword, venue, year }, 'Searching DBLP');

            const result = await this.searchYear(keyword, venue, year);
            if (!result.ok) {
                logger.warn({ year, kind: result.error.kind, error: result.error.message }, 'DBLP search failed for year');
                continue;
            }

            for (const record of result.value) {
                logger.debug({ title: record.title, year }, 'Found');
            }
            logger.info({ year, count: result.value.length }, 'Papers found for year');
            records.push(...result.value);
        }

        return records;
    }

    /**
     * Query a single year. Transport and schema errors become a SearchQueryFailure.
     */
    async searchYear(keyword: string, venue: string, year: number): Promise<Result<CandidateRecord[]>> {
        const query = {
            q: `${keyword} venue:${venue} year:${year}`,
            format: 'json',
            h: this.maxHits,
            f: 0,
        };

        let data: unknown;
        try {
            const response = await this.httpClient.getJson(DBLP_SEARCH_URL, {
                query,
                timeout: this.timeoutMs,
                source: 'dblp',
            });
            data = response.data;
        } catch (error) {
            return fail(CrawlErrorKind.SearchQueryFailure, describeError(error), DBLP_SEARCH_URL);
        }

        const parsed = dblpResponseSchema.safeParse(data);
        if (!parsed.success) {
            const issue = parsed.error.issues[0];
            const detail = issue ? `${issue.path.join('.')}: ${issue.message}` : 'unexpected shape';
            return fail(CrawlErrorKind.SearchQueryFailure, `Malformed DBLP response (${detail})`, DBLP_SEARCH_URL);
        }

        const hits = parsed.data.result.hits.hit ?? [];
        return ok(
            hits
                .map((hit) => toCandidate(hit.info))
                .filter((record) => matchesQuery(record, keyword, venue))
        );
    }
}
