import type { CandidateRecord } from '../types/index.js';
import { HttpClient } from '../utils/http-client.js';

/**
 * Candidate with placeholder values; override what the test cares about.
 */
export function makeCandidate(overrides: Partial<CandidateRecord> = {}): CandidateRecord {
    return {
        title: 'Temporal Knowledge Graph Completion with Relation Paths',
        authors: ['Ada Example', 'Grace Sample'],
        year: '2025',
        venue: 'AAAI',
        canonical_url: 'https://dblp.org/rec/conf/aaai/Example25',
        direct_link: null,
        unique_key: 'conf/aaai/Example25',
        doi: null,
        source_tag: 'bibliographic-index',
        ...overrides,
    };
}

/**
 * HTTP client without politeness throttling, for mocked fetch.
 */
export function fastHttpClient(): HttpClient {
    const unlimited = { tokensPerSecond: 1000, maxBurst: 1000 };
    return new HttpClient({
        timeout: 5000,
        rateLimits: { dblp: unlimited, arxiv: unlimited, download: unlimited, default: unlimited },
    });
}

export function jsonResponse(body: unknown, status = 200): Response {
    return new Response(JSON.stringify(body), {
        status,
        headers: { 'content-type': 'application/json' },
    });
}

export function atomResponse(xml: string): Response {
    return new Response(xml, {
        status: 200,
        headers: { 'content-type': 'application/atom+xml; charset=utf-8' },
    });
}

export function pdfResponse(body = '%PDF-1.4 test document', contentType = 'application/pdf'): Response {
    return new Response(body, { status: 200, headers: { 'content-type': contentType } });
}

/**
 * Minimal arXiv Atom feed.
 */
export function atomFeed(entries: Array<{ id: string; title: string; withPdfLink?: boolean }>): string {
    const body = entries
        .map(({ id, title, withPdfLink = true }) => {
            const pdfLink = withPdfLink
                ? `<link title="pdf" href="http://arxiv.org/pdf/${id}" rel="related" type="application/pdf"/>`
                : '';
            return `
  <entry>
    <id>http://arxiv.org/abs/${id}</id>
    <title>${title}</title>
    <link href="http://arxiv.org/abs/${id}" rel="alternate" type="text/html"/>
    ${pdfLink}
  </entry>`;
        })
        .join('');

    return `<?xml version="1.0" encoding="UTF-8"?>
<feed xmlns="http://www.w3.org/2005/Atom">
  <title type="html">ArXiv Query</title>
  <id>http://arxiv.org/api/query</id>${body}
</feed>`;
}

/**
 * Request URL of the nth call to a mocked fetch.
 */
export function calledUrl(mock: { mock: { calls: unknown[][] } }, n: number): URL {
    const arg = mock.mock.calls[n]?.[0];
    if (typeof arg !== 'string') {
        throw new Error(`fetch call ${n} has no string URL`);
    }
    return new URL(arg);
}
