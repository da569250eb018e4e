import { describe, it, expect, vi } from 'vitest';
import { SourceSelectionPolicy, classifyLink, NO_SOURCE_REASON } from '../policy/source-selection.js';
import { CrawlErrorKind, DEFAULT_CONFIG, Provenance, fail, ok, type OpenAccessResolver } from '../types/index.js';
import { makeCandidate } from './helpers.js';

function stubResolver(url: string | null): OpenAccessResolver {
    return {
        name: 'stub',
        resolve: vi.fn(async () => url),
        tryResolve: vi.fn(async () => (url ? ok(url) : fail(CrawlErrorKind.ResolutionFailure, 'no match'))),
    };
}

const patterns = DEFAULT_CONFIG.sources;

describe('Source Selection Policy', () => {
    describe('classifyLink', () => {
        it('should treat .pdf links as direct', () => {
            expect(classifyLink('https://example.org/papers/kg.PDF', patterns)).toBe('direct');
        });

        it('should treat open-access PDF hosts as direct', () => {
            expect(classifyLink('https://arxiv.org/pdf/2401.01234', patterns)).toBe('direct');
        });

        it('should flag proceedings hosts and DOI prefixes as paywalled', () => {
            expect(classifyLink('https://ojs.aaai.org/index.php/AAAI/article/view/1', patterns)).toBe('paywalled');
            expect(classifyLink('https://doi.org/10.1609/aaai.v39i1.00001', patterns)).toBe('paywalled');
        });

        it('should treat other links as broad', () => {
            expect(classifyLink('https://doi.org/10.48550/example', patterns)).toBe('broad');
        });
    });

    describe('select', () => {
        it('should prefer the open-access index', async () => {
            const resolver = stubResolver('http://arxiv.org/pdf/2401.01234v1');
            const policy = new SourceSelectionPolicy(resolver, patterns);

            const result = await policy.select(makeCandidate({ direct_link: 'https://example.org/kg.pdf' }));

            expect(result).toEqual(ok({ url: 'http://arxiv.org/pdf/2401.01234v1', provenance: Provenance.OpenAccessIndex }));
            expect(resolver.resolve).toHaveBeenCalledWith(
                'Temporal Knowledge Graph Completion with Relation Paths',
                ['Ada Example', 'Grace Sample']
            );
        });

        it('should use a direct PDF link from the index next', async () => {
            const policy = new SourceSelectionPolicy(stubResolver(null), patterns);

            const result = await policy.select(makeCandidate({ direct_link: 'https://example.org/kg.pdf' }));

            expect(result).toEqual(ok({ url: 'https://example.org/kg.pdf', provenance: Provenance.DirectLinkFromIndex }));
        });

        it('should fall back to a broad link', async () => {
            const policy = new SourceSelectionPolicy(stubResolver(null), patterns);

            const result = await policy.select(makeCandidate({ direct_link: 'https://example.org/landing/42' }));

            expect(result).toEqual(ok({ url: 'https://example.org/landing/42', provenance: Provenance.BroadLinkFromIndex }));
        });

        it('should skip paywalled links', async () => {
            const policy = new SourceSelectionPolicy(stubResolver(null), patterns);

            const result = await policy.select(makeCandidate({ direct_link: 'https://doi.org/10.1609/aaai.v39i1.00001' }));

            expect(result).toEqual({
                ok: false,
                error: { kind: CrawlErrorKind.NoAccessibleSource, message: NO_SOURCE_REASON },
            });
        });

        it('should report no source when there is no link at all', async () => {
            const policy = new SourceSelectionPolicy(stubResolver(null), patterns);

            const result = await policy.select(makeCandidate());

            expect(result.ok).toBe(false);
        });

        it('should honour configured patterns', async () => {
            const policy = new SourceSelectionPolicy(stubResolver(null), {
                directPdfPatterns: [],
                paywalledPatterns: ['publisher.example.com'],
            });

            const result = await policy.select(makeCandidate({ direct_link: 'https://publisher.example.com/article/7' }));

            expect(result.ok).toBe(false);
        });
    });
});
