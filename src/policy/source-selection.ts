import {
    CrawlErrorKind,
    Provenance,
    fail,
    ok,
    type CandidateRecord,
    type OpenAccessResolver,
    type ResolvedSource,
    type Result,
    type SourcePatternConfig,
} from '../types/index.js';
import { getLogger } from '../utils/logger.js';

export const NO_SOURCE_REASON = 'No accessible PDF URL found';

/**
 * How an index-supplied link is treated.
 * - `direct`: already points at a PDF
 * - `paywalled`: proceedings host or DOI prefix that needs institutional access; never attempted
 * - `broad`: anything else (publisher page, DOI); attempted as a last resort
 */
export type LinkClass = 'direct' | 'paywalled' | 'broad';

export function classifyLink(link: string, patterns: SourcePatternConfig): LinkClass {
    const lower = link.toLowerCase();

    if (lower.endsWith('.pdf') || patterns.directPdfPatterns.some((p) => lower.includes(p.toLowerCase()))) {
        return 'direct';
    }
    if (patterns.paywalledPatterns.some((p) => lower.includes(p.toLowerCase()))) {
        return 'paywalled';
    }
    return 'broad';
}

/**
 * Chooses where to download a candidate from. First strategy that yields a URL wins:
 *
 * 1. Open-access index match
 * 2. The index's own link, when it is a direct PDF
 * 3. The index's own link, unless it is paywalled
 */
export class SourceSelectionPolicy {
    constructor(
        private readonly resolver: OpenAccessResolver,
        private readonly patterns: SourcePatternConfig
    ) {}

    async select(candidate: CandidateRecord): Promise<Result<ResolvedSource>> {
        const logger = getLogger('policy');

        logger.debug({ resolver: this.resolver.name }, 'Searching open-access index');
        const resolved = await this.resolver.resolve(candidate.title, candidate.authors);
        if (resolved) {
            return ok({ url: resolved, provenance: Provenance.OpenAccessIndex });
        }

        const link = candidate.direct_link;
        if (link) {
            switch (classifyLink(link, this.patterns)) {
                case 'direct':
                    return ok({ url: link, provenance: Provenance.DirectLinkFromIndex });
                case 'broad':
                    return ok({ url: link, provenance: Provenance.BroadLinkFromIndex });
                case 'paywalled':
                    logger.info({ url: link }, 'Skipping paywalled link (requires institutional access)');
                    break;
            }
        }

        return fail(CrawlErrorKind.NoAccessibleSource, NO_SOURCE_REASON);
    }
}
