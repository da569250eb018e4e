/**
 * CandidateRecord — one publication discovered in the bibliographic index.
 * Field names mirror what is persisted to `all_papers.json` and the per-paper metadata file.
 */
export interface CandidateRecord {
    readonly title: string;

    /** Author display names, in publication order */
    readonly authors: readonly string[];

    /** Publication year as reported by the index (kept as a string) */
    readonly year: string;

    readonly venue: string;

    /** Index landing page for the record */
    readonly canonical_url: string;

    /** "Electronic edition" pointer: a PDF, a DOI, or a publisher page */
    readonly direct_link: string | null;

    /** Index-specific record key (e.g., "conf/aaai/Smith24") */
    readonly unique_key: string;

    /** DOI without the https://doi.org/ prefix */
    readonly doi: string | null;

    readonly source_tag: 'bibliographic-index';
}

/**
 * Which strategy supplied a download URL.
 */
export enum Provenance {
    OpenAccessIndex = 'OpenAccessIndex',
    DirectLinkFromIndex = 'DirectLinkFromIndex',
    BroadLinkFromIndex = 'BroadLinkFromIndex',
}

/** Human-readable labels used in failure reasons and logs */
export const PROVENANCE_LABELS: Readonly<Record<Provenance, string>> = {
    [Provenance.OpenAccessIndex]: 'arXiv',
    [Provenance.DirectLinkFromIndex]: 'DBLP direct link',
    [Provenance.BroadLinkFromIndex]: 'DBLP EE link',
};

export interface ResolvedSource {
    url: string;
    provenance: Provenance;
}

/**
 * Sibling metadata record written next to each downloaded PDF.
 */
export interface ArtifactMetadata extends CandidateRecord {
    provenance: Provenance;
    download_url: string;
    /** ISO-8601 timestamp */
    download_date: string;
}
