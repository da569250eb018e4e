/**
 * Per-candidate error taxonomy. None of these abort a run.
 */
export enum CrawlErrorKind {
    SearchQueryFailure = 'SearchQueryFailure',
    ResolutionFailure = 'ResolutionFailure',
    AccessForbidden = 'AccessForbidden',
    FetchFailure = 'FetchFailure',
    NoAccessibleSource = 'NoAccessibleSource',
}

export interface CrawlError {
    kind: CrawlErrorKind;
    message: string;
    url?: string;
}

/**
 * Outcome of a single external call site.
 */
export type Result<T, E = CrawlError> =
    | { ok: true; value: T }
    | { ok: false; error: E };

export function ok<T>(value: T): Result<T, never> {
    return { ok: true, value };
}

export function fail(kind: CrawlErrorKind, message: string, url?: string): Result<never> {
    return { ok: false, error: url === undefined ? { kind, message } : { kind, message, url } };
}

/**
 * Render an unknown thrown value as text for logs and failure reports.
 */
export function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
