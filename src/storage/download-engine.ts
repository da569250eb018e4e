import { createWriteStream, existsSync, mkdirSync } from 'node:fs';
import { rename, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { pipeline } from 'node:stream/promises';
import {
    CrawlErrorKind,
    PROVENANCE_LABELS,
    describeError,
    type ArtifactMetadata,
    type CandidateRecord,
    type CrawlError,
    type DownloadOutcome,
    type ResolvedSource,
    type Result,
} from '../types/index.js';
import { getHttpClient, HttpError, sleep, type HttpClient } from '../utils/http-client.js';
import { getLogger } from '../utils/logger.js';

const MAX_TITLE_LENGTH = 80;

/**
 * Filesystem-safe form of a title.
 * Drops everything except letters, digits, underscores, whitespace and hyphens,
 * truncates to 80 characters, then joins words with single hyphens.
 */
export function sanitizeTitle(title: string): string {
    const kept = title.replace(/[^\p{L}\p{N}_\s-]/gu, '');
    const truncated = Array.from(kept).slice(0, MAX_TITLE_LENGTH).join('');
    return truncated.replace(/[-\s]+/g, '-');
}

/** 7 → "007" */
export function runPrefix(index: number): string {
    return String(index).padStart(3, '0');
}

export function artifactFilename(title: string, index: number): string {
    return `${runPrefix(index)}_${sanitizeTitle(title)}.pdf`;
}

export function metadataFilename(index: number): string {
    return `${runPrefix(index)}_metadata.json`;
}

export interface DownloadEngineOptions {
    /** Longest wait for the response or for the next chunk of the body */
    timeoutMs?: number;
    /** Pause after each successful download */
    delayMs?: number;
    /** Clock for metadata timestamps */
    now?: () => Date;
}

/**
 * Downloads a chosen source and persists it with its metadata.
 *
 * The PDF path doubles as the completion marker: bytes and metadata are written
 * to `.part` files and renamed into place only once both are complete, so a file
 * at the final path always means a finished download. A failed attempt removes
 * its own `.part` files and nothing else.
 */
export class DownloadEngine {
    private httpClient: HttpClient;
    private readonly timeoutMs: number;
    private readonly delayMs: number;
    private readonly now: () => Date;

    constructor(
        private readonly outDir: string,
        options: DownloadEngineOptions = {}
    ) {
        this.timeoutMs = options.timeoutMs ?? 30000;
        this.delayMs = options.delayMs ?? 2000;
        this.now = options.now ?? (() => new Date());
        this.httpClient = getHttpClient();
        mkdirSync(this.outDir, { recursive: true });
    }

    /**
     * For dependency injection in tests.
     */
    setHttpClient(client: HttpClient): void {
        this.httpClient = client;
    }

    artifactPath(candidate: CandidateRecord, index: number): string {
        return join(this.outDir, artifactFilename(candidate.title, index));
    }

    /**
     * Outcome for a candidate already downloaded by an earlier run, or null.
     */
    existingOutcome(candidate: CandidateRecord, index: number): DownloadOutcome | null {
        const filePath = this.artifactPath(candidate, index);
        if (!existsSync(filePath)) return null;

        getLogger('download').info({ file: filePath }, 'Already downloaded');
        return {
            index,
            title: candidate.title,
            succeeded: true,
            skipped: true,
            failure_kind: null,
            failure_reason: null,
            source_url: null,
            file_path: filePath,
        };
    }

    async fetchAndStore(
        candidate: CandidateRecord,
        selection: Result<ResolvedSource>,
        index: number
    ): Promise<DownloadOutcome> {
        const logger = getLogger('download');
        const existing = this.existingOutcome(candidate, index);
        if (existing) return existing;

        if (!selection.ok) {
            logger.info({ reason: selection.error.message }, 'No download source');
            return failure(candidate, index, selection.error);
        }

        const source = selection.value;
        const label = PROVENANCE_LABELS[source.provenance];
        const filePath = this.artifactPath(candidate, index);
        const partPath = `${filePath}.part`;
        const metadataPath = join(this.outDir, metadataFilename(index));
        const metadataPartPath = `${metadataPath}.part`;

        logger.info({ source: label, url: source.url }, 'Downloading');

        try {
            const response = await this.httpClient.stream(source.url, {
                timeout: this.timeoutMs,
                source: 'download',
            });

            if (!response.contentType.toLowerCase().includes('pdf') && !source.url.toLowerCase().endsWith('.pdf')) {
                logger.warn({ contentType: response.contentType, url: source.url }, 'Content might not be PDF');
            }

            await pipeline(response.body, createWriteStream(partPath));

            const metadata: ArtifactMetadata = {
                ...candidate,
                provenance: source.provenance,
                download_url: source.url,
                download_date: this.now().toISOString(),
            };
            await writeFile(metadataPartPath, JSON.stringify(metadata, null, 2), 'utf-8');
            await rename(partPath, filePath);
            await rename(metadataPartPath, metadataPath);
        } catch (error) {
            await rm(partPath, { force: true });
            await rm(metadataPartPath, { force: true });

            if (error instanceof HttpError && error.forbidden) {
                logger.warn({ url: source.url }, 'Access forbidden (403)');
                return failure(candidate, index, {
                    kind: CrawlErrorKind.AccessForbidden,
                    message: `403 Forbidden from ${label}`,
                    url: source.url,
                });
            }

            logger.warn({ url: source.url, error: describeError(error) }, 'Download failed');
            return failure(candidate, index, {
                kind: CrawlErrorKind.FetchFailure,
                message: describeError(error),
                url: source.url,
            });
        }

        logger.info({ file: filePath }, 'Downloaded successfully');
        await sleep(this.delayMs);

        return {
            index,
            title: candidate.title,
            succeeded: true,
            skipped: false,
            failure_kind: null,
            failure_reason: null,
            source_url: source.url,
            file_path: filePath,
        };
    }
}

function failure(candidate: CandidateRecord, index: number, error: CrawlError): DownloadOutcome {
    return {
        index,
        title: candidate.title,
        succeeded: false,
        skipped: false,
        failure_kind: error.kind,
        failure_reason: error.message,
        source_url: error.url ?? null,
        file_path: null,
    };
}
