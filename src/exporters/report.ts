import { existsSync, readdirSync, readFileSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { z } from 'zod';
import {
    CrawlErrorKind,
    type CandidateRecord,
    type DownloadOutcome,
    type FailureRecord,
} from '../types/index.js';
import { getLogger } from '../utils/logger.js';

export const ALL_PAPERS_FILE = 'all_papers.json';
export const FAILED_DOWNLOADS_FILE = 'failed_downloads.json';
export const REPORT_FILE = 'download_report.txt';

const RULE_WIDTH = 80;

// ─── Failure records ─────────────────────────────────────

/**
 * Project an unsuccessful outcome onto its `failed_downloads.json` entry.
 */
export function toFailureRecord(outcome: DownloadOutcome): FailureRecord | null {
    if (outcome.succeeded) return null;

    const record: FailureRecord = {
        index: outcome.index,
        title: outcome.title,
        kind: outcome.failure_kind ?? CrawlErrorKind.FetchFailure,
        reason: outcome.failure_reason ?? 'Unknown error',
    };
    if (outcome.source_url) {
        record.url = outcome.source_url;
    }
    return record;
}

// ─── Text report ─────────────────────────────────────────

function pad2(n: number): string {
    return String(n).padStart(2, '0');
}

/**
 * Local time as "YYYY-MM-DD HH:MM:SS".
 */
export function formatTimestamp(date: Date): string {
    return (
        `${date.getFullYear()}-${pad2(date.getMonth() + 1)}-${pad2(date.getDate())} ` +
        `${pad2(date.getHours())}:${pad2(date.getMinutes())}:${pad2(date.getSeconds())}`
    );
}

/**
 * Human-readable run summary.
 */
export function formatReport(totalFound: number, failures: readonly FailureRecord[], now: Date): string {
    const lines = [
        `Download Report - ${formatTimestamp(now)}`,
        '='.repeat(RULE_WIDTH),
        '',
        `Total papers found: ${totalFound}`,
        `Successfully downloaded: ${totalFound - failures.length}`,
        `Failed downloads: ${failures.length}`,
        '',
    ];

    if (failures.length > 0) {
        lines.push('Failed Downloads:', '-'.repeat(RULE_WIDTH));
        for (const fail of failures) {
            lines.push('', `[${fail.index}] ${fail.title}`, `    Reason: ${fail.reason}`);
            if (fail.url) {
                lines.push(`    URL: ${fail.url}`);
            }
        }
    }

    return `${lines.join('\n')}\n`;
}

// ─── Writing ─────────────────────────────────────────────

/**
 * Write the aggregate outputs of a run. Errors propagate: a run without its
 * reports is a failed run.
 */
export function writeReports(
    outDir: string,
    candidates: readonly CandidateRecord[],
    failures: readonly FailureRecord[],
    now: Date = new Date()
): void {
    const logger = getLogger('report');

    const papersFile = join(outDir, ALL_PAPERS_FILE);
    writeFileSync(papersFile, JSON.stringify(candidates, null, 2), 'utf-8');
    logger.info({ path: papersFile }, 'Saved complete paper list');

    if (failures.length > 0) {
        const failedFile = join(outDir, FAILED_DOWNLOADS_FILE);
        writeFileSync(failedFile, JSON.stringify(failures, null, 2), 'utf-8');
        logger.info({ path: failedFile }, 'Saved failed downloads list');
    }

    const reportFile = join(outDir, REPORT_FILE);
    writeFileSync(reportFile, formatReport(candidates.length, failures, now), 'utf-8');
    logger.info({ path: reportFile }, 'Saved download report');
}

// ─── Reading back ────────────────────────────────────────

const failureListSchema = z.array(
    z.object({
        index: z.number(),
        title: z.string(),
        kind: z.nativeEnum(CrawlErrorKind),
        reason: z.string(),
        url: z.string().optional(),
    })
);

export interface RunStats {
    papers: number;
    failures: number;
    failuresByKind: Partial<Record<CrawlErrorKind, number>>;
    pdfs: number;
}

function readJson(path: string): unknown {
    return JSON.parse(readFileSync(path, 'utf-8'));
}

/**
 * Summarize an existing output directory.
 */
export function readRunStats(outDir: string): RunStats {
    const papersFile = join(outDir, ALL_PAPERS_FILE);
    if (!existsSync(papersFile)) {
        throw new Error(`No ${ALL_PAPERS_FILE} in ${outDir}`);
    }

    const papers = readJson(papersFile);
    if (!Array.isArray(papers)) {
        throw new Error(`${papersFile} does not contain a list`);
    }

    const failedFile = join(outDir, FAILED_DOWNLOADS_FILE);
    const failures = existsSync(failedFile) ? failureListSchema.parse(readJson(failedFile)) : [];

    const failuresByKind: Partial<Record<CrawlErrorKind, number>> = {};
    for (const failure of failures) {
        failuresByKind[failure.kind] = (failuresByKind[failure.kind] ?? 0) + 1;
    }

    const pdfs = readdirSync(outDir).filter((name) => /^\d{3}_.*\.pdf$/.test(name)).length;

    return { papers: papers.length, failures: failures.length, failuresByKind, pdfs };
}
