import { Command, InvalidArgumentError } from 'commander';
import { resolveConfig, type CliFlags } from '../utils/config.js';
import { initLogger, getLogger } from '../utils/logger.js';
import { getHttpClient } from '../utils/http-client.js';
import { runCrawl } from '../builder/crawler.js';
import { readRunStats } from '../exporters/report.js';
import type { LogLevel } from '../types/index.js';

const VERSION = '1.0.0';

const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug', 'silent'];

function parseYear(value: string): number {
    const year = Number(value);
    if (!Number.isInteger(year) || year < 1900) {
        throw new InvalidArgumentError('Year must be a four-digit number.');
    }
    return year;
}

function parseLogLevel(value: string): LogLevel {
    const level = LOG_LEVELS.find((l) => l === value);
    if (!level) {
        throw new InvalidArgumentError(`Valid levels: ${LOG_LEVELS.join(', ')}`);
    }
    return level;
}

interface CrawlOptions {
    keyword?: string;
    venue?: string;
    year?: number;
    out?: string;
    email?: string;
    logLevel?: LogLevel;
    jsonLogs?: boolean;
}

const program = new Command();

program
    .name('paperfetch')
    .description('Find conference papers by keyword and download open-access PDFs.')
    .version(VERSION);

// ─── CRAWL command ────────────────────────────────────────

program
    .command('crawl')
    .description('Search DBLP, resolve PDFs via arXiv, and download them')
    .option('-k, --keyword <keyword>', 'Keyword that must appear in the title (default: "knowledge graph")')
    .option('--venue <venue>', 'Venue name to match (default: AAAI)')
    .option('-y, --year <year>', 'Target year; the year before is searched too (default: 2025)', parseYear)
    .option('-o, --out <dir>', 'Output directory (default: ./papers)')
    .option('--email <address>', 'Contact address sent in the User-Agent')
    .option('--log-level <level>', 'Log level: debug | info | warn | error | silent', parseLogLevel)
    .option('--json-logs', 'Output JSON logs')
    .action(async (opts: CrawlOptions) => {
        const cliConfig: CliFlags = {
            keyword: opts.keyword,
            venue: opts.venue,
            year: opts.year,
            out: opts.out,
            email: opts.email,
            logLevel: opts.logLevel,
            jsonLogs: opts.jsonLogs,
        };

        const config = await resolveConfig(cliConfig);
        initLogger({ level: config.logLevel, jsonLogs: config.jsonLogs });
        getHttpClient({ version: VERSION, email: config.email });

        const logger = getLogger();

        try {
            const summary = await runCrawl(config);
            logger.info(
                { found: summary.candidates.length, succeeded: summary.succeeded, failed: summary.failed },
                'Crawl finished'
            );
        } catch (error) {
            logger.error({ error }, 'Crawl failed');
            process.exit(1);
        }
    });

// ─── INSPECT command ──────────────────────────────────────

program
    .command('inspect')
    .description('Show statistics for an output directory')
    .requiredOption('-i, --input <dir>', 'Output directory of a previous crawl')
    .action((opts: { input: string }) => {
        try {
            const stats = readRunStats(opts.input);

            console.log('\n📄 paperfetch Output Statistics\n');
            console.log(`  Papers found:  ${stats.papers}`);
            console.log(`  PDFs on disk:  ${stats.pdfs}`);
            console.log(`  Failures:      ${stats.failures}`);

            const kinds = Object.entries(stats.failuresByKind);
            if (kinds.length > 0) {
                console.log('\n  Failure Kinds:');
                for (const [kind, count] of kinds) {
                    console.log(`    ${kind}: ${count}`);
                }
            }

            console.log('');
        } catch (error) {
            console.error('Inspect failed:', error);
            process.exit(1);
        }
    });

await program.parseAsync();
