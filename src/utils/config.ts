import { cosmiconfig } from 'cosmiconfig';
import { z } from 'zod';
import { DEFAULT_CONFIG, type CrawlerConfig } from '../types/index.js';
import { getLogger } from './logger.js';

const fileConfigSchema = z
    .object({
        keyword: z.string().min(1),
        venue: z.string().min(1),
        year: z.number().int().min(1900),
        out: z.string().min(1),
        maxHits: z.number().int().positive(),
        maxResolverResults: z.number().int().positive(),
        politeness: z
            .object({
                queryDelayMs: z.number().int().nonnegative(),
                downloadDelayMs: z.number().int().nonnegative(),
            })
            .partial(),
        timeouts: z
            .object({
                searchMs: z.number().int().positive(),
                resolverMs: z.number().int().positive(),
                downloadMs: z.number().int().positive(),
            })
            .partial(),
        sources: z
            .object({
                directPdfPatterns: z.array(z.string()),
                paywalledPatterns: z.array(z.string()),
            })
            .partial(),
        email: z.string().email(),
        logLevel: z.enum(['error', 'warn', 'info', 'debug', 'silent']),
        jsonLogs: z.boolean(),
    })
    .partial()
    .strict();

export type FileConfig = z.infer<typeof fileConfigSchema>;

/**
 * Flags accepted from the command line. Nested sections are not exposed as flags.
 */
export type CliFlags = Partial<Omit<CrawlerConfig, 'politeness' | 'timeouts' | 'sources'>>;

/**
 * Validate a parsed config file. Invalid files are reported and ignored.
 */
export function parseFileConfig(raw: unknown, filepath = 'paperfetch.config.json'): FileConfig | null {
    const result = fileConfigSchema.safeParse(raw);
    if (!result.success) {
        getLogger('config').warn(
            { path: filepath, issues: result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`) },
            'Invalid config file, using defaults'
        );
        return null;
    }
    return result.data;
}

/**
 * Load configuration from paperfetch.config.json using cosmiconfig.
 * Returns null if no config file is found (which is fine — defaults are used).
 */
async function loadConfigFile(searchFrom?: string): Promise<FileConfig | null> {
    const explorer = cosmiconfig('paperfetch', {
        searchPlaces: ['paperfetch.config.json'],
    });

    try {
        const result = await explorer.search(searchFrom);
        if (result && !result.isEmpty) {
            getLogger('config').debug({ path: result.filepath }, 'Loaded config file');
            return parseFileConfig(result.config, result.filepath);
        }
    } catch (error) {
        getLogger('config').warn({ error }, 'Failed to load config file, using defaults');
    }

    return null;
}

/**
 * Read relevant environment variables.
 */
function loadEnvVars(): CliFlags {
    const env: CliFlags = {};

    const email = process.env['PAPERFETCH_EMAIL'];
    if (email) {
        env.email = email;
    }

    return env;
}

/**
 * Drop keys whose value is undefined so they cannot mask lower-precedence sources.
 */
function definedOnly<T extends object>(input: T): Partial<T> {
    const out: Partial<T> = {};
    for (const key in input) {
        if (input[key] !== undefined) {
            out[key] = input[key];
        }
    }
    return out;
}

/**
 * Merge configuration from multiple sources.
 * Precedence: CLI flags > environment variables > config file > defaults
 */
export async function resolveConfig(
    cliFlags: CliFlags,
    options: { searchFrom?: string } = {}
): Promise<CrawlerConfig> {
    const fileConfig = await loadConfigFile(options.searchFrom);
    const envConfig = loadEnvVars();

    return mergeConfig(fileConfig, envConfig, cliFlags);
}

/**
 * Pure merge step of `resolveConfig`.
 */
export function mergeConfig(
    fileConfig: FileConfig | null,
    envConfig: CliFlags,
    cliFlags: CliFlags
): CrawlerConfig {
    return {
        ...DEFAULT_CONFIG,
        ...definedOnly(fileConfig ?? {}),
        ...definedOnly(envConfig),
        ...definedOnly(cliFlags),
        // Deep merge nested objects
        politeness: {
            ...DEFAULT_CONFIG.politeness,
            ...definedOnly(fileConfig?.politeness ?? {}),
        },
        timeouts: {
            ...DEFAULT_CONFIG.timeouts,
            ...definedOnly(fileConfig?.timeouts ?? {}),
        },
        sources: {
            ...DEFAULT_CONFIG.sources,
            ...definedOnly(fileConfig?.sources ?? {}),
        },
    };
}
