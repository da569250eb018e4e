import pino from 'pino';
import type { LogLevel } from '../types/index.js';

/**
 * Pipeline stages that log under their own name.
 */
export type LogComponent = 'config' | 'http' | 'dblp' | 'arxiv' | 'policy' | 'download' | 'report' | 'crawl';

/**
 * Logger singleton. Configured once at startup via `initLogger()`.
 * Records carry a `component` binding when taken from `getLogger(component)`.
 */
let loggerInstance: pino.Logger | null = null;
const children = new Map<LogComponent, pino.Logger>();

/**
 * Initialize the logger with the specified options.
 * Should be called once at CLI startup, before any client is constructed.
 */
export function initLogger(options: {
    level?: LogLevel;
    jsonLogs?: boolean;
}): pino.Logger {
    const { level = 'info', jsonLogs = false } = options;
    children.clear();

    // No transport worker when nothing will be printed
    if (jsonLogs || level === 'silent') {
        loggerInstance = pino({ level });
    } else {
        loggerInstance = pino({
            level,
            transport: {
                target: 'pino-pretty',
                options: {
                    colorize: true,
                    translateTime: 'HH:MM:ss',
                    ignore: 'pid,hostname,component',
                    messageFormat: '{if component}[{component}] {end}{msg}',
                },
            },
        });
    }

    return loggerInstance;
}

/**
 * Get the logger, or a child bound to a pipeline stage.
 * If not initialized, creates a default info-level logger.
 */
export function getLogger(component?: LogComponent): pino.Logger {
    const root = loggerInstance ?? initLogger({ level: 'info' });
    if (!component) return root;

    let child = children.get(component);
    if (!child) {
        child = root.child({ component });
        children.set(component, child);
    }
    return child;
}
