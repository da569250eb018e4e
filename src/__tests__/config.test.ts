import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { mergeConfig, parseFileConfig, resolveConfig } from '../utils/config.js';
import { DEFAULT_CONFIG } from '../types/index.js';

describe('Config', () => {
    describe('DEFAULT_CONFIG', () => {
        it('should search knowledge graph papers at AAAI 2025', () => {
            expect(DEFAULT_CONFIG.keyword).toBe('knowledge graph');
            expect(DEFAULT_CONFIG.venue).toBe('AAAI');
            expect(DEFAULT_CONFIG.year).toBe(2025);
        });

        it('should inspect five open-access results per query', () => {
            expect(DEFAULT_CONFIG.maxResolverResults).toBe(5);
        });

        it('should bound every external call', () => {
            expect(Object.values(DEFAULT_CONFIG.timeouts).every((ms) => ms > 0)).toBe(true);
        });
    });

    describe('mergeConfig', () => {
        it('should apply precedence CLI > env > file > defaults', () => {
            const merged = mergeConfig(
                { venue: 'IJCAI', year: 2023, email: 'file@example.org' },
                { email: 'env@example.org' },
                { year: 2024 }
            );

            expect(merged.keyword).toBe('knowledge graph');
            expect(merged.venue).toBe('IJCAI');
            expect(merged.year).toBe(2024);
            expect(merged.email).toBe('env@example.org');
        });

        it('should ignore undefined CLI flags', () => {
            const merged = mergeConfig({ out: 'from-file' }, {}, { out: undefined, keyword: undefined });

            expect(merged.out).toBe('from-file');
            expect(merged.keyword).toBe('knowledge graph');
        });

        it('should deep merge nested sections', () => {
            const merged = mergeConfig({ politeness: { queryDelayMs: 1000 } }, {}, {});

            expect(merged.politeness).toEqual({ queryDelayMs: 1000, downloadDelayMs: 2000 });
            expect(merged.sources).toEqual(DEFAULT_CONFIG.sources);
        });
    });

    describe('parseFileConfig', () => {
        it('should accept a valid partial config', () => {
            expect(parseFileConfig({ venue: 'ACL', timeouts: { downloadMs: 60000 } })).toEqual({
                venue: 'ACL',
                timeouts: { downloadMs: 60000 },
            });
        });

        it('should reject unknown keys and wrong types', () => {
            expect(parseFileConfig({ venu: 'ACL' })).toBeNull();
            expect(parseFileConfig({ year: '2025' })).toBeNull();
        });
    });

    describe('resolveConfig', () => {
        let dir: string;
        const savedEmail = process.env['PAPERFETCH_EMAIL'];

        beforeEach(() => {
            dir = mkdtempSync(join(tmpdir(), 'paperfetch-config-'));
            delete process.env['PAPERFETCH_EMAIL'];
        });

        afterEach(() => {
            rmSync(dir, { recursive: true, force: true });
            if (savedEmail === undefined) {
                delete process.env['PAPERFETCH_EMAIL'];
            } else {
                process.env['PAPERFETCH_EMAIL'] = savedEmail;
            }
        });

        it('should read paperfetch.config.json', async () => {
            writeFileSync(join(dir, 'paperfetch.config.json'), JSON.stringify({ venue: 'KDD', maxHits: 200 }));

            const config = await resolveConfig({ keyword: 'graph' }, { searchFrom: dir });

            expect(config.venue).toBe('KDD');
            expect(config.maxHits).toBe(200);
            expect(config.keyword).toBe('graph');
        });

        it('should pick up the contact email from the environment', async () => {
            process.env['PAPERFETCH_EMAIL'] = 'crawler@example.org';
            writeFileSync(join(dir, 'paperfetch.config.json'), '{}');

            const config = await resolveConfig({}, { searchFrom: dir });

            expect(config.email).toBe('crawler@example.org');
        });
    });
});
