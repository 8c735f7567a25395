import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { loadEnvVars, resolveConfig, validateFileConfig } from '../utils/config.js';
import { parseLogLevel } from '../utils/logger.js';
import { DEFAULT_CONFIG } from '../types/index.js';

describe('Config', () => {
    describe('DEFAULT_CONFIG', () => {
        it('should have sensible defaults', () => {
            expect(DEFAULT_CONFIG.maxResults).toBe(100);
            expect(DEFAULT_CONFIG.timeout).toBe(30000);
            expect(DEFAULT_CONFIG.maxRetries).toBe(3);
            expect(DEFAULT_CONFIG.toolName).toBe('pubmed-company-papers');
            expect(DEFAULT_CONFIG.logLevel).toBe('info');
            expect(DEFAULT_CONFIG.jsonLogs).toBe(false);
            expect(DEFAULT_CONFIG.email).toBeUndefined();
            expect(DEFAULT_CONFIG.file).toBeUndefined();
        });
    });

    describe('validateFileConfig', () => {
        it('should keep well-typed fields', () => {
            expect(validateFileConfig({
                email: ' test@example.com ',
                maxResults: 250,
                maxRetries: 0,
                logLevel: 'warn',
                jsonLogs: true,
            })).toEqual({
                email: 'test@example.com',
                maxResults: 250,
                maxRetries: 0,
                logLevel: 'warn',
                jsonLogs: true,
            });
        });

        it('should drop mistyped and unknown fields', () => {
            expect(validateFileConfig({
                maxResults: -1,
                timeout: 1.5,
                logLevel: 'loud',
                jsonLogs: 'yes',
                file: '  ',
                database: 'papers.db',
            })).toEqual({});
        });

        it('should ignore a config that is not an object', () => {
            expect(validateFileConfig('maxResults=5')).toEqual({});
            expect(validateFileConfig([1, 2])).toEqual({});
            expect(validateFileConfig(null)).toEqual({});
        });

        it('should fill in missing classifier lists', () => {
            expect(validateFileConfig({ classifier: { academicKeywords: ['Max Planck'] } })).toEqual({
                classifier: { academicKeywords: ['Max Planck'], commercialKeywords: [] },
            });
        });

        it('should reject classifier lists that are not strings', () => {
            expect(validateFileConfig({ classifier: { commercialKeywords: 'Genentech' } })).toEqual({});
            expect(validateFileConfig({ classifier: { academicKeywords: [1] } })).toEqual({});
        });
    });

    describe('loadEnvVars', () => {
        it('should read the contact e-mail and log level', () => {
            expect(loadEnvVars({ NCBI_EMAIL: '  test@example.com ', LOG_LEVEL: 'DEBUG' })).toEqual({
                email: 'test@example.com',
                logLevel: 'debug',
            });
        });

        it('should ignore empty and unknown values', () => {
            expect(loadEnvVars({ NCBI_EMAIL: '   ', LOG_LEVEL: 'verbose' })).toEqual({});
            expect(loadEnvVars({})).toEqual({});
        });
    });

    describe('resolveConfig', () => {
        let dir: string;

        beforeEach(() => {
            dir = mkdtempSync(join(tmpdir(), 'papers-config-'));
        });

        afterEach(() => {
            rmSync(dir, { recursive: true, force: true });
        });

        it('should fall back to defaults with no file, env or flags', async () => {
            await expect(resolveConfig({}, { searchFrom: dir, env: {} })).resolves.toEqual(DEFAULT_CONFIG);
        });

        it('should layer file < env < CLI flags', async () => {
            writeFileSync(join(dir, 'pubmed-fetcher.config.json'), JSON.stringify({
                email: 'file@example.com',
                maxResults: 50,
                toolName: 'lab-tool',
                logLevel: 'warn',
            }));

            const config = await resolveConfig(
                { query: 'CAR-T', maxResults: 20 },
                { searchFrom: dir, env: { NCBI_EMAIL: 'env@example.com' } }
            );

            expect(config).toMatchObject({
                query: 'CAR-T',
                email: 'env@example.com',
                maxResults: 20,
                toolName: 'lab-tool',
                logLevel: 'warn',
                timeout: 30000,
            });
        });

        it('should let a CLI e-mail win over the environment', async () => {
            const config = await resolveConfig(
                { email: 'cli@example.com' },
                { searchFrom: dir, env: { NCBI_EMAIL: 'env@example.com' } }
            );
            expect(config.email).toBe('cli@example.com');
        });

        it('should find the rc file and add its keywords', async () => {
            writeFileSync(join(dir, '.pubmedfetcherrc.json'), JSON.stringify({
                classifier: { commercialKeywords: ['Genentech'] },
            }));

            const config = await resolveConfig({}, { searchFrom: dir, env: {} });

            expect(config.classifier).toEqual({ academicKeywords: [], commercialKeywords: ['Genentech'] });
        });

        it('should use defaults when the file is not valid JSON', async () => {
            writeFileSync(join(dir, 'pubmed-fetcher.config.json'), '{ maxResults: ');

            await expect(resolveConfig({}, { searchFrom: dir, env: {} })).resolves.toEqual(DEFAULT_CONFIG);
        });
    });

    describe('parseLogLevel', () => {
        it('should accept known levels in any case', () => {
            expect(parseLogLevel('INFO')).toBe('info');
            expect(parseLogLevel('silent')).toBe('silent');
        });

        it('should reject unknown or missing levels', () => {
            expect(parseLogLevel('trace')).toBeUndefined();
            expect(parseLogLevel(undefined)).toBeUndefined();
        });
    });
});
