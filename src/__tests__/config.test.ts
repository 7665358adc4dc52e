import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { describe, it, expect, vi, afterEach } from 'vitest';
import { loadEnvVars, mergeConfig, resolveConfig, toOverrides } from '../utils/config.js';
import { parseLogLevel } from '../utils/logger.js';
import { DEFAULT_CONFIG } from '../types/index.js';

describe('Config', () => {
    afterEach(() => {
        vi.unstubAllEnvs();
    });

    describe('mergeConfig', () => {
        it('should return the defaults without layers', () => {
            expect(mergeConfig()).toEqual(DEFAULT_CONFIG);
        });

        it('should let later layers win and merge nested objects by key', () => {
            const config = mergeConfig(
                { timeouts: { download: 1000 }, email: 'file@example.com' },
                { email: 'env@example.com' },
                { logLevel: 'debug', endpoints: { osfApi: 'http://localhost:8000/v2' } }
            );

            expect(config.email).toBe('env@example.com');
            expect(config.logLevel).toBe('debug');
            expect(config.timeouts).toEqual({ existenceCheck: 10000, request: 30000, download: 1000 });
            expect(config.endpoints).toEqual({ ...DEFAULT_CONFIG.endpoints, osfApi: 'http://localhost:8000/v2' });
        });
    });

    describe('loadEnvVars', () => {
        it('should read the contact email and log level', () => {
            expect(loadEnvVars({ PREPRINT_BRIDGE_EMAIL: 'env@example.com', LOG_LEVEL: 'WARN' }))
                .toEqual({ email: 'env@example.com', logLevel: 'warn' });
        });

        it('should ignore unknown log levels', () => {
            expect(loadEnvVars({ LOG_LEVEL: 'loud' })).toEqual({});
        });
    });

    describe('toOverrides', () => {
        it('should keep only recognized, well-typed keys', () => {
            expect(toOverrides({
                logLevel: 'debug',
                jsonLogs: 'yes',
                endpoints: { osfApi: 'http://localhost:9/v2', bogus: 'x' },
                timeouts: { request: -5, download: 500 },
                extra: true,
            })).toEqual({
                logLevel: 'debug',
                endpoints: { osfApi: 'http://localhost:9/v2' },
                timeouts: { download: 500 },
            });
        });

        it('should ignore non-object files', () => {
            expect(toOverrides(['not', 'an', 'object'])).toEqual({});
            expect(toOverrides(null)).toEqual({});
        });
    });

    describe('resolveConfig', () => {
        it('should layer CLI flags over env over the config file', async () => {
            const dir = await mkdtemp(join(tmpdir(), 'config-'));
            await writeFile(
                join(dir, 'preprint-bridge.config.json'),
                JSON.stringify({ email: 'file@example.com', jsonLogs: true, timeouts: { request: 1234 } })
            );
            vi.stubEnv('PREPRINT_BRIDGE_EMAIL', 'env@example.com');
            vi.stubEnv('LOG_LEVEL', 'error');

            try {
                const config = await resolveConfig({ logLevel: 'debug' }, { searchFrom: dir });

                expect(config.email).toBe('env@example.com');
                expect(config.logLevel).toBe('debug');
                expect(config.jsonLogs).toBe(true);
                expect(config.timeouts.request).toBe(1234);
            } finally {
                await rm(dir, { recursive: true, force: true });
            }
        });
    });

    describe('parseLogLevel', () => {
        it('should accept known levels case-insensitively', () => {
            expect(parseLogLevel('Debug')).toBe('debug');
            expect(parseLogLevel('silent')).toBe('silent');
            expect(parseLogLevel(undefined)).toBeUndefined();
        });
    });
});
