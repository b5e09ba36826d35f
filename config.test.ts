import { describe, it, expect } from 'vitest';
import { loadConfig } from './config';
import { ConfigError } from './errors';

describe('loadConfig', () => {
    it('falls back to the defaults', () => {
        expect(loadConfig({})).toEqual({
            bufferSize: 128,
            parallelism: 4,
            logLevel: 'info',
            verifyTimeoutMs: 5000,
        });
    });

    it('reads the environment', () => {
        const config = loadConfig({
            REACTOR_BUFFER_SIZE: '32',
            REACTOR_PARALLELISM: '2',
            REACTOR_LOG_LEVEL: 'debug',
            REACTOR_VERIFY_TIMEOUT_MS: '250',
        });
        expect(config).toEqual({ bufferSize: 32, parallelism: 2, logLevel: 'debug', verifyTimeoutMs: 250 });
    });

    it('treats blank values as unset', () => {
        expect(loadConfig({ REACTOR_BUFFER_SIZE: ' ', REACTOR_LOG_LEVEL: '' }).bufferSize).toBe(128);
    });

    it('rejects a buffer size that is not a power of two', () => {
        expect(() => loadConfig({ REACTOR_BUFFER_SIZE: '100' })).toThrow(ConfigError);
    });

    it('lists every invalid setting', () => {
        let issues: string[] = [];
        try {
            loadConfig({ REACTOR_PARALLELISM: '0', REACTOR_LOG_LEVEL: 'loud' });
        } catch (ex) {
            if (ex instanceof ConfigError) {
                issues = ex.issues;
            }
        }
        expect(issues.map(i => i.split(':')[0])).toEqual(['parallelism', 'logLevel']);
    });
});
