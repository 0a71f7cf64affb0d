import { assert, describe, test } from 'vitest';
import { DEFAULT_STALENESS } from '../lib/cache.js';
import {
    DEFAULT_RETRY_CONFIG,
    DEFAULT_USER_AGENT,
    createFetcherSettings,
} from '../lib/config.js';
import { ValidationError } from '../lib/errors.js';
import { ConsoleLogger, silentLogger } from '../lib/logger.js';

describe('createFetcherSettings', () => {
    test('should fill in defaults', () => {
        const settings = createFetcherSettings({
            registryUrl: 'localhost:5000/',
            cacheDir: '/tmp/cache',
        });

        assert.equal(settings.registryUrl, 'http://localhost:5000');
        assert.equal(settings.concurrency, 8);
        assert.equal(settings.timeoutMs, 30_000);
        assert.deepEqual(settings.staleness, DEFAULT_STALENESS);
        assert.equal(settings.memoryCapacity, 1000);
        assert.deepEqual(settings.retry, DEFAULT_RETRY_CONFIG);
        assert.equal(settings.userAgent, DEFAULT_USER_AGENT);
        assert.isFalse(settings.dockerhubCompat);
        assert.isUndefined(settings.credential);
        assert.isUndefined(settings.pageSize);
        assert.strictEqual(settings.logger, silentLogger);
    });

    test('should merge partial staleness and retry settings', () => {
        const logger = new ConsoleLogger('error');
        const settings = createFetcherSettings({
            registryUrl: 'https://registry.test',
            cacheDir: '/tmp/cache',
            credential: { type: 'bearer', token: 'test-token' },
            staleness: { tags: 5000 },
            retry: { maxAttempts: 5 },
            logger,
        });

        assert.deepEqual(settings.staleness, { ...DEFAULT_STALENESS, tags: 5000 });
        assert.deepEqual(settings.retry, { ...DEFAULT_RETRY_CONFIG, maxAttempts: 5 });
        assert.deepEqual(settings.credential, { type: 'bearer', token: 'test-token' });
        assert.strictEqual(settings.logger, logger);
    });

    test.each([
        ['zero concurrency', { concurrency: 0 }],
        ['fractional concurrency', { concurrency: 1.5 }],
        ['negative timeout', { timeoutMs: -1 }],
        ['negative staleness', { staleness: { catalog: -1 } }],
        ['negative memory capacity', { memoryCapacity: -1 }],
        ['zero retry attempts', { retry: { maxAttempts: 0 } }],
        ['empty bearer token', { credential: { type: 'bearer' as const, token: '' } }],
    ])('should reject %s', (_name, overrides) => {
        assert.throws(
            () =>
                createFetcherSettings({
                    registryUrl: 'https://registry.test',
                    cacheDir: '/tmp/cache',
                    ...overrides,
                }),
            ValidationError,
        );
    });

    test('should accept a memory capacity of zero', () => {
        const settings = createFetcherSettings({
            registryUrl: 'https://registry.test',
            cacheDir: '/tmp/cache',
            memoryCapacity: 0,
        });
        assert.equal(settings.memoryCapacity, 0);
    });

    test('should name the invalid field in the message', () => {
        assert.throws(
            () =>
                createFetcherSettings({
                    registryUrl: 'https://registry.test',
                    cacheDir: '/tmp/cache',
                    concurrency: 0,
                }),
            ValidationError,
            'Invalid fetcher settings: concurrency: Number must be greater than 0',
        );
    });
});
