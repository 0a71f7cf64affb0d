import { assert, describe, test } from 'vitest';
import { ValidationError } from '../lib/errors.js';
import {
    getErrorMessage,
    isFileNotFoundError,
    normalizeRegistryUrl,
    parseRetryAfter,
    sleep,
    toError,
} from '../lib/util.js';

describe('utils', () => {
    describe('getErrorMessage', () => {
        test('should return undefined for null', () => {
            assert.strictEqual(getErrorMessage(null), undefined);
        });

        test('should return undefined for empty string', () => {
            assert.strictEqual(getErrorMessage(''), undefined);
        });

        test('should return string when input is a string', () => {
            assert.strictEqual(getErrorMessage('error message'), 'error message');
        });

        test('should return Error message property', () => {
            assert.strictEqual(getErrorMessage(new TypeError('fetch failed')), 'fetch failed');
        });

        test('should extract message from object with message property', () => {
            assert.strictEqual(getErrorMessage({ message: 'nested error message' }), 'nested error message');
        });

        test('should ignore a non-string message property', () => {
            assert.strictEqual(getErrorMessage({ message: { message: 'deep' } }), undefined);
        });
    });

    describe('toError', () => {
        test('should return Error instances unchanged', () => {
            const error = new Error('boom');
            assert.strictEqual(toError(error), error);
        });

        test('should wrap other values', () => {
            assert.equal(toError('boom').message, 'boom');
            assert.equal(toError(42).message, '42');
        });
    });

    describe('isFileNotFoundError', () => {
        test('should recognise ENOENT', () => {
            assert.isTrue(isFileNotFoundError({ code: 'ENOENT' }));
            assert.isFalse(isFileNotFoundError({ code: 'EACCES' }));
            assert.isFalse(isFileNotFoundError(null));
        });
    });

    describe('parseRetryAfter', () => {
        test('should read delta-seconds', () => {
            assert.equal(parseRetryAfter('120'), 120_000);
            assert.equal(parseRetryAfter(' 0 '), 0);
        });

        test('should read an HTTP date relative to now', () => {
            const now = Date.parse('Wed, 21 Oct 2025 07:28:00 GMT');
            assert.equal(parseRetryAfter('Wed, 21 Oct 2025 07:28:30 GMT', now), 30_000);
        });

        test('should clamp past dates to zero', () => {
            const now = Date.parse('Wed, 21 Oct 2025 07:28:00 GMT');
            assert.equal(parseRetryAfter('Wed, 21 Oct 2025 07:00:00 GMT', now), 0);
        });

        test('should return undefined when missing or unparseable', () => {
            assert.isUndefined(parseRetryAfter(null));
            assert.isUndefined(parseRetryAfter(''));
            assert.isUndefined(parseRetryAfter('soon'));
        });
    });

    describe('normalizeRegistryUrl', () => {
        test('should add http:// when no scheme is given', () => {
            assert.equal(normalizeRegistryUrl('localhost:5000'), 'http://localhost:5000');
        });

        test('should keep https and strip trailing slashes', () => {
            assert.equal(normalizeRegistryUrl('https://registry.test//'), 'https://registry.test');
        });

        test('should reject an empty URL', () => {
            assert.throws(() => normalizeRegistryUrl('  '), ValidationError);
        });
    });

    describe('sleep', () => {
        test('should resolve early when the signal aborts', async () => {
            const controller = new AbortController();
            const started = Date.now();
            const pending = sleep(60_000, controller.signal);
            controller.abort();
            await pending;
            assert.isBelow(Date.now() - started, 1000);
        });

        test('should resolve at once for an aborted signal', async () => {
            await sleep(60_000, AbortSignal.abort());
        });
    });
});
