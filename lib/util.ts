import { ValidationError } from './errors.js';

export function isObject(value: unknown): value is object {
    return value !== null && typeof value === 'object';
}

export function isFileNotFoundError(error: unknown): boolean {
    return isObject(error) && 'code' in error && error.code === 'ENOENT';
}

export function getErrorMessage(error: unknown): string | undefined {
    if (!error) {
        return;
    }
    if (typeof error === 'string') {
        return error;
    }
    if (error instanceof Error) {
        return error.message;
    }
    if (
        isObject(error) &&
        'message' in error &&
        typeof error.message === 'string'
    ) {
        return error.message;
    }
    return;
}

export function toError(error: unknown): Error {
    return error instanceof Error
        ? error
        : new Error(getErrorMessage(error) ?? String(error));
}

// Retry-After is either delta-seconds or an HTTP date (RFC 9110 10.2.3).
// Returns milliseconds to wait, or undefined when the header is missing or unparseable.
export function parseRetryAfter(
    value: string | null | undefined,
    now: number = Date.now(),
): number | undefined {
    if (!value) {
        return;
    }
    const trimmed = value.trim();
    if (/^\d+$/.test(trimmed)) {
        return parseInt(trimmed, 10) * 1000;
    }
    const date = Date.parse(trimmed);
    if (Number.isNaN(date)) {
        return;
    }
    return Math.max(0, date - now);
}

// Adds http:// when no scheme is given and strips trailing slashes.
export function normalizeRegistryUrl(url: string): string {
    const trimmed = url.trim();
    if (trimmed === '') {
        throw new ValidationError('Registry URL cannot be empty');
    }
    const withScheme = /^https?:\/\//i.test(trimmed)
        ? trimmed
        : `http://${trimmed}`;
    return withScheme.replace(/\/+$/, '');
}

// Resolves after `ms`, or as soon as `signal` aborts
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve) => {
        if (signal?.aborted) {
            resolve();
            return;
        }
        const onAbort = () => {
            clearTimeout(timer);
            resolve();
        };
        const timer = setTimeout(() => {
            signal?.removeEventListener('abort', onAbort);
            resolve();
        }, ms);
        signal?.addEventListener('abort', onAbort, { once: true });
    });
}
