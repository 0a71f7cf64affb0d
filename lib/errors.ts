import type { AuthChallenge } from './types/index.js';

export type RegistryErrorCode =
    | 'VALIDATION'
    | 'UNAUTHORIZED'
    | 'NOT_FOUND'
    | 'RATE_LIMITED'
    | 'TRANSPORT'
    | 'PROTOCOL'
    | 'CACHE'
    | 'CANCELLED';

export interface RegistryErrorOptions {
    statusCode?: number;
    detail?: unknown;
    cause?: unknown;
}

/**
 * Base class for every error raised by the engine.
 *
 * `code` identifies the category, `statusCode` is set when the error came from
 * an HTTP response and `detail` carries the registry's own error detail.
 */
export class RegistryError extends Error {
    public readonly code: RegistryErrorCode;
    public readonly statusCode?: number;
    public readonly detail?: unknown;

    constructor(
        message: string,
        code: RegistryErrorCode,
        options: RegistryErrorOptions = {},
    ) {
        super(message, { cause: options.cause });
        this.name = 'RegistryError';
        this.code = code;
        this.statusCode = options.statusCode;
        this.detail = options.detail;
    }
}

// Malformed digest, reference or settings. Never reaches the network.
export class ValidationError extends RegistryError {
    constructor(message: string, options?: RegistryErrorOptions) {
        super(message, 'VALIDATION', options);
        this.name = 'ValidationError';
    }
}

// 401 and 403 responses. The caller re-resolves credentials rather than retrying.
export class UnauthorizedError extends RegistryError {
    public readonly challenge?: AuthChallenge;

    constructor(
        message: string,
        options: RegistryErrorOptions & { challenge?: AuthChallenge } = {},
    ) {
        super(message, 'UNAUTHORIZED', options);
        this.name = 'UnauthorizedError';
        this.challenge = options.challenge;
    }
}

export class NotFoundError extends RegistryError {
    constructor(message: string, options?: RegistryErrorOptions) {
        super(message, 'NOT_FOUND', options);
        this.name = 'NotFoundError';
    }
}

// 429 responses. retryAfterMs is the server's hint, when it sent one.
export class RateLimitedError extends RegistryError {
    public readonly retryAfterMs?: number;

    constructor(
        message: string,
        options: RegistryErrorOptions & { retryAfterMs?: number } = {},
    ) {
        super(message, 'RATE_LIMITED', options);
        this.name = 'RateLimitedError';
        this.retryAfterMs = options.retryAfterMs;
    }
}

// Timeouts, DNS failures, resets and 5xx responses.
export class TransportError extends RegistryError {
    constructor(message: string, options?: RegistryErrorOptions) {
        super(message, 'TRANSPORT', options);
        this.name = 'TransportError';
    }
}

// The registry answered, but not with something the distribution API allows.
export class ProtocolError extends RegistryError {
    constructor(message: string, options?: RegistryErrorOptions) {
        super(message, 'PROTOCOL', options);
        this.name = 'ProtocolError';
    }
}

export type CacheErrorKind = 'io' | 'corrupt' | 'integrity';

/**
 * Cache Store failure.
 *
 * `io` and `corrupt` are treated as cache misses by the fetchers.
 * `integrity` means a payload did not hash to its claimed digest and is
 * always surfaced.
 */
export class CacheError extends RegistryError {
    public readonly kind: CacheErrorKind;
    public readonly key: string;

    constructor(
        message: string,
        kind: CacheErrorKind,
        key: string,
        options?: RegistryErrorOptions,
    ) {
        super(message, 'CACHE', options);
        this.name = 'CacheError';
        this.kind = kind;
        this.key = key;
    }
}

export class CancelledError extends RegistryError {
    constructor(message: string = 'Operation cancelled', options?: RegistryErrorOptions) {
        super(message, 'CANCELLED', options);
        this.name = 'CancelledError';
    }
}
