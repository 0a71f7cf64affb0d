import type { RetryConfig } from './config.js';
import { CancelledError, RateLimitedError } from './errors.js';
import { silentLogger, type Logger } from './logger.js';
import { sleep as defaultSleep } from './util.js';

export interface RetryOptions {
    logger?: Logger;
    // Included in retry log records
    operation?: string;
    // No retry is started once this signal has fired
    signal?: AbortSignal;
    sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

/**
 * Delay before the retry that follows failed attempt `attempt` (1-based)
 *
 * Exponential from `initialDelayMs` and raised to the server's Retry-After
 * hint when that is longer. `maxDelayMs` caps the result, Retry-After included.
 */
export function backoffDelay(
    attempt: number,
    config: RetryConfig,
    retryAfterMs?: number,
): number {
    const exponential =
        config.initialDelayMs * Math.pow(config.multiplier, attempt - 1);
    return Math.min(config.maxDelayMs, Math.max(exponential, retryAfterMs ?? 0));
}

/**
 * Run `operation`, retrying it while it fails with RateLimitedError
 *
 * Gives up after `config.maxAttempts` attempts and rethrows the last error.
 * Any other error is rethrown at once. When `options.signal` aborts, the
 * pending backoff ends early and CancelledError is thrown instead of retrying.
 */
export async function withRetry<T>(
    operation: () => Promise<T>,
    config: RetryConfig,
    options: RetryOptions = {},
): Promise<T> {
    const logger = options.logger ?? silentLogger;
    const sleep = options.sleep ?? defaultSleep;

    for (let attempt = 1; ; attempt++) {
        try {
            return await operation();
        } catch (error) {
            if (!(error instanceof RateLimitedError) || attempt >= config.maxAttempts) {
                throw error;
            }
            const delay = backoffDelay(attempt, config, error.retryAfterMs);
            logger.warn('Rate limited, retrying', {
                operation: options.operation,
                attempt,
                delayMs: delay,
            });
            await sleep(delay, options.signal);
            if (options.signal?.aborted) {
                throw new CancelledError(undefined, { cause: error });
            }
        }
    }
}
