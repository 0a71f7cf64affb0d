import type { Dispatcher } from 'undici';
import { z } from 'zod';
import { DEFAULT_MEMORY_CAPACITY, DEFAULT_STALENESS, type Staleness } from './cache.js';
import { ValidationError } from './errors.js';
import { silentLogger, type Logger } from './logger.js';
import { normalizeRegistryUrl } from './util.js';
import type { Credential } from './types/index.js';

export const DEFAULT_CONCURRENCY = 8;
export const DEFAULT_TIMEOUT_MS = 30_000;
export const DEFAULT_USER_AGENT = 'registry-scout/0.1.0';

export interface RetryConfig {
    // Attempts per call, the first one included
    readonly maxAttempts: number;
    readonly initialDelayMs: number;
    readonly maxDelayMs: number;
    readonly multiplier: number;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
    maxAttempts: 3,
    initialDelayMs: 1000,
    maxDelayMs: 60_000,
    multiplier: 2,
};

/**
 * Resolved fetcher settings. Every field has its final value.
 */
export interface FetcherSettings {
    readonly registryUrl: string;
    readonly cacheDir: string;
    readonly credential?: Credential;
    readonly concurrency: number;
    readonly staleness: Staleness;
    // Cache entries held in memory; 0 disables the memory tier
    readonly memoryCapacity: number;
    readonly timeoutMs: number;
    readonly retry: RetryConfig;
    // Page size sent as `n` on listing requests; the registry picks when unset
    readonly pageSize?: number;
    readonly userAgent: string;
    // Map single-segment Docker Hub names to library/<name>
    readonly dockerhubCompat: boolean;
    readonly logger: Logger;
    readonly dispatcher?: Dispatcher;
}

/**
 * Optional fetcher settings, merged over the defaults
 */
export interface FetcherOptions {
    staleness?: Partial<Staleness>;
    memoryCapacity?: number;
    timeoutMs?: number;
    retry?: Partial<RetryConfig>;
    pageSize?: number;
    userAgent?: string;
    dockerhubCompat?: boolean;
    logger?: Logger;
    dispatcher?: Dispatcher;
}

export interface FetcherSettingsInput extends FetcherOptions {
    registryUrl: string;
    cacheDir: string;
    credential?: Credential;
    concurrency?: number;
}

const credentialSchema = z.discriminatedUnion('type', [
    z.object({
        type: z.literal('basic'),
        username: z.string().min(1),
        password: z.string(),
    }),
    z.object({ type: z.literal('bearer'), token: z.string().min(1) }),
]);

const settingsSchema = z.object({
    registryUrl: z.string().url(),
    cacheDir: z.string().min(1),
    credential: credentialSchema.optional(),
    concurrency: z.number().int().positive(),
    staleness: z.object({
        catalog: z.number().nonnegative(),
        tags: z.number().nonnegative(),
        reference: z.number().nonnegative(),
    }),
    memoryCapacity: z.number().int().nonnegative(),
    timeoutMs: z.number().int().positive(),
    retry: z.object({
        maxAttempts: z.number().int().positive().max(10),
        initialDelayMs: z.number().nonnegative(),
        maxDelayMs: z.number().nonnegative(),
        multiplier: z.number().min(1),
    }),
    pageSize: z.number().int().positive().optional(),
    userAgent: z.string().min(1),
    dockerhubCompat: z.boolean(),
});

/**
 * Merge settings over the defaults and validate them
 *
 * @throws ValidationError listing every invalid field
 */
export function createFetcherSettings(
    input: FetcherSettingsInput,
): FetcherSettings {
    const candidate = {
        registryUrl: normalizeRegistryUrl(input.registryUrl),
        cacheDir: input.cacheDir,
        credential: input.credential,
        concurrency: input.concurrency ?? DEFAULT_CONCURRENCY,
        staleness: { ...DEFAULT_STALENESS, ...input.staleness },
        memoryCapacity: input.memoryCapacity ?? DEFAULT_MEMORY_CAPACITY,
        timeoutMs: input.timeoutMs ?? DEFAULT_TIMEOUT_MS,
        retry: { ...DEFAULT_RETRY_CONFIG, ...input.retry },
        pageSize: input.pageSize,
        userAgent: input.userAgent ?? DEFAULT_USER_AGENT,
        dockerhubCompat: input.dockerhubCompat ?? false,
    };

    const result = settingsSchema.safeParse(candidate);
    if (!result.success) {
        const issues = result.error.issues.map(
            (issue) => `${issue.path.join('.')}: ${issue.message}`,
        );
        throw new ValidationError(
            `Invalid fetcher settings: ${issues.join('; ')}`,
            { detail: result.error.issues },
        );
    }

    return {
        ...result.data,
        logger: input.logger ?? silentLogger,
        dispatcher: input.dispatcher,
    };
}
