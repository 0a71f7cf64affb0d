export { Digest, DigestAlgorithms, type DigestAlgorithm } from './digest.js';
export {
    DEFAULT_REGISTRY,
    Reference,
    isDockerHub,
    sameRegistry,
    type ParseReferenceOptions,
    type ReferenceParts,
} from './reference.js';
export {
    CacheStore,
    DEFAULT_MEMORY_CAPACITY,
    DEFAULT_STALENESS,
    contentKey,
    listingKey,
    type CacheEntry,
    type CacheEntryInput,
    type CacheKind,
    type CacheStats,
    type CacheStoreOptions,
    type ContentKind,
    type ListingKind,
    type PruneStats,
    type Staleness,
} from './cache.js';
export {
    MediaTypes,
    RegistryClient,
    buildAuthorization,
    extractNextLink,
    parseAuthChallenge,
    type ManifestResponse,
    type RegistryClientOptions,
    type VersionInfo,
} from './registry.js';
export {
    formatPlatform,
    matchesPlatform,
    parsePlatform,
    type PlatformSelector,
} from './platform.js';
export { Semaphore, runOrdered, type RunOptions, type TaskOutcome } from './pool.js';
export { backoffDelay, withRetry, type RetryOptions } from './retry.js';
export {
    MetadataFetcher,
    isRecoverable,
    type FetchOptions,
    type ProgressCallback,
} from './fetcher.js';
export { fuzzySearch, searchImages, searchRepositories, searchTags } from './search.js';
export { TagMetadataFetcher } from './tag-fetcher.js';
export {
    RepositoryMetadataFetcher,
    type FetchRepositoriesOptions,
} from './repository-fetcher.js';
export {
    CacheError,
    CancelledError,
    NotFoundError,
    ProtocolError,
    RateLimitedError,
    RegistryError,
    TransportError,
    UnauthorizedError,
    ValidationError,
    type CacheErrorKind,
    type RegistryErrorCode,
    type RegistryErrorOptions,
} from './errors.js';
export {
    DEFAULT_CONCURRENCY,
    DEFAULT_RETRY_CONFIG,
    DEFAULT_TIMEOUT_MS,
    DEFAULT_USER_AGENT,
    createFetcherSettings,
    type FetcherOptions,
    type FetcherSettings,
    type FetcherSettingsInput,
    type RetryConfig,
} from './config.js';
export {
    ConsoleLogger,
    silentLogger,
    type LogContext,
    type LogLevel,
    type Logger,
} from './logger.js';
export type * from './types/index.js';
