import { z } from 'zod';
import {
    CacheStore,
    contentKey,
    listingKey,
    type CacheEntry,
    type CacheEntryInput,
} from './cache.js';
import {
    createFetcherSettings,
    DEFAULT_CONCURRENCY,
    type FetcherOptions,
    type FetcherSettings,
} from './config.js';
import { Digest } from './digest.js';
import {
    CacheError,
    CancelledError,
    NotFoundError,
    ProtocolError,
    UnauthorizedError,
    ValidationError,
} from './errors.js';
import type { Logger } from './logger.js';
import {
    formatPlatform,
    matchesPlatform,
    parsePlatform,
    type PlatformSelector,
} from './platform.js';
import { runOrdered, Semaphore, type TaskOutcome } from './pool.js';
import { Reference, sameRegistry } from './reference.js';
import { MediaTypes, RegistryClient, type VersionInfo } from './registry.js';
import { withRetry } from './retry.js';
import { imageConfigSchema, indexSchema, manifestSchema } from './schemas.js';
import type {
    Credential,
    FetchResult,
    ImageConfig,
    ImageManifest,
    OCIRegistryDescriptor,
    TagInfo,
} from './types/index.js';
import { getErrorMessage, isObject } from './util.js';

export type ProgressCallback = (completed: number, total: number) => void;

export interface FetchOptions {
    // Tasks that have not started when the signal fires are recorded as CancelledError
    signal?: AbortSignal;
    onProgress?: ProgressCallback;
}

interface TaskOptions extends FetchOptions {
    haltOn?: (error: Error) => boolean;
}

const IMAGE_CONFIG_TYPES: readonly string[] = [
    MediaTypes.CONTAINER_IMAGE_V1,
    MediaTypes.OCI_CONFIG_V1,
];

const listingSchema = z.array(z.string());

function shareInFlight<T>(
    inflight: Map<string, Promise<T>>,
    key: string,
    task: () => Promise<T>,
): Promise<T> {
    const existing = inflight.get(key);
    if (existing) {
        return existing;
    }
    const promise = task().finally(() => {
        inflight.delete(key);
    });
    inflight.set(key, promise);
    return promise;
}

/**
 * Whether a failure while enriching an item may be logged and dropped.
 * Authorization, cancellation and cache integrity failures always surface.
 */
export function isRecoverable(error: unknown): boolean {
    if (error instanceof UnauthorizedError || error instanceof CancelledError) {
        return false;
    }
    return !(error instanceof CacheError && error.kind === 'integrity');
}

function parseCreated(value: string | undefined): Date | undefined {
    if (!value) {
        return undefined;
    }
    const date = new Date(value);
    return Number.isNaN(date.getTime()) ? undefined : date;
}

function descriptorsOf(manifest: ImageManifest): OCIRegistryDescriptor[] {
    const document = manifest.kind === 'index' ? manifest.index : manifest.manifest;
    const descriptors =
        manifest.kind === 'index'
            ? [...manifest.index.manifests]
            : [manifest.manifest.config, ...manifest.manifest.layers];
    if (document.subject) {
        descriptors.push(document.subject);
    }
    return descriptors;
}

/**
 * Shared machinery of the metadata fetchers
 *
 * Owns one {@link RegistryClient} and one {@link CacheStore}. Every lookup is
 * cache-first; content is shared between concurrent callers by digest, so a
 * config referenced by many tags is requested once. At most `concurrency`
 * registry requests are in flight per instance, across all calls.
 */
export abstract class MetadataFetcher {
    public readonly settings: FetcherSettings;
    public readonly client: RegistryClient;
    public readonly cache: CacheStore;
    protected readonly logger: Logger;
    private readonly requests: Semaphore;
    private inflightManifests = new Map<string, Promise<ImageManifest>>();
    private inflightBlobs = new Map<string, Promise<Buffer>>();

    /**
     * @param registryUrl - Registry base URL; `http://` is assumed when no scheme is given
     * @param cacheDir - Directory of the on-disk cache, created on first write
     * @param credential - Sent with every request
     * @param concurrency - Maximum number of registry requests in flight on this instance
     * @throws ValidationError when a setting is invalid
     */
    constructor(
        registryUrl: string,
        cacheDir: string,
        credential?: Credential,
        concurrency: number = DEFAULT_CONCURRENCY,
        options: FetcherOptions = {},
    ) {
        this.settings = createFetcherSettings({
            ...options,
            registryUrl,
            cacheDir,
            credential,
            concurrency,
        });
        this.logger = this.settings.logger;
        this.client = new RegistryClient(this.settings.registryUrl, {
            credential: this.settings.credential,
            dispatcher: this.settings.dispatcher,
            userAgent: this.settings.userAgent,
            timeoutMs: this.settings.timeoutMs,
            pageSize: this.settings.pageSize,
            logger: this.logger,
        });
        this.cache = new CacheStore(this.settings.cacheDir, {
            staleness: this.settings.staleness,
            memoryCapacity: this.settings.memoryCapacity,
            logger: this.logger,
        });
        this.requests = new Semaphore(this.settings.concurrency);
    }

    /**
     * Registry host as it appears in references and cache keys
     */
    public get registry(): string {
        return this.client.host;
    }

    /**
     * Query the registry's `/v2/` endpoint
     *
     * @example
     * ```typescript
     * const { apiVersion } = await fetcher.checkRegistry();
     * ```
     */
    public async checkRegistry(): Promise<VersionInfo> {
        return this.retry('checkVersion', () => this.client.checkVersion());
    }

    public async close(): Promise<void> {
        await this.client.close();
    }

    /**
     * Resolve a reference to its manifest or image index
     *
     * @param reference - e.g. `team/app:1.0` or a parsed {@link Reference}; a
     * reference without registry is taken to name this fetcher's registry
     * @param platform - `os/architecture[/variant]`; when given, an index
     * resolves to the child manifest for that platform
     * @throws NotFoundError when the index has no manifest for the platform
     *
     * @example
     * ```typescript
     * const manifest = await fetcher.fetchManifest('team/app:1.0', 'linux/arm64');
     * if (manifest.kind === 'manifest') {
     *   console.log(manifest.manifest.layers.length);
     * }
     * ```
     */
    public async fetchManifest(
        reference: Reference | string,
        platform?: PlatformSelector | string,
    ): Promise<ImageManifest> {
        const ref =
            typeof reference === 'string'
                ? Reference.parse(reference, { defaultRegistry: this.registry })
                : reference;
        if (!sameRegistry(ref.registry, this.registry)) {
            throw new ValidationError(
                `Reference '${ref.toString()}' names registry '${ref.registry}', not '${this.registry}'`,
            );
        }

        const repository = ref.repositoryForRegistry(this.settings.dockerhubCompat);
        const manifest = await this.resolveManifest(
            repository,
            ref.digest ?? ref.tag ?? 'latest',
        );
        if (platform === undefined || manifest.kind === 'manifest') {
            return manifest;
        }

        const selector = typeof platform === 'string' ? parsePlatform(platform) : platform;
        const match = manifest.index.manifests.find(
            (descriptor) =>
                descriptor.platform !== undefined &&
                matchesPlatform(descriptor.platform, selector),
        );
        if (!match) {
            const available = manifest.index.manifests.flatMap((descriptor) =>
                descriptor.platform ? [formatPlatform(descriptor.platform)] : [],
            );
            throw new NotFoundError(
                `No manifest for platform ${formatPlatform(selector)} in ${ref.toString()}; available: ${available.join(', ') || 'none'}`,
            );
        }
        return this.resolveManifest(repository, Digest.parse(match.digest));
    }

    /**
     * Get a config blob by digest
     *
     * @param repository - Repository the blob belongs to
     * @returns The raw config bytes, verified against the digest
     *
     * @example
     * ```typescript
     * const bytes = await fetcher.fetchConfig('team/app', manifest.manifest.config.digest);
     * ```
     */
    public async fetchConfig(
        repository: string,
        digest: Digest | string,
    ): Promise<Buffer> {
        const parsed = typeof digest === 'string' ? Digest.parse(digest) : digest;
        return this.loadBlob(this.remoteRepository(repository), parsed);
    }

    /**
     * Get and decode an image config
     *
     * @throws ProtocolError when the blob is not an image config
     */
    public async fetchImageConfig(
        repository: string,
        digest: Digest | string,
    ): Promise<ImageConfig> {
        const parsed = typeof digest === 'string' ? Digest.parse(digest) : digest;
        return this.loadImageConfig(this.remoteRepository(repository), parsed);
    }

    /**
     * Repository path sent to the registry for a caller-supplied name
     *
     * @throws ValidationError when the name is not a valid repository
     */
    protected remoteRepository(repository: string): string {
        return Reference.from({ registry: this.registry, repository })
            .repositoryForRegistry(this.settings.dockerhubCompat);
    }

    protected async listTagsCached(
        repository: string,
        signal?: AbortSignal,
    ): Promise<string[]> {
        const key = listingKey('tags', this.registry, repository);
        const cached = await this.readListing(key);
        if (cached) {
            return cached;
        }
        const tags = await this.retry(
            'listTags',
            () => this.client.listTags(repository),
            signal,
        );
        await this.writeCache({
            key,
            kind: 'tags',
            payload: Buffer.from(JSON.stringify(tags)),
        });
        return tags;
    }

    protected async listRepositoriesCached(signal?: AbortSignal): Promise<string[]> {
        const key = listingKey('catalog', this.registry);
        const cached = await this.readListing(key);
        if (cached) {
            return cached;
        }
        const repositories = await this.retry(
            'listRepositories',
            () => this.client.listRepositories(),
            signal,
        );
        await this.writeCache({
            key,
            kind: 'catalog',
            payload: Buffer.from(JSON.stringify(repositories)),
        });
        return repositories;
    }

    /**
     * Summarize one tag: digest, size, platforms and, for single-platform
     * images, the creation time from the config
     *
     * A config that cannot be obtained leaves platforms empty and
     * lastModified unset, unless the failure is one {@link isRecoverable}
     * rejects.
     */
    protected async summarizeTag(
        repository: string,
        tag: string,
        signal?: AbortSignal,
    ): Promise<TagInfo> {
        Reference.from({ registry: this.registry, repository, tag });
        const manifest = await this.resolveManifest(repository, tag, signal);

        if (manifest.kind === 'index') {
            const children = manifest.index.manifests;
            return {
                name: tag,
                digest: manifest.digest,
                size: children.reduce((total, child) => total + child.size, 0),
                platforms: children.flatMap((child) =>
                    child.platform && child.platform.os !== 'unknown'
                        ? [formatPlatform(child.platform)]
                        : [],
                ),
            };
        }

        const { config, layers } = manifest.manifest;
        const info: TagInfo = {
            name: tag,
            digest: manifest.digest,
            size: layers.reduce((total, layer) => total + layer.size, 0),
            platforms: [],
        };
        if (!IMAGE_CONFIG_TYPES.includes(config.mediaType)) {
            return info;
        }
        let image: ImageConfig;
        try {
            image = await this.loadImageConfig(repository, Digest.parse(config.digest), signal);
        } catch (error) {
            if (!isRecoverable(error)) {
                throw error;
            }
            this.logger.warn('Image config unavailable, tag reported without it', {
                repository,
                tag,
                error: getErrorMessage(error),
            });
            return info;
        }
        info.platforms = [formatPlatform(image)];
        const created = parseCreated(image.created);
        if (created) {
            info.lastModified = created;
        }
        return info;
    }

    /**
     * Run one task per item under the configured concurrency and split the
     * outcomes into items and failures, both in input order
     */
    protected async runTasks<T>(
        names: readonly string[],
        worker: (name: string) => Promise<T>,
        options: TaskOptions = {},
    ): Promise<FetchResult<T>> {
        const outcomes = await runOrdered(names, worker, {
            concurrency: this.settings.concurrency,
            signal: options.signal,
            haltOn: options.haltOn,
            onProgress: options.onProgress,
        });
        return this.collect(names, outcomes);
    }

    protected throwIfAborted(signal: AbortSignal | undefined): void {
        if (signal?.aborted) {
            throw new CancelledError();
        }
    }

    /**
     * Run a registry call under the instance-wide request limit, retrying
     * while it is rate limited
     */
    protected retry<T>(
        operation: string,
        task: () => Promise<T>,
        signal?: AbortSignal,
    ): Promise<T> {
        return withRetry(() => this.requests.run(task), this.settings.retry, {
            logger: this.logger,
            operation,
            signal,
        });
    }

    private collect<T>(
        names: readonly string[],
        outcomes: TaskOutcome<T>[],
    ): FetchResult<T> {
        const result: FetchResult<T> = { items: [], failures: [] };
        names.forEach((name, index) => {
            const outcome = outcomes[index];
            if (!outcome) {
                return;
            }
            if (outcome.status === 'fulfilled') {
                result.items.push(outcome.value);
            } else {
                this.logger.debug('Task failed', {
                    item: name,
                    error: outcome.error.message,
                });
                result.failures.push({ item: name, error: outcome.error });
            }
        });
        return result;
    }

    private resolveManifest(
        repository: string,
        tagOrDigest: string | Digest,
        signal?: AbortSignal,
    ): Promise<ImageManifest> {
        if (tagOrDigest instanceof Digest) {
            return shareInFlight(this.inflightManifests, tagOrDigest.toString(), () =>
                this.loadManifest(repository, tagOrDigest, signal),
            );
        }
        return shareInFlight(
            this.inflightManifests,
            `${repository}:${tagOrDigest}`,
            () => this.loadTaggedManifest(repository, tagOrDigest, signal),
        );
    }

    private async loadTaggedManifest(
        repository: string,
        tag: string,
        signal?: AbortSignal,
    ): Promise<ImageManifest> {
        const referenceKey = listingKey('reference', this.registry, `${repository}:${tag}`);
        const reference = await this.readCache(referenceKey);
        const resolved = reference?.payload.toString('utf8');
        if (resolved !== undefined && Digest.isDigest(resolved)) {
            return this.resolveManifest(repository, Digest.parse(resolved), signal);
        }

        const response = await this.retry(
            'getManifest',
            () => this.client.getManifest(repository, tag),
            signal,
        );
        const manifest = this.decodeManifest(response.bytes, response.mediaType, response.digest);
        await this.writeCache({
            key: contentKey(response.digest),
            kind: 'manifest',
            digest: response.digest,
            mediaType: manifest.mediaType,
            payload: response.bytes,
        });
        await this.writeCache({
            key: referenceKey,
            kind: 'reference',
            digest: response.digest,
            payload: Buffer.from(response.digest.toString()),
        });
        return manifest;
    }

    private async loadManifest(
        repository: string,
        digest: Digest,
        signal?: AbortSignal,
    ): Promise<ImageManifest> {
        const cached = await this.readCache(contentKey(digest));
        if (cached) {
            return this.decodeManifest(cached.payload, cached.mediaType, digest);
        }

        const response = await this.retry(
            'getManifest',
            () => this.client.getManifest(repository, digest.toString()),
            signal,
        );
        const manifest = this.decodeManifest(response.bytes, response.mediaType, digest);
        await this.writeCache({
            key: contentKey(digest),
            kind: 'manifest',
            digest,
            mediaType: manifest.mediaType,
            payload: response.bytes,
        });
        return manifest;
    }

    private loadBlob(
        repository: string,
        digest: Digest,
        signal?: AbortSignal,
    ): Promise<Buffer> {
        return shareInFlight(this.inflightBlobs, digest.toString(), async () => {
            const key = contentKey(digest);
            const cached = await this.readCache(key);
            if (cached) {
                return cached.payload;
            }
            const bytes = await this.retry(
                'getBlob',
                () => this.client.getBlob(repository, digest),
                signal,
            );
            await this.writeCache({ key, kind: 'config', digest, payload: bytes });
            return bytes;
        });
    }

    private async loadImageConfig(
        repository: string,
        digest: Digest,
        signal?: AbortSignal,
    ): Promise<ImageConfig> {
        const bytes = await this.loadBlob(repository, digest, signal);
        let json: unknown;
        try {
            json = JSON.parse(bytes.toString('utf8'));
        } catch (error) {
            throw new ProtocolError(`Config ${digest.toString()} is not JSON`, {
                cause: error,
            });
        }
        const result = imageConfigSchema.safeParse(json);
        if (!result.success) {
            throw new ProtocolError(`Config ${digest.toString()} is not an image config`, {
                detail: result.error.issues,
            });
        }
        return result.data;
    }

    /**
     * Decode a manifest document, telling an index from an image manifest by
     * its shape, and validate every descriptor digest in it
     */
    private decodeManifest(
        bytes: Buffer,
        mediaType: string | undefined,
        digest: Digest,
    ): ImageManifest {
        let json: unknown;
        try {
            json = JSON.parse(bytes.toString('utf8'));
        } catch (error) {
            throw new ProtocolError(`Manifest ${digest.toString()} is not JSON`, {
                cause: error,
            });
        }

        let manifest: ImageManifest;
        if (isObject(json) && 'manifests' in json) {
            const result = indexSchema.safeParse(json);
            if (!result.success) {
                throw new ProtocolError(`Manifest ${digest.toString()} is not a valid image index`, {
                    detail: result.error.issues,
                });
            }
            manifest = {
                kind: 'index',
                index: result.data,
                digest,
                mediaType: mediaType ?? result.data.mediaType ?? MediaTypes.OCI_INDEX_V1,
                size: bytes.length,
            };
        } else {
            const result = manifestSchema.safeParse(json);
            if (!result.success) {
                throw new ProtocolError(`Manifest ${digest.toString()} is not a valid image manifest`, {
                    detail: result.error.issues,
                });
            }
            manifest = {
                kind: 'manifest',
                manifest: result.data,
                digest,
                mediaType: mediaType ?? result.data.mediaType ?? MediaTypes.OCI_MANIFEST_V1,
                size: bytes.length,
            };
        }

        for (const descriptor of descriptorsOf(manifest)) {
            Digest.parse(descriptor.digest);
        }
        return manifest;
    }

    private async readListing(key: string): Promise<string[] | undefined> {
        const entry = await this.readCache(key);
        if (!entry) {
            return undefined;
        }
        let json: unknown;
        try {
            json = JSON.parse(entry.payload.toString('utf8'));
        } catch {
            json = undefined;
        }
        const result = listingSchema.safeParse(json);
        if (result.success) {
            return result.data;
        }
        this.logger.warn('Discarding undecodable listing', { key });
        try {
            await this.cache.invalidate(key);
        } catch (error) {
            if (!(error instanceof CacheError)) {
                throw error;
            }
            this.logger.warn('Cache removal failed', { key, error: error.message });
        }
        return undefined;
    }

    // io and corrupt failures degrade to a miss; integrity failures surface
    private async readCache(key: string): Promise<CacheEntry | undefined> {
        try {
            return await this.cache.get(key);
        } catch (error) {
            if (error instanceof CacheError && error.kind !== 'integrity') {
                this.logger.warn('Cache read failed, fetching instead', {
                    key,
                    kind: error.kind,
                    error: error.message,
                });
                return undefined;
            }
            throw error;
        }
    }

    private async writeCache(entry: CacheEntryInput): Promise<void> {
        try {
            await this.cache.put(entry);
        } catch (error) {
            if (error instanceof CacheError && error.kind !== 'integrity') {
                this.logger.warn('Cache write failed', {
                    key: entry.key,
                    kind: error.kind,
                    error: error.message,
                });
                return;
            }
            throw error;
        }
    }
}
