import { createHash, randomUUID } from 'node:crypto';
import type { Dirent } from 'node:fs';
import { access, mkdir, readFile, readdir, rename, rm, stat, writeFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { LRUCache } from 'lru-cache';
import { z } from 'zod';
import { Digest } from './digest.js';
import { CacheError } from './errors.js';
import { silentLogger, type Logger } from './logger.js';
import { getErrorMessage, isFileNotFoundError } from './util.js';

export type ContentKind = 'manifest' | 'config';
export type ListingKind = 'catalog' | 'tags' | 'reference';
export type CacheKind = ContentKind | ListingKind;

const CONTENT_KINDS: readonly CacheKind[] = ['manifest', 'config'];

export function isContentKind(kind: CacheKind): kind is ContentKind {
    return CONTENT_KINDS.includes(kind);
}

// Maximum age in milliseconds before a listing entry is a miss
export type Staleness = Record<ListingKind, number>;

export const DEFAULT_STALENESS: Staleness = {
    catalog: 60 * 60 * 1000,
    tags: 30 * 60 * 1000,
    reference: 24 * 60 * 60 * 1000,
};

export interface CacheEntry {
    key: string;
    kind: CacheKind;
    payload: Buffer;
    digest?: Digest;
    mediaType?: string;
    fetchedAt: Date;
}

export type CacheEntryInput = Omit<CacheEntry, 'fetchedAt'> & {
    fetchedAt?: Date;
};

export interface CacheStoreOptions {
    staleness?: Partial<Staleness>;
    // Clock used for freshness checks, in epoch milliseconds
    now?: () => number;
    logger?: Logger;
    // Entries kept in memory in front of the disk; 0 turns the memory tier off
    memoryCapacity?: number;
}

export const DEFAULT_MEMORY_CAPACITY = 1000;

export interface CacheStats {
    // Entry files on disk and their total size
    entries: number;
    bytes: number;
    memoryEntries: number;
}

export interface PruneStats {
    removedFiles: number;
    reclaimedBytes: number;
}

const entryFileSchema = z.object({
    version: z.literal(1),
    key: z.string().min(1),
    kind: z.enum(['manifest', 'config', 'catalog', 'tags', 'reference']),
    digest: z
        .string()
        .refine((value) => Digest.isDigest(value))
        .optional(),
    mediaType: z.string().optional(),
    fetchedAt: z.number().int().nonnegative(),
    payload: z.string().regex(/^[A-Za-z0-9+/]*={0,2}$/),
});

type EntryFile = z.infer<typeof entryFileSchema>;

/**
 * Key of a listing entry: `kind:registry` or `kind:registry/repository`
 */
export function listingKey(
    kind: ListingKind,
    registry: string,
    repository?: string,
): string {
    return repository === undefined
        ? `${kind}:${registry}`
        : `${kind}:${registry}/${repository}`;
}

export function contentKey(digest: Digest): string {
    return digest.toString();
}

function ioError(action: string, key: string, error: unknown): CacheError {
    return new CacheError(
        `Failed to ${action} cache entry '${key}': ${getErrorMessage(error)}`,
        'io',
        key,
        { cause: error },
    );
}

async function listEntryFiles(directory: string): Promise<string[]> {
    let entries: Dirent[];
    try {
        entries = await readdir(directory, { withFileTypes: true });
    } catch (error) {
        if (isFileNotFoundError(error)) {
            return [];
        }
        throw ioError('list', directory, error);
    }
    const files: string[] = [];
    for (const entry of entries) {
        const path = join(directory, entry.name);
        if (entry.isDirectory()) {
            files.push(...(await listEntryFiles(path)));
        } else if (entry.isFile() && entry.name.endsWith('.json')) {
            files.push(path);
        }
    }
    return files;
}

/**
 * Two-tier metadata cache: a bounded in-memory LRU in front of the disk
 *
 * Content entries (manifests, configs) are keyed by their digest, verified
 * on write and on read, and never change once written. Listing entries
 * (catalog, tags, tag references) are overwritten on write and expire after
 * their kind's staleness window.
 *
 * Every write lands in a temporary file that is renamed into place. Writes to
 * one key are serialized within the process. Reads try memory first and
 * fill it from disk.
 *
 * @example
 * ```typescript
 * const cache = new CacheStore('/tmp/registry-cache');
 * const digest = Digest.compute(bytes);
 * await cache.put({ key: contentKey(digest), kind: 'manifest', digest, payload: bytes });
 * const entry = await cache.get(contentKey(digest));
 * ```
 */
export class CacheStore {
    public readonly directory: string;
    private staleness: Staleness;
    private now: () => number;
    private logger: Logger;
    private locks = new Map<string, Promise<void>>();
    private memory?: LRUCache<string, CacheEntry>;

    constructor(directory: string, options: CacheStoreOptions = {}) {
        this.directory = directory;
        this.staleness = { ...DEFAULT_STALENESS, ...options.staleness };
        this.now = options.now ?? Date.now;
        this.logger = options.logger ?? silentLogger;
        const capacity = options.memoryCapacity ?? DEFAULT_MEMORY_CAPACITY;
        if (capacity > 0) {
            this.memory = new LRUCache<string, CacheEntry>({ max: capacity });
        }
    }

    /**
     * Look up an entry
     *
     * @returns The entry, or undefined when absent or (for listings) stale
     * @throws CacheError `io` when the file cannot be read, `corrupt` when it
     * cannot be decoded or no longer hashes to its key; corrupt files are removed
     */
    public async get(key: string): Promise<CacheEntry | undefined> {
        const remembered = this.memory?.get(key);
        if (remembered) {
            if (!this.isExpired(remembered)) {
                return remembered;
            }
            this.memory?.delete(key);
        }

        const entry = await this.readEntry(key);
        if (entry) {
            this.memory?.set(key, entry);
        }
        return entry;
    }

    private async readEntry(key: string): Promise<CacheEntry | undefined> {
        const path = this.pathFor(key);

        let raw: string;
        try {
            raw = await readFile(path, 'utf8');
        } catch (error) {
            if (isFileNotFoundError(error)) {
                return undefined;
            }
            throw ioError('read', key, error);
        }

        const file = this.decode(raw);
        if (
            !file ||
            file.key !== key ||
            isContentKind(file.kind) !== Digest.isDigest(key)
        ) {
            await this.evict(key, path, 'undecodable entry');
            throw new CacheError(`Cache entry '${key}' is corrupt`, 'corrupt', key);
        }

        const payload = Buffer.from(file.payload, 'base64');
        if (isContentKind(file.kind)) {
            const digest = Digest.parse(key);
            if (!digest.matches(payload)) {
                await this.evict(key, path, 'payload does not match digest');
                throw new CacheError(
                    `Cache entry '${key}' does not match its digest`,
                    'corrupt',
                    key,
                );
            }
            return {
                key,
                kind: file.kind,
                payload,
                digest,
                mediaType: file.mediaType,
                fetchedAt: new Date(file.fetchedAt),
            };
        }

        if (this.isStale(file.kind, file.fetchedAt)) {
            return undefined;
        }
        return {
            key,
            kind: file.kind,
            payload,
            digest: file.digest ? Digest.parse(file.digest) : undefined,
            mediaType: file.mediaType,
            fetchedAt: new Date(file.fetchedAt),
        };
    }

    /**
     * Store an entry
     *
     * Content entries must carry a digest equal to their key and a payload that
     * hashes to it. Storing a content entry that already exists does nothing.
     *
     * @throws CacheError `integrity` when a content entry fails verification, `io` when the write fails
     */
    public async put(entry: CacheEntryInput): Promise<void> {
        const contentAddressed = isContentKind(entry.kind);
        if (contentAddressed !== Digest.isDigest(entry.key)) {
            throw new CacheError(
                `Cache key '${entry.key}' does not fit entry kind '${entry.kind}'`,
                'integrity',
                entry.key,
            );
        }
        if (contentAddressed) {
            if (!entry.digest || entry.digest.toString() !== entry.key) {
                throw new CacheError(
                    `Content entry '${entry.key}' must carry a digest equal to its key`,
                    'integrity',
                    entry.key,
                );
            }
            if (!entry.digest.matches(entry.payload)) {
                throw new CacheError(
                    `Payload does not hash to '${entry.key}'`,
                    'integrity',
                    entry.key,
                );
            }
        }

        const path = this.pathFor(entry.key);
        const fetchedAt = entry.fetchedAt ?? new Date(this.now());
        if (!contentAddressed || !this.memory?.has(entry.key)) {
            this.memory?.set(entry.key, { ...entry, fetchedAt });
        }
        const file: EntryFile = {
            version: 1,
            key: entry.key,
            kind: entry.kind,
            digest: entry.digest?.toString(),
            mediaType: entry.mediaType,
            fetchedAt: fetchedAt.getTime(),
            payload: entry.payload.toString('base64'),
        };

        await this.withKeyLock(entry.key, async () => {
            if (contentAddressed && (await this.exists(path))) {
                return;
            }
            await this.writeAtomic(entry.key, path, JSON.stringify(file));
        });
    }

    /**
     * Remove an entry. Removing an absent entry is not an error.
     */
    public async invalidate(key: string): Promise<void> {
        const path = this.pathFor(key);
        this.memory?.delete(key);
        await this.withKeyLock(key, async () => {
            try {
                await rm(path, { force: true });
            } catch (error) {
                throw ioError('remove', key, error);
            }
        });
    }

    /**
     * Remove expired listing entries and files that cannot be decoded
     */
    public async prune(): Promise<PruneStats> {
        const stats: PruneStats = { removedFiles: 0, reclaimedBytes: 0 };
        const remembered = this.memory ? [...this.memory.entries()] : [];
        for (const [key, entry] of remembered) {
            if (this.isExpired(entry)) {
                this.memory?.delete(key);
            }
        }
        for (const path of await this.entryFiles()) {
            let size: number;
            let file: EntryFile | undefined;
            try {
                size = (await stat(path)).size;
                file = this.decode(await readFile(path, 'utf8'));
            } catch (error) {
                throw ioError('inspect', path, error);
            }
            const expired =
                !file ||
                (!isContentKind(file.kind) &&
                    this.isStale(file.kind, file.fetchedAt));
            if (expired) {
                try {
                    await rm(path, { force: true });
                } catch (error) {
                    throw ioError('remove', path, error);
                }
                stats.removedFiles++;
                stats.reclaimedBytes += size;
            }
        }
        this.logger.debug('Pruned cache', { ...stats });
        return stats;
    }

    /**
     * Remove every entry
     */
    public async clear(): Promise<PruneStats> {
        const { entries, bytes } = await this.stats();
        this.memory?.clear();
        try {
            await rm(join(this.directory, 'blobs'), { recursive: true, force: true });
            await rm(join(this.directory, 'listings'), { recursive: true, force: true });
        } catch (error) {
            throw ioError('clear', this.directory, error);
        }
        return { removedFiles: entries, reclaimedBytes: bytes };
    }

    public async stats(): Promise<CacheStats> {
        const stats: CacheStats = {
            entries: 0,
            bytes: 0,
            memoryEntries: this.memory?.size ?? 0,
        };
        for (const path of await this.entryFiles()) {
            try {
                stats.bytes += (await stat(path)).size;
            } catch (error) {
                throw ioError('inspect', path, error);
            }
            stats.entries++;
        }
        return stats;
    }

    private pathFor(key: string): string {
        if (Digest.isDigest(key)) {
            const digest = Digest.parse(key);
            return join(this.directory, 'blobs', digest.algorithm, `${digest.hex}.json`);
        }
        const hashed = createHash('sha256').update(key).digest('hex');
        return join(this.directory, 'listings', `${hashed}.json`);
    }

    private isStale(kind: ListingKind, fetchedAt: number): boolean {
        return this.now() - fetchedAt > this.staleness[kind];
    }

    private isExpired(entry: CacheEntry): boolean {
        return !isContentKind(entry.kind) && this.isStale(entry.kind, entry.fetchedAt.getTime());
    }

    private decode(raw: string): EntryFile | undefined {
        let json: unknown;
        try {
            json = JSON.parse(raw);
        } catch {
            return undefined;
        }
        const result = entryFileSchema.safeParse(json);
        return result.success ? result.data : undefined;
    }

    private async entryFiles(): Promise<string[]> {
        const blobs = await listEntryFiles(join(this.directory, 'blobs'));
        const listings = await listEntryFiles(join(this.directory, 'listings'));
        return [...blobs, ...listings];
    }

    private async exists(path: string): Promise<boolean> {
        try {
            await access(path);
            return true;
        } catch (error) {
            if (isFileNotFoundError(error)) {
                return false;
            }
            throw ioError('check', path, error);
        }
    }

    private async evict(key: string, path: string, reason: string): Promise<void> {
        this.logger.warn('Evicting cache entry', { key, reason });
        try {
            await rm(path, { force: true });
        } catch (error) {
            throw ioError('evict', key, error);
        }
    }

    private async writeAtomic(key: string, path: string, data: string): Promise<void> {
        const temporary = `${path}.${process.pid}.${randomUUID()}.tmp`;
        try {
            await mkdir(dirname(path), { recursive: true });
            await writeFile(temporary, data, 'utf8');
            await rename(temporary, path);
        } catch (error) {
            await rm(temporary, { force: true });
            throw ioError('write', key, error);
        }
    }

    private async withKeyLock<T>(key: string, task: () => Promise<T>): Promise<T> {
        const previous = this.locks.get(key) ?? Promise.resolve();
        const run = previous.then(task);
        const settled = run.then(
            () => undefined,
            () => undefined,
        );
        this.locks.set(key, settled);
        try {
            return await run;
        } finally {
            if (this.locks.get(key) === settled) {
                this.locks.delete(key);
            }
        }
    }
}
