import { isRecoverable, MetadataFetcher, type FetchOptions } from './fetcher.js';
import { Reference } from './reference.js';
import { searchImages as matchImages, searchRepositories as matchRepositories } from './search.js';
import type { FetchResult, RepositoryItem, SearchResult } from './types/index.js';
import { getErrorMessage } from './util.js';

export interface FetchRepositoriesOptions extends FetchOptions {
    // Also report size and creation time of each repository's last listed tag
    details?: boolean;
}

/**
 * Fetches per-repository metadata from the registry catalog
 *
 * @example
 * ```typescript
 * const fetcher = new RepositoryMetadataFetcher('localhost:5000', '/tmp/cache');
 * const { items } = await fetcher.fetchRepositories({ details: true });
 * for (const repository of items) {
 *   console.log(repository.name, repository.tagCount);
 * }
 * ```
 */
export class RepositoryMetadataFetcher extends MetadataFetcher {
    /**
     * List the catalog and count the tags of every repository in it
     *
     * @returns One item per repository in catalog order, failures alongside
     * @throws When the catalog itself cannot be obtained
     */
    public async fetchRepositories(
        options: FetchRepositoriesOptions = {},
    ): Promise<FetchResult<RepositoryItem>> {
        this.throwIfAborted(options.signal);
        const repositories = await this.listRepositoriesCached(options.signal);
        return this.runTasks(
            repositories,
            (name) => this.describeRepository(name, options.details ?? false, options.signal),
            options,
        );
    }

    /**
     * Fuzzy-search repository names in the catalog
     *
     * @returns Matching repositories, best first
     */
    public async searchRepositories(query: string): Promise<SearchResult[]> {
        return matchRepositories(query, await this.listRepositoriesCached());
    }

    /**
     * Fuzzy-search `repository:tag` images across the catalog
     *
     * A colon in the query splits it into a repository part and a tag part.
     * Repositories whose tags cannot be listed are left out.
     *
     * @example
     * ```typescript
     * const results = await fetcher.searchImages('alp:lat');
     * // [{ value: 'alpine:latest', score: ... }, ...]
     * ```
     */
    public async searchImages(
        query: string,
        options: FetchOptions = {},
    ): Promise<SearchResult[]> {
        this.throwIfAborted(options.signal);
        const repositories = await this.listRepositoriesCached(options.signal);
        const listed = await this.runTasks(
            repositories,
            async (name) => ({ name, tags: await this.listTagsCached(name, options.signal) }),
            options,
        );
        for (const failure of listed.failures) {
            this.logger.warn('Tags unavailable, repository left out of search', {
                repository: failure.item,
                error: failure.error.message,
            });
        }
        const tagsByRepository = new Map(
            listed.items.map((item): [string, string[]] => [item.name, item.tags]),
        );
        return matchImages(query, repositories, tagsByRepository);
    }

    private async describeRepository(
        name: string,
        details: boolean,
        signal?: AbortSignal,
    ): Promise<RepositoryItem> {
        // Catalog names are already registry paths
        Reference.from({ registry: this.registry, repository: name });
        const tags = await this.listTagsCached(name, signal);
        const item: RepositoryItem = { name, tagCount: tags.length };

        const lastTag = tags[tags.length - 1];
        if (!details || lastTag === undefined) {
            return item;
        }
        try {
            const info = await this.summarizeTag(name, lastTag, signal);
            item.size = info.size;
            if (info.lastModified) {
                item.lastModified = info.lastModified;
            }
        } catch (error) {
            if (!isRecoverable(error)) {
                throw error;
            }
            this.logger.warn('Last tag unavailable, repository reported without details', {
                repository: name,
                tag: lastTag,
                error: getErrorMessage(error),
            });
        }
        return item;
    }
}
