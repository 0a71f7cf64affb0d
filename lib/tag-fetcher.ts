import { UnauthorizedError } from './errors.js';
import { MetadataFetcher, type FetchOptions } from './fetcher.js';
import { searchTags as matchTags } from './search.js';
import type { FetchResult, SearchResult, TagInfo } from './types/index.js';

/**
 * Fetches per-tag metadata for a repository
 *
 * @example
 * ```typescript
 * const fetcher = new TagMetadataFetcher('https://registry.example.com', '/tmp/cache');
 * const { items, failures } = await fetcher.fetchTags('team/app', {
 *   onProgress: (done, total) => console.log(`${done}/${total}`),
 * });
 * ```
 */
export class TagMetadataFetcher extends MetadataFetcher {
    /**
     * List the tags of a repository and summarize each of them
     *
     * The tag listing is served from the cache while fresh. Each tag becomes
     * one task; a failing tag is reported in `failures` without affecting the
     * others. An UnauthorizedError stops tasks that have not started yet, which
     * are reported with that same error.
     *
     * @param repository - Repository name as the caller knows it (e.g., 'alpine' or 'team/app')
     * @returns Tag summaries and failures, both in listing order
     * @throws When the tag listing itself cannot be obtained
     */
    public async fetchTags(
        repository: string,
        options: FetchOptions = {},
    ): Promise<FetchResult<TagInfo>> {
        this.throwIfAborted(options.signal);
        const remote = this.remoteRepository(repository);
        const tags = await this.listTagsCached(remote, options.signal);

        const result = await this.runTasks(
            tags,
            (tag) => this.summarizeTag(remote, tag, options.signal),
            {
                ...options,
                haltOn: (error) => error instanceof UnauthorizedError,
            },
        );

        const unauthorized = result.failures.filter(
            (failure) => failure.error instanceof UnauthorizedError,
        );
        if (unauthorized.length > 0) {
            this.logger.warn('Unauthorized while fetching tags, remaining tags skipped', {
                repository: remote,
                affected: unauthorized.length,
            });
        }
        return result;
    }

    /**
     * Fuzzy-search the tags of a repository, listing them first unless the
     * listing is cached
     *
     * @returns Matching tags, best first; every tag for an empty query
     *
     * @example
     * ```typescript
     * const [best] = await fetcher.searchTags('alpine', 'lat');
     * console.log(best?.value); // 'latest'
     * ```
     */
    public async searchTags(repository: string, query: string): Promise<SearchResult[]> {
        const tags = await this.listTagsCached(this.remoteRepository(repository));
        return matchTags(query, tags);
    }
}
