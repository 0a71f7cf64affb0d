/**
 * One row per repository returned by RepositoryMetadataFetcher.fetchRepositories.
 * size and lastModified describe the last listed tag and are only filled in
 * when details are requested.
 */
export interface RepositoryItem {
    name: string;
    tagCount?: number;
    size?: number;
    lastModified?: Date;
}
