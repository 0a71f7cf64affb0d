import { Fzf } from 'fzf';
import type { SearchResult } from './types/index.js';

function byRank(a: SearchResult, b: SearchResult): number {
    if (a.score !== b.score) {
        return b.score - a.score;
    }
    if (a.value === b.value) {
        return 0;
    }
    return a.value < b.value ? -1 : 1;
}

/**
 * Fuzzy-match `query` against `targets`
 *
 * Query characters must appear in order but need not be adjacent. Matching
 * ignores case unless the query has an uppercase letter. An empty query
 * returns every target with score 0, in input order.
 *
 * @returns Matches, best score first and alphabetical among equal scores
 */
export function fuzzySearch(query: string, targets: readonly string[]): SearchResult[] {
    if (query === '') {
        return targets.map((value) => ({ value, score: 0 }));
    }
    const matcher = new Fzf([...targets], { casing: 'smart-case' });
    return matcher
        .find(query)
        .map((match) => ({ value: match.item, score: match.score }))
        .sort(byRank);
}

export function searchRepositories(query: string, repositories: readonly string[]): SearchResult[] {
    return fuzzySearch(query, repositories);
}

export function searchTags(query: string, tags: readonly string[]): SearchResult[] {
    return fuzzySearch(query, tags);
}

/**
 * Search `repository:tag` images
 *
 * A query with a colon matches the part before it against repositories and
 * the part after it against their tags; an image scores the mean of the two,
 * rounded down. Without a colon every tag of a matching repository is
 * returned with the repository's score.
 *
 * @param tagsByRepository - Tags per repository; repositories missing from it yield nothing
 *
 * @example
 * ```typescript
 * const tags = new Map([['alpine', ['3.19', 'latest']]]);
 * searchImages('alp:lat', ['alpine', 'ubuntu'], tags);
 * // [{ value: 'alpine:latest', score: ... }]
 * ```
 */
export function searchImages(
    query: string,
    repositories: readonly string[],
    tagsByRepository: ReadonlyMap<string, readonly string[]>,
): SearchResult[] {
    const separator = query.indexOf(':');
    const repositoryQuery = separator === -1 ? query : query.slice(0, separator);
    const tagQuery = separator === -1 ? undefined : query.slice(separator + 1);

    const results: SearchResult[] = [];
    for (const repository of searchRepositories(repositoryQuery, repositories)) {
        const tags = tagsByRepository.get(repository.value);
        if (!tags) {
            continue;
        }
        if (tagQuery === undefined) {
            for (const tag of tags) {
                results.push({ value: `${repository.value}:${tag}`, score: repository.score });
            }
            continue;
        }
        for (const tag of searchTags(tagQuery, tags)) {
            results.push({
                value: `${repository.value}:${tag.value}`,
                score: Math.floor((repository.score + tag.score) / 2),
            });
        }
    }
    return results.sort(byRank);
}
