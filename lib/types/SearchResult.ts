/**
 * A search match; higher scores rank first
 */
export interface SearchResult {
    value: string;
    score: number;
}
