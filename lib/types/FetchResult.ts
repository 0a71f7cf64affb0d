export interface FetchFailure {
    item: string;
    error: Error;
}

/**
 * Aggregate of a fan-out. Both lists follow the order items were requested in.
 */
export interface FetchResult<T> {
    items: T[];
    failures: FetchFailure[];
}
