import type { Digest } from '../digest.js';

/**
 * One row per tag returned by TagMetadataFetcher.fetchTags
 */
export interface TagInfo {
    name: string;
    digest?: Digest;
    // Sum of layer sizes, or of child manifest sizes for an index
    size?: number;
    lastModified?: Date;
    platforms: string[];
}
