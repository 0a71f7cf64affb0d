export type {
    OCIImageIndex,
    OCIManifest,
    OCIRegistryDescriptor,
    RegistryErrorItem,
    RegistryErrorResponse,
    RegistryPlatform,
} from './Distribution.js';
export type { AuthChallenge, Credential } from './Credential.js';
export type { ImageConfig } from './ImageConfig.js';
export type { ImageManifest } from './ImageManifest.js';
export type { TagInfo } from './TagInfo.js';
export type { RepositoryItem } from './RepositoryItem.js';
export type { FetchFailure, FetchResult } from './FetchResult.js';
export type { SearchResult } from './SearchResult.js';
