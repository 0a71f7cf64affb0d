/**
 * The fields of an image config blob the engine reads.
 */
export interface ImageConfig {
    architecture: string;
    os: string;
    variant?: string;
    created?: string;
    author?: string;
    config?: {
        Labels?: Record<string, string> | null;
    };
}
