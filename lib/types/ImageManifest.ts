import type { Digest } from '../digest.js';
import type { OCIImageIndex, OCIManifest } from './Distribution.js';

interface ManifestMeta {
    digest: Digest;
    mediaType: string;
    // Size of the manifest document itself, in bytes
    size: number;
}

export type ImageManifest =
    | (ManifestMeta & { kind: 'manifest'; manifest: OCIManifest })
    | (ManifestMeta & { kind: 'index'; index: OCIImageIndex });
