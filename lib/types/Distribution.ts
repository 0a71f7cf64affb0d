import type { z } from 'zod';
import type {
    descriptorSchema,
    errorEnvelopeSchema,
    indexSchema,
    manifestSchema,
    platformSchema,
} from '../schemas.js';

// Documents of the distribution API, as they come out of validation

export type RegistryPlatform = z.infer<typeof platformSchema>;

/**
 * Content descriptor: a typed, sized pointer to content by digest.
 * `platform` is only present on the entries of an image index.
 */
export type OCIRegistryDescriptor = z.infer<typeof descriptorSchema>;

// Single-platform image manifest (OCI or Docker schema 2)
export type OCIManifest = z.infer<typeof manifestSchema>;

// Image index or Docker manifest list
export type OCIImageIndex = z.infer<typeof indexSchema>;

export type RegistryErrorResponse = z.infer<typeof errorEnvelopeSchema>;
export type RegistryErrorItem = RegistryErrorResponse['errors'][number];
