import { z } from 'zod';

// Response documents of the distribution API. Unknown fields are dropped.

export const platformSchema = z.object({
    architecture: z.string(),
    os: z.string(),
    'os.version': z.string().optional(),
    'os.features': z.array(z.string()).optional(),
    variant: z.string().optional(),
});

export const descriptorSchema = z.object({
    mediaType: z.string(),
    digest: z.string(),
    size: z.number().int().nonnegative(),
    urls: z.array(z.string()).optional(),
    annotations: z.record(z.string()).optional(),
    artifactType: z.string().optional(),
    platform: platformSchema.optional(),
});

export const manifestSchema = z.object({
    schemaVersion: z.number().int(),
    mediaType: z.string().optional(),
    artifactType: z.string().optional(),
    config: descriptorSchema,
    layers: z.array(descriptorSchema),
    subject: descriptorSchema.optional(),
    annotations: z.record(z.string()).optional(),
});

export const indexSchema = z.object({
    schemaVersion: z.number().int(),
    mediaType: z.string().optional(),
    artifactType: z.string().optional(),
    manifests: z.array(descriptorSchema),
    subject: descriptorSchema.optional(),
    annotations: z.record(z.string()).optional(),
});

export const imageConfigSchema = z.object({
    architecture: z.string(),
    os: z.string(),
    variant: z.string().optional(),
    created: z.string().optional(),
    author: z.string().optional(),
    config: z
        .object({
            Labels: z.record(z.string()).nullable().optional(),
        })
        .nullable()
        .optional()
        .transform((value) => value ?? undefined),
});

export const tagsPageSchema = z.object({
    name: z.string(),
    tags: z.array(z.string()).nullable().optional(),
});

export const catalogPageSchema = z.object({
    repositories: z.array(z.string()).nullable().optional(),
});

export const errorEnvelopeSchema = z.object({
    errors: z.array(
        z.object({
            code: z.string(),
            message: z.string().optional(),
            detail: z.unknown().optional(),
        }),
    ),
});
