import { createHash } from 'node:crypto';
import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { MockAgent } from 'undici';
import { MediaTypes } from '../lib/registry.js';

export const REGISTRY_URL = 'http://registry.test';
export const REGISTRY_HOST = 'registry.test';

export function sha256(content: string): string {
    return `sha256:${createHash('sha256').update(content).digest('hex')}`;
}

export function createMockAgent(): MockAgent {
    const agent = new MockAgent();
    agent.disableNetConnect();
    return agent;
}

export async function makeTempDir(): Promise<string> {
    return mkdtemp(join(tmpdir(), 'registry-scout-'));
}

export async function removeDir(directory: string): Promise<void> {
    await rm(directory, { recursive: true, force: true });
}

// Resolves to whatever the promise rejected with, or undefined when it fulfilled
export function captureError(promise: Promise<unknown>): Promise<unknown> {
    return promise.then(
        () => undefined,
        (error: unknown) => error,
    );
}

export interface Document {
    body: string;
    digest: string;
    size: number;
}

function document(value: unknown): Document {
    const body = JSON.stringify(value);
    return { body, digest: sha256(body), size: Buffer.byteLength(body) };
}

export function imageConfig(options: {
    os?: string;
    architecture?: string;
    variant?: string;
    created?: string;
} = {}): Document {
    return document({
        architecture: options.architecture ?? 'amd64',
        os: options.os ?? 'linux',
        ...(options.variant ? { variant: options.variant } : {}),
        ...(options.created ? { created: options.created } : {}),
        config: { Labels: null },
        rootfs: { type: 'layers', diff_ids: [] },
    });
}

export function imageManifest(config: Document, layerSizes: number[]): Document {
    return document({
        schemaVersion: 2,
        mediaType: MediaTypes.OCI_MANIFEST_V1,
        config: {
            mediaType: MediaTypes.OCI_CONFIG_V1,
            digest: config.digest,
            size: config.size,
        },
        layers: layerSizes.map((size, index) => ({
            mediaType: 'application/vnd.oci.image.layer.v1.tar+gzip',
            digest: sha256(`layer-${index}-${size}`),
            size,
        })),
    });
}

export interface IndexChild {
    manifest: Document;
    os: string;
    architecture: string;
    variant?: string;
}

export function imageIndex(children: IndexChild[]): Document {
    return document({
        schemaVersion: 2,
        mediaType: MediaTypes.OCI_INDEX_V1,
        manifests: children.map((child) => ({
            mediaType: MediaTypes.OCI_MANIFEST_V1,
            digest: child.manifest.digest,
            size: child.manifest.size,
            platform: {
                os: child.os,
                architecture: child.architecture,
                ...(child.variant ? { variant: child.variant } : {}),
            },
        })),
    });
}

export function manifestHeaders(manifest: Document, mediaType: string = MediaTypes.OCI_MANIFEST_V1): Record<string, string> {
    return {
        'Content-Type': mediaType,
        'Docker-Content-Digest': manifest.digest,
    };
}

export const JSON_HEADERS = { 'Content-Type': 'application/json' };
