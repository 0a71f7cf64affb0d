import type { Dispatcher, Response as UndiciResponse } from 'undici';
import { fetch } from 'undici';
import type { z } from 'zod';
import { DEFAULT_USER_AGENT } from './config.js';
import { Digest } from './digest.js';
import {
    NotFoundError,
    ProtocolError,
    RateLimitedError,
    RegistryError,
    TransportError,
    UnauthorizedError,
} from './errors.js';
import { silentLogger, type Logger } from './logger.js';
import {
    catalogPageSchema,
    errorEnvelopeSchema,
    tagsPageSchema,
} from './schemas.js';
import type { AuthChallenge, Credential } from './types/index.js';
import { getErrorMessage, normalizeRegistryUrl, parseRetryAfter } from './util.js';

/**
 * OCI Distribution Specification media types
 */
export const MediaTypes = {
    // Manifest types
    MANIFEST_V2: 'application/vnd.docker.distribution.manifest.v2+json',
    MANIFEST_LIST_V2:
        'application/vnd.docker.distribution.manifest.list.v2+json',
    OCI_MANIFEST_V1: 'application/vnd.oci.image.manifest.v1+json',
    OCI_INDEX_V1: 'application/vnd.oci.image.index.v1+json',

    // Config types
    CONTAINER_IMAGE_V1: 'application/vnd.docker.container.image.v1+json',
    OCI_CONFIG_V1: 'application/vnd.oci.image.config.v1+json',
} as const;

const MANIFEST_ACCEPT = [
    MediaTypes.OCI_MANIFEST_V1,
    MediaTypes.OCI_INDEX_V1,
    MediaTypes.MANIFEST_V2,
    MediaTypes.MANIFEST_LIST_V2,
].join(', ');

export const DEFAULT_CLIENT_TIMEOUT_MS = 30_000;

export interface RegistryClientOptions {
    credential?: Credential;
    // Connection pool to send requests through; the client closes it on close()
    dispatcher?: Dispatcher;
    userAgent?: string;
    // Deadline per call, covering headers and body
    timeoutMs?: number;
    // Sent as `n` on the first page of listing requests
    pageSize?: number;
    logger?: Logger;
}

export interface ManifestResponse {
    bytes: Buffer;
    mediaType?: string;
    digest: Digest;
}

export interface VersionInfo {
    // Value of the Docker-Distribution-API-Version header, when sent
    apiVersion?: string;
}

interface RawResponse {
    response: UndiciResponse;
    body: Buffer;
}

/**
 * Turn a credential into an Authorization header value
 */
export function buildAuthorization(credential: Credential): string {
    if (credential.type === 'bearer') {
        return `Bearer ${credential.token}`;
    }
    const encoded = Buffer.from(
        `${credential.username}:${credential.password}`,
    ).toString('base64');
    return `Basic ${encoded}`;
}

/**
 * Parse a WWW-Authenticate challenge header
 */
export function parseAuthChallenge(header: string): AuthChallenge {
    const trimmed = header.trim();
    const space = trimmed.indexOf(' ');
    const scheme = space === -1 ? trimmed : trimmed.substring(0, space);
    const challenge: AuthChallenge = { scheme };

    // Parse key="value" pairs
    const regex = /(\w+)="([^"]*)"/g;
    let match;
    while ((match = regex.exec(trimmed)) !== null) {
        const key = match[1];
        const value = match[2];
        if (key === 'realm' || key === 'service' || key === 'scope') {
            challenge[key] = value;
        }
    }

    return challenge;
}

/**
 * Target of the `rel="next"` entry of a Link header, e.g.
 * `</v2/_catalog?n=100&last=repo99>; rel="next"`
 */
export function extractNextLink(header: string | null): string | undefined {
    if (!header) {
        return undefined;
    }
    for (const part of header.split(',')) {
        if (!/rel=(?:"next"|'next'|next\b)/.test(part)) {
            continue;
        }
        const start = part.indexOf('<');
        const end = part.indexOf('>', start + 1);
        if (start !== -1 && end !== -1) {
            return part.substring(start + 1, end);
        }
    }
    return undefined;
}

/**
 * OCI Registry Client
 *
 * Read-only client for the OCI Distribution API. Every failure is mapped to a
 * {@link RegistryError} subclass by status: 401/403 to UnauthorizedError, 404
 * to NotFoundError, 429 to RateLimitedError, 5xx and network failures to
 * TransportError, anything else to ProtocolError. The client never retries
 * and never exchanges credentials for tokens.
 *
 * @example
 * ```typescript
 * const client = new RegistryClient('https://registry.example.com', {
 *   credential: { type: 'basic', username: 'myuser', password: 'mypassword' },
 * });
 *
 * const tags = await client.listTags('team/app');
 * const { digest } = await client.getManifest('team/app', 'latest');
 * ```
 */
export class RegistryClient {
    public readonly baseUrl: string;
    private credential?: Credential;
    private dispatcher?: Dispatcher;
    private userAgent: string;
    private timeoutMs: number;
    private pageSize?: number;
    private logger: Logger;

    /**
     * Create a new RegistryClient
     *
     * @param baseUrl - Registry URL; `http://` is assumed when no scheme is given
     */
    constructor(baseUrl: string, options: RegistryClientOptions = {}) {
        this.baseUrl = normalizeRegistryUrl(baseUrl);
        this.credential = options.credential;
        this.dispatcher = options.dispatcher;
        this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
        this.timeoutMs = options.timeoutMs ?? DEFAULT_CLIENT_TIMEOUT_MS;
        this.pageSize = options.pageSize;
        this.logger = options.logger ?? silentLogger;
    }

    /**
     * Host (and port) of the registry, as used in image references
     */
    public get host(): string {
        return new URL(this.baseUrl).host;
    }

    /**
     * Close the client and its dispatcher
     */
    public async close(): Promise<void> {
        if (this.dispatcher) {
            await this.dispatcher.close();
        }
    }

    /**
     * Query the `/v2/` endpoint
     *
     * @returns The API version the registry reports
     * @throws UnauthorizedError when the registry requires other credentials
     *
     * @example
     * ```typescript
     * const { apiVersion } = await client.checkVersion();
     * console.log(apiVersion); // 'registry/2.0'
     * ```
     */
    public async checkVersion(): Promise<VersionInfo> {
        const { response } = await this.get(`${this.baseUrl}/v2/`);
        const apiVersion = response.headers.get('Docker-Distribution-API-Version');
        return apiVersion ? { apiVersion } : {};
    }

    /**
     * List every tag of a repository, following pagination links
     *
     * @param repository - Repository name (e.g., 'library/nginx')
     * @returns Tags in the order the registry sent them
     * @throws ProtocolError when the response names a different repository
     *
     * @example
     * ```typescript
     * const tags = await client.listTags('library/nginx');
     * console.log(tags); // ['1.25', '1.26', 'latest']
     * ```
     */
    public async listTags(repository: string): Promise<string[]> {
        const tags: string[] = [];
        await this.paginate(`/v2/${repository}/tags/list`, (body) => {
            const page = this.parseJson(body, tagsPageSchema, 'tags list');
            if (page.name !== repository) {
                throw new ProtocolError(
                    `Registry returned tags for '${page.name}' but expected '${repository}'`,
                );
            }
            tags.push(...(page.tags ?? []));
        });
        return tags;
    }

    /**
     * List every repository in the registry catalog, following pagination links
     *
     * @example
     * ```typescript
     * const repositories = await client.listRepositories();
     * ```
     */
    public async listRepositories(): Promise<string[]> {
        const repositories: string[] = [];
        await this.paginate('/v2/_catalog', (body) => {
            const page = this.parseJson(body, catalogPageSchema, 'catalog');
            repositories.push(...(page.repositories ?? []));
        });
        return repositories;
    }

    /**
     * Get a manifest or image index
     *
     * @param repository - Repository name
     * @param reference - Tag or digest (e.g., 'latest' or 'sha256:...')
     * @returns The raw document bytes, its media type and its digest. The digest
     * is the requested one when `reference` is a digest, else the one from the
     * Docker-Content-Digest header, else the sha256 of the bytes.
     * @throws ProtocolError when the bytes do not match the digest
     *
     * @example
     * ```typescript
     * const { bytes, mediaType, digest } = await client.getManifest('library/nginx', 'latest');
     * ```
     */
    public async getManifest(
        repository: string,
        reference: string,
    ): Promise<ManifestResponse> {
        const url = `${this.baseUrl}/v2/${repository}/manifests/${reference}`;
        const { response, body } = await this.get(url, { Accept: MANIFEST_ACCEPT });

        const contentType = response.headers.get('Content-Type');
        const mediaType = contentType?.split(';')[0]?.trim() || undefined;

        let digest: Digest;
        if (Digest.isDigest(reference)) {
            digest = Digest.parse(reference);
        } else {
            const header = response.headers.get('Docker-Content-Digest');
            if (!header) {
                return { bytes: body, mediaType, digest: Digest.compute(body) };
            }
            if (!Digest.isDigest(header)) {
                throw new ProtocolError(
                    `Invalid Docker-Content-Digest header '${header}' from ${url}`,
                );
            }
            digest = Digest.parse(header);
        }

        if (!digest.matches(body)) {
            throw new ProtocolError(
                `Manifest from ${url} does not match digest ${digest.toString()}`,
            );
        }
        return { bytes: body, mediaType, digest };
    }

    /**
     * Get a blob, such as an image config
     *
     * @param repository - Repository name
     * @param digest - Blob digest
     * @throws ProtocolError when the bytes do not match the digest
     *
     * @example
     * ```typescript
     * const config = await client.getBlob('library/nginx', manifest.config.digest);
     * ```
     */
    public async getBlob(repository: string, digest: Digest): Promise<Buffer> {
        const url = `${this.baseUrl}/v2/${repository}/blobs/${digest.toString()}`;
        const { body } = await this.get(url);
        if (!digest.matches(body)) {
            throw new ProtocolError(
                `Blob from ${url} does not match digest ${digest.toString()}`,
            );
        }
        return body;
    }

    private async paginate(
        path: string,
        handlePage: (body: Buffer) => void,
    ): Promise<void> {
        const first = new URL(`${this.baseUrl}${path}`);
        if (this.pageSize !== undefined) {
            first.searchParams.set('n', String(this.pageSize));
        }

        const seen = new Set<string>();
        let url: string | undefined = first.toString();
        while (url !== undefined) {
            if (seen.has(url)) {
                throw new ProtocolError(`Pagination loop at ${url}`);
            }
            seen.add(url);

            const { response, body } = await this.get(url);
            handlePage(body);
            const next = extractNextLink(response.headers.get('Link'));
            url = next === undefined ? undefined : this.resolveLink(next);
        }
    }

    private resolveLink(link: string): string {
        if (/^https?:\/\//i.test(link)) {
            return link;
        }
        return `${this.baseUrl}${link.startsWith('/') ? '' : '/'}${link}`;
    }

    private parseJson<T extends z.ZodTypeAny>(
        body: Buffer,
        schema: T,
        what: string,
    ): z.infer<T> {
        let json: unknown;
        try {
            json = JSON.parse(body.toString('utf8'));
        } catch (error) {
            throw new ProtocolError(`Malformed ${what} response`, { cause: error });
        }
        const result = schema.safeParse(json);
        if (!result.success) {
            throw new ProtocolError(`Unexpected ${what} response`, {
                detail: result.error.issues,
            });
        }
        return result.data;
    }

    /**
     * Build request headers with authentication
     */
    private buildHeaders(additional?: Record<string, string>): Record<string, string> {
        const headers: Record<string, string> = {
            'User-Agent': this.userAgent,
            ...additional,
        };
        if (this.credential) {
            headers.Authorization = buildAuthorization(this.credential);
        }
        return headers;
    }

    /**
     * GET `url` and read the whole body under one deadline
     */
    private async get(
        url: string,
        additionalHeaders?: Record<string, string>,
    ): Promise<RawResponse> {
        const signal = AbortSignal.timeout(this.timeoutMs);
        let response: UndiciResponse;
        let body: Buffer;
        try {
            response = await fetch(url, {
                headers: this.buildHeaders(additionalHeaders),
                dispatcher: this.dispatcher,
                signal,
            });
            body = Buffer.from(await response.arrayBuffer());
        } catch (error) {
            if (error instanceof RegistryError) {
                throw error;
            }
            const timedOut =
                error instanceof Error &&
                (error.name === 'TimeoutError' || signal.aborted);
            throw new TransportError(
                timedOut
                    ? `Request to ${url} timed out after ${this.timeoutMs}ms`
                    : `Request to ${url} failed: ${getErrorMessage(error) ?? 'unknown error'}`,
                { cause: error },
            );
        }

        this.logger.debug('Registry request', { url, status: response.status });
        this.handleResponse(url, response, body);
        return { response, body };
    }

    /**
     * Map a non-2xx response to its error class
     */
    private handleResponse(url: string, response: UndiciResponse, body: Buffer): void {
        if (response.ok) {
            return;
        }

        const status = response.status;
        let errorMessage = `Registry request to ${url} failed: ${status} ${response.statusText}`;
        let detail: unknown = undefined;

        const contentType = response.headers.get('Content-Type');
        if (contentType?.includes('json')) {
            const envelope = this.decodeErrorEnvelope(body);
            const firstError = envelope?.errors[0];
            if (firstError) {
                errorMessage = `${firstError.message ?? firstError.code} (${firstError.code})`;
                detail = firstError;
            }
        }

        if (status === 401 || status === 403) {
            const header = response.headers.get('WWW-Authenticate');
            throw new UnauthorizedError(errorMessage, {
                statusCode: status,
                detail,
                challenge: header ? parseAuthChallenge(header) : undefined,
            });
        }
        if (status === 404) {
            throw new NotFoundError(errorMessage, { statusCode: status, detail });
        }
        if (status === 429) {
            throw new RateLimitedError(errorMessage, {
                statusCode: status,
                detail,
                retryAfterMs: parseRetryAfter(response.headers.get('Retry-After')),
            });
        }
        if (status >= 500) {
            throw new TransportError(errorMessage, { statusCode: status, detail });
        }
        throw new ProtocolError(errorMessage, { statusCode: status, detail });
    }

    private decodeErrorEnvelope(
        body: Buffer,
    ): z.infer<typeof errorEnvelopeSchema> | undefined {
        try {
            const result = errorEnvelopeSchema.safeParse(
                JSON.parse(body.toString('utf8')),
            );
            return result.success ? result.data : undefined;
        } catch {
            // Not JSON after all; keep the status line as the message
            return undefined;
        }
    }
}
