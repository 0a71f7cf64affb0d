import { Digest } from './digest.js';
import { ValidationError } from './errors.js';

export const DEFAULT_REGISTRY = 'docker.io';

const DOCKER_HUB_HOSTS = new Set([
    'docker.io',
    'index.docker.io',
    'registry-1.docker.io',
]);

const DOMAIN_LABEL = '(?:[a-zA-Z0-9]|[a-zA-Z0-9][a-zA-Z0-9-]*[a-zA-Z0-9])';
const DOMAIN_PATTERN = new RegExp(
    `^(?:${DOMAIN_LABEL}(?:\\.${DOMAIN_LABEL})*|\\[[a-fA-F0-9:]+\\])(?::[0-9]+)?$`,
);
const PATH_COMPONENT_PATTERN = /^[a-z0-9]+(?:(?:[._]|__|-+)[a-z0-9]+)*$/;
const TAG_PATTERN = /^[A-Za-z0-9_][A-Za-z0-9_.-]{0,127}$/;
const MAX_REPOSITORY_LENGTH = 255;

export interface ReferenceParts {
    registry: string;
    repository: string;
    tag?: string;
    digest?: Digest | string;
}

export interface ParseReferenceOptions {
    // Registry to use when the input names none. Defaults to docker.io.
    defaultRegistry?: string;
}

export function isDockerHub(registry: string): boolean {
    return DOCKER_HUB_HOSTS.has(registry.toLowerCase());
}

export function sameRegistry(a: string, b: string): boolean {
    if (isDockerHub(a) && isDockerHub(b)) {
        return true;
    }
    return a.toLowerCase() === b.toLowerCase();
}

// The first path segment names a registry only when it looks like a host.
function isDomainSegment(segment: string): boolean {
    return (
        segment.includes('.') ||
        segment.includes(':') ||
        segment === 'localhost' ||
        segment.toLowerCase() !== segment
    );
}

function validateRegistry(registry: string, input: string): void {
    if (!DOMAIN_PATTERN.test(registry)) {
        throw new ValidationError(
            `Invalid image reference '${input}': invalid registry '${registry}'`,
        );
    }
}

function validateRepository(repository: string, input: string): void {
    if (repository === '') {
        throw new ValidationError(
            `Invalid image reference '${input}': repository is empty`,
        );
    }
    if (repository.length > MAX_REPOSITORY_LENGTH) {
        throw new ValidationError(
            `Invalid image reference '${input}': repository exceeds ${MAX_REPOSITORY_LENGTH} characters`,
        );
    }
    for (const segment of repository.split('/')) {
        if (segment === '') {
            throw new ValidationError(
                `Invalid image reference '${input}': empty repository path segment`,
            );
        }
        if (!PATH_COMPONENT_PATTERN.test(segment)) {
            throw new ValidationError(
                `Invalid image reference '${input}': invalid repository path segment '${segment}'`,
            );
        }
    }
}

function validateTag(tag: string, input: string): void {
    if (!TAG_PATTERN.test(tag)) {
        throw new ValidationError(
            `Invalid image reference '${input}': invalid tag '${tag}'`,
        );
    }
}

function toDigest(digest: Digest | string, input: string): Digest {
    if (digest instanceof Digest) {
        return digest;
    }
    try {
        return Digest.parse(digest);
    } catch (error) {
        throw new ValidationError(
            `Invalid image reference '${input}': malformed digest`,
            { cause: error },
        );
    }
}

/**
 * Image reference: `[registry/]repository[:tag][@digest]`.
 *
 * Parsed with the distribution reference grammar. The repository is kept
 * exactly as written; Docker Hub's implicit `library/` namespace is only added
 * on request through {@link Reference.repositoryForRegistry}.
 */
export class Reference {
    public readonly registry: string;
    public readonly repository: string;
    public readonly tag?: string;
    public readonly digest?: Digest;

    private constructor(
        registry: string,
        repository: string,
        tag?: string,
        digest?: Digest,
    ) {
        this.registry = registry;
        this.repository = repository;
        this.tag = tag;
        this.digest = digest;
    }

    /**
     * Parse a reference string
     *
     * @param input - e.g. `ghcr.io/org/app:1.2`, `localhost:5000/app@sha256:...`
     * @throws ValidationError on empty segments, an invalid tag or a malformed digest
     *
     * @example
     * ```typescript
     * const ref = Reference.parse('ghcr.io/org/app:1.2');
     * ref.registry; // 'ghcr.io'
     * ref.repository; // 'org/app'
     * ref.tag; // '1.2'
     * ```
     */
    static parse(input: string, options: ParseReferenceOptions = {}): Reference {
        if (input === '') {
            throw new ValidationError('Invalid image reference: empty string');
        }

        let remainder = input;
        let digest: Digest | undefined;
        const at = remainder.indexOf('@');
        if (at !== -1) {
            digest = toDigest(remainder.substring(at + 1), input);
            remainder = remainder.substring(0, at);
        }

        let tag: string | undefined;
        const colon = remainder.lastIndexOf(':');
        if (colon > remainder.lastIndexOf('/')) {
            tag = remainder.substring(colon + 1);
            remainder = remainder.substring(0, colon);
            validateTag(tag, input);
        }

        let registry = options.defaultRegistry ?? DEFAULT_REGISTRY;
        let repository = remainder;
        const slash = remainder.indexOf('/');
        if (slash !== -1 && isDomainSegment(remainder.substring(0, slash))) {
            registry = remainder.substring(0, slash);
            repository = remainder.substring(slash + 1);
        }

        validateRegistry(registry, input);
        validateRepository(repository, input);

        return new Reference(registry, repository, tag, digest);
    }

    /**
     * Build a reference from parts that are already split, with the same validation as parse
     */
    static from(parts: ReferenceParts): Reference {
        const display = `${parts.registry}/${parts.repository}`;
        validateRegistry(parts.registry, display);
        validateRepository(parts.repository, display);
        if (parts.tag !== undefined) {
            validateTag(parts.tag, display);
        }
        const digest =
            parts.digest === undefined
                ? undefined
                : toDigest(parts.digest, display);
        return new Reference(parts.registry, parts.repository, parts.tag, digest);
    }

    /**
     * What goes in the manifests URL: the digest when present, else the tag, else `latest`
     */
    get identifier(): string {
        return this.digest?.toString() ?? this.tag ?? 'latest';
    }

    /**
     * Repository path to send to the registry.
     *
     * With `dockerhubCompat` on, single-segment Docker Hub names get the
     * `library/` namespace (`alpine` becomes `library/alpine`).
     */
    repositoryForRegistry(dockerhubCompat: boolean): string {
        if (
            dockerhubCompat &&
            isDockerHub(this.registry) &&
            !this.repository.includes('/')
        ) {
            return `library/${this.repository}`;
        }
        return this.repository;
    }

    withDigest(digest: Digest): Reference {
        return new Reference(this.registry, this.repository, this.tag, digest);
    }

    equals(other: Reference): boolean {
        const sameDigest =
            this.digest === undefined || other.digest === undefined
                ? this.digest === other.digest
                : this.digest.equals(other.digest);
        return (
            this.registry === other.registry &&
            this.repository === other.repository &&
            this.tag === other.tag &&
            sameDigest
        );
    }

    toString(): string {
        let value = `${this.registry}/${this.repository}`;
        if (this.tag !== undefined) {
            value += `:${this.tag}`;
        }
        if (this.digest !== undefined) {
            value += `@${this.digest.toString()}`;
        }
        return value;
    }
}
