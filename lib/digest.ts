import { createHash, timingSafeEqual } from 'node:crypto';
import { ValidationError } from './errors.js';

/**
 * Supported hash algorithms and the hex length of their output
 */
export const DigestAlgorithms = {
    sha256: 64,
    sha512: 128,
} as const;

export type DigestAlgorithm = keyof typeof DigestAlgorithms;

function isDigestAlgorithm(value: string): value is DigestAlgorithm {
    return Object.prototype.hasOwnProperty.call(DigestAlgorithms, value);
}

const HEX_PATTERN = /^[0-9a-f]+$/;

/**
 * Content digest in `algorithm:hex` form.
 *
 * Instances only exist for syntactically valid digests: the constructor is
 * private and every instance comes from {@link Digest.parse} or
 * {@link Digest.compute}. Syntax is all this type checks; whether a payload
 * actually hashes to a digest is answered by {@link Digest.matches}.
 *
 * @example
 * ```typescript
 * const digest = Digest.parse('sha256:7173b809ca12ec5dee4506cd86be934c4596dd234ee82c0662eac04a8c2c71dc');
 * digest.algorithm; // 'sha256'
 * digest.toString(); // same string
 * ```
 */
export class Digest {
    public readonly algorithm: DigestAlgorithm;
    public readonly hex: string;

    private constructor(algorithm: DigestAlgorithm, hex: string) {
        this.algorithm = algorithm;
        this.hex = hex;
    }

    /**
     * Parse and validate a digest string
     *
     * @param value - Digest such as `sha256:<64 hex>`
     * @throws ValidationError when the separator, algorithm or hex payload is invalid
     */
    static parse(value: string): Digest {
        const parts = value.split(':');
        if (parts.length !== 2) {
            throw new ValidationError(
                `Invalid digest '${value}': expected exactly one ':' separator`,
            );
        }
        const [algorithm = '', hex = ''] = parts;
        if (!isDigestAlgorithm(algorithm)) {
            throw new ValidationError(
                `Invalid digest '${value}': unsupported algorithm '${algorithm}'`,
            );
        }
        const expectedLength = DigestAlgorithms[algorithm];
        if (hex.length !== expectedLength || !HEX_PATTERN.test(hex)) {
            throw new ValidationError(
                `Invalid digest '${value}': ${algorithm} requires ${expectedLength} lowercase hex characters`,
            );
        }
        return new Digest(algorithm, hex);
    }

    static isDigest(value: string): boolean {
        try {
            Digest.parse(value);
            return true;
        } catch {
            return false;
        }
    }

    /**
     * Hash a payload
     */
    static compute(
        content: Uint8Array | string,
        algorithm: DigestAlgorithm = 'sha256',
    ): Digest {
        const hex = createHash(algorithm).update(content).digest('hex');
        return new Digest(algorithm, hex);
    }

    /**
     * Whether `content` hashes to this digest, using this digest's algorithm
     */
    matches(content: Uint8Array | string): boolean {
        const computed = Digest.compute(content, this.algorithm);
        return timingSafeEqual(
            Buffer.from(computed.hex, 'hex'),
            Buffer.from(this.hex, 'hex'),
        );
    }

    equals(other: Digest): boolean {
        return this.algorithm === other.algorithm && this.hex === other.hex;
    }

    toString(): string {
        return `${this.algorithm}:${this.hex}`;
    }

    toJSON(): string {
        return this.toString();
    }
}
