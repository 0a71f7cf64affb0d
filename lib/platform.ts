import { ValidationError } from './errors.js';
import type { RegistryPlatform } from './types/index.js';

export interface PlatformSelector {
    os: string;
    architecture: string;
    variant?: string;
}

const SEGMENT_PATTERN = /^[a-z0-9_.-]+$/i;

/**
 * Parse an `os/architecture[/variant]` selector such as `linux/arm64/v8`
 */
export function parsePlatform(value: string): PlatformSelector {
    const parts = value.split('/');
    if (
        parts.length < 2 ||
        parts.length > 3 ||
        !parts.every((part) => SEGMENT_PATTERN.test(part))
    ) {
        throw new ValidationError(
            `Invalid platform '${value}': expected os/architecture[/variant]`,
        );
    }
    const [os = '', architecture = '', variant] = parts;
    return variant === undefined ? { os, architecture } : { os, architecture, variant };
}

// A selector without a variant matches every variant of its architecture.
export function matchesPlatform(
    platform: RegistryPlatform,
    selector: PlatformSelector,
): boolean {
    if (platform.os !== selector.os || platform.architecture !== selector.architecture) {
        return false;
    }
    return selector.variant === undefined || platform.variant === selector.variant;
}

export function formatPlatform(platform: PlatformSelector | RegistryPlatform): string {
    const base = `${platform.os}/${platform.architecture}`;
    return platform.variant ? `${base}/${platform.variant}` : base;
}
