import { UnsupportedVersionError } from './errors';
import type { VersionComparator } from './types';

const SEMVER_PATTERN = /^v?(\d+)(?:\.(\d+))?(?:\.(\d+))?(?:-([0-9A-Za-z-]+(?:\.[0-9A-Za-z-]+)*))?(?:\+[0-9A-Za-z-]+(?:\.[0-9A-Za-z-]+)*)?$/;

export interface ParsedSemver {
    major: number;
    minor: number;
    patch: number;
    prerelease: string[];
}

/**
 * Lenient semantic versions: a leading `v` or `=` and missing minor/patch
 * parts are accepted (`1.2` reads as `1.2.0`); build metadata is ignored.
 */
export function parseSemver(version: string): ParsedSemver | null {
    const trimmed = version.trim().replace(/^=+/, '');
    if (/\.\./.test(trimmed)) {
        return null;
    }

    const match = SEMVER_PATTERN.exec(trimmed);
    if (!match) {
        return null;
    }

    return {
        major: Number.parseInt(match[1], 10),
        minor: match[2] === undefined ? 0 : Number.parseInt(match[2], 10),
        patch: match[3] === undefined ? 0 : Number.parseInt(match[3], 10),
        prerelease: match[4] === undefined ? [] : match[4].split('.'),
    };
}

export function compareParsedSemver(left: ParsedSemver, right: ParsedSemver): number {
    if (left.major !== right.major) return left.major - right.major;
    if (left.minor !== right.minor) return left.minor - right.minor;
    if (left.patch !== right.patch) return left.patch - right.patch;

    return comparePrerelease(left.prerelease, right.prerelease);
}

function comparePrerelease(left: string[], right: string[]): number {
    // 1.0.0-alpha < 1.0.0
    if (left.length === 0 && right.length === 0) return 0;
    if (left.length === 0) return 1;
    if (right.length === 0) return -1;

    const length = Math.max(left.length, right.length);
    for (let i = 0; i < length; i += 1) {
        const a = left[i];
        const b = right[i];
        if (a === undefined) return -1;
        if (b === undefined) return 1;

        const aNumeric = /^\d+$/.test(a);
        const bNumeric = /^\d+$/.test(b);

        if (aNumeric && bNumeric) {
            const diff = Number.parseInt(a, 10) - Number.parseInt(b, 10);
            if (diff !== 0) return diff;
            continue;
        }

        // Numeric identifiers have lower precedence than alphanumeric ones.
        if (aNumeric) return -1;
        if (bNumeric) return 1;
        if (a !== b) return a < b ? -1 : 1;
    }

    return 0;
}

export class SemverComparator implements VersionComparator {
    readonly scheme = 'semver' as const;

    isValid(version: string): boolean {
        return parseSemver(version) !== null;
    }

    compare(left: string, right: string): number {
        return compareParsedSemver(this.parseOrThrow(left), this.parseOrThrow(right));
    }

    private parseOrThrow(version: string): ParsedSemver {
        const parsed = parseSemver(version);
        if (parsed === null) {
            throw new UnsupportedVersionError('UNPARSABLE_VERSION', `"${version}" is not a semantic version.`, {
                version,
                scheme: this.scheme,
            });
        }

        return parsed;
    }
}
