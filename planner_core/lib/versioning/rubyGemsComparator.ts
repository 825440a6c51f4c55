import { UnsupportedVersionError } from './errors';
import type { VersionComparator } from './types';

const GEM_VERSION_PATTERN = /^[0-9]+(?:\.[0-9A-Za-z]+)*(?:-[0-9A-Za-z-]+(?:\.[0-9A-Za-z-]+)*)?(?:\+[0-9A-Za-z.-]+)?$/;

export type GemSegment = number | string;

/**
 * RubyGems-style segments: any number of dot-separated parts, digit and
 * letter runs split apart, `-` read as `.pre.`. Trailing zeros are dropped
 * from the release and pre-release parts, so `1.0 == 1.0.0`. NuGet's
 * four-part versions (`4.0.0.0`, `4.0.0-beta`) read the same way.
 */
export function parseGemVersion(version: string): GemSegment[] | null {
    const trimmed = version.trim().replace(/^v(?=\d)/, '');
    if (!GEM_VERSION_PATTERN.test(trimmed)) {
        return null;
    }

    const withoutBuild = trimmed.replace(/\+.*$/, '');
    const tokens = withoutBuild.replace(/-/g, '.pre.').match(/\d+|[a-z]+/gi) ?? [];
    const segments = tokens.map((token): GemSegment => (/^\d+$/.test(token) ? Number.parseInt(token, 10) : token));

    const firstLabel = segments.findIndex((segment) => typeof segment === 'string');
    if (firstLabel === -1) {
        return dropTrailingZeros(segments);
    }

    return [...dropTrailingZeros(segments.slice(0, firstLabel)), ...dropTrailingZeros(segments.slice(firstLabel))];
}

function dropTrailingZeros(segments: GemSegment[]): GemSegment[] {
    let end = segments.length;
    while (end > 0 && segments[end - 1] === 0) {
        end -= 1;
    }
    return segments.slice(0, end);
}

/** A label sorts before any number, so `2.0.0.pre < 2.0.0 < 2.0.0.1`. */
export function compareGemSegments(left: GemSegment[], right: GemSegment[]): number {
    const length = Math.max(left.length, right.length);
    for (let i = 0; i < length; i += 1) {
        const x = left[i] ?? 0;
        const y = right[i] ?? 0;
        if (x === y) {
            continue;
        }

        if (typeof x === 'number' && typeof y === 'number') return x - y;
        if (typeof x === 'string' && typeof y === 'string') return x < y ? -1 : 1;
        return typeof x === 'string' ? -1 : 1;
    }

    return 0;
}

export class RubyGemsComparator implements VersionComparator {
    readonly scheme = 'rubygems' as const;

    isValid(version: string): boolean {
        return parseGemVersion(version) !== null;
    }

    compare(left: string, right: string): number {
        return compareGemSegments(this.parseOrThrow(left), this.parseOrThrow(right));
    }

    private parseOrThrow(version: string): GemSegment[] {
        const parsed = parseGemVersion(version);
        if (parsed === null) {
            throw new UnsupportedVersionError('UNPARSABLE_VERSION', `"${version}" is not a RubyGems version.`, {
                version,
                scheme: this.scheme,
            });
        }
        return parsed;
    }
}
