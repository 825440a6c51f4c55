import { UnsupportedVersionError } from './errors';
import type { VersionComparator } from './types';

/**
 * Segment-wise ordering for version strings with no formal scheme (image
 * tags, provider pins, maven coordinates). Digit runs compare numerically,
 * letter runs by code unit, and a trailing letter run marks a pre-release:
 * `1.0rc1 < 1.0 < 1.0.1`.
 */
export class GenericComparator implements VersionComparator {
    readonly scheme = 'generic' as const;

    isValid(version: string): boolean {
        return tokenize(version) !== null;
    }

    compare(left: string, right: string): number {
        const a = this.tokensOrThrow(left);
        const b = this.tokensOrThrow(right);

        const length = Math.max(a.length, b.length);
        for (let i = 0; i < length; i += 1) {
            const x = a[i];
            const y = b[i];

            if (x === undefined) {
                return isNumeric(y) ? -1 : 1;
            }
            if (y === undefined) {
                return isNumeric(x) ? 1 : -1;
            }

            const xNumeric = isNumeric(x);
            const yNumeric = isNumeric(y);
            if (xNumeric && yNumeric) {
                const diff = Number.parseInt(x, 10) - Number.parseInt(y, 10);
                if (diff !== 0) return diff;
                continue;
            }

            if (xNumeric) return 1;
            if (yNumeric) return -1;
            if (x !== y) return x < y ? -1 : 1;
        }

        return 0;
    }

    private tokensOrThrow(version: string): string[] {
        const tokens = tokenize(version);
        if (tokens === null) {
            throw new UnsupportedVersionError('UNPARSABLE_VERSION', `"${version}" has no comparable version segments.`, {
                version,
                scheme: this.scheme,
            });
        }

        return tokens;
    }
}

function tokenize(version: string): string[] | null {
    const tokens = version.trim().toLowerCase().replace(/^v(?=\d)/, '').match(/\d+|[a-z]+/g);
    if (!tokens || !tokens.some(isNumeric)) {
        return null;
    }

    return tokens;
}

function isNumeric(token: string | undefined): boolean {
    return token !== undefined && /^\d+$/.test(token);
}
