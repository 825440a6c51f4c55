import { UnsupportedVersionError } from './errors';
import { compareParsedSemver, parseSemver } from './semverComparator';
import type { ParsedSemver } from './semverComparator';
import type { VersionComparator } from './types';

// vX.0.0-yyyymmddhhmmss-abcdefabcdef, vX.Y.Z-pre.0.yyyymmddhhmmss-..., vX.Y.(Z+1)-0.yyyymmddhhmmss-...
const PSEUDO_VERSION_SUFFIX = /(?:^|\.)(\d{14})-([0-9a-f]{12})$/;

export interface ParsedGoVersion {
    semver: ParsedSemver;
    pseudoTimestamp: string | null;
}

export function parseGoVersion(version: string): ParsedGoVersion | null {
    const stripped = version.trim().replace(/\+incompatible$/, '');
    const semver = parseSemver(stripped);
    if (semver === null) {
        return null;
    }

    const pseudo = PSEUDO_VERSION_SUFFIX.exec(semver.prerelease.join('.'));

    return {
        semver,
        pseudoTimestamp: pseudo ? pseudo[1] : null,
    };
}

export function isPseudoVersion(version: string): boolean {
    return parseGoVersion(version)?.pseudoTimestamp != null;
}

export class GoModuleComparator implements VersionComparator {
    readonly scheme = 'go' as const;

    isValid(version: string): boolean {
        return parseGoVersion(version) !== null;
    }

    compare(left: string, right: string): number {
        const a = this.parseOrThrow(left);
        const b = this.parseOrThrow(right);

        if (a.pseudoTimestamp !== null && b.pseudoTimestamp !== null && sameCore(a.semver, b.semver)) {
            if (a.pseudoTimestamp !== b.pseudoTimestamp) {
                return a.pseudoTimestamp < b.pseudoTimestamp ? -1 : 1;
            }
            return 0;
        }

        return compareParsedSemver(a.semver, b.semver);
    }

    private parseOrThrow(version: string): ParsedGoVersion {
        const parsed = parseGoVersion(version);
        if (parsed === null) {
            throw new UnsupportedVersionError('UNPARSABLE_VERSION', `"${version}" is not a Go module version.`, {
                version,
                scheme: this.scheme,
            });
        }

        return parsed;
    }
}

function sameCore(left: ParsedSemver, right: ParsedSemver): boolean {
    return left.major === right.major && left.minor === right.minor && left.patch === right.patch;
}
