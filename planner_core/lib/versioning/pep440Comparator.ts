import { UnsupportedVersionError } from './errors';
import type { VersionComparator } from './types';

const PEP440_PATTERN = new RegExp(
    '^v?'
    + '(?:(\\d+)!)?'
    + '(\\d+(?:\\.\\d+)*)'
    + '(?:[-_.]?(a|alpha|b|beta|rc|c|pre|preview)[-_.]?(\\d+)?)?'
    + '(?:-(\\d+)|[-_.]?(post|rev|r)[-_.]?(\\d+)?)?'
    + '(?:[-_.]?(dev)[-_.]?(\\d+)?)?'
    + '(?:\\+([a-z0-9]+(?:[-_.][a-z0-9]+)*))?$',
    'i',
);

const PRE_RELEASE_RANK: Record<string, number> = {
    a: 0,
    alpha: 0,
    b: 1,
    beta: 1,
    rc: 2,
    c: 2,
    pre: 2,
    preview: 2,
};

export interface ParsedPep440 {
    epoch: number;
    release: number[];
    pre: { rank: number; number: number } | null;
    post: number | null;
    dev: number | null;
    local: string[] | null;
}

export function parsePep440(version: string): ParsedPep440 | null {
    const match = PEP440_PATTERN.exec(version.trim());
    if (!match) {
        return null;
    }

    const [, epoch, release, preLabel, preNumber, implicitPost, postLabel, postNumber, devLabel, devNumber, local] = match;

    let post: number | null = null;
    if (implicitPost !== undefined) {
        post = Number.parseInt(implicitPost, 10);
    } else if (postLabel !== undefined) {
        post = postNumber === undefined ? 0 : Number.parseInt(postNumber, 10);
    }

    return {
        epoch: epoch === undefined ? 0 : Number.parseInt(epoch, 10),
        release: release.split('.').map((part) => Number.parseInt(part, 10)),
        pre: preLabel === undefined
            ? null
            : {
                rank: PRE_RELEASE_RANK[preLabel.toLowerCase()] ?? 0,
                number: preNumber === undefined ? 0 : Number.parseInt(preNumber, 10),
            },
        post,
        dev: devLabel === undefined ? null : (devNumber === undefined ? 0 : Number.parseInt(devNumber, 10)),
        local: local === undefined ? null : local.toLowerCase().split(/[-_.]/),
    };
}

export function compareParsedPep440(left: ParsedPep440, right: ParsedPep440): number {
    if (left.epoch !== right.epoch) {
        return left.epoch - right.epoch;
    }

    const byRelease = compareNumberLists(left.release, right.release);
    if (byRelease !== 0) {
        return byRelease;
    }

    const byPre = compareNumberLists(preKey(left), preKey(right));
    if (byPre !== 0) {
        return byPre;
    }

    const byPost = (left.post ?? -1) - (right.post ?? -1);
    if (byPost !== 0) {
        return byPost;
    }

    const byDev = compareDev(left.dev, right.dev);
    if (byDev !== 0) {
        return byDev;
    }

    return compareLocal(left.local, right.local);
}

/** A dev-only release (`1.0.dev1`) sorts before every pre-release of the same version. */
function preKey(version: ParsedPep440): number[] {
    if (version.pre === null && version.post === null && version.dev !== null) {
        return [-1, 0];
    }

    if (version.pre === null) {
        return [3, 0];
    }

    return [version.pre.rank, version.pre.number];
}

/** A release without a dev segment sorts after any dev build of it. */
function compareDev(left: number | null, right: number | null): number {
    if (left === right) return 0;
    if (left === null) return 1;
    if (right === null) return -1;
    return left - right;
}

function compareNumberLists(left: number[], right: number[]): number {
    const length = Math.max(left.length, right.length);
    for (let i = 0; i < length; i += 1) {
        const diff = (left[i] ?? 0) - (right[i] ?? 0);
        if (diff !== 0) {
            return diff;
        }
    }

    return 0;
}

function compareLocal(left: string[] | null, right: string[] | null): number {
    if (left === null && right === null) return 0;
    if (left === null) return -1;
    if (right === null) return 1;

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

        if (aNumeric) return 1;
        if (bNumeric) return -1;
        if (a !== b) return a < b ? -1 : 1;
    }

    return 0;
}

export class Pep440Comparator implements VersionComparator {
    readonly scheme = 'pep440' as const;

    isValid(version: string): boolean {
        return parsePep440(version) !== null;
    }

    compare(left: string, right: string): number {
        return compareParsedPep440(this.parseOrThrow(left), this.parseOrThrow(right));
    }

    private parseOrThrow(version: string): ParsedPep440 {
        const parsed = parsePep440(version);
        if (parsed === null) {
            throw new UnsupportedVersionError('UNPARSABLE_VERSION', `"${version}" is not a PEP 440 version.`, {
                version,
                scheme: this.scheme,
            });
        }

        return parsed;
    }
}
