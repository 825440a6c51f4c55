import { createHash } from 'node:crypto';

import { IdentityGenerationError } from './errors';
import type { CanonicalHashInput } from './types';

type UnknownRecord = Record<string, unknown>;

export function buildCanonicalHash(input: CanonicalHashInput): string {
    if (!isRecord(input)) {
        throw new IdentityGenerationError('INVALID_IDENTITY_INPUT', 'Canonical hash input must be an object.');
    }

    return sha256Hex(stableStringify(input));
}

export function sha256Hex(input: string | Buffer): string {
    return createHash('sha256').update(input).digest('hex');
}

export function stableStringify(input: unknown, spaces = 0): string {
    return JSON.stringify(canonicalize(input), null, spaces);
}

function canonicalize(value: unknown): unknown {
    if (value === undefined) {
        return null;
    }

    if (value === null || typeof value !== 'object') {
        return value;
    }

    if (Array.isArray(value)) {
        return value.map((entry) => canonicalize(entry));
    }

    return Object.entries(value)
        .sort(([left], [right]) => compareAscii(left, right))
        .reduce<UnknownRecord>((acc, [key, entry]) => {
            acc[key] = canonicalize(entry);
            return acc;
        }, {});
}

/** Code-unit ordering; unlike localeCompare it does not move with the host locale. */
export function compareAscii(left: string, right: string): number {
    if (left === right) {
        return 0;
    }

    return left < right ? -1 : 1;
}

function isRecord(value: unknown): value is UnknownRecord {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}
