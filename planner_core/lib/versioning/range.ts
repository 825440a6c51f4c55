import { UnsupportedVersionError } from './errors';
import type { RangeConstraint, RangeOperator, VersionComparator, VersionRange } from './types';

const INTERVAL_PATTERN = /^([[(])\s*([^,]*?)\s*,\s*([^\])]*?)\s*([\])])$/;
const OSV_EVENT_PATTERN = /^(introduced|fixed|last_affected|limit)\s*[:=]\s*(\S+)$/i;
const COMPARATOR_PATTERN = /(<=|>=|!=|==|<|>|=)?\s*([^\s,<>=!]+)/g;
const ANY_VERSION = new Set(['*', 'x', 'all', 'any']);

/**
 * Parses the range syntaxes feeds emit into one comparator model:
 *
 * - `>= 1.0.0, < 1.2.3` and `< 2.11.2 >= 0` (constraints AND-ed)
 * - `< 1.0 || >= 2.0 < 2.1` (sets OR-ed)
 * - `[1.0,2.0)` interval notation, either bound may be empty
 * - `introduced:0 fixed:1.2.0 introduced:2.0.0 fixed:2.1.0` OSV range events,
 *   each `introduced` opening an interval of its own
 * - `1.4.2` (exact) and `*` (every version)
 */
export function parseVersionRange(raw: string): VersionRange {
    const trimmed = raw.trim();
    if (trimmed.length === 0) {
        throw new UnsupportedVersionError('INVALID_RANGE', 'Affected range is empty.', { range: raw });
    }

    const sets = trimmed
        .split('||')
        .map((part) => part.trim())
        .filter((part) => part.length > 0)
        .flatMap((part) => parseConstraintSets(part, raw));

    if (sets.length === 0) {
        throw new UnsupportedVersionError('INVALID_RANGE', `Affected range "${raw}" has no constraints.`, { range: raw });
    }

    return { raw: trimmed, sets };
}

function parseConstraintSets(part: string, raw: string): RangeConstraint[][] {
    if (ANY_VERSION.has(part.toLowerCase())) {
        return [[{ operator: '*' }]];
    }

    const interval = INTERVAL_PATTERN.exec(part);
    if (interval) {
        return [parseInterval(interval)];
    }

    const tokens = part.split(/[\s,]+/).filter((token) => token.length > 0);
    if (tokens.length > 0 && tokens.every((token) => OSV_EVENT_PATTERN.test(token))) {
        return parseOsvEvents(tokens, raw);
    }

    const constraints: RangeConstraint[] = [];
    for (const match of part.matchAll(COMPARATOR_PATTERN)) {
        const operator = toOperator(match[1]);
        const version = match[2];
        if (ANY_VERSION.has(version.toLowerCase())) {
            constraints.push({ operator: '*' });
            continue;
        }
        constraints.push({ operator, version });
    }

    if (constraints.length === 0) {
        throw new UnsupportedVersionError('INVALID_RANGE', `Unable to read constraints from "${part}".`, { range: raw });
    }

    return [constraints];
}

function parseInterval(match: RegExpExecArray): RangeConstraint[] {
    const [, open, lower, upper, close] = match;
    const constraints: RangeConstraint[] = [];

    if (lower.length > 0) {
        constraints.push({ operator: open === '[' ? '>=' : '>', version: lower });
    }

    if (upper.length > 0) {
        constraints.push({ operator: close === ']' ? '<=' : '<', version: upper });
    }

    if (constraints.length === 0) {
        constraints.push({ operator: '*' });
    }

    return constraints;
}

/**
 * Events are read in order: `introduced` opens an interval and the next
 * `fixed`, `last_affected` or `limit` closes it. A closing event with no
 * open interval starts from the first release; an interval left open has
 * no upper bound.
 */
function parseOsvEvents(tokens: string[], raw: string): RangeConstraint[][] {
    const sets: RangeConstraint[][] = [];
    let open: RangeConstraint[] | null = null;

    for (const token of tokens) {
        const match = OSV_EVENT_PATTERN.exec(token);
        if (!match) {
            throw new UnsupportedVersionError('INVALID_RANGE', `Unexpected range event "${token}".`, { range: raw });
        }

        const event = match[1].toLowerCase();
        const version = match[2];

        if (event === 'introduced') {
            if (open) {
                sets.push(open);
            }
            // introduced:0 means "from the first release"
            open = version === '0' ? [] : [{ operator: '>=', version }];
            continue;
        }

        const upper: RangeConstraint = event === 'last_affected'
            ? { operator: '<=', version }
            : { operator: '<', version };
        sets.push([...(open ?? []), upper]);
        open = null;
    }

    if (open) {
        sets.push(open);
    }

    return sets.map((set) => (set.length > 0 ? set : [{ operator: '*' }]));
}

function toOperator(token: string | undefined): RangeOperator {
    switch (token) {
        case '<':
        case '<=':
        case '>':
        case '>=':
        case '!=':
            return token;
        default:
            return '=';
    }
}

/** Every version named in the range, in order of appearance. */
export function rangeVersions(range: VersionRange): string[] {
    return range.sets.flatMap((set) => set.flatMap((constraint) => (constraint.operator === '*' ? [] : [constraint.version])));
}

/**
 * True when some set in the range admits `version`. Throws
 * `UnsupportedVersionError` when the comparator cannot parse a version.
 */
export function rangeContains(range: VersionRange, version: string, comparator: VersionComparator): boolean {
    return range.sets.some((set) => set.every((constraint) => satisfies(constraint, version, comparator)));
}

function satisfies(constraint: RangeConstraint, version: string, comparator: VersionComparator): boolean {
    if (constraint.operator === '*') {
        return true;
    }

    const diff = comparator.compare(version, constraint.version);
    switch (constraint.operator) {
        case '<':
            return diff < 0;
        case '<=':
            return diff <= 0;
        case '>':
            return diff > 0;
        case '>=':
            return diff >= 0;
        case '=':
            return diff === 0;
        case '!=':
            return diff !== 0;
        default:
            return false;
    }
}
