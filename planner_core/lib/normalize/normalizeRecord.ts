import { selectCanonicalVulnId } from '../identity';
import type { RawFindingRecord } from '../types';
import { isKevRecord } from '../types';
import type { VersionRange } from '../versioning';
import {
    UnsupportedVersionError,
    canonicalEcosystem,
    createDefaultComparatorRegistry,
    normalizePackageName,
    parseVersionRange,
    rangeVersions,
} from '../versioning';
import { UnparsableRecordError } from './errors';
import { resolveExploitability, resolveSeverity } from './severity';
import type { FindingFragment, NormalizeOptions } from './types';

const DEFAULT_COMPARATORS = createDefaultComparatorRegistry();

/**
 * Converts one feed record into a canonical fragment. Pure; throws
 * `UnparsableRecordError` when the record has no usable identifier, package
 * or affected range.
 */
export function normalize(record: RawFindingRecord, options: NormalizeOptions = {}): FindingFragment {
    const comparators = options.comparators ?? DEFAULT_COMPARATORS;
    const sourceId = text(record.sourceId);
    const context = {
        sourceId,
        vulnId: text(record.vulnId),
        packageName: text(record.packageName),
    };

    const { vulnId, aliases } = selectCanonicalVulnId(text(record.vulnId), stringList(record.aliases));
    if (vulnId.length === 0) {
        throw new UnparsableRecordError('MISSING_VULN_ID', `Record from ${sourceId || 'unknown source'} has no vulnerability identifier.`, context);
    }

    const ecosystem = canonicalEcosystem(text(record.ecosystem));
    const packageName = text(record.packageName);
    if (ecosystem.length === 0 || packageName.length === 0) {
        throw new UnparsableRecordError('MISSING_PACKAGE', `Record ${vulnId} from ${sourceId} does not name an ecosystem and package.`, context);
    }

    const affectedRange = text(record.affectedRange);
    if (affectedRange.length === 0) {
        throw new UnparsableRecordError('MISSING_AFFECTED_RANGE', `Record ${vulnId} from ${sourceId} has no affected-version expression.`, context);
    }

    const range = parseRange(affectedRange, context);
    const comparator = comparators.resolve(ecosystem);
    const unreadable = rangeVersions(range).find((version) => !comparator.isValid(version));
    if (unreadable !== undefined) {
        throw new UnparsableRecordError(
            'INVALID_RANGE',
            `Record ${vulnId} from ${sourceId} uses "${unreadable}", which ${comparator.scheme} ordering cannot read.`,
            { ...context, range: affectedRange },
        );
    }

    const severity = resolveSeverity(record);
    const fixedVersion = optionalText(record.fixedVersion) ?? deriveFixedVersion(range);

    return {
        sourceId,
        sourcePriority: typeof record.sourcePriority === 'number' && Number.isFinite(record.sourcePriority) ? record.sourcePriority : null,
        vulnId,
        aliases,
        ecosystem,
        packageName,
        packageKey: normalizePackageName(ecosystem, packageName),
        range,
        affectedRange: range.raw,
        fixedVersion: fixedVersion !== null && comparator.isValid(fixedVersion) ? fixedVersion : null,
        title: optionalText(record.title) ?? kevTitle(record),
        description: optionalText(record.description),
        cvss: severity.cvss,
        cvssVector: severity.vector,
        exploitability: resolveExploitability(record),
        references: Array.from(new Set((record.references ?? []).map((reference) => text(reference.url)).filter((url) => url.length > 0))).sort(),
        fetchedAt: text(record.fetchedAt),
    };
}

function parseRange(affectedRange: string, context: Record<string, string>): VersionRange {
    try {
        return parseVersionRange(affectedRange);
    } catch (error) {
        if (error instanceof UnsupportedVersionError) {
            throw new UnparsableRecordError('INVALID_RANGE', error.message, { ...context, range: affectedRange });
        }
        throw error;
    }
}

/** The exclusive upper bound of a single-interval range is the first fixed release. */
export function deriveFixedVersion(range: VersionRange): string | null {
    if (range.sets.length !== 1) {
        return null;
    }

    for (const constraint of range.sets[0]) {
        if (constraint.operator === '<') {
            return constraint.version;
        }
    }

    return null;
}

function kevTitle(record: RawFindingRecord): string | null {
    if (!isKevRecord(record)) {
        return null;
    }

    const label = [optionalText(record.vendorProject), optionalText(record.product)]
        .filter((part): part is string => part !== null)
        .join(' ');

    return label.length > 0 ? `${label} (known exploited)` : null;
}

function text(value: unknown): string {
    return typeof value === 'string' ? value.trim() : '';
}

function optionalText(value: unknown): string | null {
    const trimmed = text(value);
    return trimmed.length > 0 ? trimmed : null;
}

function stringList(value: unknown): string[] {
    return Array.isArray(value) ? value.filter((entry): entry is string => typeof entry === 'string') : [];
}
