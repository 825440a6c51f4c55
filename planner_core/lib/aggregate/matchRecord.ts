import { UnparsableRecordError, normalize } from '../normalize';
import type { FindingFragment } from '../normalize';
import type { PlanWarning, RawFindingRecord } from '../types';
import { formatAssetRef } from '../types';
import type { ComparatorRegistry } from '../versioning';
import { createDefaultComparatorRegistry, rangeContains } from '../versioning';
import type { AssetIndex } from './assetIndex';
import type { MatchedFragment, RecordMatchOutcome, SourcePriorityTable } from './types';
import { DEFAULT_SOURCE_PRIORITY } from './types';

export interface MatchContext {
    index: AssetIndex;
    comparators?: ComparatorRegistry;
    sourcePriority?: SourcePriorityTable;
}

const DEFAULT_COMPARATORS = createDefaultComparatorRegistry();

/**
 * Normalizes one record and pairs it with every inventory asset inside its
 * affected range. Bad records and unreadable asset versions come back as
 * warnings; nothing here throws for input quality.
 */
export function matchRecord(record: RawFindingRecord, context: MatchContext): RecordMatchOutcome {
    const comparators = context.comparators ?? DEFAULT_COMPARATORS;

    let fragment: FindingFragment;
    try {
        fragment = normalize(record, { comparators });
    } catch (error) {
        if (error instanceof UnparsableRecordError) {
            return {
                matches: [],
                warnings: [{
                    code: 'UNPARSABLE_RECORD',
                    message: error.message,
                    context: { ...error.context, reason: error.code },
                }],
                dropped: {
                    sourceId: error.context.sourceId ?? '',
                    vulnId: error.context.vulnId ?? '',
                    packageName: error.context.packageName ?? '',
                    reason: 'UNPARSABLE_RECORD',
                },
            };
        }
        throw error;
    }

    const comparator = comparators.resolve(fragment.ecosystem);
    const priority = resolveSourcePriority(fragment, context.sourcePriority ?? DEFAULT_SOURCE_PRIORITY);
    const matches: MatchedFragment[] = [];
    const warnings: PlanWarning[] = [];

    for (const asset of context.index.lookup(fragment.ecosystem, fragment.packageName)) {
        if (!comparator.isValid(asset.version)) {
            warnings.push({
                code: 'UNPARSABLE_ASSET_VERSION',
                message: `${formatAssetRef(asset)} cannot be ordered with ${comparator.scheme} rules; skipped for matching.`,
                context: {
                    asset: formatAssetRef(asset),
                    filePath: asset.filePath,
                    scheme: comparator.scheme,
                },
            });
            continue;
        }

        if (rangeContains(fragment.range, asset.version, comparator)) {
            matches.push({ fragment, asset, priority });
        }
    }

    return {
        matches,
        warnings,
        dropped: matches.length > 0
            ? null
            : {
                sourceId: fragment.sourceId,
                vulnId: fragment.vulnId,
                packageName: fragment.packageName,
                reason: 'NO_MATCHING_ASSET',
            },
    };
}

/**
 * The invocation's table decides; a priority carried on the record is used
 * for sources the table does not list; anything else ranks last.
 */
export function resolveSourcePriority(fragment: Pick<FindingFragment, 'sourceId' | 'sourcePriority'>, table: SourcePriorityTable): number {
    const fromTable = table[fragment.sourceId];
    if (typeof fromTable === 'number' && Number.isFinite(fromTable)) {
        return fromTable;
    }

    return fragment.sourcePriority ?? Number.MAX_SAFE_INTEGER;
}
