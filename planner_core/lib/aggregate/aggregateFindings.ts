import { compareAscii, stableStringify } from '../identity';
import type { Asset, PlanWarning, RawFindingRecord } from '../types';
import { AssetIndex } from './assetIndex';
import { EmptyInventoryError } from './errors';
import { matchRecord } from './matchRecord';
import { mergeFragments } from './mergeFragments';
import type { AggregateOptions, AggregationResult, DroppedRecord, MatchedFragment, RecordMatchOutcome } from './types';

/**
 * Matches feed records against the inventory and merges them into one
 * finding per vulnerability per package version. A bad record is skipped
 * with a warning; only an empty inventory fails the call.
 */
export function aggregate(
    assets: readonly Asset[],
    records: readonly RawFindingRecord[],
    options: AggregateOptions = {},
): AggregationResult {
    assertInventory(assets, records.length);

    const index = new AssetIndex(assets);
    const outcomes = records.map((record) => matchRecord(record, {
        index,
        comparators: options.comparators,
        sourcePriority: options.sourcePriority,
    }));

    return combineOutcomes(outcomes);
}

export function assertInventory(assets: readonly Asset[], recordCount: number): void {
    if (assets.length === 0) {
        throw new EmptyInventoryError('Asset inventory is empty; no finding can match.', {
            assets: '0',
            records: String(recordCount),
        });
    }
}

/** Merges per-record outcomes. Input order does not affect the result. */
export function combineOutcomes(outcomes: readonly RecordMatchOutcome[]): AggregationResult {
    const matches: MatchedFragment[] = [];
    const warnings: PlanWarning[] = [];
    const dropped: DroppedRecord[] = [];

    for (const outcome of outcomes) {
        matches.push(...outcome.matches);
        warnings.push(...outcome.warnings);
        if (outcome.dropped) {
            dropped.push(outcome.dropped);
        }
    }

    return {
        findings: mergeFragments(matches),
        warnings: dedupeWarnings(warnings),
        dropped: dropped.sort(compareDropped),
    };
}

/** Drops exact repeats; warnings that differ only in context are all kept. */
export function dedupeWarnings(warnings: readonly PlanWarning[]): PlanWarning[] {
    const unique = new Map<string, PlanWarning>();
    for (const warning of warnings) {
        const key = stableStringify(warning);
        if (!unique.has(key)) {
            unique.set(key, warning);
        }
    }

    return Array.from(unique.entries())
        .sort(([leftKey, left], [rightKey, right]) => compareAscii(left.code, right.code)
            || compareAscii(left.message, right.message)
            || compareAscii(leftKey, rightKey))
        .map(([, warning]) => warning);
}

function compareDropped(left: DroppedRecord, right: DroppedRecord): number {
    return compareAscii(left.sourceId, right.sourceId)
        || compareAscii(left.vulnId, right.vulnId)
        || compareAscii(left.packageName, right.packageName)
        || compareAscii(left.reason, right.reason);
}
