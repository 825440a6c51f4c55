import type { FindingFragment } from '../normalize';
import type { Asset, Finding, PlanWarning } from '../types';
import type { ComparatorRegistry } from '../versioning';

/** sourceId → priority; lower numbers win field-level precedence. */
export type SourcePriorityTable = Readonly<Record<string, number>>;

export const DEFAULT_SOURCE_PRIORITY: SourcePriorityTable = {
    'cisa-kev': 1,
    nvd: 2,
    ghsa: 3,
    osv: 4,
};

export interface AggregateOptions {
    sourcePriority?: SourcePriorityTable;
    comparators?: ComparatorRegistry;
}

export interface MatchedFragment {
    fragment: FindingFragment;
    asset: Asset;
    priority: number;
}

export interface DroppedRecord {
    sourceId: string;
    vulnId: string;
    packageName: string;
    reason: 'NO_MATCHING_ASSET' | 'UNPARSABLE_RECORD';
}

export interface RecordMatchOutcome {
    matches: MatchedFragment[];
    warnings: PlanWarning[];
    dropped: DroppedRecord | null;
}

export interface AggregationResult {
    findings: Finding[];
    warnings: PlanWarning[];
    dropped: DroppedRecord[];
}
