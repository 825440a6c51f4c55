import type { DroppedRecord, SourcePriorityTable } from '../aggregate';
import type { PlanDiff } from '../diff';
import type { PersistedPlan, PlanStore } from '../persistence';
import type { RunLogClient } from '../runtime';
import type { ScoringConfig } from '../scoring';
import type { Asset, PlanWarning, RawFindingRecord, RemediationPlan } from '../types';
import type { ComparatorRegistry } from '../versioning';

export const DEFAULT_CONCURRENCY = 4;

export interface PipelineInput {
    projectPath: string;
    assets: readonly Asset[];
    records: readonly RawFindingRecord[];
    /** Problems found while reading the inputs, such as feed records skipped by `parseFeedSnapshot`. */
    warnings?: readonly PlanWarning[];
}

export interface PipelineOptions {
    config?: ScoringConfig;
    sourcePriority?: SourcePriorityTable;
    comparators?: ComparatorRegistry;
    /** Records normalized and matched at once. */
    concurrency?: number;
    /** Previous plan source and persistence target. Without one, every finding is new. */
    store?: PlanStore;
    runLogClient?: RunLogClient;
    /** Sources that should have contributed; absent ones become MISSING_SOURCE warnings. */
    expectedSources?: readonly string[];
    /** Defaults to the latest `fetchedAt` among the records. */
    generatedAt?: string;
    /** Loads and diffs against the stored plan but does not save. */
    dryRun?: boolean;
    now?: () => number;
}

export interface PipelineResult {
    runId: string;
    plan: RemediationPlan;
    diff: PlanDiff;
    encodedPlan: string;
    previousPlan: PersistedPlan | null;
    dropped: DroppedRecord[];
    savedTo: string | null;
}
