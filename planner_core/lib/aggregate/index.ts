export { aggregate, assertInventory, combineOutcomes, dedupeWarnings } from './aggregateFindings';
export { AssetIndex, packageIndexKey } from './assetIndex';
export { criticalityTier, exposureTier } from './assetTiers';
export { matchRecord, resolveSourcePriority } from './matchRecord';
export type { MatchContext } from './matchRecord';
export { mergeFragments } from './mergeFragments';
export { EmptyInventoryError } from './errors';
export type { EmptyInventoryErrorCode } from './errors';
export { DEFAULT_SOURCE_PRIORITY } from './types';
export type {
    AggregateOptions,
    AggregationResult,
    DroppedRecord,
    MatchedFragment,
    RecordMatchOutcome,
    SourcePriorityTable,
} from './types';
