import type { ScoringConfig } from '../scoring';
import type { AssetKind, FixAction, PlanWarning, ScoredFinding } from '../types';

export type PlanBuildConfig = ScoringConfig;

export interface BuildPlanOptions {
    /** Defaults to {@link UNKNOWN_GENERATED_AT} so that a build stays a pure function. */
    generatedAt?: string;
    inputDigest?: string | null;
    /** Warnings raised upstream (aggregation, pipeline) merged into the plan's list. */
    warnings?: readonly PlanWarning[];
}

export const UNKNOWN_GENERATED_AT = '1970-01-01T00:00:00.000Z';

export type FixStrategy = (finding: ScoredFinding) => FixAction;

export type FixStrategyTable = Readonly<Record<AssetKind, FixStrategy>>;
