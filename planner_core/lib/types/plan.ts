import type { PhaseTier, PlannedFinding } from './finding';

export type PlanWarningCode =
    | 'UNPARSABLE_RECORD'
    | 'UNPARSABLE_ASSET_VERSION'
    | 'UNSUPPORTED_ASSET_KIND'
    | 'MISSING_SOURCE'
    | 'UNREADABLE_PREVIOUS_PLAN';

export interface PlanWarning {
    code: PlanWarningCode;
    message: string;
    context: Record<string, string>;
}

export interface RemediationPhase {
    tier: PhaseTier;
    findings: PlannedFinding[];
    estimatedEffortHours: number;
}

export interface RemediationPlan {
    generatedAt: string;
    inputDigest: string | null;
    phases: RemediationPhase[];
    totalEffortHours: number;
    findingCount: number;
    warnings: PlanWarning[];
}
