import type { PhaseTier } from '../types';

/** The part of a plan the differ reads. Both in-memory and decoded plans fit it. */
export interface DiffablePlan {
    phases: ReadonlyArray<{
        tier: PhaseTier;
        findings: ReadonlyArray<{
            canonicalId: string;
            vulnId: string;
            riskScore: number;
            matchedAsset: { ecosystem: string; name: string; version: string };
        }>;
    }>;
}

export interface PlanDiffEntry {
    canonicalId: string;
    vulnId: string;
    assetRef: string;
    riskScore: number;
    phase: PhaseTier;
}

export interface RescoredDiffEntry extends PlanDiffEntry {
    previousRiskScore: number;
    previousPhase: PhaseTier;
}

export interface PlanDiffCounts {
    new: number;
    unchanged: number;
    resolved: number;
    rescored: number;
}

export interface PlanDiff {
    new: PlanDiffEntry[];
    unchanged: PlanDiffEntry[];
    resolved: PlanDiffEntry[];
    rescored: RescoredDiffEntry[];
    counts: PlanDiffCounts;
}
