import type { Asset } from './asset';
import type { FixAction } from './fix';

export type ExploitabilityTier = 10 | 7 | 3;

/** Criticality and exposure share the same closed scale. */
export type AssetTier = 10 | 5 | 2;

export type PhaseTier = 'critical' | 'high' | 'medium' | 'low';

export const PHASE_TIERS: readonly PhaseTier[] = ['critical', 'high', 'medium', 'low'];

export type RiskReasonCode =
    | 'KEV_PRESENT'
    | 'EXPLOIT_PUBLIC'
    | 'EXPLOIT_UNKNOWN'
    | 'CVSS_CRITICAL'
    | 'CVSS_HIGH'
    | 'CVSS_MEDIUM'
    | 'CVSS_LOW'
    | 'CVSS_MISSING'
    | 'CRITICALITY_HIGH'
    | 'CRITICALITY_MEDIUM'
    | 'CRITICALITY_LOW'
    | 'EXPOSURE_INTERNET'
    | 'EXPOSURE_INTERNAL'
    | 'EXPOSURE_ISOLATED';

/**
 * Canonical, deduplicated record of one vulnerability affecting one asset.
 * `riskScore` stays null until the scorer runs.
 */
export interface Finding {
    canonicalId: string;
    vulnId: string;
    aliases: string[];
    matchedAsset: Asset;
    filePaths: string[];
    title: string;
    description: string;
    affectedRange: string;
    fixedVersion: string | null;
    cvss: number | null;
    cvssVector: string | null;
    exploitability: ExploitabilityTier;
    criticality: AssetTier;
    exposure: AssetTier;
    sources: string[];
    references: string[];
    riskScore: number | null;
}

export interface ScoreBreakdown {
    effectiveCvss: number;
    cvssContribution: number;
    exploitabilityContribution: number;
    criticalityContribution: number;
    exposureContribution: number;
    exactTotal: number;
}

export interface ScoredFinding extends Finding {
    /** Rounded to one decimal; what reports show and phases bucket on. */
    riskScore: number;
    /** Unrounded total, kept for ordering ties. */
    riskScoreExact: number;
    scoreBreakdown: ScoreBreakdown;
    reasonCodes: RiskReasonCode[];
}

export type VerificationPhase = 'pre-fix' | 'remediation' | 'post-fix';

export type VerificationRunPoint = 'before-fix' | 'in-isolation' | 'after-fix';

export type TestOutcome = 'fail' | 'pass';

export interface VerificationTestSpec {
    id: string;
    phase: VerificationPhase;
    runAt: VerificationRunPoint;
    name: string;
    target: string;
    assertion: string;
    expectedBefore: TestOutcome;
    expectedAfter: TestOutcome;
}

export interface VerificationTests {
    preFix: VerificationTestSpec;
    remediation: VerificationTestSpec;
    postFix: VerificationTestSpec;
}

export interface PlannedFinding extends ScoredFinding {
    phase: PhaseTier;
    fixAction: FixAction | null;
    needsManualReview: boolean;
    effortHours: number;
    tests: VerificationTests;
}
