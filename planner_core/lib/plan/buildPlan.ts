import { dedupeWarnings } from '../aggregate';
import { compareAscii } from '../identity';
import { DEFAULT_SCORING_CONFIG, validateScoringConfig } from '../scoring';
import type { PhaseThresholds } from '../scoring';
import type { FixAction, PhaseTier, PlannedFinding, PlanWarning, RemediationPlan, ScoredFinding } from '../types';
import { PHASE_TIERS } from '../types';
import { roundTo } from '../utils/rounding';
import { UnsupportedAssetKindError } from './errors';
import { DEFAULT_FIX_STRATEGIES, requiresManualReview, selectFixAction } from './fixActions';
import type { BuildPlanOptions, FixStrategyTable, PlanBuildConfig } from './types';
import { UNKNOWN_GENERATED_AT } from './types';
import { buildVerificationTests } from './verificationTests';

export function phaseForScore(riskScore: number, thresholds: PhaseThresholds): PhaseTier {
    if (riskScore >= thresholds.critical) {
        return 'critical';
    }

    if (riskScore >= thresholds.high) {
        return 'high';
    }

    if (riskScore >= thresholds.medium) {
        return 'medium';
    }

    return 'low';
}

/**
 * Order inside a phase: rounded score descending, then cvss descending, then
 * the exact score, then canonicalId ascending.
 */
export function comparePlannedOrder(left: ScoredFinding, right: ScoredFinding): number {
    if (left.riskScore !== right.riskScore) {
        return right.riskScore - left.riskScore;
    }

    const leftCvss = left.scoreBreakdown.effectiveCvss;
    const rightCvss = right.scoreBreakdown.effectiveCvss;
    if (leftCvss !== rightCvss) {
        return rightCvss - leftCvss;
    }

    if (left.riskScoreExact !== right.riskScoreExact) {
        return right.riskScoreExact - left.riskScoreExact;
    }

    return compareAscii(left.canonicalId, right.canonicalId);
}

/**
 * Buckets scored findings into the four phases and attaches fix actions,
 * verification tests and effort. Every phase is present, even when empty.
 */
export function build(
    findings: readonly ScoredFinding[],
    config: PlanBuildConfig = DEFAULT_SCORING_CONFIG,
    options: BuildPlanOptions = {},
    strategies: FixStrategyTable = DEFAULT_FIX_STRATEGIES,
): RemediationPlan {
    const validated = validateScoringConfig(config);
    const warnings: PlanWarning[] = [...(options.warnings ?? [])];
    const seen = new Set<string>();
    const buckets = new Map<PhaseTier, PlannedFinding[]>(PHASE_TIERS.map((tier) => [tier, []]));

    for (const finding of [...findings].sort(comparePlannedOrder)) {
        if (seen.has(finding.canonicalId)) {
            continue;
        }
        seen.add(finding.canonicalId);

        let fixAction: FixAction | null = null;
        try {
            fixAction = selectFixAction(finding, strategies);
        } catch (error) {
            if (!(error instanceof UnsupportedAssetKindError)) {
                throw error;
            }
            warnings.push({
                code: 'UNSUPPORTED_ASSET_KIND',
                message: `${error.message} ${finding.vulnId} in ${finding.matchedAsset.filePath} needs manual review.`,
                context: { ...error.context, kind: error.kind },
            });
        }

        const phase = phaseForScore(finding.riskScore, validated.phaseThresholds);
        buckets.get(phase)?.push({
            ...finding,
            phase,
            fixAction,
            needsManualReview: requiresManualReview(fixAction),
            effortHours: validated.effortHoursByTier[phase],
            tests: buildVerificationTests(finding, fixAction),
        });
    }

    const phases = PHASE_TIERS.map((tier) => {
        const planned = buckets.get(tier) ?? [];
        return {
            tier,
            findings: planned,
            estimatedEffortHours: roundTo(planned.reduce((total, finding) => total + finding.effortHours, 0), 2),
        };
    });

    const totalHours = phases.reduce(
        (total, phase) => total + phase.findings.reduce((sum, finding) => sum + finding.effortHours, 0),
        0,
    );

    return {
        generatedAt: options.generatedAt ?? UNKNOWN_GENERATED_AT,
        inputDigest: options.inputDigest ?? null,
        phases,
        totalEffortHours: roundTo(totalHours, 2),
        findingCount: seen.size,
        warnings: dedupeWarnings(warnings),
    };
}
