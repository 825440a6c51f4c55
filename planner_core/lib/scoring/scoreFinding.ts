import { roundTo } from '../utils/rounding';
import type { AssetTier, ExploitabilityTier, Finding, RiskReasonCode, ScoredFinding } from '../types';
import { DEFAULT_SCORING_CONFIG, assertValidWeights } from './scoringConfig';
import type { ScoringWeights } from './scoringConfig';

/**
 * Weighted risk in [0, 10]. An unknown CVSS counts as 0 so exploitability and
 * asset signals still rank the finding. The rounded value is what phases
 * bucket on; the exact value breaks ordering ties.
 */
export function score(finding: Finding, weights: ScoringWeights = DEFAULT_SCORING_CONFIG): ScoredFinding {
    assertValidWeights(weights);
    return scoreWithValidatedWeights(finding, weights);
}

/** Validates once; the returned function scores without re-checking. */
export function createScorer(weights: ScoringWeights = DEFAULT_SCORING_CONFIG): (finding: Finding) => ScoredFinding {
    assertValidWeights(weights);
    const frozen: ScoringWeights = Object.freeze({
        cvssWeight: weights.cvssWeight,
        exploitabilityWeight: weights.exploitabilityWeight,
        criticalityWeight: weights.criticalityWeight,
        exposureWeight: weights.exposureWeight,
    });
    return (finding) => scoreWithValidatedWeights(finding, frozen);
}

export function scoreAll(findings: readonly Finding[], weights: ScoringWeights = DEFAULT_SCORING_CONFIG): ScoredFinding[] {
    const scorer = createScorer(weights);
    return findings.map(scorer);
}

function scoreWithValidatedWeights(finding: Finding, weights: ScoringWeights): ScoredFinding {
    const effectiveCvss = finding.cvss ?? 0;
    const cvssContribution = effectiveCvss * weights.cvssWeight;
    const exploitabilityContribution = finding.exploitability * weights.exploitabilityWeight;
    const criticalityContribution = finding.criticality * weights.criticalityWeight;
    const exposureContribution = finding.exposure * weights.exposureWeight;
    const exactTotal = cvssContribution + exploitabilityContribution + criticalityContribution + exposureContribution;

    return {
        ...finding,
        aliases: [...finding.aliases],
        filePaths: [...finding.filePaths],
        sources: [...finding.sources],
        references: [...finding.references],
        riskScore: roundTo(exactTotal, 1),
        riskScoreExact: exactTotal,
        scoreBreakdown: {
            effectiveCvss,
            cvssContribution,
            exploitabilityContribution,
            criticalityContribution,
            exposureContribution,
            exactTotal,
        },
        reasonCodes: buildReasonCodes(finding),
    };
}

export function buildReasonCodes(finding: Pick<Finding, 'cvss' | 'exploitability' | 'criticality' | 'exposure'>): RiskReasonCode[] {
    return [
        exploitabilityReason(finding.exploitability),
        cvssReason(finding.cvss),
        criticalityReason(finding.criticality),
        exposureReason(finding.exposure),
    ];
}

function exploitabilityReason(tier: ExploitabilityTier): RiskReasonCode {
    switch (tier) {
        case 10:
            return 'KEV_PRESENT';
        case 7:
            return 'EXPLOIT_PUBLIC';
        case 3:
            return 'EXPLOIT_UNKNOWN';
    }
}

function cvssReason(cvss: number | null): RiskReasonCode {
    if (cvss === null) {
        return 'CVSS_MISSING';
    }

    if (cvss >= 9) {
        return 'CVSS_CRITICAL';
    }

    if (cvss >= 7) {
        return 'CVSS_HIGH';
    }

    if (cvss >= 4) {
        return 'CVSS_MEDIUM';
    }

    return 'CVSS_LOW';
}

function criticalityReason(tier: AssetTier): RiskReasonCode {
    switch (tier) {
        case 10:
            return 'CRITICALITY_HIGH';
        case 5:
            return 'CRITICALITY_MEDIUM';
        case 2:
            return 'CRITICALITY_LOW';
    }
}

function exposureReason(tier: AssetTier): RiskReasonCode {
    switch (tier) {
        case 10:
            return 'EXPOSURE_INTERNET';
        case 5:
            return 'EXPOSURE_INTERNAL';
        case 2:
            return 'EXPOSURE_ISOLATED';
    }
}
