import { compareAscii } from '../identity';
import { formatAssetRef } from '../types';
import { roundTo } from '../utils/rounding';
import type { DiffablePlan, PlanDiff, PlanDiffEntry, RescoredDiffEntry } from './types';

function indexPlan(plan: DiffablePlan | null): Map<string, PlanDiffEntry> {
    const entries = new Map<string, PlanDiffEntry>();
    if (!plan) {
        return entries;
    }

    for (const phase of plan.phases) {
        for (const finding of phase.findings) {
            if (entries.has(finding.canonicalId)) {
                continue;
            }
            entries.set(finding.canonicalId, {
                canonicalId: finding.canonicalId,
                vulnId: finding.vulnId,
                assetRef: formatAssetRef(finding.matchedAsset),
                riskScore: roundTo(finding.riskScore, 1),
                phase: phase.tier,
            });
        }
    }

    return entries;
}

const byCanonicalId = (left: PlanDiffEntry, right: PlanDiffEntry): number => compareAscii(left.canonicalId, right.canonicalId);

/**
 * Partitions findings by canonicalId against the previous plan. Scores are
 * compared at display precision, so a persisted plan diffs the same way as
 * the in-memory plan it was encoded from.
 */
export function diffPlans(previous: DiffablePlan | null, current: DiffablePlan): PlanDiff {
    const before = indexPlan(previous);
    const after = indexPlan(current);

    const added: PlanDiffEntry[] = [];
    const unchanged: PlanDiffEntry[] = [];
    const rescored: RescoredDiffEntry[] = [];
    const resolved: PlanDiffEntry[] = [];

    for (const [canonicalId, entry] of after) {
        const prior = before.get(canonicalId);
        if (!prior) {
            added.push(entry);
        } else if (prior.riskScore === entry.riskScore) {
            unchanged.push(entry);
        } else {
            rescored.push({ ...entry, previousRiskScore: prior.riskScore, previousPhase: prior.phase });
        }
    }

    for (const [canonicalId, entry] of before) {
        if (!after.has(canonicalId)) {
            resolved.push(entry);
        }
    }

    added.sort(byCanonicalId);
    unchanged.sort(byCanonicalId);
    rescored.sort(byCanonicalId);
    resolved.sort(byCanonicalId);

    return {
        new: added,
        unchanged,
        resolved,
        rescored,
        counts: {
            new: added.length,
            unchanged: unchanged.length,
            resolved: resolved.length,
            rescored: rescored.length,
        },
    };
}
