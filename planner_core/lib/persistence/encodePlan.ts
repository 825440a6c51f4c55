import { compareAscii } from '../identity';
import type {
    Asset,
    FixAction,
    PlannedFinding,
    PlanWarning,
    RemediationPlan,
    VerificationTestSpec,
} from '../types';
import { roundTo } from '../utils/rounding';
import { PlanDecodeError } from './errors';
import { PLAN_SCHEMA_VERSION, PersistedPlanSchema } from './schema';
import type {
    PersistedAsset,
    PersistedFinding,
    PersistedFixAction,
    PersistedPlan,
    PersistedTestSpec,
    PersistedWarning,
} from './schema';

// Object literals below fix the key order of the encoding. Keep them in step
// with schema.ts.

function persistAsset(asset: Asset): PersistedAsset {
    return {
        ecosystem: asset.ecosystem,
        name: asset.name,
        version: asset.version,
        filePath: asset.filePath,
        kind: asset.kind,
        tags: {
            criticality: asset.tags?.criticality ?? null,
            exposure: asset.tags?.exposure ?? null,
        },
    };
}

function persistTest(spec: VerificationTestSpec): PersistedTestSpec {
    return {
        id: spec.id,
        phase: spec.phase,
        runAt: spec.runAt,
        name: spec.name,
        target: spec.target,
        assertion: spec.assertion,
        expectedBefore: spec.expectedBefore,
        expectedAfter: spec.expectedAfter,
    };
}

function persistFixAction(action: FixAction | null): PersistedFixAction | null {
    if (action === null) {
        return null;
    }

    switch (action.kind) {
        case 'dependency':
            return {
                kind: action.kind,
                summary: action.summary,
                targetVersion: action.targetVersion,
                command: action.command,
                lockfileInstruction: action.lockfileInstruction,
            };
        case 'container-image':
            return {
                kind: action.kind,
                summary: action.summary,
                targetVersion: action.targetVersion,
                dockerfilePatch: action.dockerfilePatch,
            };
        case 'iac-resource':
            return {
                kind: action.kind,
                summary: action.summary,
                targetVersion: action.targetVersion,
                format: action.format,
                manifestPatch: action.manifestPatch,
            };
        case 'secret-exposure':
            return {
                kind: action.kind,
                summary: action.summary,
                rotationCommand: action.rotationCommand,
                removalCommand: action.removalCommand,
                gitignoreEntry: action.gitignoreEntry,
            };
    }
}

function persistFinding(finding: PlannedFinding): PersistedFinding {
    return {
        canonicalId: finding.canonicalId,
        vulnId: finding.vulnId,
        aliases: [...finding.aliases],
        title: finding.title,
        description: finding.description,
        matchedAsset: persistAsset(finding.matchedAsset),
        filePaths: [...finding.filePaths],
        affectedRange: finding.affectedRange,
        fixedVersion: finding.fixedVersion,
        cvss: finding.cvss === null ? null : roundTo(finding.cvss, 1),
        cvssVector: finding.cvssVector,
        exploitability: finding.exploitability,
        criticality: finding.criticality,
        exposure: finding.exposure,
        riskScore: roundTo(finding.riskScore, 1),
        sources: [...finding.sources],
        references: [...finding.references],
        reasonCodes: [...finding.reasonCodes],
        phase: finding.phase,
        effortHours: roundTo(finding.effortHours, 2),
        needsManualReview: finding.needsManualReview,
        fixAction: persistFixAction(finding.fixAction),
        tests: {
            preFix: persistTest(finding.tests.preFix),
            remediation: persistTest(finding.tests.remediation),
            postFix: persistTest(finding.tests.postFix),
        },
    };
}

function persistWarning(warning: PlanWarning): PersistedWarning {
    const context: Record<string, string> = {};
    for (const key of Object.keys(warning.context).sort(compareAscii)) {
        context[key] = warning.context[key];
    }

    return {
        code: warning.code,
        message: warning.message,
        context,
    };
}

/** Drops in-memory-only fields (exact score, breakdown) and rounds what is kept. */
export function toPersistedPlan(plan: RemediationPlan): PersistedPlan {
    return {
        schemaVersion: PLAN_SCHEMA_VERSION,
        generatedAt: plan.generatedAt,
        inputDigest: plan.inputDigest,
        totalEffortHours: roundTo(plan.totalEffortHours, 2),
        findingCount: plan.findingCount,
        phases: plan.phases.map((phase) => ({
            tier: phase.tier,
            estimatedEffortHours: roundTo(phase.estimatedEffortHours, 2),
            findings: phase.findings.map(persistFinding),
        })),
        warnings: plan.warnings.map(persistWarning),
    };
}

export function serializePersistedPlan(plan: PersistedPlan): string {
    return `${JSON.stringify(plan, null, 2)}\n`;
}

/** Stable, diffable text: fixed key order, two-space indent, trailing newline. */
export function encodePlan(plan: RemediationPlan): string {
    return serializePersistedPlan(toPersistedPlan(plan));
}

export function decodePlan(text: string): PersistedPlan {
    let raw: unknown;
    try {
        raw = JSON.parse(text);
    } catch (error) {
        throw new PlanDecodeError('INVALID_JSON', `Stored plan is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
    }

    const parsed = PersistedPlanSchema.safeParse(raw);
    if (!parsed.success) {
        const issue = parsed.error.issues[0];
        const path = issue ? issue.path.join('.') : '';
        throw new PlanDecodeError('INVALID_PLAN', `Stored plan does not match the plan schema at "${path}": ${issue?.message ?? 'unknown issue'}.`, {
            path,
        });
    }

    return parsed.data;
}
