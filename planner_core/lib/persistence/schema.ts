import { z } from 'zod';

export const PLAN_SCHEMA_VERSION = 1;

const PhaseTierSchema = z.enum(['critical', 'high', 'medium', 'low']);
const AssetTierSchema = z.union([z.literal(10), z.literal(5), z.literal(2)]);
const OutcomeSchema = z.enum(['fail', 'pass']);

export const PersistedAssetSchema = z.object({
    ecosystem: z.string(),
    name: z.string(),
    version: z.string(),
    filePath: z.string(),
    kind: z.string(),
    tags: z.object({
        criticality: z.enum(['high', 'medium', 'low']).nullable(),
        exposure: z.enum(['internet-facing', 'internal', 'isolated']).nullable(),
    }),
});

export const PersistedTestSpecSchema = z.object({
    id: z.string(),
    phase: z.enum(['pre-fix', 'remediation', 'post-fix']),
    runAt: z.enum(['before-fix', 'in-isolation', 'after-fix']),
    name: z.string(),
    target: z.string(),
    assertion: z.string(),
    expectedBefore: OutcomeSchema,
    expectedAfter: OutcomeSchema,
});

export const PersistedFixActionSchema = z.discriminatedUnion('kind', [
    z.object({
        kind: z.literal('dependency'),
        summary: z.string(),
        targetVersion: z.string().nullable(),
        command: z.string(),
        lockfileInstruction: z.string(),
    }),
    z.object({
        kind: z.literal('container-image'),
        summary: z.string(),
        targetVersion: z.string().nullable(),
        dockerfilePatch: z.string(),
    }),
    z.object({
        kind: z.literal('iac-resource'),
        summary: z.string(),
        targetVersion: z.string().nullable(),
        format: z.enum(['terraform', 'kubernetes', 'generic']),
        manifestPatch: z.string(),
    }),
    z.object({
        kind: z.literal('secret-exposure'),
        summary: z.string(),
        rotationCommand: z.string(),
        removalCommand: z.string(),
        gitignoreEntry: z.string(),
    }),
]);

export const PersistedFindingSchema = z.object({
    canonicalId: z.string().min(1),
    vulnId: z.string().min(1),
    aliases: z.array(z.string()),
    title: z.string(),
    description: z.string(),
    matchedAsset: PersistedAssetSchema,
    filePaths: z.array(z.string()),
    affectedRange: z.string(),
    fixedVersion: z.string().nullable(),
    cvss: z.number().min(0).max(10).nullable(),
    cvssVector: z.string().nullable(),
    exploitability: z.union([z.literal(10), z.literal(7), z.literal(3)]),
    criticality: AssetTierSchema,
    exposure: AssetTierSchema,
    riskScore: z.number().min(0).max(10),
    sources: z.array(z.string()),
    references: z.array(z.string()),
    reasonCodes: z.array(z.string()),
    phase: PhaseTierSchema,
    effortHours: z.number().nonnegative(),
    needsManualReview: z.boolean(),
    fixAction: PersistedFixActionSchema.nullable(),
    tests: z.object({
        preFix: PersistedTestSpecSchema,
        remediation: PersistedTestSpecSchema,
        postFix: PersistedTestSpecSchema,
    }),
});

export const PersistedPhaseSchema = z.object({
    tier: PhaseTierSchema,
    estimatedEffortHours: z.number().nonnegative(),
    findings: z.array(PersistedFindingSchema),
});

export const PersistedWarningSchema = z.object({
    code: z.string(),
    message: z.string(),
    context: z.record(z.string(), z.string()),
});

export const PersistedPlanSchema = z.object({
    schemaVersion: z.literal(PLAN_SCHEMA_VERSION),
    generatedAt: z.string(),
    inputDigest: z.string().nullable(),
    totalEffortHours: z.number().nonnegative(),
    findingCount: z.number().int().nonnegative(),
    phases: z.array(PersistedPhaseSchema),
    warnings: z.array(PersistedWarningSchema),
});

export type PersistedAsset = z.infer<typeof PersistedAssetSchema>;
export type PersistedFinding = z.infer<typeof PersistedFindingSchema>;
export type PersistedFixAction = z.infer<typeof PersistedFixActionSchema>;
export type PersistedTestSpec = z.infer<typeof PersistedTestSpecSchema>;
export type PersistedPhase = z.infer<typeof PersistedPhaseSchema>;
export type PersistedWarning = z.infer<typeof PersistedWarningSchema>;
export type PersistedPlan = z.infer<typeof PersistedPlanSchema>;
