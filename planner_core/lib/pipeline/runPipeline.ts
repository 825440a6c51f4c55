import { AssetIndex, assertInventory, combineOutcomes, matchRecord } from '../aggregate';
import { diffPlans } from '../diff';
import { buildCanonicalHash, compareAscii, stableStringify } from '../identity';
import { PlanDecodeError, encodePlan } from '../persistence';
import type { PersistedPlan } from '../persistence';
import { build, UNKNOWN_GENERATED_AT } from '../plan';
import { PipelineRunLogger, computeRunId, toTaskError } from '../runtime';
import type { RunLogClient, TaskStage } from '../runtime';
import { DEFAULT_SCORING_CONFIG, scoreAll, validateScoringConfig } from '../scoring';
import type { PlanWarning, RawFindingRecord } from '../types';
import { createDefaultComparatorRegistry } from '../versioning';
import { mapWithConcurrency } from './concurrency';
import type { PipelineInput, PipelineOptions, PipelineResult } from './types';
import { DEFAULT_CONCURRENCY } from './types';

const DISCARD_CLIENT: RunLogClient = {
    async bulkUpsert(_index, documents) {
        return { attempted: documents.length, succeeded: documents.length, failed: 0 };
    },
};

/** Latest parseable `fetchedAt`, so that reruns over one snapshot share a timestamp. */
export function resolveGeneratedAt(records: readonly Pick<RawFindingRecord, 'fetchedAt'>[]): string {
    let latest: number | null = null;
    for (const record of records) {
        const parsed = Date.parse(record.fetchedAt);
        if (!Number.isNaN(parsed) && (latest === null || parsed > latest)) {
            latest = parsed;
        }
    }
    return latest === null ? UNKNOWN_GENERATED_AT : new Date(latest).toISOString();
}

/** Order-independent digest of the inventory and the feed snapshot. */
export function computeInputDigest(input: Pick<PipelineInput, 'assets' | 'records' | 'warnings'>): string {
    const canonicalOrder = (items: readonly unknown[]): string[] => items
        .map((item) => stableStringify(item))
        .sort(compareAscii);

    const inputWarnings = input.warnings ?? [];
    return buildCanonicalHash({
        assets: canonicalOrder(input.assets),
        records: canonicalOrder(input.records),
        ...(inputWarnings.length > 0 ? { warnings: canonicalOrder(inputWarnings) } : {}),
    });
}

export function findMissingSources(records: readonly RawFindingRecord[], expected: readonly string[]): PlanWarning[] {
    const present = new Set(records.map((record) => record.sourceId));
    return Array.from(new Set(expected))
        .filter((sourceId) => !present.has(sourceId))
        .sort(compareAscii)
        .map((sourceId): PlanWarning => ({
            code: 'MISSING_SOURCE',
            message: `No records supplied by source "${sourceId}"; the plan reflects the remaining sources only.`,
            context: { sourceId },
        }));
}

/**
 * Inventory and feed snapshot in, remediation plan out. Configuration and
 * inventory preconditions are checked before any record is touched; per-record
 * problems end up as plan warnings or dropped entries.
 */
export async function runRemediationPipeline(input: PipelineInput, options: PipelineOptions = {}): Promise<PipelineResult> {
    const config = validateScoringConfig(options.config ?? DEFAULT_SCORING_CONFIG);
    assertInventory(input.assets, input.records.length);

    const inputDigest = computeInputDigest(input);
    const runId = computeRunId({ projectPath: input.projectPath, inputDigest });
    const logger = new PipelineRunLogger({
        client: options.runLogClient ?? DISCARD_CLIENT,
        runId,
        projectPath: input.projectPath,
        now: options.now,
    });

    const startedAt = logger.clock();
    let currentStage: TaskStage = 'SYSTEM';
    let stageStartedAt = startedAt;

    const enterStage = async (stage: TaskStage, refs?: Record<string, unknown>): Promise<void> => {
        currentStage = stage;
        stageStartedAt = logger.clock();
        await logger.writeStageStart(stage, stageStartedAt, refs);
    };

    const leaveStage = async (refs?: Record<string, unknown>): Promise<void> => {
        await logger.writeStageTerminal({
            stage: currentStage,
            status: 'SUCCEEDED',
            startedAt: stageStartedAt,
            endedAt: logger.clock(),
            refs,
        });
    };

    await logger.writeRun({ status: 'RUNNING', startedAt, endedAt: null, counts: {}, errorSummary: null });

    try {
        await enterStage('NORMALIZE', { records: input.records.length });
        const index = new AssetIndex(input.assets);
        const comparators = options.comparators ?? createDefaultComparatorRegistry();
        const outcomes = await mapWithConcurrency(
            input.records,
            options.concurrency ?? DEFAULT_CONCURRENCY,
            async (record) => matchRecord(record, { index, comparators, sourcePriority: options.sourcePriority }),
        );
        await leaveStage({ records: input.records.length });

        await enterStage('AGGREGATE');
        const aggregation = combineOutcomes(outcomes);
        for (const dropped of aggregation.dropped) {
            await logger.writeTask({
                stage: 'AGGREGATE',
                taskType: 'RECORD',
                taskKey: `record.${dropped.sourceId}.${dropped.vulnId}.${dropped.packageName}`,
                status: 'SKIPPED',
                message: dropped.reason === 'NO_MATCHING_ASSET'
                    ? `${dropped.vulnId} from ${dropped.sourceId} matches no asset in the inventory`
                    : `${dropped.vulnId || 'record'} from ${dropped.sourceId || 'unknown source'} could not be parsed`,
                refs: { ...dropped },
            });
        }
        await leaveStage({ findings: aggregation.findings.length, dropped: aggregation.dropped.length });

        await enterStage('SCORE');
        const scored = scoreAll(aggregation.findings, config);
        await leaveStage({ findings: scored.length });

        await enterStage('DIFF');
        const warnings: PlanWarning[] = [
            ...(input.warnings ?? []),
            ...aggregation.warnings,
            ...findMissingSources(input.records, options.expectedSources ?? []),
        ];
        let previousPlan: PersistedPlan | null = null;
        if (options.store) {
            try {
                previousPlan = await options.store.load(input.projectPath);
            } catch (error) {
                if (!(error instanceof PlanDecodeError)) {
                    throw error;
                }
                console.warn(`[PlanPipeline] Ignoring unreadable stored plan for ${input.projectPath}: ${error.message}`);
                warnings.push({
                    code: 'UNREADABLE_PREVIOUS_PLAN',
                    message: `Stored plan could not be read (${error.code}); every finding is reported as new.`,
                    context: { ...error.context, projectPath: input.projectPath },
                });
            }
        }
        await leaveStage({ previousPlan: previousPlan !== null });

        await enterStage('PLAN');
        const plan = build(scored, config, {
            generatedAt: options.generatedAt ?? resolveGeneratedAt(input.records),
            inputDigest,
            warnings,
        });
        const encodedPlan = encodePlan(plan);
        const diff = diffPlans(previousPlan, plan);
        await leaveStage({ findings: plan.findingCount, warnings: plan.warnings.length, ...diff.counts });

        await enterStage('PERSIST', { dryRun: options.dryRun === true });
        let savedTo: string | null = null;
        if (options.store && options.dryRun !== true) {
            savedTo = await options.store.save(input.projectPath, encodedPlan);
        }
        await leaveStage({ savedTo });

        await logger.writeRun({
            status: 'SUCCEEDED',
            startedAt,
            endedAt: logger.clock(),
            counts: {
                records: input.records.length,
                assets: input.assets.length,
                findings: plan.findingCount,
                dropped: aggregation.dropped.length,
                warnings: plan.warnings.length,
            },
            errorSummary: null,
        });

        return {
            runId,
            plan,
            diff,
            encodedPlan,
            previousPlan,
            dropped: aggregation.dropped,
            savedTo,
        };
    } catch (error) {
        const taskError = toTaskError(error);
        await logger.writeStageTerminal({
            stage: currentStage,
            status: 'FAILED',
            startedAt: stageStartedAt,
            endedAt: logger.clock(),
            error: taskError,
        });
        await logger.writeRun({ status: 'FAILED', startedAt, endedAt: logger.clock(), counts: {}, errorSummary: taskError });
        throw error;
    }
}
