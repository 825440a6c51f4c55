import { compareAscii, sha256Hex } from '../identity';
import { InMemoryPlanStore } from '../persistence';
import { runRemediationPipeline } from '../pipeline';
import type { PipelineInput, PipelineOptions, PipelineResult } from '../pipeline';

export interface DeterminismCapture {
    encodedHash: string;
    canonicalIds: string[];
    phaseOrder: Record<string, string[]>;
}

export interface DeterminismReport {
    passed: boolean;
    failures: string[];
    baselineHash: string;
    rerunHash: string;
    baseline: DeterminismCapture;
    rerun: DeterminismCapture;
}

export type DeterminismHarnessOptions = Omit<PipelineOptions, 'store' | 'dryRun'> & {
    failFast?: boolean;
};

/**
 * Runs the pipeline twice against one fresh store, the second time with the
 * inventory and records in reverse order, and checks that nothing moved.
 */
export async function runDeterminismHarness(
    input: PipelineInput,
    options: DeterminismHarnessOptions = {},
): Promise<DeterminismReport> {
    const { failFast, ...pipelineOptions } = options;
    const store = new InMemoryPlanStore();

    const first = await runRemediationPipeline(input, { ...pipelineOptions, store });
    const storedAfterFirst = store.read(input.projectPath);

    const second = await runRemediationPipeline({
        projectPath: input.projectPath,
        assets: [...input.assets].reverse(),
        records: [...input.records].reverse(),
        warnings: [...(input.warnings ?? [])].reverse(),
    }, { ...pipelineOptions, store });
    const storedAfterSecond = store.read(input.projectPath);

    const baseline = capture(first);
    const rerun = capture(second);
    const failures = collectFailures({
        first,
        second,
        baseline,
        rerun,
        storedAfterFirst,
        storedAfterSecond,
    }, failFast === true);

    return {
        passed: failures.length === 0,
        failures,
        baselineHash: baseline.encodedHash,
        rerunHash: rerun.encodedHash,
        baseline,
        rerun,
    };
}

export function capture(result: PipelineResult): DeterminismCapture {
    const phaseOrder: Record<string, string[]> = {};
    for (const phase of result.plan.phases) {
        phaseOrder[phase.tier] = phase.findings.map((finding) => finding.canonicalId);
    }

    return {
        encodedHash: sha256Hex(result.encodedPlan),
        canonicalIds: Object.values(phaseOrder).flat().sort(compareAscii),
        phaseOrder,
    };
}

function collectFailures(state: {
    first: PipelineResult;
    second: PipelineResult;
    baseline: DeterminismCapture;
    rerun: DeterminismCapture;
    storedAfterFirst: string | undefined;
    storedAfterSecond: string | undefined;
}, failFast: boolean): string[] {
    const checks: Array<[boolean, string]> = [
        [state.baseline.encodedHash === state.rerun.encodedHash, 'encoded plan differs between runs'],
        [
            state.storedAfterFirst !== undefined && state.storedAfterFirst === state.storedAfterSecond,
            'persisted plan is not byte-identical across runs',
        ],
        [
            JSON.stringify(state.baseline.canonicalIds) === JSON.stringify(state.rerun.canonicalIds),
            'canonicalId set differs between runs',
        ],
        [
            JSON.stringify(state.baseline.phaseOrder) === JSON.stringify(state.rerun.phaseOrder),
            'phase ordering differs between runs',
        ],
        [
            state.second.diff.counts.new === 0
                && state.second.diff.counts.resolved === 0
                && state.second.diff.counts.rescored === 0
                && state.second.diff.counts.unchanged === state.first.plan.findingCount,
            `rerun diff is not all-unchanged: ${JSON.stringify(state.second.diff.counts)}`,
        ],
    ];

    const failures: string[] = [];
    for (const [ok, message] of checks) {
        if (!ok) {
            failures.push(message);
            if (failFast) {
                break;
            }
        }
    }
    return failures;
}
