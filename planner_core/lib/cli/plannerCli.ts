import fs from 'node:fs';

import { loadPlannerConfig } from '../config';
import { stableStringify } from '../identity';
import { parseFeedSnapshot, parseInventory } from '../inventory';
import { FilePlanStore } from '../persistence';
import { runRemediationPipeline } from '../pipeline';
import type { PipelineResult } from '../pipeline';
import { ConsoleRunLogClient } from '../runtime';
import { CliUsageError } from './errors';

type CliArgs = {
    project: string;
    inventory: string;
    feeds: string;
    config: string | null;
    stateDir: string | null;
    dryRun: boolean;
    verbose: boolean;
};

export interface PlannerCliOptions {
    env?: Readonly<Record<string, string | undefined>>;
}

export interface PlannerCliResult {
    exitCode: number;
    output: string;
}

export async function runPlannerCli(argv: string[], options: PlannerCliOptions = {}): Promise<PlannerCliResult> {
    try {
        const args = parseArgs(argv);
        const config = loadPlannerConfig({ configPath: args.config ?? undefined, env: options.env });
        const assets = parseInventory(readJson(args.inventory, 'inventory'));
        const { records, warnings } = parseFeedSnapshot(readJson(args.feeds, 'feeds'));

        const result = await runRemediationPipeline({ projectPath: args.project, assets, records, warnings }, {
            config: config.scoring,
            sourcePriority: config.sourcePriority,
            expectedSources: config.expectedSources,
            concurrency: config.concurrency,
            store: new FilePlanStore({ stateDir: args.stateDir ?? config.stateDir }),
            runLogClient: args.verbose ? new ConsoleRunLogClient() : undefined,
            dryRun: args.dryRun,
        });

        return { exitCode: 0, output: stableStringify(summarize(args, result), 2) };
    } catch (error) {
        return { exitCode: 1, output: stableStringify({ error: describeFailure(error) }, 2) };
    }
}

export function summarize(args: Pick<CliArgs, 'project' | 'dryRun'>, result: PipelineResult): Record<string, unknown> {
    return {
        runId: result.runId,
        project: args.project,
        dryRun: args.dryRun,
        generatedAt: result.plan.generatedAt,
        findingCount: result.plan.findingCount,
        totalEffortHours: result.plan.totalEffortHours,
        phases: Object.fromEntries(result.plan.phases.map((phase) => [phase.tier, {
            findings: phase.findings.length,
            estimatedEffortHours: phase.estimatedEffortHours,
        }])),
        diff: result.diff.counts,
        warnings: result.plan.warnings.length,
        dropped: result.dropped.length,
        savedTo: result.savedTo,
    };
}

function describeFailure(error: unknown): { code: string; name: string; message: string } {
    if (error instanceof Error) {
        const code = 'code' in error && typeof error.code === 'string' ? error.code : 'UNEXPECTED';
        return { code, name: error.name, message: error.message };
    }
    return { code: 'UNEXPECTED', name: 'Error', message: String(error) };
}

function readJson(filePath: string, label: string): unknown {
    try {
        return JSON.parse(fs.readFileSync(filePath, 'utf8'));
    } catch (error) {
        throw new CliUsageError('UNREADABLE_INPUT', `Cannot read ${label} file ${filePath}: ${error instanceof Error ? error.message : String(error)}`);
    }
}

function parseArgs(argv: string[]): CliArgs {
    const flags = new Map<string, string | boolean>();

    for (let i = 0; i < argv.length; i += 1) {
        const token = argv[i];
        if (!token.startsWith('--')) {
            continue;
        }

        const name = token.slice(2);
        if (name === 'dry-run' || name === 'verbose') {
            flags.set(name, true);
            continue;
        }

        const value = argv[i + 1];
        if (!value || value.startsWith('--')) {
            throw new CliUsageError('MISSING_FLAG', `Missing value for --${name}`);
        }

        flags.set(name, value);
        i += 1;
    }

    return {
        project: requiredFlag(flags, 'project'),
        inventory: requiredFlag(flags, 'inventory'),
        feeds: requiredFlag(flags, 'feeds'),
        config: optionalFlag(flags, 'config'),
        stateDir: optionalFlag(flags, 'state-dir'),
        dryRun: flags.get('dry-run') === true,
        verbose: flags.get('verbose') === true,
    };
}

function requiredFlag(flags: Map<string, string | boolean>, name: string): string {
    const value = optionalFlag(flags, name);
    if (value === null) {
        throw new CliUsageError('MISSING_FLAG', `Missing required flag --${name}`);
    }

    return value;
}

function optionalFlag(flags: Map<string, string | boolean>, name: string): string | null {
    const value = flags.get(name);
    if (typeof value !== 'string' || value.trim().length === 0) {
        return null;
    }

    return value.trim();
}
