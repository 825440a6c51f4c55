import fs from 'node:fs';

import { loadPlannerConfig } from '../config';
import { runDeterminismHarness } from '../harness';
import { stableStringify } from '../identity';
import { parseFeedSnapshot, parseInventory } from '../inventory';
import { CliUsageError } from './errors';

type CliArgs = {
    project: string;
    inventory: string;
    feeds: string;
    config: string | null;
    failFast: boolean;
};

export async function runDeterminismCli(
    argv: string[],
    options: { env?: Readonly<Record<string, string | undefined>> } = {},
): Promise<{ output: string; exitCode: number }> {
    const args = parseArgs(argv);
    const config = loadPlannerConfig({ configPath: args.config ?? undefined, env: options.env });

    const { records, warnings } = parseFeedSnapshot(readJson(args.feeds));

    const report = await runDeterminismHarness({
        projectPath: args.project,
        assets: parseInventory(readJson(args.inventory)),
        records,
        warnings,
    }, {
        config: config.scoring,
        sourcePriority: config.sourcePriority,
        expectedSources: config.expectedSources,
        concurrency: config.concurrency,
        failFast: args.failFast,
    });

    return {
        output: stableStringify({
            passed: report.passed,
            failures: report.failures,
            baselineHash: report.baselineHash,
            rerunHash: report.rerunHash,
        }, 2),
        exitCode: report.passed ? 0 : 1,
    };
}

function readJson(filePath: string): unknown {
    try {
        return JSON.parse(fs.readFileSync(filePath, 'utf8'));
    } catch (error) {
        throw new CliUsageError('UNREADABLE_INPUT', `Cannot read ${filePath}: ${error instanceof Error ? error.message : String(error)}`);
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
        if (name === 'fail-fast') {
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

    const required = (name: string): string => {
        const value = flags.get(name);
        if (typeof value !== 'string' || value.trim().length === 0) {
            throw new CliUsageError('MISSING_FLAG', `Missing required flag --${name}`);
        }
        return value.trim();
    };

    const config = flags.get('config');

    return {
        project: required('project'),
        inventory: required('inventory'),
        feeds: required('feeds'),
        config: typeof config === 'string' ? config : null,
        failFast: flags.get('fail-fast') === true,
    };
}
