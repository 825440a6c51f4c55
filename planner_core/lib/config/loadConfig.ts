import fs from 'node:fs';

import { DEFAULT_SOURCE_PRIORITY } from '../aggregate';
import { DEFAULT_SCORING_CONFIG, validateScoringConfig } from '../scoring';
import type { ScoringConfig } from '../scoring';
import { DEFAULT_CONCURRENCY } from '../pipeline';
import { ConfigLoadError } from './errors';
import { DEFAULT_STATE_DIR, PlannerConfigFileSchema } from './types';
import type { LoadPlannerConfigOptions, PlannerConfig, PlannerConfigFile } from './types';

type Env = Readonly<Record<string, string | undefined>>;

function readConfigFile(configPath: string): PlannerConfigFile {
    let text: string;
    try {
        text = fs.readFileSync(configPath, 'utf8');
    } catch (error) {
        throw new ConfigLoadError('CONFIG_NOT_FOUND', `Cannot read config file ${configPath}: ${error instanceof Error ? error.message : String(error)}`, {
            configPath,
        });
    }

    let raw: unknown;
    try {
        raw = JSON.parse(text);
    } catch (error) {
        throw new ConfigLoadError('INVALID_CONFIG_JSON', `Config file ${configPath} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`, {
            configPath,
        });
    }

    const parsed = PlannerConfigFileSchema.safeParse(raw);
    if (!parsed.success) {
        const issue = parsed.error.issues[0];
        const field = issue ? issue.path.join('.') : '';
        throw new ConfigLoadError('INVALID_CONFIG_JSON', `Config file ${configPath} is invalid at "${field}": ${issue?.message ?? 'unknown issue'}.`, {
            configPath,
            field,
        });
    }

    return parsed.data;
}

function envNumber(env: Env, name: string): number | undefined {
    const value = env[name];
    if (value === undefined || value.trim() === '') {
        return undefined;
    }

    const parsed = Number(value);
    if (!Number.isFinite(parsed)) {
        throw new ConfigLoadError('INVALID_ENV_VALUE', `${name} must be a number, got "${value}".`, { variable: name, value });
    }
    return parsed;
}

function mergeScoring(file: PlannerConfigFile, env: Env): ScoringConfig {
    const base = DEFAULT_SCORING_CONFIG;
    return {
        cvssWeight: envNumber(env, 'PLANNER_CVSS_WEIGHT') ?? file.cvssWeight ?? base.cvssWeight,
        exploitabilityWeight: envNumber(env, 'PLANNER_EXPLOITABILITY_WEIGHT') ?? file.exploitabilityWeight ?? base.exploitabilityWeight,
        criticalityWeight: envNumber(env, 'PLANNER_CRITICALITY_WEIGHT') ?? file.criticalityWeight ?? base.criticalityWeight,
        exposureWeight: envNumber(env, 'PLANNER_EXPOSURE_WEIGHT') ?? file.exposureWeight ?? base.exposureWeight,
        phaseThresholds: { ...base.phaseThresholds, ...file.phaseThresholds },
        effortHoursByTier: { ...base.effortHoursByTier, ...file.effortHoursByTier },
    };
}

/**
 * Defaults, then the optional JSON file, then `PLANNER_*` environment
 * variables. The merged scoring config is validated before it is returned.
 */
export function loadPlannerConfig(options: LoadPlannerConfigOptions = {}): PlannerConfig {
    const env = options.env ?? process.env;
    const file: PlannerConfigFile = options.configPath ? readConfigFile(options.configPath) : {};

    const concurrency = envNumber(env, 'PLANNER_CONCURRENCY') ?? file.concurrency ?? DEFAULT_CONCURRENCY;
    if (!Number.isInteger(concurrency) || concurrency < 1) {
        throw new ConfigLoadError('INVALID_ENV_VALUE', `PLANNER_CONCURRENCY must be a positive integer, got ${concurrency}.`, {
            variable: 'PLANNER_CONCURRENCY',
            value: String(concurrency),
        });
    }

    const stateDirFromEnv = env.PLANNER_STATE_DIR?.trim();

    return {
        scoring: validateScoringConfig(mergeScoring(file, env)),
        concurrency,
        stateDir: stateDirFromEnv || file.stateDir || DEFAULT_STATE_DIR,
        sourcePriority: { ...DEFAULT_SOURCE_PRIORITY, ...file.sourcePriority },
        expectedSources: [...(file.expectedSources ?? [])],
    };
}
