import { z } from 'zod';

import type { SourcePriorityTable } from '../aggregate';
import type { ScoringConfig } from '../scoring';

export const DEFAULT_STATE_DIR = '.vulnplan';

/** Every field optional; whatever is present overrides the defaults. */
export const PlannerConfigFileSchema = z.object({
    cvssWeight: z.number().finite().optional(),
    exploitabilityWeight: z.number().finite().optional(),
    criticalityWeight: z.number().finite().optional(),
    exposureWeight: z.number().finite().optional(),
    phaseThresholds: z.object({
        critical: z.number().finite().optional(),
        high: z.number().finite().optional(),
        medium: z.number().finite().optional(),
    }).strict().optional(),
    effortHoursByTier: z.object({
        critical: z.number().finite().optional(),
        high: z.number().finite().optional(),
        medium: z.number().finite().optional(),
        low: z.number().finite().optional(),
    }).strict().optional(),
    concurrency: z.number().int().positive().optional(),
    stateDir: z.string().min(1).optional(),
    sourcePriority: z.record(z.string(), z.number().finite()).optional(),
    expectedSources: z.array(z.string().min(1)).optional(),
}).strict();

export type PlannerConfigFile = z.infer<typeof PlannerConfigFileSchema>;

export interface PlannerConfig {
    scoring: ScoringConfig;
    concurrency: number;
    stateDir: string;
    sourcePriority: SourcePriorityTable;
    expectedSources: string[];
}

export interface LoadPlannerConfigOptions {
    configPath?: string;
    env?: Readonly<Record<string, string | undefined>>;
}
