import { z } from 'zod';

import { InvalidScoringConfigError, InvalidWeightsError } from './errors';

const finite = () => z.number().finite();

export const PhaseThresholdsSchema = z.object({
    critical: finite(),
    high: finite(),
    medium: finite(),
});

export const EffortHoursByTierSchema = z.object({
    critical: finite().nonnegative(),
    high: finite().nonnegative(),
    medium: finite().nonnegative(),
    low: finite().nonnegative(),
});

export const ScoringConfigSchema = z.object({
    cvssWeight: finite(),
    exploitabilityWeight: finite(),
    criticalityWeight: finite(),
    exposureWeight: finite(),
    phaseThresholds: PhaseThresholdsSchema,
    effortHoursByTier: EffortHoursByTierSchema,
}).strict();

export type PhaseThresholds = z.infer<typeof PhaseThresholdsSchema>;
export type EffortHoursByTier = z.infer<typeof EffortHoursByTierSchema>;
export type ScoringConfig = z.infer<typeof ScoringConfigSchema>;
export type ScoringWeights = Pick<ScoringConfig, 'cvssWeight' | 'exploitabilityWeight' | 'criticalityWeight' | 'exposureWeight'>;

export const WEIGHT_SUM_TOLERANCE = 1e-9;

export const DEFAULT_SCORING_CONFIG: ScoringConfig = Object.freeze({
    cvssWeight: 0.3,
    exploitabilityWeight: 0.3,
    criticalityWeight: 0.2,
    exposureWeight: 0.2,
    phaseThresholds: Object.freeze({ critical: 8.5, high: 6.5, medium: 4 }),
    effortHoursByTier: Object.freeze({ critical: 1.0, high: 0.5, medium: 0.25, low: 0.1 }),
});

const WEIGHT_FIELDS = ['cvssWeight', 'exploitabilityWeight', 'criticalityWeight', 'exposureWeight'] as const;

export function assertValidWeights(weights: ScoringWeights): void {
    for (const field of WEIGHT_FIELDS) {
        if (!Number.isFinite(weights[field])) {
            throw new InvalidWeightsError('NON_FINITE_WEIGHT', `${field} must be a finite number.`, {
                field,
                value: String(weights[field]),
            });
        }
        if (weights[field] < 0) {
            throw new InvalidWeightsError('NEGATIVE_WEIGHT', `${field} must not be negative.`, {
                field,
                value: String(weights[field]),
            });
        }
    }

    const sum = WEIGHT_FIELDS.reduce((total, field) => total + weights[field], 0);
    if (!(Math.abs(sum - 1) <= WEIGHT_SUM_TOLERANCE)) {
        throw new InvalidWeightsError('WEIGHTS_DO_NOT_SUM_TO_ONE', `Scoring weights must sum to 1.0, got ${sum}.`, {
            sum: String(sum),
            ...Object.fromEntries(WEIGHT_FIELDS.map((field) => [field, String(weights[field])])),
        });
    }
}

/**
 * Structural validation first, then the weight and threshold invariants.
 * Returns a fresh, frozen config.
 */
export function validateScoringConfig(raw: unknown): ScoringConfig {
    const parsed = ScoringConfigSchema.safeParse(raw);
    if (!parsed.success) {
        const issue = parsed.error.issues[0];
        const path = issue ? issue.path.join('.') : '';
        throw new InvalidScoringConfigError(`Scoring config is invalid at "${path}": ${issue?.message ?? 'unknown issue'}.`, {
            path,
        });
    }

    const config = parsed.data;
    assertValidWeights(config);

    const { critical, high, medium } = config.phaseThresholds;
    if (!(critical > high && high > medium)) {
        throw new InvalidScoringConfigError('Phase thresholds must be strictly descending: critical > high > medium.', {
            critical: String(critical),
            high: String(high),
            medium: String(medium),
        });
    }

    return Object.freeze({
        ...config,
        phaseThresholds: Object.freeze({ ...config.phaseThresholds }),
        effortHoursByTier: Object.freeze({ ...config.effortHoursByTier }),
    });
}
