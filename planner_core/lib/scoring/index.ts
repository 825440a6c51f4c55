export { buildReasonCodes, createScorer, score, scoreAll } from './scoreFinding';
export {
    DEFAULT_SCORING_CONFIG,
    EffortHoursByTierSchema,
    PhaseThresholdsSchema,
    ScoringConfigSchema,
    WEIGHT_SUM_TOLERANCE,
    assertValidWeights,
    validateScoringConfig,
} from './scoringConfig';
export type { EffortHoursByTier, PhaseThresholds, ScoringConfig, ScoringWeights } from './scoringConfig';
export { InvalidScoringConfigError, InvalidWeightsError } from './errors';
export type { InvalidScoringConfigErrorCode, InvalidWeightsErrorCode } from './errors';
