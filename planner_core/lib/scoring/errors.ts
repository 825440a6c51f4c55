export type InvalidWeightsErrorCode = 'WEIGHTS_DO_NOT_SUM_TO_ONE' | 'NEGATIVE_WEIGHT' | 'NON_FINITE_WEIGHT';

/** Weight sets are rejected, never silently normalized. */
export class InvalidWeightsError extends Error {
    readonly code: InvalidWeightsErrorCode;
    readonly context: Record<string, string>;

    constructor(code: InvalidWeightsErrorCode, message: string, context: Record<string, string> = {}) {
        super(message);
        this.name = 'InvalidWeightsError';
        this.code = code;
        this.context = context;
    }
}

export type InvalidScoringConfigErrorCode = 'INVALID_CONFIG';

export class InvalidScoringConfigError extends Error {
    readonly code: InvalidScoringConfigErrorCode = 'INVALID_CONFIG';
    readonly context: Record<string, string>;

    constructor(message: string, context: Record<string, string> = {}) {
        super(message);
        this.name = 'InvalidScoringConfigError';
        this.context = context;
    }
}
