export type PlanDecodeErrorCode = 'INVALID_JSON' | 'INVALID_PLAN';

export class PlanDecodeError extends Error {
    readonly code: PlanDecodeErrorCode;
    readonly context: Record<string, string>;

    constructor(code: PlanDecodeErrorCode, message: string, context: Record<string, string> = {}) {
        super(message);
        this.name = 'PlanDecodeError';
        this.code = code;
        this.context = context;
    }
}
