export type UnparsableRecordErrorCode =
    | 'MISSING_VULN_ID'
    | 'MISSING_PACKAGE'
    | 'MISSING_AFFECTED_RANGE'
    | 'INVALID_RANGE';

/** One feed record that cannot take part in aggregation. Never fatal for a batch. */
export class UnparsableRecordError extends Error {
    readonly code: UnparsableRecordErrorCode;
    readonly context: Record<string, string>;

    constructor(code: UnparsableRecordErrorCode, message: string, context: Record<string, string> = {}) {
        super(message);
        this.name = 'UnparsableRecordError';
        this.code = code;
        this.context = context;
    }
}
