export type CliUsageErrorCode = 'MISSING_FLAG' | 'UNREADABLE_INPUT';

export class CliUsageError extends Error {
    readonly code: CliUsageErrorCode;

    constructor(code: CliUsageErrorCode, message: string) {
        super(message);
        this.name = 'CliUsageError';
        this.code = code;
    }
}
