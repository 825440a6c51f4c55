export type VersionErrorCode = 'UNPARSABLE_VERSION' | 'INVALID_RANGE';

export class UnsupportedVersionError extends Error {
    readonly code: VersionErrorCode;
    readonly context: Record<string, string>;

    constructor(code: VersionErrorCode, message: string, context: Record<string, string> = {}) {
        super(message);
        this.name = 'UnsupportedVersionError';
        this.code = code;
        this.context = context;
    }
}
