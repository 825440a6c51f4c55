export type ConfigLoadErrorCode = 'CONFIG_NOT_FOUND' | 'INVALID_CONFIG_JSON' | 'INVALID_ENV_VALUE';

export class ConfigLoadError extends Error {
    readonly code: ConfigLoadErrorCode;
    readonly context: Record<string, string>;

    constructor(code: ConfigLoadErrorCode, message: string, context: Record<string, string> = {}) {
        super(message);
        this.name = 'ConfigLoadError';
        this.code = code;
        this.context = context;
    }
}
