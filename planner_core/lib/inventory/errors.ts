export type InvalidInventoryErrorCode = 'INVALID_INVENTORY' | 'INVALID_FEED_SNAPSHOT';

/** Collaborator input that does not have the agreed shape. */
export class InvalidInventoryError extends Error {
    readonly code: InvalidInventoryErrorCode;
    readonly context: Record<string, string>;

    constructor(code: InvalidInventoryErrorCode, message: string, context: Record<string, string> = {}) {
        super(message);
        this.name = 'InvalidInventoryError';
        this.code = code;
        this.context = context;
    }
}
