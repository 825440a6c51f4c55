export type EmptyInventoryErrorCode = 'EMPTY_INVENTORY';

/** Raised before any matching starts: with no assets nothing can ever match. */
export class EmptyInventoryError extends Error {
    readonly code: EmptyInventoryErrorCode = 'EMPTY_INVENTORY';
    readonly context: Record<string, string>;

    constructor(message: string, context: Record<string, string> = {}) {
        super(message);
        this.name = 'EmptyInventoryError';
        this.context = context;
    }
}
