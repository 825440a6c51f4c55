export type UnsupportedAssetKindErrorCode = 'UNSUPPORTED_ASSET_KIND';

/**
 * No fix strategy exists for the asset kind. The plan builder turns this into
 * a plan warning and flags the finding for manual review.
 */
export class UnsupportedAssetKindError extends Error {
    readonly code: UnsupportedAssetKindErrorCode = 'UNSUPPORTED_ASSET_KIND';
    readonly kind: string;
    readonly context: Record<string, string>;

    constructor(kind: string, context: Record<string, string> = {}) {
        super(`No fix strategy for asset kind "${kind}".`);
        this.name = 'UnsupportedAssetKindError';
        this.kind = kind;
        this.context = context;
    }
}
