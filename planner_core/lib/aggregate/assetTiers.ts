import type { Asset, AssetTier } from '../types';

const CRITICALITY_TIERS: Record<string, AssetTier> = {
    high: 10,
    medium: 5,
    low: 2,
};

const EXPOSURE_TIERS: Record<string, AssetTier> = {
    'internet-facing': 10,
    internal: 5,
    isolated: 2,
};

/** Untagged assets sit in the lowest tier; the result is never null. */
export function criticalityTier(asset: Asset): AssetTier {
    const tag = asset.tags?.criticality;
    return tag === undefined ? 2 : CRITICALITY_TIERS[tag] ?? 2;
}

export function exposureTier(asset: Asset): AssetTier {
    const tag = asset.tags?.exposure;
    return tag === undefined ? 2 : EXPOSURE_TIERS[tag] ?? 2;
}
