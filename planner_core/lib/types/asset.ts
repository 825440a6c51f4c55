export const ASSET_KINDS = ['dependency', 'container-image', 'iac-resource', 'secret-exposure'] as const;

export type AssetKind = typeof ASSET_KINDS[number];

export type CriticalityTag = 'high' | 'medium' | 'low';

export type ExposureTag = 'internet-facing' | 'internal' | 'isolated';

export interface AssetTags {
    criticality?: CriticalityTag;
    exposure?: ExposureTag;
}

/**
 * One scanned unit handed over by environment discovery.
 *
 * `kind` is typed as a plain string because discovery may report kinds this
 * planner has no fix strategy for; those degrade to manual review.
 */
export interface Asset {
    ecosystem: string;
    name: string;
    version: string;
    filePath: string;
    kind: string;
    tags?: AssetTags;
}

export function isAssetKind(value: string): value is AssetKind {
    return ASSET_KINDS.some((kind) => kind === value);
}

export function formatAssetRef(asset: Pick<Asset, 'ecosystem' | 'name' | 'version'>): string {
    return `${asset.ecosystem}:${asset.name}@${asset.version}`;
}
