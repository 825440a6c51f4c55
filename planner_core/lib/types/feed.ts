export interface FeedReference {
    url: string;
    tags?: string[];
}

/**
 * Fields every feed client supplies, whatever the shape of its upstream API.
 * `affectedRange` is kept in the source's own syntax until normalization.
 */
export interface RawFindingRecordBase {
    sourceId: string;
    sourcePriority?: number | null;
    vulnId: string;
    aliases?: string[];
    ecosystem: string;
    packageName: string;
    affectedRange: string;
    fixedVersion?: string | null;
    title?: string | null;
    description?: string | null;
    references?: FeedReference[];
    fetchedAt: string;
}

export interface KevRecord extends RawFindingRecordBase {
    sourceId: 'cisa-kev';
    vendorProject?: string | null;
    product?: string | null;
    dateAdded?: string | null;
    knownRansomwareCampaignUse?: 'Known' | 'Unknown' | null;
}

export interface NvdRecord extends RawFindingRecordBase {
    sourceId: 'nvd';
    cvssV31BaseScore?: number | null;
    cvssV30BaseScore?: number | null;
    cvssV2BaseScore?: number | null;
    vectorString?: string | null;
}

export type GhsaSeverity = 'critical' | 'high' | 'moderate' | 'medium' | 'low';

export interface GhsaRecord extends RawFindingRecordBase {
    sourceId: 'ghsa';
    severity?: GhsaSeverity | null;
    cvssScore?: number | null;
    vectorString?: string | null;
}

export interface OsvSeverityEntry {
    type: string;
    score: string;
}

export interface OsvRecord extends RawFindingRecordBase {
    sourceId: 'osv';
    severity?: OsvSeverityEntry[];
    databaseSeverity?: string | null;
}

export interface GenericFeedRecord extends RawFindingRecordBase {
    cvss?: number | null;
}

export type RawFindingRecord = KevRecord | NvdRecord | GhsaRecord | OsvRecord | GenericFeedRecord;

export function isKevRecord(record: RawFindingRecord): record is KevRecord {
    return record.sourceId === 'cisa-kev';
}

export function isNvdRecord(record: RawFindingRecord): record is NvdRecord {
    return record.sourceId === 'nvd';
}

export function isGhsaRecord(record: RawFindingRecord): record is GhsaRecord {
    return record.sourceId === 'ghsa';
}

export function isOsvRecord(record: RawFindingRecord): record is OsvRecord {
    return record.sourceId === 'osv';
}
