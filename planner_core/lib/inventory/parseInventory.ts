import type { z } from 'zod';

import { compareAscii } from '../identity';
import type { Asset, PlanWarning, RawFindingRecord, RawFindingRecordBase } from '../types';
import { InvalidInventoryError } from './errors';
import type { InvalidInventoryErrorCode } from './errors';
import {
    FeedSnapshotSchema,
    GenericRecordSchema,
    GhsaRecordSchema,
    InventorySchema,
    KevRecordSchema,
    NvdRecordSchema,
    OsvRecordSchema,
} from './schemas';

function fail(code: InvalidInventoryErrorCode, label: string, error: z.ZodError, context: Record<string, string> = {}): never {
    const issue = error.issues[0];
    const path = issue ? issue.path.join('.') : '';
    throw new InvalidInventoryError(code, `${label} is invalid at "${path}": ${issue?.message ?? 'unknown issue'}.`, {
        ...context,
        path,
    });
}

function compareAssets(left: Asset, right: Asset): number {
    return compareAscii(left.ecosystem, right.ecosystem)
        || compareAscii(left.name, right.name)
        || compareAscii(left.version, right.version)
        || compareAscii(left.filePath, right.filePath)
        || compareAscii(left.kind, right.kind);
}

/** Validates the discovery collaborator's inventory: an array, or `{ assets: [...] }`. */
export function parseInventory(raw: unknown): Asset[] {
    const parsed = InventorySchema.safeParse(raw);
    if (!parsed.success) {
        fail('INVALID_INVENTORY', 'Asset inventory', parsed.error);
    }

    return parsed.data
        .map((asset): Asset => {
            const tags = asset.tags && (asset.tags.criticality || asset.tags.exposure)
                ? {
                    ...(asset.tags.criticality ? { criticality: asset.tags.criticality } : {}),
                    ...(asset.tags.exposure ? { exposure: asset.tags.exposure } : {}),
                }
                : undefined;
            return {
                ecosystem: asset.ecosystem,
                name: asset.name,
                version: asset.version,
                filePath: asset.filePath,
                kind: asset.kind,
                ...(tags ? { tags } : {}),
            };
        })
        .sort(compareAssets);
}

export interface FeedSnapshot {
    records: RawFindingRecord[];
    /** One UNPARSABLE_RECORD entry per record that failed its source's schema. */
    warnings: PlanWarning[];
}

class RecordShapeError extends Error {
    readonly path: string;

    constructor(path: string, message: string) {
        super(message);
        this.name = 'RecordShapeError';
        this.path = path;
    }
}

function parseEntry<T extends z.ZodTypeAny>(schema: T, entry: unknown): z.infer<T> {
    const parsed = schema.safeParse(entry);
    if (!parsed.success) {
        const issue = parsed.error.issues[0];
        throw new RecordShapeError(issue ? issue.path.join('.') : '', issue?.message ?? 'unknown issue');
    }
    return parsed.data;
}

function withBase(sourceId: string, vulnId: string, record: z.infer<typeof GenericRecordSchema>): RawFindingRecordBase {
    return {
        sourceId,
        sourcePriority: record.sourcePriority,
        vulnId,
        aliases: record.aliases,
        ecosystem: record.ecosystem,
        packageName: record.packageName,
        affectedRange: record.affectedRange,
        fixedVersion: record.fixedVersion,
        title: record.title,
        description: record.description,
        references: record.references,
        fetchedAt: record.fetchedAt,
    };
}

function parseRecord(sourceId: string, entry: unknown): RawFindingRecord {
    switch (sourceId) {
        case 'cisa-kev': {
            const record = parseEntry(KevRecordSchema, entry);
            return {
                ...withBase(sourceId, record.vulnId ?? record.cveID ?? '', record),
                sourceId,
                vendorProject: record.vendorProject,
                product: record.product,
                dateAdded: record.dateAdded,
                knownRansomwareCampaignUse: record.knownRansomwareCampaignUse,
            };
        }
        case 'nvd': {
            const record = parseEntry(NvdRecordSchema, entry);
            return {
                ...withBase(sourceId, record.vulnId ?? '', record),
                sourceId,
                cvssV31BaseScore: record.cvssV31BaseScore,
                cvssV30BaseScore: record.cvssV30BaseScore,
                cvssV2BaseScore: record.cvssV2BaseScore,
                vectorString: record.vectorString,
            };
        }
        case 'ghsa': {
            const record = parseEntry(GhsaRecordSchema, entry);
            return {
                ...withBase(sourceId, record.vulnId ?? '', record),
                sourceId,
                severity: record.severity,
                cvssScore: record.cvssScore,
                vectorString: record.vectorString,
            };
        }
        case 'osv': {
            const record = parseEntry(OsvRecordSchema, entry);
            return {
                ...withBase(sourceId, record.vulnId ?? '', record),
                sourceId,
                severity: record.severity,
                databaseSeverity: record.databaseSeverity ?? record.database_specific?.severity ?? null,
            };
        }
        default: {
            const record = parseEntry(GenericRecordSchema, entry);
            return {
                ...withBase(sourceId, record.vulnId ?? '', record),
                cvss: record.cvss,
            };
        }
    }
}

/**
 * Flattens a `{ [sourceId]: record[] }` snapshot into records tagged with
 * their source. Sources without a dedicated shape are read as generic records.
 * A record that fails its source's schema is skipped with a warning; only a
 * snapshot without that outer shape is rejected.
 */
export function parseFeedSnapshot(raw: unknown): FeedSnapshot {
    const parsed = FeedSnapshotSchema.safeParse(raw);
    if (!parsed.success) {
        fail('INVALID_FEED_SNAPSHOT', 'Feed snapshot', parsed.error);
    }

    const records: RawFindingRecord[] = [];
    const warnings: PlanWarning[] = [];

    for (const sourceId of Object.keys(parsed.data).sort(compareAscii)) {
        parsed.data[sourceId].forEach((entry, index) => {
            try {
                records.push(parseRecord(sourceId, entry));
            } catch (error) {
                if (!(error instanceof RecordShapeError)) {
                    throw error;
                }
                console.warn(`[FeedSnapshot] Skipping ${sourceId}[${index}]: invalid at "${error.path}": ${error.message}`);
                warnings.push({
                    code: 'UNPARSABLE_RECORD',
                    message: `Feed record ${sourceId}[${index}] is invalid at "${error.path}": ${error.message}.`,
                    context: { sourceId, index: String(index), path: error.path },
                });
            }
        });
    }

    return { records, warnings };
}
