import { z } from 'zod';

const trimmed = () => z.string().trim().min(1);

export const AssetSchema = z.object({
    ecosystem: trimmed().transform((value) => value.toLowerCase()),
    name: trimmed(),
    version: trimmed(),
    filePath: trimmed(),
    // unknown kinds are kept; the plan builder flags them for review
    kind: trimmed(),
    tags: z.object({
        criticality: z.enum(['high', 'medium', 'low']).optional(),
        exposure: z.enum(['internet-facing', 'internal', 'isolated']).optional(),
    }).optional(),
});

export const InventorySchema = z.union([
    z.array(AssetSchema),
    z.object({ assets: z.array(AssetSchema) }).transform((wrapper) => wrapper.assets),
]);

const optionalText = () => z.string().nullable().optional();
const optionalScore = () => z.number().finite().nullable().optional();

// Required fields default to '' so the normalizer, not the schema, rejects
// a record that lacks them.
const CommonRecordSchema = z.object({
    sourcePriority: z.number().finite().nullable().optional(),
    vulnId: z.string().optional(),
    aliases: z.array(z.string()).optional(),
    ecosystem: z.string().default(''),
    packageName: z.string().default(''),
    affectedRange: z.string().default(''),
    fixedVersion: optionalText(),
    title: optionalText(),
    description: optionalText(),
    references: z.array(z.object({
        url: z.string(),
        tags: z.array(z.string()).optional(),
    })).optional(),
    fetchedAt: z.string().default(''),
});

export const KevRecordSchema = CommonRecordSchema.extend({
    cveID: z.string().optional(),
    vendorProject: optionalText(),
    product: optionalText(),
    dateAdded: optionalText(),
    knownRansomwareCampaignUse: z.enum(['Known', 'Unknown']).nullable().optional(),
});

export const NvdRecordSchema = CommonRecordSchema.extend({
    cvssV31BaseScore: optionalScore(),
    cvssV30BaseScore: optionalScore(),
    cvssV2BaseScore: optionalScore(),
    vectorString: optionalText(),
});

export const GhsaRecordSchema = CommonRecordSchema.extend({
    severity: z.preprocess(
        (value) => (typeof value === 'string' ? value.toLowerCase() : value),
        z.enum(['critical', 'high', 'moderate', 'medium', 'low']).nullable().optional(),
    ),
    cvssScore: optionalScore(),
    vectorString: optionalText(),
});

export const OsvRecordSchema = CommonRecordSchema.extend({
    severity: z.array(z.object({ type: z.string(), score: z.string() })).optional(),
    databaseSeverity: optionalText(),
    database_specific: z.object({ severity: z.string().optional() }).passthrough().optional(),
});

export const GenericRecordSchema = CommonRecordSchema.extend({
    cvss: optionalScore(),
});

export const FeedSnapshotSchema = z.record(z.string().min(1), z.array(z.unknown()));
