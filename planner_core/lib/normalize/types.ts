import type { ExploitabilityTier } from '../types';
import type { ComparatorRegistry, VersionRange } from '../versioning';

/**
 * One source's view of a vulnerability, in canonical units but not yet tied
 * to an asset.
 */
export interface FindingFragment {
    sourceId: string;
    sourcePriority: number | null;
    vulnId: string;
    aliases: string[];
    ecosystem: string;
    packageName: string;
    packageKey: string;
    range: VersionRange;
    affectedRange: string;
    fixedVersion: string | null;
    title: string | null;
    description: string | null;
    cvss: number | null;
    cvssVector: string | null;
    exploitability: ExploitabilityTier | null;
    references: string[];
    fetchedAt: string;
}

export interface NormalizeOptions {
    comparators?: ComparatorRegistry;
}
