import { CVSS30, CVSS31, CVSS40 } from '@pandatix/js-cvss';

import type { ExploitabilityTier, FeedReference, RawFindingRecord } from '../types';
import { isGhsaRecord, isKevRecord, isNvdRecord, isOsvRecord } from '../types';
import { describeError, roundTo } from '../utils/rounding';

/**
 * Midpoints of the CVSS v3 qualitative bands, used when a source only
 * publishes a label.
 */
export const SEVERITY_LABEL_CVSS: Record<string, number> = {
    critical: 9.5,
    high: 7.5,
    moderate: 5.5,
    medium: 5.5,
    low: 2.5,
};

const OSV_SEVERITY_TYPES = ['CVSS_V3', 'CVSS_V4'];

export interface ResolvedSeverity {
    cvss: number | null;
    vector: string | null;
}

export function scoreCvssVector(vector: string): number | null {
    const trimmed = vector.trim();

    try {
        if (trimmed.startsWith('CVSS:4.0/')) {
            return roundTo(new CVSS40(trimmed).Score(), 1);
        }
        if (trimmed.startsWith('CVSS:3.1/')) {
            return roundTo(new CVSS31(trimmed).BaseScore(), 1);
        }
        if (trimmed.startsWith('CVSS:3.0/')) {
            return roundTo(new CVSS30(trimmed).BaseScore(), 1);
        }
    } catch (error) {
        console.warn(`[Normalizer] Ignoring unreadable CVSS vector "${trimmed}": ${describeError(error)}`);
    }

    return null;
}

export function cvssFromLabel(label: string | null | undefined): number | null {
    if (!label) {
        return null;
    }

    return SEVERITY_LABEL_CVSS[label.trim().toLowerCase()] ?? null;
}

/**
 * Maps a record's severity vocabulary onto CVSS 0-10. KEV publishes no
 * score: its cvss stays null and the NVD record for the same CVE supplies
 * one during aggregation.
 */
export function resolveSeverity(record: RawFindingRecord): ResolvedSeverity {
    if (isKevRecord(record)) {
        return { cvss: null, vector: null };
    }

    if (isNvdRecord(record)) {
        const vector = normalizeVector(record.vectorString);
        const score = firstScore(record.cvssV31BaseScore, record.cvssV30BaseScore, record.cvssV2BaseScore)
            ?? (vector === null ? null : scoreCvssVector(vector));
        return { cvss: score, vector };
    }

    if (isGhsaRecord(record)) {
        const vector = normalizeVector(record.vectorString);
        const score = firstScore(record.cvssScore)
            ?? (vector === null ? null : scoreCvssVector(vector))
            ?? cvssFromLabel(record.severity);
        return { cvss: score, vector };
    }

    if (isOsvRecord(record)) {
        for (const type of OSV_SEVERITY_TYPES) {
            const entry = (record.severity ?? []).find((candidate) => candidate.type === type);
            if (!entry) {
                continue;
            }

            const numeric = /^\d+(\.\d+)?$/.test(entry.score.trim()) ? firstScore(Number(entry.score)) : null;
            if (numeric !== null) {
                return { cvss: numeric, vector: null };
            }

            const score = scoreCvssVector(entry.score);
            if (score !== null) {
                return { cvss: score, vector: entry.score.trim() };
            }
        }

        return { cvss: cvssFromLabel(record.databaseSeverity), vector: null };
    }

    return { cvss: 'cvss' in record ? firstScore(record.cvss) : null, vector: null };
}

/**
 * KEV listing is confirmed exploitation (10). Other sources only raise the
 * tier to 7 when a reference is tagged as an exploit; otherwise they stay
 * silent and the merged finding falls back to 3.
 */
export function resolveExploitability(record: RawFindingRecord): ExploitabilityTier | null {
    if (isKevRecord(record)) {
        return 10;
    }

    return hasExploitReference(record.references ?? []) ? 7 : null;
}

function hasExploitReference(references: readonly FeedReference[]): boolean {
    return references.some((reference) => (reference.tags ?? []).some((tag) => /exploit/i.test(tag)));
}

function firstScore(...candidates: Array<number | null | undefined>): number | null {
    for (const candidate of candidates) {
        if (typeof candidate === 'number' && Number.isFinite(candidate) && candidate >= 0 && candidate <= 10) {
            return roundTo(candidate, 1);
        }
    }

    return null;
}

function normalizeVector(value: string | null | undefined): string | null {
    if (typeof value !== 'string') {
        return null;
    }

    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : null;
}
