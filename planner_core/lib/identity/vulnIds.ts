const CVE_PATTERN = /^CVE-\d{4}-\d{4,}$/;
const GHSA_PATTERN = /^GHSA(-[23456789cfghjmpqrvwx]{4}){3}$/;

/**
 * Normalizes a vulnerability identifier to the casing each namespace uses:
 * CVE and OSV-style prefixes upper-case, GHSA ids with an upper-case prefix
 * and a lower-case body (`GHSA-968p-4wvh-cqc8`).
 */
export function normalizeVulnId(raw: string): string {
    const trimmed = raw.trim();
    if (trimmed.length === 0) {
        return '';
    }

    const upper = trimmed.toUpperCase();
    if (upper.startsWith('GHSA-')) {
        return `GHSA-${trimmed.slice(5).toLowerCase()}`;
    }

    return upper;
}

export function isCveId(value: string): boolean {
    return CVE_PATTERN.test(value);
}

export function isGhsaId(value: string): boolean {
    return GHSA_PATTERN.test(value);
}

export interface ResolvedVulnId {
    vulnId: string;
    aliases: string[];
}

/**
 * Picks one identifier for a vulnerability reported under several names.
 * A CVE id wins, then a GHSA id, then the source's own id. The rest become
 * aliases, sorted and deduplicated.
 */
export function selectCanonicalVulnId(rawId: string, rawAliases: readonly string[] = []): ResolvedVulnId {
    const candidates = [rawId, ...rawAliases]
        .map((entry) => normalizeVulnId(entry))
        .filter((entry) => entry.length > 0);

    const unique = Array.from(new Set(candidates));
    if (unique.length === 0) {
        return { vulnId: '', aliases: [] };
    }

    const vulnId = unique.find(isCveId)
        ?? unique.find(isGhsaId)
        ?? unique[0];

    return {
        vulnId,
        aliases: unique.filter((entry) => entry !== vulnId).sort(),
    };
}
