import { compareAscii, generateFindingId, stableStringify } from '../identity';
import type { Asset, AssetTier, Finding } from '../types';
import { normalizePackageName } from '../versioning';
import { criticalityTier, exposureTier } from './assetTiers';
import type { MatchedFragment } from './types';

/**
 * Collapses matched fragments into one finding per (vulnerability, package
 * version). For every field the highest-priority source with a non-null
 * value wins; `sources`, aliases, references and file paths accumulate.
 *
 * Groups and their members are put in a total order before merging, so the
 * result does not depend on the order fragments arrive in.
 */
export function mergeFragments(matches: readonly MatchedFragment[]): Finding[] {
    const groups = new Map<string, MatchedFragment[]>();

    for (const match of matches) {
        const canonicalId = generateFindingId({
            vulnId: match.fragment.vulnId,
            ecosystem: match.fragment.ecosystem,
            name: normalizePackageName(match.fragment.ecosystem, match.asset.name),
            version: match.asset.version,
        });

        const bucket = groups.get(canonicalId);
        if (bucket) {
            bucket.push(match);
        } else {
            groups.set(canonicalId, [match]);
        }
    }

    return Array.from(groups.entries())
        .sort(([left], [right]) => compareAscii(left, right))
        .map(([canonicalId, members]) => mergeGroup(canonicalId, [...members].sort(comparePrecedence)));
}

function mergeGroup(canonicalId: string, members: MatchedFragment[]): Finding {
    const fragments = members.map((member) => member.fragment);
    const assets = members.map((member) => member.asset).sort(compareAssets);
    const vulnId = fragments[0].vulnId;

    const pick = <T>(select: (fragment: MatchedFragment['fragment']) => T | null): T | null => {
        for (const fragment of fragments) {
            const value = select(fragment);
            if (value !== null) {
                return value;
            }
        }
        return null;
    };

    const aliases = new Set(fragments.flatMap((fragment) => fragment.aliases));
    aliases.delete(vulnId);

    return {
        canonicalId,
        vulnId,
        aliases: Array.from(aliases).sort(compareAscii),
        matchedAsset: assets[0],
        filePaths: Array.from(new Set(assets.map((asset) => asset.filePath))).sort(compareAscii),
        title: pick((fragment) => fragment.title) ?? vulnId,
        description: pick((fragment) => fragment.description) ?? '',
        affectedRange: fragments[0].affectedRange,
        fixedVersion: pick((fragment) => fragment.fixedVersion),
        cvss: pick((fragment) => fragment.cvss),
        cvssVector: pick((fragment) => fragment.cvssVector),
        exploitability: pick((fragment) => fragment.exploitability) ?? 3,
        criticality: maxTier(assets.map(criticalityTier)),
        exposure: maxTier(assets.map(exposureTier)),
        sources: Array.from(new Set(fragments.map((fragment) => fragment.sourceId))),
        references: Array.from(new Set(fragments.flatMap((fragment) => fragment.references))).sort(compareAscii),
        riskScore: null,
    };
}

function comparePrecedence(left: MatchedFragment, right: MatchedFragment): number {
    if (left.priority !== right.priority) {
        return left.priority - right.priority;
    }

    const bySource = compareAscii(left.fragment.sourceId, right.fragment.sourceId);
    if (bySource !== 0) return bySource;

    // newer snapshot of the same source first
    const byFetched = compareAscii(right.fragment.fetchedAt, left.fragment.fetchedAt);
    if (byFetched !== 0) return byFetched;

    const byAsset = compareAssets(left.asset, right.asset);
    if (byAsset !== 0) return byAsset;

    return compareAscii(stableStringify(left.fragment), stableStringify(right.fragment));
}

function compareAssets(left: Asset, right: Asset): number {
    const byPath = compareAscii(left.filePath, right.filePath);
    if (byPath !== 0) return byPath;

    const byKind = compareAscii(left.kind, right.kind);
    if (byKind !== 0) return byKind;

    return compareAscii(stableStringify(left), stableStringify(right));
}

function maxTier(tiers: AssetTier[]): AssetTier {
    return tiers.reduce<AssetTier>((highest, tier) => (tier > highest ? tier : highest), 2);
}
