import { GenericComparator } from './genericComparator';
import { GoModuleComparator } from './goModuleComparator';
import { Pep440Comparator } from './pep440Comparator';
import { RubyGemsComparator } from './rubyGemsComparator';
import { SemverComparator } from './semverComparator';
import type { VersionComparator } from './types';

const ECOSYSTEM_ALIASES: Record<string, string> = {
    pip: 'pypi',
    python: 'pypi',
    golang: 'go',
    'crates.io': 'cargo',
    crates: 'cargo',
    rust: 'cargo',
    node: 'npm',
    yarn: 'npm',
    pnpm: 'npm',
    gem: 'rubygems',
    ruby: 'rubygems',
    docker: 'container',
    oci: 'container',
};

/** Lower-cases an ecosystem name and folds common aliases (`pip` → `pypi`). */
export function canonicalEcosystem(ecosystem: string): string {
    const lowered = ecosystem.trim().toLowerCase();
    return ECOSYSTEM_ALIASES[lowered] ?? lowered;
}

/**
 * Package-name comparison key within an ecosystem. PyPI names fold case and
 * separator runs (PEP 503); npm, cargo and nuget names are case-insensitive
 * in their registries; Go module paths and everything else match exactly.
 */
export function normalizePackageName(ecosystem: string, name: string): string {
    const trimmed = name.trim();
    switch (canonicalEcosystem(ecosystem)) {
        case 'pypi':
            return trimmed.toLowerCase().replace(/[-_.]+/g, '-');
        case 'npm':
        case 'cargo':
        case 'nuget':
            return trimmed.toLowerCase();
        default:
            return trimmed;
    }
}

/**
 * Selects the ordering rules for an ecosystem. Unknown ecosystems fall back
 * to the generic comparator rather than failing.
 */
export class ComparatorRegistry {
    private readonly byEcosystem = new Map<string, VersionComparator>();
    private readonly fallback: VersionComparator;

    constructor(fallback: VersionComparator = new GenericComparator()) {
        this.fallback = fallback;
    }

    register(ecosystem: string, comparator: VersionComparator): this {
        this.byEcosystem.set(canonicalEcosystem(ecosystem), comparator);
        return this;
    }

    resolve(ecosystem: string): VersionComparator {
        return this.byEcosystem.get(canonicalEcosystem(ecosystem)) ?? this.fallback;
    }
}

export function createDefaultComparatorRegistry(): ComparatorRegistry {
    const semver = new SemverComparator();
    const rubygems = new RubyGemsComparator();

    return new ComparatorRegistry(new GenericComparator())
        .register('npm', semver)
        .register('cargo', semver)
        .register('nuget', rubygems)
        .register('rubygems', rubygems)
        .register('hex', semver)
        .register('pub', semver)
        .register('pypi', new Pep440Comparator())
        .register('go', new GoModuleComparator());
}
