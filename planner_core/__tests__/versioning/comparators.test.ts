import {
    createDefaultComparatorRegistry,
    canonicalEcosystem,
    GenericComparator,
    GoModuleComparator,
    isPseudoVersion,
    normalizePackageName,
    parseVersionRange,
    Pep440Comparator,
    rangeContains,
    rangeVersions,
    RubyGemsComparator,
    SemverComparator,
} from '../../lib/versioning';
import type { VersionComparator } from '../../lib/versioning';
import { thrownBy } from '../support/thrownBy';

function expectAscending(comparator: VersionComparator, versions: string[]): void {
    for (let i = 1; i < versions.length; i += 1) {
        expect(comparator.compare(versions[i - 1], versions[i])).toBeLessThan(0);
        expect(comparator.compare(versions[i], versions[i - 1])).toBeGreaterThan(0);
    }
}

describe('version comparators', () => {
    describe('semver', () => {
        const semver = new SemverComparator();

        it('orders pre-releases before the release', () => {
            expectAscending(semver, ['1.0.0-alpha', '1.0.0-alpha.1', '1.0.0-beta', '1.0.0-rc.1', '1.0.0', '1.0.1', '1.10.0']);
        });

        it('treats a leading v and missing parts leniently', () => {
            expect(semver.compare('v1.2', '1.2.0')).toBe(0);
            expect(semver.compare('1.2.3+build.7', '1.2.3')).toBe(0);
        });

        it('rejects versions it cannot read', () => {
            expect(semver.isValid('1..2')).toBe(false);
            expect(thrownBy(() => semver.compare('not-a-version', '1.0.0'))).toMatchObject({
                name: 'UnsupportedVersionError',
                code: 'UNPARSABLE_VERSION',
                context: { version: 'not-a-version', scheme: 'semver' },
            });
        });
    });

    describe('pep440', () => {
        const pep440 = new Pep440Comparator();

        it('orders dev, pre, final and post releases', () => {
            expectAscending(pep440, ['1.0.dev1', '1.0a1', '1.0b2', '1.0rc1', '1.0', '1.0.post1', '1.0.1']);
        });

        it('lets the epoch dominate the release segment', () => {
            expect(pep440.compare('1!0.5', '2.0')).toBeGreaterThan(0);
        });

        it('pads shorter release segments with zeros', () => {
            expect(pep440.compare('2.31', '2.31.0')).toBe(0);
        });
    });

    describe('go modules', () => {
        const go = new GoModuleComparator();

        it('orders pseudo-versions by timestamp and below the next tag', () => {
            const older = 'v0.0.0-20210101000000-abcdefabcdef';
            const newer = 'v0.0.0-20220101000000-abcdefabcdef';

            expect(isPseudoVersion(older)).toBe(true);
            expect(isPseudoVersion('v1.2.3')).toBe(false);
            expect(go.compare(older, newer)).toBeLessThan(0);
            expect(go.compare(newer, 'v0.1.0')).toBeLessThan(0);
        });

        it('ignores the +incompatible suffix', () => {
            expect(go.compare('v2.0.0+incompatible', 'v2.0.0')).toBe(0);
        });
    });

    describe('rubygems', () => {
        const gems = new RubyGemsComparator();

        it('orders four-part versions and labelled pre-releases', () => {
            expectAscending(gems, ['2.0.0.pre', '2.0.0.rc1', '2.0.0', '2.0.0.1', '6.1.7.3', '6.1.7.4', '7.0.0']);
        });

        it('ignores trailing zeros and reads a hyphen as a pre-release', () => {
            expect(gems.compare('1.0', '1.0.0')).toBe(0);
            expect(gems.compare('4.0.0.0', '4.0.0')).toBe(0);
            expect(gems.compare('4.0.0-beta', '4.0.0.0')).toBeLessThan(0);
        });

        it('matches four-part versions against advisory ranges', () => {
            expect(rangeContains(parseVersionRange('< 6.1.7.4'), '6.1.7.3', gems)).toBe(true);
            expect(rangeContains(parseVersionRange('>= 6.1.0, < 6.1.7.4'), '6.1.7.4', gems)).toBe(false);
        });

        it('rejects strings with no leading number', () => {
            expect(gems.isValid('6.1.7.3')).toBe(true);
            expect(gems.isValid('banana')).toBe(false);
            expect(thrownBy(() => gems.compare('banana', '1.0'))).toMatchObject({
                code: 'UNPARSABLE_VERSION',
                context: { version: 'banana', scheme: 'rubygems' },
            });
        });
    });

    describe('generic', () => {
        const generic = new GenericComparator();

        it('treats a trailing letter run as a pre-release', () => {
            expectAscending(generic, ['1.0rc1', '1.0', '1.0.1', '1.19.0', '1.21.0']);
        });

        it('needs at least one numeric segment', () => {
            expect(generic.isValid('latest')).toBe(false);
            expect(generic.isValid('v3.0.0')).toBe(true);
        });
    });
});

describe('comparator registry', () => {
    const registry = createDefaultComparatorRegistry();

    it('folds ecosystem aliases', () => {
        expect(canonicalEcosystem(' PIP ')).toBe('pypi');
        expect(canonicalEcosystem('golang')).toBe('go');
        expect(canonicalEcosystem('crates.io')).toBe('cargo');
        expect(canonicalEcosystem('Maven')).toBe('maven');
    });

    it('resolves per-ecosystem schemes with a generic fallback', () => {
        expect(registry.resolve('npm').scheme).toBe('semver');
        expect(registry.resolve('PyPI').scheme).toBe('pep440');
        expect(registry.resolve('golang').scheme).toBe('go');
        expect(registry.resolve('maven').scheme).toBe('generic');
        expect(registry.resolve('gem').scheme).toBe('rubygems');
        expect(registry.resolve('nuget').scheme).toBe('rubygems');
    });

    it('normalizes package names per registry rules', () => {
        expect(normalizePackageName('PyPI', 'Django_Rest.Framework')).toBe('django-rest-framework');
        expect(normalizePackageName('npm', 'Lodash')).toBe('lodash');
        expect(normalizePackageName('go', 'github.com/Foo/Bar')).toBe('github.com/Foo/Bar');
    });
});

describe('version ranges', () => {
    const semver = new SemverComparator();

    it('AND-s comparator constraints', () => {
        const range = parseVersionRange('>= 1.0.0, < 1.2.3');

        expect(range.sets).toEqual([[{ operator: '>=', version: '1.0.0' }, { operator: '<', version: '1.2.3' }]]);
        expect(rangeContains(range, '1.1.0', semver)).toBe(true);
        expect(rangeContains(range, '1.2.3', semver)).toBe(false);
        expect(rangeContains(range, '0.9.9', semver)).toBe(false);
    });

    it('OR-s sets split by ||', () => {
        const range = parseVersionRange('< 1.0 || >= 2.0 < 2.1');

        expect(rangeContains(range, '0.5.0', semver)).toBe(true);
        expect(rangeContains(range, '1.5.0', semver)).toBe(false);
        expect(rangeContains(range, '2.0.4', semver)).toBe(true);
        expect(rangeVersions(range)).toEqual(['1.0', '2.0', '2.1']);
    });

    it('reads interval notation', () => {
        expect(parseVersionRange('[1.0,2.0)').sets).toEqual([[{ operator: '>=', version: '1.0' }, { operator: '<', version: '2.0' }]]);
        expect(parseVersionRange('(,3.0]').sets).toEqual([[{ operator: '<=', version: '3.0' }]]);
    });

    it('reads OSV range events', () => {
        expect(parseVersionRange('introduced:0 fixed:1.2.0').sets).toEqual([[{ operator: '<', version: '1.2.0' }]]);
        expect(parseVersionRange('introduced:2.3.0 fixed:2.31.0').sets).toEqual([
            [{ operator: '>=', version: '2.3.0' }, { operator: '<', version: '2.31.0' }],
        ]);
    });

    it('opens a separate interval for each introduced event', () => {
        const range = parseVersionRange('introduced:0 fixed:1.2.0 introduced:2.0.0 fixed:2.1.0');

        expect(range.sets).toEqual([
            [{ operator: '<', version: '1.2.0' }],
            [{ operator: '>=', version: '2.0.0' }, { operator: '<', version: '2.1.0' }],
        ]);
        expect(rangeContains(range, '1.0.0', semver)).toBe(true);
        expect(rangeContains(range, '2.0.5', semver)).toBe(true);
        expect(rangeContains(range, '1.5.0', semver)).toBe(false);
        expect(rangeContains(range, '2.1.0', semver)).toBe(false);
    });

    it('closes OSV intervals with last_affected and leaves a trailing introduced open', () => {
        expect(parseVersionRange('introduced:1.0.0 last_affected:1.4.0 introduced:3.0.0').sets).toEqual([
            [{ operator: '>=', version: '1.0.0' }, { operator: '<=', version: '1.4.0' }],
            [{ operator: '>=', version: '3.0.0' }],
        ]);
        expect(parseVersionRange('fixed:0.9.0').sets).toEqual([[{ operator: '<', version: '0.9.0' }]]);
        expect(parseVersionRange('introduced:0').sets).toEqual([[{ operator: '*' }]]);
    });

    it('reads exact versions and wildcards', () => {
        expect(parseVersionRange('1.4.2').sets).toEqual([[{ operator: '=', version: '1.4.2' }]]);
        expect(rangeContains(parseVersionRange('*'), 'anything', semver)).toBe(true);
    });

    it('rejects empty ranges', () => {
        expect(thrownBy(() => parseVersionRange('  '))).toMatchObject({ code: 'INVALID_RANGE' });
        expect(thrownBy(() => parseVersionRange('||'))).toMatchObject({ code: 'INVALID_RANGE' });
    });
});
