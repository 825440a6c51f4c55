import { cvssFromLabel, deriveFixedVersion, normalize, scoreCvssVector } from '../../lib/normalize';
import type { GhsaRecord, KevRecord, NvdRecord, OsvRecord, RawFindingRecord } from '../../lib/types';
import { parseVersionRange } from '../../lib/versioning';
import { thrownBy } from '../support/thrownBy';

const FETCHED_AT = '2024-05-01T00:00:00.000Z';

describe('normalize', () => {
    it('canonicalizes an NVD record', () => {
        const record: NvdRecord = {
            sourceId: 'nvd',
            vulnId: ' cve-2021-44906 ',
            ecosystem: 'Node',
            packageName: 'minimist',
            affectedRange: '< 1.2.6',
            cvssV31BaseScore: 9.8,
            references: [
                { url: 'https://b.example/advisory' },
                { url: 'https://a.example/poc', tags: ['Exploit'] },
                { url: 'https://b.example/advisory' },
            ],
            fetchedAt: FETCHED_AT,
        };

        const fragment = normalize(record);

        expect(fragment).toMatchObject({
            sourceId: 'nvd',
            sourcePriority: null,
            vulnId: 'CVE-2021-44906',
            aliases: [],
            ecosystem: 'npm',
            packageName: 'minimist',
            packageKey: 'minimist',
            affectedRange: '< 1.2.6',
            fixedVersion: '1.2.6',
            title: null,
            description: null,
            cvss: 9.8,
            cvssVector: null,
            exploitability: 7,
            references: ['https://a.example/poc', 'https://b.example/advisory'],
            fetchedAt: FETCHED_AT,
        });
    });

    it('marks KEV entries as known exploited without a score', () => {
        const record: KevRecord = {
            sourceId: 'cisa-kev',
            vulnId: 'CVE-2021-23337',
            ecosystem: 'npm',
            packageName: 'lodash',
            affectedRange: '< 4.17.21',
            vendorProject: 'Lodash',
            product: 'lodash',
            fetchedAt: FETCHED_AT,
        };

        const fragment = normalize(record);

        expect(fragment.cvss).toBeNull();
        expect(fragment.exploitability).toBe(10);
        expect(fragment.title).toBe('Lodash lodash (known exploited)');
    });

    it('prefers a CVE id over the GHSA id a record is filed under', () => {
        const record: GhsaRecord = {
            sourceId: 'ghsa',
            vulnId: 'GHSA-35jh-r3h4-6jhm',
            aliases: ['CVE-2021-23337'],
            ecosystem: 'npm',
            packageName: 'lodash',
            affectedRange: '< 4.17.21',
            severity: 'moderate',
            fetchedAt: FETCHED_AT,
        };

        const fragment = normalize(record);

        expect(fragment.vulnId).toBe('CVE-2021-23337');
        expect(fragment.aliases).toEqual(['GHSA-35jh-r3h4-6jhm']);
        expect(fragment.cvss).toBe(5.5);
        expect(fragment.exploitability).toBeNull();
    });

    it('reads OSV numeric scores and falls back to the database severity', () => {
        const scored: OsvRecord = {
            sourceId: 'osv',
            vulnId: 'PYSEC-2023-74',
            ecosystem: 'PyPI',
            packageName: 'Requests',
            affectedRange: 'introduced:2.3.0 fixed:2.31.0',
            severity: [{ type: 'CVSS_V3', score: '6.1' }],
            fetchedAt: FETCHED_AT,
        };
        const labelled: OsvRecord = {
            ...scored,
            severity: [{ type: 'CVSS_V3', score: 'AV:N/AC:L' }],
            databaseSeverity: 'HIGH',
        };

        const fromScore = normalize(scored);
        expect(fromScore.cvss).toBe(6.1);
        expect(fromScore.ecosystem).toBe('pypi');
        expect(fromScore.packageKey).toBe('requests');
        expect(fromScore.fixedVersion).toBe('2.31.0');

        expect(normalize(labelled).cvss).toBe(7.5);
    });

    it('leaves cvss null when the score is out of range', () => {
        const record: RawFindingRecord = {
            sourceId: 'vendor-feed',
            sourcePriority: 5,
            vulnId: 'CVE-2099-0003',
            ecosystem: 'npm',
            packageName: 'left-pad',
            affectedRange: '*',
            cvss: 12,
            fetchedAt: FETCHED_AT,
        };

        const fragment = normalize(record);

        expect(fragment.cvss).toBeNull();
        expect(fragment.sourcePriority).toBe(5);
        expect(fragment.fixedVersion).toBeNull();
    });

    it('drops a fixed version the ecosystem cannot order', () => {
        const record: RawFindingRecord = {
            sourceId: 'ghsa',
            vulnId: 'CVE-2021-23337',
            ecosystem: 'npm',
            packageName: 'lodash',
            affectedRange: '< 4.17.21',
            fixedVersion: 'latest',
            fetchedAt: FETCHED_AT,
        };

        expect(normalize(record).fixedVersion).toBeNull();
    });

    describe('rejections', () => {
        const base: RawFindingRecord = {
            sourceId: 'nvd',
            vulnId: 'CVE-2021-44906',
            ecosystem: 'npm',
            packageName: 'minimist',
            affectedRange: '< 1.2.6',
            fetchedAt: FETCHED_AT,
        };

        it('requires a vulnerability id', () => {
            expect(thrownBy(() => normalize({ ...base, vulnId: '  ' }))).toMatchObject({
                name: 'UnparsableRecordError',
                code: 'MISSING_VULN_ID',
                context: { sourceId: 'nvd', vulnId: '', packageName: 'minimist' },
            });
        });

        it('requires an ecosystem and package', () => {
            expect(thrownBy(() => normalize({ ...base, packageName: '' }))).toMatchObject({ code: 'MISSING_PACKAGE' });
            expect(thrownBy(() => normalize({ ...base, ecosystem: '' }))).toMatchObject({ code: 'MISSING_PACKAGE' });
        });

        it('requires an affected range', () => {
            expect(thrownBy(() => normalize({ ...base, affectedRange: '' }))).toMatchObject({ code: 'MISSING_AFFECTED_RANGE' });
        });

        it('rejects range versions the ecosystem cannot order', () => {
            const error = thrownBy(() => normalize({ ...base, ecosystem: 'pypi', packageName: 'django', affectedRange: '< banana' }));

            expect(error).toMatchObject({
                code: 'INVALID_RANGE',
                message: 'Record CVE-2021-44906 from nvd uses "banana", which pep440 ordering cannot read.',
                context: { range: '< banana' },
            });
        });
    });
});

describe('severity helpers', () => {
    it('maps labels to band midpoints', () => {
        expect(cvssFromLabel('Critical')).toBe(9.5);
        expect(cvssFromLabel('moderate')).toBe(5.5);
        expect(cvssFromLabel('unknown')).toBeNull();
        expect(cvssFromLabel(null)).toBeNull();
    });

    it('ignores vectors without a CVSS version prefix', () => {
        expect(scoreCvssVector('AV:N/AC:L/PR:N')).toBeNull();
    });

    it('derives a fixed version only from a single-set upper bound', () => {
        expect(deriveFixedVersion(parseVersionRange('>= 1.0 < 1.5'))).toBe('1.5');
        expect(deriveFixedVersion(parseVersionRange('<= 1.5'))).toBeNull();
        expect(deriveFixedVersion(parseVersionRange('< 1.0 || >= 2.0 < 2.1'))).toBeNull();
    });
});
