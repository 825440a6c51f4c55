import {
    build,
    DEFAULT_FIX_STRATEGIES,
    phaseForScore,
    quoteShellArg,
    selectFixAction,
    UNKNOWN_GENERATED_AT,
} from '../../lib/plan';
import { DEFAULT_SCORING_CONFIG } from '../../lib/scoring';
import type { ScoredFinding } from '../../lib/types';
import { makeAsset, makeScored } from '../support/findings';
import { thrownBy } from '../support/thrownBy';

function withScore(finding: ScoredFinding, riskScore: number, riskScoreExact: number, effectiveCvss: number): ScoredFinding {
    return {
        ...finding,
        riskScore,
        riskScoreExact,
        scoreBreakdown: { ...finding.scoreBreakdown, effectiveCvss, exactTotal: riskScoreExact },
    };
}

describe('build', () => {
    const critical = makeScored({ canonicalId: 'a'.repeat(64) });
    const medium = makeScored({ canonicalId: 'b'.repeat(64), cvss: 9.8, exploitability: 3, criticality: 5, exposure: 5 });
    const low = makeScored({ canonicalId: 'c'.repeat(64), cvss: null, exploitability: 3, criticality: 2, exposure: 2 });

    it('buckets findings into all four phases with effort totals', () => {
        const plan = build([low, medium, critical]);

        expect(plan.phases.map((phase) => phase.tier)).toEqual(['critical', 'high', 'medium', 'low']);
        expect(plan.phases.map((phase) => phase.findings.map((finding) => finding.riskScore))).toEqual([[9.2], [], [5.8], [1.7]]);
        expect(plan.phases.map((phase) => phase.estimatedEffortHours)).toEqual([1, 0, 0.25, 0.1]);
        expect(plan.totalEffortHours).toBe(1.35);
        expect(plan.findingCount).toBe(3);
        expect(plan.generatedAt).toBe(UNKNOWN_GENERATED_AT);
        expect(plan.inputDigest).toBeNull();
        expect(plan.warnings).toEqual([]);
    });

    it('orders ties by cvss, then exact score, then canonicalId', () => {
        const base = makeScored();
        const lowerCvss = withScore({ ...base, canonicalId: 'c'.repeat(64) }, 9.9, 9.91, 9.0);
        const lowerExact = withScore({ ...base, canonicalId: 'b'.repeat(64) }, 9.9, 9.86, 9.8);
        const tiedLate = withScore({ ...base, canonicalId: 'd'.repeat(64) }, 9.9, 9.94, 9.8);
        const tiedEarly = withScore({ ...base, canonicalId: 'a'.repeat(64) }, 9.9, 9.94, 9.8);

        const plan = build([lowerCvss, lowerExact, tiedLate, tiedEarly]);

        expect(plan.phases[0].findings.map((finding) => finding.canonicalId[0])).toEqual(['a', 'd', 'b', 'c']);
    });

    it('plans a finding once when it is passed twice', () => {
        const plan = build([critical, critical]);

        expect(plan.findingCount).toBe(1);
        expect(plan.phases[0].findings).toHaveLength(1);
    });

    it('carries options and upstream warnings into the plan', () => {
        const warning = { code: 'MISSING_SOURCE' as const, message: 'No records supplied by source "osv".', context: { sourceId: 'osv' } };

        const plan = build([critical], DEFAULT_SCORING_CONFIG, {
            generatedAt: '2024-05-04T00:00:00.000Z',
            inputDigest: 'f'.repeat(64),
            warnings: [warning, warning],
        });

        expect(plan.generatedAt).toBe('2024-05-04T00:00:00.000Z');
        expect(plan.inputDigest).toBe('f'.repeat(64));
        expect(plan.warnings).toEqual([warning]);
    });

    it('honours custom thresholds and effort', () => {
        const plan = build([medium], {
            ...DEFAULT_SCORING_CONFIG,
            phaseThresholds: { critical: 9, high: 5, medium: 2 },
            effortHoursByTier: { critical: 2, high: 1.5, medium: 1, low: 0.5 },
        });

        expect(plan.phases[1].findings[0].phase).toBe('high');
        expect(plan.phases[1].findings[0].effortHours).toBe(1.5);
        expect(plan.totalEffortHours).toBe(1.5);
    });

    it('rejects an invalid config before planning', () => {
        const config = { ...DEFAULT_SCORING_CONFIG, phaseThresholds: { critical: 4, high: 6.5, medium: 8.5 } };

        expect(thrownBy(() => build([critical], config))).toMatchObject({ code: 'INVALID_CONFIG' });
    });

    it('flags unknown asset kinds for manual review', () => {
        const archive = makeScored({
            canonicalId: 'e'.repeat(64),
            vulnId: 'CVE-2099-0002',
            matchedAsset: makeAsset({ name: 'left-pad', version: '1.0.0', filePath: 'vendor/left-pad.tgz', kind: 'vendored-archive' }),
        });

        const plan = build([archive]);
        const planned = plan.phases[0].findings[0];

        expect(planned.fixAction).toBeNull();
        expect(planned.needsManualReview).toBe(true);
        expect(planned.tests.remediation.assertion).toBe('a manually chosen fix removes CVE-2099-0002 from vendor/left-pad.tgz');
        expect(plan.warnings).toEqual([{
            code: 'UNSUPPORTED_ASSET_KIND',
            message: 'No fix strategy for asset kind "vendored-archive". CVE-2099-0002 in vendor/left-pad.tgz needs manual review.',
            context: {
                canonicalId: 'e'.repeat(64),
                vulnId: 'CVE-2099-0002',
                filePath: 'vendor/left-pad.tgz',
                kind: 'vendored-archive',
            },
        }]);
    });

    it('uses a supplied strategy table', () => {
        const plan = build([critical], DEFAULT_SCORING_CONFIG, {}, {
            ...DEFAULT_FIX_STRATEGIES,
            dependency: () => ({
                kind: 'dependency',
                summary: 'Pin lodash.',
                targetVersion: '4.17.21',
                command: 'make pin-lodash',
                lockfileInstruction: 'Commit the lockfile.',
            }),
        });

        expect(plan.phases[0].findings[0].fixAction).toMatchObject({ command: 'make pin-lodash' });
    });

    it('writes three verification tests per finding', () => {
        const finding = makeScored({ canonicalId: `abcdef012345${'0'.repeat(52)}` });

        const { tests } = build([finding]).phases[0].findings[0];

        expect(tests.preFix).toEqual({
            id: 'abcdef012345-pre-fix',
            phase: 'pre-fix',
            runAt: 'before-fix',
            name: 'CVE-2021-23337 is detected in npm:lodash@4.17.20',
            target: 'npm:lodash@4.17.20 (package-lock.json)',
            assertion: 'npm:lodash@4.17.20 is not affected by CVE-2021-23337',
            expectedBefore: 'fail',
            expectedAfter: 'pass',
        });
        expect(tests.remediation).toMatchObject({
            id: 'abcdef012345-remediation',
            runAt: 'in-isolation',
            name: 'fix for CVE-2021-23337 applies to npm:lodash@4.17.20',
            assertion: 'lodash resolves to 4.17.21',
        });
        expect(tests.postFix).toMatchObject({
            id: 'abcdef012345-post-fix',
            runAt: 'after-fix',
            name: 'CVE-2021-23337 is no longer detected in npm:lodash@4.17.20',
            assertion: 'npm:lodash@4.17.20 is not affected by CVE-2021-23337',
        });
    });
});

describe('selectFixAction', () => {
    it('pins an npm upgrade to the fixed version', () => {
        expect(selectFixAction(makeScored())).toEqual({
            kind: 'dependency',
            summary: 'Upgrade lodash from 4.17.20 to 4.17.21.',
            targetVersion: '4.17.21',
            command: 'npm install lodash@4.17.21',
            lockfileInstruction: 'Regenerate package-lock.json so that lodash resolves to 4.17.21, then commit it.',
        });
    });

    it('falls back to the latest release without a fixed version', () => {
        const finding = makeScored({
            fixedVersion: null,
            affectedRange: '< 2.31.0',
            matchedAsset: makeAsset({ ecosystem: 'pypi', name: 'requests', version: '2.25.0', filePath: 'requirements.txt' }),
        });

        expect(selectFixAction(finding)).toEqual({
            kind: 'dependency',
            summary: 'Upgrade requests from 2.25.0 to the latest release outside < 2.31.0.',
            targetVersion: null,
            command: 'pip install --upgrade requests',
            lockfileInstruction: 'Regenerate requirements.txt after choosing the latest release outside < 2.31.0, then commit it.',
        });
    });

    it('writes per-ecosystem upgrade commands', () => {
        const pypi = makeScored({ fixedVersion: '2.31.0', matchedAsset: makeAsset({ ecosystem: 'PyPI', name: 'requests', version: '2.25.0' }) });
        const go = makeScored({ fixedVersion: '0.17.0', matchedAsset: makeAsset({ ecosystem: 'go', name: 'golang.org/x/net', version: 'v0.7.0' }) });
        const hex = makeScored({ fixedVersion: '1.2.0', matchedAsset: makeAsset({ ecosystem: 'hex', name: 'plug', version: '1.0.0' }) });

        expect(selectFixAction(pypi)).toMatchObject({ command: 'pip install requests==2.31.0' });
        expect(selectFixAction(go)).toMatchObject({ command: 'go get golang.org/x/net@v0.17.0 && go mod tidy' });
        expect(selectFixAction(hex)).toMatchObject({
            command: 'Upgrade plug to 1.2.0 with the hex package manager',
            lockfileInstruction: 'Regenerate the hex lockfile so that plug resolves to 1.2.0, then commit it.',
        });
    });

    it('single-quotes package names that carry shell syntax', () => {
        const pypi = makeScored({
            fixedVersion: '1.0.1',
            matchedAsset: makeAsset({ ecosystem: 'pypi', name: 'x$(touch owned)', version: '1.0.0', filePath: 'requirements.txt' }),
        });

        expect(selectFixAction(pypi)).toMatchObject({ command: "pip install 'x$(touch owned)==1.0.1'" });
    });

    it('patches the Dockerfile base image', () => {
        const finding = makeScored({
            fixedVersion: '1.21.0',
            matchedAsset: makeAsset({ ecosystem: 'container', name: 'nginx', version: '1.19.0', filePath: 'deploy/Dockerfile', kind: 'container-image' }),
        });

        expect(selectFixAction(finding)).toEqual({
            kind: 'container-image',
            summary: 'Rebuild deploy/Dockerfile on nginx:1.21.0.',
            targetVersion: '1.21.0',
            dockerfilePatch: 'In deploy/Dockerfile, replace "FROM nginx:1.19.0" with "FROM nginx:1.21.0".',
        });
    });

    it('patches terraform and kubernetes manifests', () => {
        const terraform = makeScored({
            fixedVersion: '3.5.0',
            matchedAsset: makeAsset({ ecosystem: 'terraform', name: 'hashicorp/aws', version: '3.0.0', filePath: 'infra/main.tf', kind: 'iac-resource' }),
        });
        const kubernetes = makeScored({
            fixedVersion: '1.9.0',
            matchedAsset: makeAsset({ ecosystem: 'helm', name: 'ingress-nginx', version: '1.1.0', filePath: 'k8s/ingress controller.yaml', kind: 'iac-resource' }),
        });

        expect(selectFixAction(terraform)).toEqual({
            kind: 'iac-resource',
            summary: 'Update hashicorp/aws in infra/main.tf to 3.5.0.',
            targetVersion: '3.5.0',
            format: 'terraform',
            manifestPatch: 'In infra/main.tf, change the version of "hashicorp/aws" from "3.0.0" to "3.5.0", then run terraform plan and terraform apply.',
        });
        expect(selectFixAction(kubernetes)).toMatchObject({
            format: 'kubernetes',
            manifestPatch: "In k8s/ingress controller.yaml, change \"ingress-nginx\" from 1.1.0 to 1.9.0, then run kubectl apply -f 'k8s/ingress controller.yaml'.",
        });
    });

    it('rotates and untracks exposed secrets', () => {
        const aws = makeScored({
            fixedVersion: null,
            matchedAsset: makeAsset({ ecosystem: 'secrets', name: 'aws-access-key', version: '1', filePath: './config/.env', kind: 'secret-exposure' }),
        });
        const stripe = makeScored({
            fixedVersion: null,
            matchedAsset: makeAsset({ ecosystem: 'secrets', name: 'stripe-api-key', version: '1', filePath: '.env', kind: 'secret-exposure' }),
        });

        expect(selectFixAction(aws)).toEqual({
            kind: 'secret-exposure',
            summary: 'Rotate aws-access-key and remove ./config/.env from version control.',
            rotationCommand: 'aws iam create-access-key --user-name <user> && aws iam delete-access-key --user-name <user> --access-key-id <exposed-key-id>',
            removalCommand: 'git rm --cached ./config/.env',
            gitignoreEntry: 'config/.env',
        });
        expect(selectFixAction(stripe)).toMatchObject({
            rotationCommand: 'Revoke the exposed stripe-api-key with its issuer and issue a replacement credential.',
        });

        const planned = build([aws]).phases[0].findings[0];
        expect(planned.needsManualReview).toBe(false);
    });

    it('throws for kinds without a strategy', () => {
        const finding = makeScored({ matchedAsset: makeAsset({ kind: 'vendored-archive' }) });

        expect(thrownBy(() => selectFixAction(finding))).toMatchObject({
            name: 'UnsupportedAssetKindError',
            code: 'UNSUPPORTED_ASSET_KIND',
            kind: 'vendored-archive',
        });
    });
});

describe('phaseForScore', () => {
    it.each([
        [10, 'critical'],
        [8.5, 'critical'],
        [8.4, 'high'],
        [6.5, 'high'],
        [4, 'medium'],
        [3.9, 'low'],
        [0, 'low'],
    ] as const)('puts %s in %s', (riskScore, tier) => {
        expect(phaseForScore(riskScore, DEFAULT_SCORING_CONFIG.phaseThresholds)).toBe(tier);
    });
});

describe('quoteShellArg', () => {
    it('quotes only when needed', () => {
        expect(quoteShellArg('lodash@4.17.21')).toBe('lodash@4.17.21');
        expect(quoteShellArg('my file')).toBe("'my file'");
        expect(quoteShellArg("it's")).toBe("'it'\\''s'");
        expect(quoteShellArg('')).toBe("''");
    });
});
