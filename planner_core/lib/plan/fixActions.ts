import type {
    ContainerImageFixAction,
    DependencyFixAction,
    FixAction,
    IacFormat,
    IacResourceFixAction,
    ScoredFinding,
    SecretExposureFixAction,
} from '../types';
import { isAssetKind } from '../types';
import { canonicalEcosystem } from '../versioning';
import { UnsupportedAssetKindError } from './errors';
import { quoteShellArg } from './shell';
import type { FixStrategyTable } from './types';

interface EcosystemUpgrade {
    lockfile: string;
    pinned: (name: string, version: string) => string;
    latest: (name: string) => string;
}

const ECOSYSTEM_UPGRADES: Readonly<Record<string, EcosystemUpgrade>> = {
    npm: {
        lockfile: 'package-lock.json',
        pinned: (name, version) => `npm install ${quoteShellArg(`${name}@${version}`)}`,
        latest: (name) => `npm install ${quoteShellArg(`${name}@latest`)}`,
    },
    pypi: {
        lockfile: 'requirements.txt',
        pinned: (name, version) => `pip install ${quoteShellArg(`${name}==${version}`)}`,
        latest: (name) => `pip install --upgrade ${quoteShellArg(name)}`,
    },
    cargo: {
        lockfile: 'Cargo.lock',
        pinned: (name, version) => `cargo update -p ${quoteShellArg(name)} --precise ${quoteShellArg(version)}`,
        latest: (name) => `cargo update -p ${quoteShellArg(name)}`,
    },
    go: {
        lockfile: 'go.sum',
        pinned: (name, version) => `go get ${quoteShellArg(`${name}@${goVersion(version)}`)} && go mod tidy`,
        latest: (name) => `go get ${quoteShellArg(`${name}@latest`)} && go mod tidy`,
    },
    maven: {
        lockfile: 'pom.xml',
        pinned: (name, version) => `mvn versions:use-dep-version -Dincludes=${quoteShellArg(name)} -DdepVersion=${quoteShellArg(version)}`,
        latest: (name) => `mvn versions:use-latest-releases -Dincludes=${quoteShellArg(name)}`,
    },
    rubygems: {
        lockfile: 'Gemfile.lock',
        pinned: (name) => `bundle update ${quoteShellArg(name)} --conservative`,
        latest: (name) => `bundle update ${quoteShellArg(name)} --conservative`,
    },
    nuget: {
        lockfile: 'packages.lock.json',
        pinned: (name, version) => `dotnet add package ${quoteShellArg(name)} --version ${quoteShellArg(version)}`,
        latest: (name) => `dotnet add package ${quoteShellArg(name)}`,
    },
};

function goVersion(version: string): string {
    return version.startsWith('v') ? version : `v${version}`;
}

function upgradeTarget(finding: ScoredFinding): string {
    return finding.fixedVersion ?? `the latest release outside ${finding.affectedRange}`;
}

function dependencyFix(finding: ScoredFinding): DependencyFixAction {
    const { name, version, ecosystem } = finding.matchedAsset;
    const target = finding.fixedVersion;
    const upgrade = ECOSYSTEM_UPGRADES[canonicalEcosystem(ecosystem)];

    let command: string;
    let lockfile: string;
    if (upgrade) {
        command = target ? upgrade.pinned(name, target) : upgrade.latest(name);
        lockfile = upgrade.lockfile;
    } else {
        command = `Upgrade ${name} to ${upgradeTarget(finding)} with the ${ecosystem} package manager`;
        lockfile = `the ${ecosystem} lockfile`;
    }

    return {
        kind: 'dependency',
        summary: `Upgrade ${name} from ${version} to ${upgradeTarget(finding)}.`,
        targetVersion: target,
        command,
        lockfileInstruction: target
            ? `Regenerate ${lockfile} so that ${name} resolves to ${target}, then commit it.`
            : `Regenerate ${lockfile} after choosing ${upgradeTarget(finding)}, then commit it.`,
    };
}

function containerImageFix(finding: ScoredFinding): ContainerImageFixAction {
    const { name, version, filePath } = finding.matchedAsset;
    const target = finding.fixedVersion;
    const replacement = target ? `"FROM ${name}:${target}"` : `a ${name} tag outside ${finding.affectedRange}`;

    return {
        kind: 'container-image',
        summary: `Rebuild ${filePath} on ${name}:${target ?? 'a patched tag'}.`,
        targetVersion: target,
        dockerfilePatch: `In ${filePath}, replace "FROM ${name}:${version}" with ${replacement}.`,
    };
}

export function detectIacFormat(filePath: string): IacFormat {
    if (/\.tf(vars)?$/i.test(filePath)) {
        return 'terraform';
    }

    if (/\.ya?ml$/i.test(filePath)) {
        return 'kubernetes';
    }

    return 'generic';
}

function iacResourceFix(finding: ScoredFinding): IacResourceFixAction {
    const { name, version, filePath } = finding.matchedAsset;
    const target = finding.fixedVersion;
    const format = detectIacFormat(filePath);
    const to = target ?? upgradeTarget(finding);

    let manifestPatch: string;
    switch (format) {
        case 'terraform':
            manifestPatch = `In ${filePath}, change the version of "${name}" from "${version}" to "${to}", then run terraform plan and terraform apply.`;
            break;
        case 'kubernetes':
            manifestPatch = `In ${filePath}, change "${name}" from ${version} to ${to}, then run kubectl apply -f ${quoteShellArg(filePath)}.`;
            break;
        case 'generic':
            manifestPatch = `In ${filePath}, change "${name}" from ${version} to ${to}.`;
            break;
    }

    return {
        kind: 'iac-resource',
        summary: `Update ${name} in ${filePath} to ${to}.`,
        targetVersion: target,
        format,
        manifestPatch,
    };
}

function secretExposureFix(finding: ScoredFinding): SecretExposureFixAction {
    const { name, filePath } = finding.matchedAsset;
    const gitignoreEntry = filePath.replace(/^\.\//, '');

    return {
        kind: 'secret-exposure',
        summary: `Rotate ${name} and remove ${filePath} from version control.`,
        rotationCommand: /aws/i.test(name)
            ? 'aws iam create-access-key --user-name <user> && aws iam delete-access-key --user-name <user> --access-key-id <exposed-key-id>'
            : `Revoke the exposed ${name} with its issuer and issue a replacement credential.`,
        removalCommand: `git rm --cached ${quoteShellArg(filePath)}`,
        gitignoreEntry,
    };
}

export const DEFAULT_FIX_STRATEGIES: FixStrategyTable = {
    dependency: dependencyFix,
    'container-image': containerImageFix,
    'iac-resource': iacResourceFix,
    'secret-exposure': secretExposureFix,
};

/** Throws {@link UnsupportedAssetKindError} for kinds outside the table. */
export function selectFixAction(finding: ScoredFinding, strategies: FixStrategyTable = DEFAULT_FIX_STRATEGIES): FixAction {
    const { kind } = finding.matchedAsset;
    if (!isAssetKind(kind)) {
        throw new UnsupportedAssetKindError(kind, {
            canonicalId: finding.canonicalId,
            vulnId: finding.vulnId,
            filePath: finding.matchedAsset.filePath,
        });
    }

    return strategies[kind](finding);
}

export function requiresManualReview(action: FixAction | null): boolean {
    if (action === null) {
        return true;
    }

    return action.kind !== 'secret-exposure' && action.targetVersion === null;
}
