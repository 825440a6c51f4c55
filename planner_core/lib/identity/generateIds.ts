import { IdentityGenerationError } from './errors';
import { buildCanonicalHash } from './canonicalHash';
import type { FindingIdentityInput } from './types';

/**
 * Finding identity: the vulnerability plus the exact package coordinates it
 * matched. The same CVE on two packages yields two ids; a version bump yields
 * a new id.
 */
export function generateFindingId(input: FindingIdentityInput): string {
    const vulnId = expectRequiredString(input.vulnId, 'vulnId');
    const ecosystem = expectRequiredString(input.ecosystem, 'ecosystem');
    const name = expectRequiredString(input.name, 'name');
    const version = expectRequiredString(input.version, 'version');

    return buildCanonicalHash({
        kind: 'finding',
        vulnId,
        ecosystem,
        name,
        version,
    });
}

function expectRequiredString(value: unknown, field: string): string {
    if (typeof value !== 'string') {
        throw new IdentityGenerationError('MISSING_REQUIRED_FIELD', `${field} must be a non-empty string.`);
    }

    const trimmed = value.trim();
    if (trimmed.length === 0) {
        throw new IdentityGenerationError('MISSING_REQUIRED_FIELD', `${field} must be a non-empty string.`);
    }

    return trimmed;
}
