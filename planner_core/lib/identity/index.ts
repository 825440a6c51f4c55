export { buildCanonicalHash, compareAscii, sha256Hex, stableStringify } from './canonicalHash';
export { generateFindingId } from './generateIds';
export { isCveId, isGhsaId, normalizeVulnId, selectCanonicalVulnId } from './vulnIds';
export type { ResolvedVulnId } from './vulnIds';
export { IdentityGenerationError } from './errors';
export type { CanonicalHashInput, FindingIdentityInput } from './types';
