export { deriveFixedVersion, normalize } from './normalizeRecord';
export { SEVERITY_LABEL_CVSS, cvssFromLabel, resolveExploitability, resolveSeverity, scoreCvssVector } from './severity';
export type { ResolvedSeverity } from './severity';
export { UnparsableRecordError } from './errors';
export type { UnparsableRecordErrorCode } from './errors';
export type { FindingFragment, NormalizeOptions } from './types';
