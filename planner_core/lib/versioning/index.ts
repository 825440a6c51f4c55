export { ComparatorRegistry, canonicalEcosystem, createDefaultComparatorRegistry, normalizePackageName } from './registry';
export { GenericComparator } from './genericComparator';
export { GoModuleComparator, isPseudoVersion, parseGoVersion } from './goModuleComparator';
export { Pep440Comparator, parsePep440 } from './pep440Comparator';
export { RubyGemsComparator, compareGemSegments, parseGemVersion } from './rubyGemsComparator';
export type { GemSegment } from './rubyGemsComparator';
export { SemverComparator, parseSemver } from './semverComparator';
export { parseVersionRange, rangeContains, rangeVersions } from './range';
export { UnsupportedVersionError } from './errors';
export type { VersionErrorCode } from './errors';
export type { RangeConstraint, RangeOperator, VersionComparator, VersionRange, VersionScheme } from './types';
