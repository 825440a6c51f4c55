export type VersionScheme = 'semver' | 'pep440' | 'go' | 'rubygems' | 'generic';

/**
 * Ordering capability for one family of version strings. `compare` returns a
 * negative number, zero or a positive number and throws
 * `UnsupportedVersionError` when either side cannot be parsed.
 */
export interface VersionComparator {
    readonly scheme: VersionScheme;
    isValid(version: string): boolean;
    compare(left: string, right: string): number;
}

export type RangeOperator = '<' | '<=' | '>' | '>=' | '=' | '!=';

export type RangeConstraint =
    | { operator: RangeOperator; version: string }
    | { operator: '*' };

/** Disjunction of conjunctions: any set may match, every constraint in a set must. */
export interface VersionRange {
    raw: string;
    sets: RangeConstraint[][];
}
