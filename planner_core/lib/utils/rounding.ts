/**
 * Half-up rounding to a fixed number of decimals. The epsilon nudge keeps
 * binary artefacts such as 2.675 → 2.67499999 from rounding down.
 */
export function roundTo(value: number, places: number): number {
    const factor = 10 ** places;
    return Math.round((value + Number.EPSILON) * factor) / factor;
}

export function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
