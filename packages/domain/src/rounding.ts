/** Decimal places used for stored values. */
export const PRECISION = {
    internal: 6,
    rate: 4,
    percent: 2
} as const;

/** Rounds half away from zero, so a trend and its negation round to the same magnitude. */
export function roundTo(value: number, decimals: number): number {
    const factor = 10 ** decimals;
    return (Math.sign(value) * Math.round(Math.abs(value) * factor)) / factor;
}
