/**
 * Highest number of decimals a hover label ever shows.
 */
export const MAX_VALUE_DECIMALS = 6;

/**
 * Number of decimals worth showing for a value axis whose zoom level puts
 * `scale` data units in one screen pixel: one more decimal per tenfold zoom,
 * clamped to 0..MAX_VALUE_DECIMALS.
 */
export function valueDecimals(scale: number): number {
    const decimals = Math.ceil(-Math.log10(Math.abs(scale)));
    if (Number.isNaN(decimals)) {
        return 0;
    }
    return Math.min(Math.max(decimals, 0), MAX_VALUE_DECIMALS);
}

export function formatValue(value: number, decimals: number): string {
    return value.toFixed(decimals);
}
