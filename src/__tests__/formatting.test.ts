import { describe, expect, it } from 'vitest';
import { MAX_VALUE_DECIMALS, formatValue, valueDecimals } from '../helpers/formatting';

describe('valueDecimals', () => {
    it('shows two decimals at 0.05 units per pixel', () => {
        expect(valueDecimals(0.05)).toBe(2);
    });

    it('ignores the sign of the scale', () => {
        expect(valueDecimals(-0.05)).toBe(2);
    });

    it('never goes below zero when zoomed out', () => {
        expect(valueDecimals(0.5)).toBe(1);
        expect(valueDecimals(5)).toBe(0);
        expect(valueDecimals(12_000)).toBe(0);
        expect(valueDecimals(Infinity)).toBe(0);
    });

    it('caps precision when zoomed far in', () => {
        expect(valueDecimals(1e-9)).toBe(MAX_VALUE_DECIMALS);
        expect(valueDecimals(0)).toBe(6);
    });

    it('falls back to zero decimals for NaN', () => {
        expect(valueDecimals(NaN)).toBe(0);
    });

    it('does not gain decimals as the scale grows', () => {
        const scales = [1e-8, 2e-5, 0.003, 0.05, 0.5, 7, 1000];
        const decimals = scales.map(valueDecimals);
        decimals.forEach((d, i) => {
            expect(d).toBeGreaterThanOrEqual(0);
            expect(d).toBeLessThanOrEqual(6);
            if (i > 0) {
                expect(d).toBeLessThanOrEqual(decimals[i - 1]);
            }
        });
    });
});

describe('formatValue', () => {
    it('pads to the requested decimals', () => {
        expect(formatValue(10, 2)).toBe('10.00');
        expect(formatValue(0.125, 0)).toBe('0');
        expect(formatValue(NaN, 2)).toBe('NaN');
    });
});
