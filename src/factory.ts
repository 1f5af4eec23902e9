import { bigintMaskCounter, type MaskCounter, numberMaskCounter } from './algorithms/powerset/maskCounter';
import type { MaskCounterKind } from './types/types';

/** The integer types subset masks can be counted in, by `counter` option value */
export const MASK_COUNTERS: Readonly<Record<MaskCounterKind, MaskCounter>> = {
    number: numberMaskCounter,
    bigint: bigintMaskCounter,
};

export const createMaskCounter = (kind: MaskCounterKind): MaskCounter => MASK_COUNTERS[kind];

if (import.meta.vitest) {
    const { test, expect } = import.meta.vitest;

    test('should map every counter option to its arithmetic', () => {
        expect(Object.keys(MASK_COUNTERS)).toEqual(['number', 'bigint']);
        expect(createMaskCounter('number')).toBe(numberMaskCounter);
        expect(createMaskCounter('bigint')).toBe(bigintMaskCounter);
    });

    test('should keep each counter consistent with its option name', () => {
        for (const [kind, counter] of Object.entries(MASK_COUNTERS)) {
            expect(counter.kind).toBe(kind);
        }
    });
}
