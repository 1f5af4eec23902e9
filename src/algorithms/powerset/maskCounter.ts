/**
 * @module mask-counter
 * @description
 * Integer arithmetic behind subset masks. Bit `i` of a mask is set iff the element at
 * position `i` belongs to the subset.
 *
 * - `number`: IEEE doubles. 2^n must stay a safe integer, so n <= 52.
 * - `bigint`: defaults to a 64-bit unsigned word (n <= 63); arbitrary precision on request.
 */

import type { Mask, MaskCounterKind } from '../../types/types';

export interface MaskCounter<M extends Mask = Mask> {
    readonly kind: MaskCounterKind;
    /** Largest container length supported unless overridden. */
    readonly defaultMaxLength: number;
    /** Upper bound `maxLength` may be raised to; `Infinity` when unbounded. */
    readonly hardMaxLength: number;
    readonly zero: M;

    /** 2^length, one past the last mask. */
    limit(length: number): M;
    increment(mask: M): M;
    lessThan(a: M, b: M): boolean;
    hasBit(mask: M, position: number): boolean;
    /** True when 2^position > mask, i.e. no bit at or above `position` is set. */
    exceeds(position: number, mask: M): boolean;
    isMask(value: Mask): value is M;
}

export const MAX_NUMBER_MASK_LENGTH = 52;
export const MAX_WORD_MASK_LENGTH = 63;

export const numberMaskCounter: MaskCounter<number> = {
    kind: 'number',
    defaultMaxLength: MAX_NUMBER_MASK_LENGTH,
    hardMaxLength: MAX_NUMBER_MASK_LENGTH,
    zero: 0,

    limit: length => 2 ** length,
    increment: mask => mask + 1,
    lessThan: (a, b) => a < b,
    // `>>` only sees 32 bits, so shift by division instead
    hasBit: (mask, position) => Math.floor(mask / 2 ** position) % 2 === 1,
    exceeds: (position, mask) => 2 ** position > mask,
    isMask: (value): value is number => typeof value === 'number',
};

export const bigintMaskCounter: MaskCounter<bigint> = {
    kind: 'bigint',
    defaultMaxLength: MAX_WORD_MASK_LENGTH,
    hardMaxLength: Infinity,
    zero: 0n,

    limit: length => 1n << BigInt(length),
    increment: mask => mask + 1n,
    lessThan: (a, b) => a < b,
    hasBit: (mask, position) => ((mask >> BigInt(position)) & 1n) === 1n,
    exceeds: (position, mask) => 1n << BigInt(position) > mask,
    isMask: (value): value is bigint => typeof value === 'bigint',
};

if (import.meta.vitest) {
    const { describe, test, expect } = import.meta.vitest;

    describe('numberMaskCounter', () => {
        test('should read bits above the 32-bit range', () => {
            const mask = 2 ** 40 + 1;

            expect(numberMaskCounter.hasBit(mask, 0)).toBe(true);
            expect(numberMaskCounter.hasBit(mask, 39)).toBe(false);
            expect(numberMaskCounter.hasBit(mask, 40)).toBe(true);
        });

        test('should keep the end sentinel a safe integer at the maximum length', () => {
            expect(Number.isSafeInteger(numberMaskCounter.limit(MAX_NUMBER_MASK_LENGTH))).toBe(true);
        });

        test('should detect when no higher bit can be set', () => {
            expect(numberMaskCounter.exceeds(3, 0b0111)).toBe(true);
            expect(numberMaskCounter.exceeds(2, 0b0111)).toBe(false);
        });
    });

    describe('bigintMaskCounter', () => {
        test('should compute 2^64 without losing precision', () => {
            expect(bigintMaskCounter.limit(64)).toBe(18446744073709551616n);
        });

        test('should read individual bits', () => {
            const mask = 0b1010n;

            expect(bigintMaskCounter.hasBit(mask, 0)).toBe(false);
            expect(bigintMaskCounter.hasBit(mask, 1)).toBe(true);
            expect(bigintMaskCounter.hasBit(mask, 3)).toBe(true);
            expect(bigintMaskCounter.exceeds(4, mask)).toBe(true);
        });
    });
}
