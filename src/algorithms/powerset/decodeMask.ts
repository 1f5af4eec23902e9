/**
 * @module decode-mask
 * @description
 * Turns a subset mask into the subset it encodes.
 *
 * Positions are scanned in increasing order, so the subset keeps the container's
 * relative order. Scanning stops at the first position whose bit value exceeds the
 * mask, since no higher bit can be set.
 *
 * Complexity: O(n) per mask.
 */

import type { IndexableContainer } from '../../types/container';
import type { Mask } from '../../types/types';
import { type MaskCounter, bigintMaskCounter, numberMaskCounter } from './maskCounter';

export type ElementReader<T> = (container: IndexableContainer<T>, position: number) => T;

export const readByReference = <T>(container: IndexableContainer<T>, position: number): T => container.get(position);

export function* maskPositions<M extends Mask>(mask: M, length: number, counter: MaskCounter<M>): Generator<number> {
    for (let position = 0; position < length; ++position) {
        if (counter.exceeds(position, mask)) {
            return;
        }
        if (counter.hasBit(mask, position)) {
            yield position;
        }
    }
}

export const decodeMask = <T, M extends Mask>(
    container: IndexableContainer<T>,
    length: number,
    mask: M,
    counter: MaskCounter<M>,
    read: ElementReader<T> = readByReference,
): T[] => {
    const subset: T[] = [];

    for (let position = 0; position < length; ++position) {
        if (counter.exceeds(position, mask)) {
            break;
        }
        if (counter.hasBit(mask, position)) {
            subset.push(read(container, position));
        }
    }

    return subset;
};

if (import.meta.vitest) {
    const { describe, test, expect } = import.meta.vitest;

    const letters: IndexableContainer<string> = { length: 4, get: index => 'abcd'[index] };

    describe('decodeMask', () => {
        test('should decode mask 0 to the empty subset', () => {
            expect(decodeMask(letters, 4, 0, numberMaskCounter)).toEqual([]);
        });

        test('should keep original order', () => {
            // bits 0, 2, 3
            expect(decodeMask(letters, 4, 0b1101, numberMaskCounter)).toEqual(['a', 'c', 'd']);
        });

        test('should decode bigint masks the same way', () => {
            expect(decodeMask(letters, 4, 0b0110n, bigintMaskCounter)).toEqual(['b', 'c']);
        });

        test('should only read the selected positions', () => {
            const reads: number[] = [];
            const tracked: IndexableContainer<number> = {
                length: 6,
                get: index => {
                    reads.push(index);
                    return index;
                },
            };

            decodeMask(tracked, 6, 0b100100, numberMaskCounter);

            expect(reads).toEqual([2, 5]);
        });

        test('should pass positions to a custom reader', () => {
            const read: ElementReader<string> = (container, position) => `${position}:${container.get(position)}`;

            expect(decodeMask(letters, 4, 0b1010, numberMaskCounter, read)).toEqual(['1:b', '3:d']);
        });
    });

    describe('maskPositions', () => {
        test('should list set bit positions lazily in increasing order', () => {
            expect([...maskPositions(0b10011, 5, numberMaskCounter)]).toEqual([0, 1, 4]);
        });

        test('should ignore bits beyond the container length', () => {
            expect([...maskPositions(0b1100, 3, numberMaskCounter)]).toEqual([2]);
        });
    });
}
