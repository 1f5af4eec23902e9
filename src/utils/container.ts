import { POWERSET_ERRORS, PowersetError } from '../algorithms/powerset/errors';
import type { IndexableContainer, PowersetSource } from '../types/container';

export const isIndexableContainer = <T>(source: PowersetSource<T>): source is IndexableContainer<T> =>
    typeof source === 'object' && 'get' in source && typeof source.get === 'function';

/** Wraps array-likes in a view over the source. Nothing is copied; elements are read on demand. */
export const toIndexableContainer = <T>(source: PowersetSource<T>): IndexableContainer<T> => {
    if (isIndexableContainer(source)) {
        return source;
    }

    return {
        get length() {
            return source.length;
        },
        get: index => source[index],
    };
};

export const assertLength = (length: number): number => {
    if (!Number.isSafeInteger(length) || length < 0) {
        throw new PowersetError(
            POWERSET_ERRORS.INVALID_CONTAINER,
            `Container length must be a non-negative integer, got ${length}`,
        );
    }

    return length;
};

export const assertContainerLength = (container: IndexableContainer<unknown>): number =>
    assertLength(container.length);

if (import.meta.vitest) {
    const { describe, test, expect } = import.meta.vitest;

    describe('toIndexableContainer', () => {
        test('should read array elements by position', () => {
            const container = toIndexableContainer(['a', 'b', 'c']);

            expect(container.length).toBe(3);
            expect(container.get(0)).toBe('a');
            expect(container.get(2)).toBe('c');
        });

        test('should treat strings as containers of characters', () => {
            const container = toIndexableContainer('xyz');

            expect(container.length).toBe(3);
            expect(container.get(1)).toBe('y');
        });

        test('should return custom containers unchanged', () => {
            const custom: IndexableContainer<number> = { length: 2, get: index => index * 10 };

            expect(toIndexableContainer(custom)).toBe(custom);
        });

        test('should read elements lazily from the source', () => {
            const items = [1, 2];
            const container = toIndexableContainer(items);

            items[1] = 5;

            expect(container.get(1)).toBe(5);
        });
    });

    describe('assertContainerLength', () => {
        test('should accept an empty container', () => {
            expect(assertContainerLength(toIndexableContainer([]))).toBe(0);
        });

        test.each([-1, 1.5, NaN, Infinity])('should reject length %s', length => {
            const container: IndexableContainer<number> = { length, get: () => 0 };

            expect(() => assertContainerLength(container)).toThrowError(PowersetError);
        });
    });
}
