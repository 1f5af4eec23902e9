/**
 * @module powerset
 * @description
 * Lazy enumeration of every subset of an indexable container.
 *
 * Algorithm:
 * A mask counts from 0 up to 2^n - 1. Each mask is decoded into the subset whose
 * positions are its set bits, so subsets come out in ascending mask order: the empty
 * subset first, the full container last.
 *
 * Complexity:
 * O(n) per subset, O(n * 2^n) for the whole powerset. Only the current subset is held.
 *
 * WARNING:
 * The container is read lazily while enumerating. Mutating it before the enumeration
 * finishes gives inconsistent subsets.
 */

import cloneDeep from 'lodash/cloneDeep';
import { createMaskCounter } from '../../factory';
import type { IndexableContainer, PowersetSource } from '../../types/container';
import {
    type Mask,
    type PowersetEntry,
    type PowersetLogger,
    type PowersetOptions,
    powersetOptionsSchema,
} from '../../types/types';
import { assertContainerLength, assertLength, toIndexableContainer } from '../../utils/container';
import { decodeMask, type ElementReader, maskPositions, readByReference } from './decodeMask';
import { POWERSET_ERRORS, PowersetError } from './errors';
import type { MaskCounter } from './maskCounter';

const readByClone = <T>(container: IndexableContainer<T>, position: number): T => cloneDeep(container.get(position));

/** Everything an iterator needs, validated whenever an iterator is built from it. */
export interface PowersetContext<T> {
    container: IndexableContainer<T>;
    length: number;
    counter: MaskCounter;
    read: ElementReader<T>;
    /** Longest container allowed; defaults to the counter's `defaultMaxLength`. */
    maxLength?: number;
}

/** Throws unless `2^length` fits the context's counter. Nothing is read from the container. */
export const assertContextFits = <T>({
    length,
    counter,
    maxLength = counter.defaultMaxLength,
}: PowersetContext<T>): void => {
    assertLength(length);

    if (maxLength > counter.hardMaxLength) {
        throw new PowersetError(
            POWERSET_ERRORS.INVALID_OPTIONS,
            `The ${counter.kind} mask counter supports at most ${counter.hardMaxLength} elements, got maxLength ${maxLength}`,
        );
    }
    if (length > maxLength) {
        throw new PowersetError(
            POWERSET_ERRORS.OVERFLOW,
            `Cannot enumerate the powerset of ${length} elements: the ${counter.kind} mask counter supports at most ${maxLength}`,
        );
    }
};

const warnIfLarge = (logger: PowersetLogger, length: number, warnAtLength: number): void => {
    if (length >= warnAtLength) {
        logger.warn(`Enumerating 2^${length} subsets of a ${length}-element container`);
    }
};

const resolve = <T>(source: PowersetSource<T>, options: PowersetOptions = {}): PowersetContext<T> => {
    const { logger = console, ...rest } = options;
    const parsed = powersetOptionsSchema.safeParse(rest);

    if (!parsed.success) {
        throw new PowersetError(
            POWERSET_ERRORS.INVALID_OPTIONS,
            `Invalid powerset options: ${parsed.error.issues
                .map(issue => `${issue.path.join('.')}: ${issue.message}`)
                .join('; ')}`,
        );
    }

    const settings = parsed.data;
    const container = toIndexableContainer(source);
    const context: PowersetContext<T> = {
        container,
        length: assertContainerLength(container),
        counter: createMaskCounter(settings.counter),
        read: settings.copy === 'clone' ? readByClone : readByReference,
        maxLength: settings.maxLength,
    };

    assertContextFits(context);
    warnIfLarge(logger, context.length, settings.warnAtLength);

    return context;
};

/**
 * Single-pass cursor over the powerset. Yields the subset for mask 0, 1, ..., 2^n - 1,
 * then reports `done` on every further call.
 */
export class PowersetIterator<T> implements IterableIterator<T[]> {
    private readonly container: IndexableContainer<T>;
    private readonly length: number;
    private readonly counter: MaskCounter;
    private readonly read: ElementReader<T>;
    private readonly end: Mask;
    private mask: Mask;
    private exhausted = false;

    constructor(context: PowersetContext<T>) {
        assertContextFits(context);

        const { container, length, counter, read } = context;
        this.container = container;
        this.length = length;
        this.counter = counter;
        this.read = read;
        this.end = this.counter.limit(this.length);
        this.mask = this.counter.zero;
    }

    /** The mask the next call to `next()` will decode. */
    get currentMask(): Mask {
        return this.mask;
    }

    hasNext(): boolean {
        return !this.exhausted && this.counter.lessThan(this.mask, this.end);
    }

    next(): IteratorResult<T[], undefined> {
        const entry = this.nextEntry();

        if (entry === undefined) {
            return { done: true, value: undefined };
        }

        return { done: false, value: entry.subset };
    }

    nextEntry(): PowersetEntry<T> | undefined {
        if (!this.hasNext()) {
            this.exhausted = true;
            return undefined;
        }

        const mask = this.mask;
        const subset = decodeMask(this.container, this.length, mask, this.counter, this.read);
        this.mask = this.counter.increment(mask);

        return { mask, subset };
    }

    [Symbol.iterator](): PowersetIterator<T> {
        return this;
    }
}

/**
 * Re-iterable powerset of a container. Every iteration starts a fresh `PowersetIterator`
 * and produces the same sequence as long as the container is unmodified.
 */
export class Powerset<T> implements Iterable<T[]> {
    readonly length: number;
    private readonly context: PowersetContext<T>;

    constructor(source: PowersetSource<T>, options?: PowersetOptions) {
        this.context = resolve(source, options);
        this.length = this.context.length;
    }

    /** Number of subsets, 2^n, in the configured counter's type. */
    size(): Mask {
        return this.context.counter.limit(this.length);
    }

    [Symbol.iterator](): PowersetIterator<T> {
        return new PowersetIterator(this.context);
    }

    *entries(): Generator<PowersetEntry<T>, void, undefined> {
        const iterator = new PowersetIterator(this.context);

        for (let entry = iterator.nextEntry(); entry !== undefined; entry = iterator.nextEntry()) {
            yield entry;
        }
    }

    subsetAt(mask: Mask): T[] {
        const { container, length, counter, read } = this.context;

        return decodeMask(container, length, this.assertMask(mask), counter, read);
    }

    positions(mask: Mask): Generator<number> {
        return maskPositions(this.assertMask(mask), this.length, this.context.counter);
    }

    private assertMask(mask: Mask): Mask {
        const { counter } = this.context;

        if (!counter.isMask(mask) || counter.lessThan(mask, counter.zero) || !counter.lessThan(mask, this.size())) {
            throw new PowersetError(
                POWERSET_ERRORS.MASK_OUT_OF_RANGE,
                `Mask ${String(mask)} is not a ${counter.kind} in [0, 2^${this.length})`,
            );
        }
        if (typeof mask === 'number' && !Number.isInteger(mask)) {
            throw new PowersetError(POWERSET_ERRORS.MASK_OUT_OF_RANGE, `Mask ${mask} is not an integer`);
        }

        return mask;
    }
}

/** Single-pass iterator over the powerset of `source`. Throws `OVERFLOW` before producing anything. */
export const iteratePowerset = <T>(source: PowersetSource<T>, options?: PowersetOptions): PowersetIterator<T> =>
    new PowersetIterator(resolve(source, options));

/** Powerset of `source`, e.g. `for (const subset of powerset([1, 2, 3])) { ... }` */
export const powerset = <T>(source: PowersetSource<T>, options?: PowersetOptions): Powerset<T> =>
    new Powerset(source, options);
