/**
 * Anything a powerset can be taken over: a fixed length plus positional access.
 * `get(i)` must return the same element for the same `i` while the container is unmodified.
 */
export interface IndexableContainer<T> {
    readonly length: number;
    get(index: number): T;
}

export type PowersetSource<T> = IndexableContainer<T> | ArrayLike<T>;
