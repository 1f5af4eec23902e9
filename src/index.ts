export { Powerset, PowersetIterator, assertContextFits, iteratePowerset, powerset } from './algorithms/powerset';
export type { PowersetContext } from './algorithms/powerset';
export { decodeMask, maskPositions, readByReference } from './algorithms/powerset/decodeMask';
export type { ElementReader } from './algorithms/powerset/decodeMask';
export { POWERSET_ERRORS, PowersetError, isPowersetError } from './algorithms/powerset/errors';
export type { PowersetErrorCode } from './algorithms/powerset/errors';
export {
    MAX_NUMBER_MASK_LENGTH,
    MAX_WORD_MASK_LENGTH,
    bigintMaskCounter,
    numberMaskCounter,
} from './algorithms/powerset/maskCounter';
export type { MaskCounter } from './algorithms/powerset/maskCounter';
export { MASK_COUNTERS, createMaskCounter } from './factory';
export { assertContainerLength, assertLength, isIndexableContainer, toIndexableContainer } from './utils/container';
export { maskCounterKindSchema, powersetOptionsSchema } from './types/types';
export type {
    Mask,
    MaskCounterKind,
    PowersetEntry,
    PowersetLogger,
    PowersetOptions,
    PowersetSettings,
} from './types/types';
export type { IndexableContainer, PowersetSource } from './types/container';
