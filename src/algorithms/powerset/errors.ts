export const POWERSET_ERRORS = {
    OVERFLOW: 'OVERFLOW',
    INVALID_CONTAINER: 'INVALID_CONTAINER',
    INVALID_OPTIONS: 'INVALID_OPTIONS',
    MASK_OUT_OF_RANGE: 'MASK_OUT_OF_RANGE',
} as const;

export type PowersetErrorCode = (typeof POWERSET_ERRORS)[keyof typeof POWERSET_ERRORS];

export class PowersetError extends Error {
    readonly code: PowersetErrorCode;

    constructor(code: PowersetErrorCode, message: string) {
        super(message);
        this.name = 'PowersetError';
        this.code = code;
    }
}

export const isPowersetError = (error: unknown, code?: PowersetErrorCode): error is PowersetError =>
    error instanceof PowersetError && (code === undefined || error.code === code);
