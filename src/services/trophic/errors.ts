/**
 * Input validation errors raised by the trophic diversity engine.
 */

import { AppError, ErrorDetails } from '../../utils/errors';

export type TrophicErrorCode = 'DIMENSION_MISMATCH' | 'INVALID_INPUT' | 'NAME_MISMATCH';

export class TrophicInputError extends AppError {
    declare code: TrophicErrorCode;

    constructor(message: string, code: TrophicErrorCode, details: ErrorDetails = {}) {
        super(message, code, details);
    }
}

// Species count differs between the abundance table and the trophic levels
export class DimensionMismatchError extends TrophicInputError {
    constructor(message: string, details: ErrorDetails = {}) {
        super(message, 'DIMENSION_MISMATCH', details);
    }
}

export class InvalidInputError extends TrophicInputError {
    constructor(message: string, details: ErrorDetails = {}) {
        super(message, 'INVALID_INPUT', details);
    }
}

// Species identifiers differ in value or order
export class NameMismatchError extends TrophicInputError {
    constructor(message: string, details: ErrorDetails = {}) {
        super(message, 'NAME_MISMATCH', details);
    }
}
