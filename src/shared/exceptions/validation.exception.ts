// src/shared/exceptions/validation.exception.ts
import { BaseException } from './base.exception';
import { ERROR_CODES, ErrorCode, ERROR_MESSAGES } from '../constants/error-codes';
import { STATUS_CODES } from '../constants/status-codes';

export interface FieldError {
    field: string;
    message: string;
    value?: unknown;
}

export class ValidationException extends BaseException {
    public readonly validationErrors: FieldError[];

    constructor(message: string, validationErrors: FieldError[] = [], code: ErrorCode = ERROR_CODES.VALIDATION_ERROR) {
        super(message, code, STATUS_CODES.BAD_REQUEST, { validationErrors });
        this.validationErrors = validationErrors;
    }
}

/**
 * A persisted record whose field does not parse as its expected type,
 * or that has fewer fields than its layout.
 */
export class RecordParseException extends ValidationException {
    public readonly file: string;
    public readonly record: number;

    constructor(file: string, record: number, error: FieldError) {
        super(
            `${ERROR_MESSAGES[ERROR_CODES.PARSING_ERROR]}: ${file} record ${record}, ${error.field}: ${error.message}`,
            [error],
            ERROR_CODES.PARSING_ERROR
        );
        this.file = file;
        this.record = record;
    }
}
