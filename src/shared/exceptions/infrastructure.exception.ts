// src/shared/exceptions/infrastructure.exception.ts
import { BaseException, ExceptionDetails } from './base.exception';
import { ERROR_CODES, ErrorCode, ERROR_MESSAGES } from '../constants/error-codes';
import { STATUS_CODES } from '../constants/status-codes';

export class InfrastructureException extends BaseException {
    constructor(message: string, code: ErrorCode, details?: ExceptionDetails) {
        super(message, code, STATUS_CODES.INTERNAL_ERROR, details);
    }
}

/**
 * Raised for any failure to open, read or write a ledger file.
 * The underlying error is kept as `originalError`.
 */
export class FileNotFoundException extends InfrastructureException {
    public readonly path: string;
    public readonly originalError: unknown;

    constructor(path: string, cause: unknown) {
        super(ERROR_MESSAGES[ERROR_CODES.FILE_NOT_FOUND], ERROR_CODES.FILE_NOT_FOUND, {
            path,
            reason: cause instanceof Error ? cause.message : String(cause),
        });
        this.path = path;
        this.originalError = cause;
    }
}
