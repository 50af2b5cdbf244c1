// src/shared/exceptions/base.exception.ts
import { ErrorCode } from '../constants/error-codes';
import { StatusCode } from '../constants/status-codes';

export type ExceptionDetails = Record<string, unknown>;

export abstract class BaseException extends Error {
    public readonly code: ErrorCode;
    public readonly statusCode: StatusCode;
    public readonly details?: ExceptionDetails;

    constructor(
        message: string,
        code: ErrorCode,
        statusCode: StatusCode,
        details?: ExceptionDetails
    ) {
        super(message);
        this.name = this.constructor.name;
        this.code = code;
        this.statusCode = statusCode;
        this.details = details;

        // Maintains proper stack trace for where our error was thrown
        Error.captureStackTrace(this, this.constructor);
    }

    toJSON() {
        return {
            name: this.name,
            message: this.message,
            statusCode: this.statusCode,
            code: this.code,
            ...(this.details && { details: this.details }),
        };
    }
}
