// src/shared/exceptions/business.exception.ts
import { BaseException, ExceptionDetails } from './base.exception';
import { ERROR_CODES, ErrorCode, ERROR_MESSAGES } from '../constants/error-codes';
import { STATUS_CODES } from '../constants/status-codes';

export class BusinessException extends BaseException {
    constructor(message: string, code: ErrorCode = ERROR_CODES.VALIDATION_ERROR, details?: ExceptionDetails) {
        super(message, code, STATUS_CODES.UNPROCESSABLE_ENTITY, details);
    }
}

export class PhoneAlreadyRegisteredException extends BusinessException {
    constructor(phone: string) {
        super(ERROR_MESSAGES[ERROR_CODES.PHONE_ALREADY_REGISTERED], ERROR_CODES.PHONE_ALREADY_REGISTERED, { phone });
    }
}

export class AmountMustBePositiveException extends BusinessException {
    constructor(amount: number) {
        super(ERROR_MESSAGES[ERROR_CODES.INVALID_AMOUNT], ERROR_CODES.INVALID_AMOUNT, { amount });
    }
}

export class NotEnoughBalanceException extends BusinessException {
    constructor(accountId: number, balance: number, amount: number) {
        super(ERROR_MESSAGES[ERROR_CODES.INSUFFICIENT_BALANCE], ERROR_CODES.INSUFFICIENT_BALANCE, {
            accountId,
            balance,
            amount,
        });
    }
}
