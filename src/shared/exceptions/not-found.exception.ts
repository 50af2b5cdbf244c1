// src/shared/exceptions/not-found.exception.ts
import { BaseException, ExceptionDetails } from './base.exception';
import { ERROR_CODES, ErrorCode, ERROR_MESSAGES } from '../constants/error-codes';
import { STATUS_CODES } from '../constants/status-codes';

export class NotFoundException extends BaseException {
    constructor(message: string, code: ErrorCode, details?: ExceptionDetails) {
        super(message, code, STATUS_CODES.NOT_FOUND, details);
    }
}

export class AccountNotFoundException extends NotFoundException {
    constructor(accountId: number) {
        super(ERROR_MESSAGES[ERROR_CODES.ACCOUNT_NOT_FOUND], ERROR_CODES.ACCOUNT_NOT_FOUND, { accountId });
    }
}

export class PaymentNotFoundException extends NotFoundException {
    constructor(paymentId: string) {
        super(ERROR_MESSAGES[ERROR_CODES.PAYMENT_NOT_FOUND], ERROR_CODES.PAYMENT_NOT_FOUND, { paymentId });
    }
}

export class FavoriteNotFoundException extends NotFoundException {
    constructor(favoriteId: string) {
        super(ERROR_MESSAGES[ERROR_CODES.FAVORITE_NOT_FOUND], ERROR_CODES.FAVORITE_NOT_FOUND, { favoriteId });
    }
}
