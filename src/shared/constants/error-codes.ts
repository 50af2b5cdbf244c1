// src/shared/constants/error-codes.ts

/**
 * Error codes raised by the ledger.
 * Prefix groups the code by area, the number is stable across releases.
 */
export const ERROR_CODES = {
    // Validation (1100-1199)
    VALIDATION_ERROR: 'VAL_1101',
    INVALID_AMOUNT: 'VAL_1111',
    INVALID_WORKER_COUNT: 'VAL_1112',
    INVALID_CONFIGURATION: 'VAL_1113',
    NON_INTEGER_AMOUNT: 'VAL_1114',

    // Account Errors (1500-1599)
    ACCOUNT_NOT_FOUND: 'ACC_1501',
    PHONE_ALREADY_REGISTERED: 'ACC_1502',
    INSUFFICIENT_BALANCE: 'ACC_1503',

    // Payment Errors (1300-1399)
    PAYMENT_NOT_FOUND: 'PAY_1301',
    FAVORITE_NOT_FOUND: 'PAY_1302',

    // Import/Export Errors (1700-1799)
    FILE_NOT_FOUND: 'FILE_1701',
    PARSING_ERROR: 'PARSE_1708',
} as const;

export type ErrorCode = typeof ERROR_CODES[keyof typeof ERROR_CODES];

export const ERROR_MESSAGES: Record<ErrorCode, string> = {
    [ERROR_CODES.VALIDATION_ERROR]: 'Validation failed',
    [ERROR_CODES.INVALID_AMOUNT]: 'Amount must be greater than zero',
    [ERROR_CODES.INVALID_WORKER_COUNT]: 'Worker count must be a non-negative integer',
    [ERROR_CODES.INVALID_CONFIGURATION]: 'Invalid configuration',
    [ERROR_CODES.NON_INTEGER_AMOUNT]: 'Amount must be a whole number of the smallest currency unit',
    [ERROR_CODES.ACCOUNT_NOT_FOUND]: 'Account not found',
    [ERROR_CODES.PHONE_ALREADY_REGISTERED]: 'Phone already registered',
    [ERROR_CODES.INSUFFICIENT_BALANCE]: 'Account does not have enough balance',
    [ERROR_CODES.PAYMENT_NOT_FOUND]: 'Payment not found',
    [ERROR_CODES.FAVORITE_NOT_FOUND]: 'Favorite not found',
    [ERROR_CODES.FILE_NOT_FOUND]: 'File not found',
    [ERROR_CODES.PARSING_ERROR]: 'Record could not be parsed',
};
