// src/core/domain/entities/payment.entity.ts
import { Money } from './account.entity';

export type PaymentCategory = string;

export enum PaymentStatus {
    IN_PROGRESS = 'INPROGRESS',
    FAIL = 'FAIL'
}

export interface Payment {
    id: string;
    accountId: number;
    amount: Money;
    category: PaymentCategory;
    status: PaymentStatus;
}

export function isPaymentStatus(value: string): value is PaymentStatus {
    return Object.values<string>(PaymentStatus).includes(value);
}
