// src/core/domain/entities/account.entity.ts

/** Integer amount in the smallest currency unit. */
export type Money = number;

export type Phone = string;

export interface Account {
    id: number;
    phone: Phone;
    balance: Money;
}
