// src/core/domain/entities/favorite.entity.ts
import { Money } from './account.entity';
import { PaymentCategory } from './payment.entity';

/** Saved payment template, replayed through `payFromFavorite`. */
export interface Favorite {
    id: string;
    accountId: number;
    name: string;
    amount: Money;
    category: PaymentCategory;
}
