// src/core/domain/services/ledger.store.ts
import { Account } from '../entities/account.entity';
import { Payment } from '../entities/payment.entity';
import { Favorite } from '../entities/favorite.entity';

/**
 * In-memory collections behind one LedgerService.
 * Arrays keep insertion order; lookups over them are linear scans.
 * Not safe for concurrent mutation, callers serialize writes.
 */
export class LedgerStore {
    readonly accounts: Account[] = [];
    readonly payments: Payment[] = [];
    readonly favorites: Favorite[] = [];
    private lastAccountId = 0;

    nextAccountId(): number {
        this.lastAccountId++;
        return this.lastAccountId;
    }

    /**
     * Keeps registration IDs ahead of accounts loaded from disk.
     */
    reserveAccountId(id: number): void {
        if (id > this.lastAccountId) {
            this.lastAccountId = id;
        }
    }
}
