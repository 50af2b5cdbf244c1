// src/core/domain/services/ledger.service.ts
import { v4 as uuidv4 } from 'uuid';
import { Account, Money, Phone } from '../entities/account.entity';
import { Payment, PaymentCategory, PaymentStatus } from '../entities/payment.entity';
import { Favorite } from '../entities/favorite.entity';
import { LedgerStore } from './ledger.store';
import { PaymentAggregator } from './payment-aggregator.service';
import { FlatFileAdapter } from '../../../infrastructure/persistence/flat-file.adapter';
import { DumpDirectoryAdapter } from '../../../infrastructure/persistence/dump-directory.adapter';
import {
    AmountMustBePositiveException,
    NotEnoughBalanceException,
    PhoneAlreadyRegisteredException
} from '../../../shared/exceptions/business.exception';
import {
    AccountNotFoundException,
    FavoriteNotFoundException,
    PaymentNotFoundException
} from '../../../shared/exceptions/not-found.exception';
import { ValidationException } from '../../../shared/exceptions/validation.exception';
import { ERROR_CODES, ERROR_MESSAGES } from '../../../shared/constants/error-codes';
import { logger } from '../../../infrastructure/monitoring/logger.service';

export type IdGenerator = () => string;

export interface LedgerServiceOptions {
    store?: LedgerStore;
    generateId?: IdGenerator;
}

/**
 * Accounts, payments and favorites for a single owner.
 *
 * One instance per caller: nothing here locks, so concurrent mutations
 * must be serialized outside. Lookups are linear scans in insertion order.
 */
export class LedgerService {
    private readonly store: LedgerStore;
    private readonly generateId: IdGenerator;
    private readonly flatFile: FlatFileAdapter;
    private readonly dumpDirectory: DumpDirectoryAdapter;
    private readonly aggregator: PaymentAggregator;

    constructor(options: LedgerServiceOptions = {}) {
        this.store = options.store ?? new LedgerStore();
        this.generateId = options.generateId ?? (() => uuidv4());
        this.flatFile = new FlatFileAdapter(this.store);
        this.dumpDirectory = new DumpDirectoryAdapter(this.store);
        this.aggregator = new PaymentAggregator(this.store);
    }

    registerAccount(phone: Phone): Account {
        if (this.store.accounts.some(account => account.phone === phone)) {
            logger.warn('Phone already registered', { phone });
            throw new PhoneAlreadyRegisteredException(phone);
        }

        const account: Account = {
            id: this.store.nextAccountId(),
            phone,
            balance: 0
        };
        this.store.accounts.push(account);

        logger.info('Account registered', { accountId: account.id });
        return account;
    }

    findAccountById(accountId: number): Account {
        const account = this.store.accounts.find(candidate => candidate.id === accountId);
        if (!account) {
            throw new AccountNotFoundException(accountId);
        }
        return account;
    }

    /**
     * With duplicate IDs the payment added last is returned.
     */
    findPaymentById(paymentId: string): Payment {
        let payment: Payment | undefined;
        for (const candidate of this.store.payments) {
            if (candidate.id === paymentId) {
                payment = candidate;
            }
        }

        if (!payment) {
            throw new PaymentNotFoundException(paymentId);
        }
        return payment;
    }

    findFavoriteById(favoriteId: string): Favorite {
        const favorite = this.store.favorites.find(candidate => candidate.id === favoriteId);
        if (!favorite) {
            throw new FavoriteNotFoundException(favoriteId);
        }
        return favorite;
    }

    pay(accountId: number, amount: Money, category: PaymentCategory): Payment {
        this.assertWholeAmount(amount);
        if (amount <= 0) {
            throw new AmountMustBePositiveException(amount);
        }

        const account = this.findAccountById(accountId);

        if (account.balance < amount) {
            logger.warn('Payment declined, not enough balance', {
                accountId,
                balance: account.balance,
                amount
            });
            throw new NotEnoughBalanceException(accountId, account.balance, amount);
        }

        account.balance -= amount;

        const payment: Payment = {
            id: this.generateId(),
            accountId,
            amount,
            category,
            status: PaymentStatus.IN_PROGRESS
        };
        this.store.payments.push(payment);

        logger.debug('Payment created', { paymentId: payment.id, accountId, amount, category });
        return payment;
    }

    /**
     * Zero is accepted here, unlike `pay`.
     */
    deposit(accountId: number, amount: Money): void {
        this.assertWholeAmount(amount);
        if (amount < 0) {
            throw new AmountMustBePositiveException(amount);
        }

        const account = this.findAccountById(accountId);
        account.balance += amount;

        logger.debug('Deposit applied', { accountId, amount, balance: account.balance });
    }

    /**
     * Marks the payment failed and refunds it. The current status is not
     * checked, so rejecting the same payment again refunds it again.
     */
    reject(paymentId: string): void {
        const payment = this.findPaymentById(paymentId);
        const account = this.findAccountById(payment.accountId);

        payment.status = PaymentStatus.FAIL;
        account.balance += payment.amount;

        logger.debug('Payment rejected', {
            paymentId,
            accountId: account.id,
            refunded: payment.amount
        });
    }

    repeat(paymentId: string): Payment {
        const payment = this.findPaymentById(paymentId);
        return this.pay(payment.accountId, payment.amount, payment.category);
    }

    favoritePayment(paymentId: string, name: string): Favorite {
        const payment = this.findPaymentById(paymentId);

        const favorite: Favorite = {
            id: this.generateId(),
            accountId: payment.accountId,
            name,
            amount: payment.amount,
            category: payment.category
        };
        this.store.favorites.push(favorite);

        logger.debug('Favorite created', { favoriteId: favorite.id, paymentId, name });
        return favorite;
    }

    payFromFavorite(favoriteId: string): Payment {
        const favorite = this.findFavoriteById(favoriteId);
        return this.pay(favorite.accountId, favorite.amount, favorite.category);
    }

    listAccounts(): readonly Account[] {
        return this.store.accounts;
    }

    listPayments(): readonly Payment[] {
        return this.store.payments;
    }

    listFavorites(): readonly Favorite[] {
        return this.store.favorites;
    }

    // Format A: accounts only, `id;phone;balance|` records, import appends
    exportToFile(path: string): Promise<void> {
        return this.flatFile.exportToFile(path);
    }

    importFromFile(path: string): Promise<void> {
        return this.flatFile.importFromFile(path);
    }

    // Format B: one `.dump` file per collection, import merges by ID
    export(dir: string): Promise<void> {
        return this.dumpDirectory.export(dir);
    }

    import(dir: string): Promise<void> {
        return this.dumpDirectory.import(dir);
    }

    sumPayments(workerCount: number): Promise<Money> {
        return this.aggregator.sumPayments(workerCount);
    }

    // Amounts are safe integers in the smallest currency unit
    private assertWholeAmount(amount: Money): void {
        if (!Number.isSafeInteger(amount)) {
            throw new ValidationException(
                ERROR_MESSAGES[ERROR_CODES.NON_INTEGER_AMOUNT],
                [{ field: 'amount', message: 'must be a safe integer', value: amount }],
                ERROR_CODES.NON_INTEGER_AMOUNT
            );
        }
    }
}
