// test/unit/domain/services/ledger.service.test.ts
import { LedgerService } from '@/core/domain/services/ledger.service';
import { LedgerStore } from '@/core/domain/services/ledger.store';
import { PaymentStatus } from '@/core/domain/entities/payment.entity';
import {
    AmountMustBePositiveException,
    NotEnoughBalanceException,
    PhoneAlreadyRegisteredException
} from '@/shared/exceptions/business.exception';
import {
    AccountNotFoundException,
    FavoriteNotFoundException,
    PaymentNotFoundException
} from '@/shared/exceptions/not-found.exception';
import { ValidationException } from '@/shared/exceptions/validation.exception';
import { ERROR_CODES } from '@/shared/constants/error-codes';
import { TestUtils } from '@test/helpers/test-utils';

describe('LedgerService', () => {
    let store: LedgerStore;
    let ledger: LedgerService;

    beforeEach(() => {
        store = new LedgerStore();
        ledger = new LedgerService({ store, generateId: TestUtils.sequentialIds('pay') });
    });

    const captureError = (action: () => unknown): unknown => {
        try {
            action();
        } catch (error) {
            return error;
        }
        return undefined;
    };

    const fundedAccount = (balance: number, phone: string = '+10000000001') => {
        const account = ledger.registerAccount(phone);
        ledger.deposit(account.id, balance);
        return account;
    };

    describe('registerAccount', () => {
        it('should create accounts with increasing IDs and zero balance', () => {
            const first = ledger.registerAccount('+10000000001');
            const second = ledger.registerAccount('+10000000002');

            expect(first).toEqual({ id: 1, phone: '+10000000001', balance: 0 });
            expect(second).toEqual({ id: 2, phone: '+10000000002', balance: 0 });
            expect(ledger.listAccounts()).toHaveLength(2);
        });

        it('should reject a phone that is already registered', () => {
            ledger.registerAccount('+10000000001');

            expect(() => ledger.registerAccount('+10000000001')).toThrow(PhoneAlreadyRegisteredException);
            expect(ledger.listAccounts()).toHaveLength(1);
        });

        it('should not consume an ID when registration fails', () => {
            ledger.registerAccount('+10000000001');
            expect(() => ledger.registerAccount('+10000000001')).toThrow();

            expect(ledger.registerAccount('+10000000002').id).toBe(2);
        });
    });

    describe('findAccountById', () => {
        it('should return the stored account object', () => {
            const account = ledger.registerAccount('+10000000001');

            expect(ledger.findAccountById(account.id)).toBe(account);
        });

        it('should throw AccountNotFoundException for unknown IDs', () => {
            expect(() => ledger.findAccountById(42)).toThrow(AccountNotFoundException);
        });
    });

    describe('findPaymentById', () => {
        it('should return the payment added last when IDs collide', () => {
            store.payments.push(
                { id: 'dup', accountId: 1, amount: 10, category: 'food', status: PaymentStatus.IN_PROGRESS },
                { id: 'dup', accountId: 1, amount: 20, category: 'auto', status: PaymentStatus.IN_PROGRESS }
            );

            expect(ledger.findPaymentById('dup').amount).toBe(20);
        });

        it('should throw PaymentNotFoundException for unknown IDs', () => {
            expect(() => ledger.findPaymentById('missing')).toThrow(PaymentNotFoundException);
        });
    });

    describe('findFavoriteById', () => {
        it('should return the first favorite when IDs collide', () => {
            store.favorites.push(
                { id: 'fav', accountId: 1, name: 'first', amount: 10, category: 'food' },
                { id: 'fav', accountId: 1, name: 'second', amount: 20, category: 'food' }
            );

            expect(ledger.findFavoriteById('fav').name).toBe('first');
        });

        it('should throw FavoriteNotFoundException for unknown IDs', () => {
            expect(() => ledger.findFavoriteById('missing')).toThrow(FavoriteNotFoundException);
        });
    });

    describe('pay', () => {
        it('should debit the account and record an in-progress payment', () => {
            const account = fundedAccount(1000);

            const payment = ledger.pay(account.id, 300, 'food');

            expect(payment).toEqual({
                id: 'pay-1',
                accountId: account.id,
                amount: 300,
                category: 'food',
                status: PaymentStatus.IN_PROGRESS
            });
            expect(account.balance).toBe(700);
            expect(ledger.listPayments()).toEqual([payment]);
        });

        it.each([0, -1, -500])('should reject amount %d', (amount) => {
            const account = fundedAccount(1000);

            expect(() => ledger.pay(account.id, amount, 'food')).toThrow(AmountMustBePositiveException);
            expect(account.balance).toBe(1000);
        });

        it.each([NaN, 1.5, 0.5, Infinity, -Infinity])('should reject non-integer amount %p', (amount) => {
            const account = fundedAccount(1000);

            expect(() => ledger.pay(account.id, amount, 'food')).toThrow(ValidationException);
            expect(captureError(() => ledger.pay(account.id, amount, 'food'))).toMatchObject({
                code: ERROR_CODES.NON_INTEGER_AMOUNT
            });
            expect(account.balance).toBe(1000);
            expect(ledger.listPayments()).toHaveLength(0);
        });

        it('should check the amount before the account', () => {
            expect(() => ledger.pay(99, 0, 'food')).toThrow(AmountMustBePositiveException);
        });

        it('should throw AccountNotFoundException for unknown accounts', () => {
            expect(() => ledger.pay(99, 10, 'food')).toThrow(AccountNotFoundException);
        });

        it('should refuse payments above the balance', () => {
            const account = fundedAccount(100);

            expect(() => ledger.pay(account.id, 101, 'food')).toThrow(NotEnoughBalanceException);
            expect(account.balance).toBe(100);
            expect(ledger.listPayments()).toHaveLength(0);
        });

        it('should allow paying the exact balance', () => {
            const account = fundedAccount(100);

            ledger.pay(account.id, 100, 'food');

            expect(account.balance).toBe(0);
        });
    });

    describe('deposit', () => {
        it('should credit the account', () => {
            const account = ledger.registerAccount('+10000000001');

            ledger.deposit(account.id, 250);
            ledger.deposit(account.id, 50);

            expect(account.balance).toBe(300);
        });

        it('should accept a zero deposit', () => {
            const account = fundedAccount(100);

            expect(() => ledger.deposit(account.id, 0)).not.toThrow();
            expect(account.balance).toBe(100);
        });

        it('should reject negative deposits', () => {
            const account = fundedAccount(100);

            expect(() => ledger.deposit(account.id, -1)).toThrow(AmountMustBePositiveException);
            expect(account.balance).toBe(100);
        });

        it('should throw AccountNotFoundException for unknown accounts', () => {
            expect(() => ledger.deposit(7, 10)).toThrow(AccountNotFoundException);
        });

        it.each([NaN, 1.5, Infinity])('should reject non-integer amount %p', (amount) => {
            const account = fundedAccount(100);

            expect(() => ledger.deposit(account.id, amount)).toThrow(ValidationException);
            expect(account.balance).toBe(100);
        });

        it('should leave the balance whole after fractional attempts', () => {
            const account = fundedAccount(100);
            expect(() => ledger.deposit(account.id, 1.5)).toThrow(ValidationException);
            expect(() => ledger.pay(account.id, 0.5, 'food')).toThrow(ValidationException);

            expect(account.balance).toBe(100);
        });
    });

    describe('reject', () => {
        it('should fail the payment and refund its amount', () => {
            const account = fundedAccount(1000);
            const payment = ledger.pay(account.id, 400, 'auto');

            ledger.reject(payment.id);

            expect(payment.status).toBe(PaymentStatus.FAIL);
            expect(account.balance).toBe(1000);
        });

        it('should refund again when the same payment is rejected twice', () => {
            const account = fundedAccount(1000);
            const payment = ledger.pay(account.id, 400, 'auto');

            ledger.reject(payment.id);
            ledger.reject(payment.id);

            expect(account.balance).toBe(1400);
        });

        it('should throw PaymentNotFoundException for unknown payments', () => {
            expect(() => ledger.reject('missing')).toThrow(PaymentNotFoundException);
        });

        it('should throw AccountNotFoundException when the owner is gone', () => {
            store.payments.push({ id: 'orphan', accountId: 77, amount: 5, category: 'food', status: PaymentStatus.IN_PROGRESS });

            expect(() => ledger.reject('orphan')).toThrow(AccountNotFoundException);
        });

        it('should keep the balance equation over mixed operations', () => {
            const account = fundedAccount(500);
            const food = ledger.pay(account.id, 120, 'food');
            ledger.pay(account.id, 80, 'auto');
            ledger.deposit(account.id, 30);
            ledger.reject(food.id);

            // 500 + 30 - (120 + 80) + 120
            expect(account.balance).toBe(450);
        });
    });

    describe('repeat', () => {
        it('should create a fresh payment with the same details', () => {
            const account = fundedAccount(1000);
            const original = ledger.pay(account.id, 200, 'mobile');

            const repeated = ledger.repeat(original.id);

            expect(repeated).toEqual({
                id: 'pay-2',
                accountId: account.id,
                amount: 200,
                category: 'mobile',
                status: PaymentStatus.IN_PROGRESS
            });
            expect(account.balance).toBe(600);
        });

        it('should be subject to the balance check', () => {
            const account = fundedAccount(300);
            const original = ledger.pay(account.id, 200, 'mobile');

            expect(() => ledger.repeat(original.id)).toThrow(NotEnoughBalanceException);
        });

        it('should throw PaymentNotFoundException for unknown payments', () => {
            expect(() => ledger.repeat('missing')).toThrow(PaymentNotFoundException);
        });
    });

    describe('favoritePayment', () => {
        it('should copy the payment into a named favorite', () => {
            const account = fundedAccount(1000);
            const payment = ledger.pay(account.id, 150, 'internet');

            const favorite = ledger.favoritePayment(payment.id, 'Home internet');

            expect(favorite).toEqual({
                id: 'pay-2',
                accountId: account.id,
                name: 'Home internet',
                amount: 150,
                category: 'internet'
            });
            expect(ledger.listFavorites()).toEqual([favorite]);
        });

        it('should throw PaymentNotFoundException for unknown payments', () => {
            expect(() => ledger.favoritePayment('missing', 'x')).toThrow(PaymentNotFoundException);
        });
    });

    describe('payFromFavorite', () => {
        it('should pay with the stored account, amount and category', () => {
            const account = fundedAccount(1000);
            const payment = ledger.pay(account.id, 150, 'internet');
            const favorite = ledger.favoritePayment(payment.id, 'Home internet');

            const fromFavorite = ledger.payFromFavorite(favorite.id);

            expect(fromFavorite).toEqual({
                id: 'pay-3',
                accountId: account.id,
                amount: 150,
                category: 'internet',
                status: PaymentStatus.IN_PROGRESS
            });
            expect(account.balance).toBe(700);
        });

        it('should throw FavoriteNotFoundException for unknown favorites', () => {
            expect(() => ledger.payFromFavorite('missing')).toThrow(FavoriteNotFoundException);
        });
    });

    describe('error payloads', () => {
        it('should expose code and details on business errors', () => {
            const account = fundedAccount(10);

            const error = captureError(() => ledger.pay(account.id, 25, 'food'));

            expect(error).toBeInstanceOf(NotEnoughBalanceException);
            expect(error).toMatchObject({
                code: ERROR_CODES.INSUFFICIENT_BALANCE,
                statusCode: 422,
                details: { accountId: account.id, balance: 10, amount: 25 }
            });
        });
    });

    describe('default ID generator', () => {
        it('should generate distinct UUIDs', () => {
            const uuidLedger = new LedgerService();
            const account = uuidLedger.registerAccount('+10000000001');
            uuidLedger.deposit(account.id, 100);

            const first = uuidLedger.pay(account.id, 10, 'food');
            const second = uuidLedger.pay(account.id, 10, 'food');

            expect(first.id).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
            expect(first.id).not.toBe(second.id);
        });
    });
});
