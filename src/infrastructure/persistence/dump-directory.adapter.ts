// src/infrastructure/persistence/dump-directory.adapter.ts
import path from 'path';
import { Account } from '../../core/domain/entities/account.entity';
import { Payment, isPaymentStatus, PaymentStatus } from '../../core/domain/entities/payment.entity';
import { Favorite } from '../../core/domain/entities/favorite.entity';
import { LedgerStore } from '../../core/domain/services/ledger.store';
import { RecordParseException } from '../../shared/exceptions/validation.exception';
import { logger } from '../monitoring/logger.service';
import { fileExists, readFileContent, writeFileContent } from './file-io';
import { fieldAt, joinFields, parseInteger, RecordLocation, splitFields, splitRecords } from './record-parser';

export const DUMP_FILES = {
    accounts: 'accounts.dump',
    payments: 'payments.dump',
    favorites: 'favorites.dump'
} as const;

const LINE_TERMINATOR = '\n';

/**
 * One file per entity type inside a directory, one `;`-separated line per record:
 *
 * - accounts.dump:  id;phone;balance
 * - payments.dump:  id;accountId;amount;category;status
 * - favorites.dump: id;accountId;amount;category
 *
 * Import merges by ID: every entity already in the store with a matching ID
 * is overwritten in place, anything else is appended.
 */
export class DumpDirectoryAdapter {
    constructor(private readonly store: LedgerStore) {}

    async export(dir: string): Promise<void> {
        const { accounts, payments, favorites } = this.store;

        if (accounts.length > 0) {
            await this.writeDump(dir, DUMP_FILES.accounts, accounts.map(account =>
                joinFields([account.id, account.phone, account.balance])
            ));
        }

        if (payments.length > 0) {
            await this.writeDump(dir, DUMP_FILES.payments, payments.map(payment =>
                joinFields([payment.id, payment.accountId, payment.amount, payment.category, payment.status])
            ));
        }

        if (favorites.length > 0) {
            await this.writeDump(dir, DUMP_FILES.favorites, favorites.map(favorite =>
                joinFields([favorite.id, favorite.accountId, favorite.amount, favorite.category])
            ));
        }
    }

    async import(dir: string): Promise<void> {
        await this.readDump(dir, DUMP_FILES.accounts, (fields, location) => {
            this.mergeAccount(this.parseAccount(fields, location));
        });

        await this.readDump(dir, DUMP_FILES.payments, (fields, location) => {
            this.mergePayment(this.parsePayment(fields, location));
        });

        await this.readDump(dir, DUMP_FILES.favorites, (fields, location) => {
            this.mergeFavorite(this.parseFavorite(fields, location));
        });
    }

    private async writeDump(dir: string, fileName: string, lines: string[]): Promise<void> {
        const filePath = path.join(dir, fileName);
        await writeFileContent(filePath, lines.map(line => line + LINE_TERMINATOR).join(''));

        logger.persistence('Dump written', { path: filePath, records: lines.length });
    }

    private async readDump(
        dir: string,
        fileName: string,
        apply: (fields: string[], location: RecordLocation) => void
    ): Promise<void> {
        const filePath = path.join(dir, fileName);

        if (!(await fileExists(filePath))) {
            logger.debug('Dump file absent, skipping', { path: filePath });
            return;
        }

        const content = await readFileContent(filePath);
        const lines = splitRecords(content, LINE_TERMINATOR);

        lines.forEach((line, index) => {
            const fields = splitFields(line);
            logger.debug('Dump record read', { path: filePath, record: index + 1, fields });
            apply(fields, { file: filePath, record: index + 1 });
        });

        logger.persistence('Dump read', { path: filePath, records: lines.length });
    }

    private parseAccount(fields: string[], location: RecordLocation): Account {
        return {
            id: parseInteger(fieldAt(fields, 0, 'id', location), 'id', location),
            phone: fieldAt(fields, 1, 'phone', location),
            balance: parseInteger(fieldAt(fields, 2, 'balance', location), 'balance', location)
        };
    }

    private parsePayment(fields: string[], location: RecordLocation): Payment {
        return {
            id: fieldAt(fields, 0, 'id', location),
            accountId: parseInteger(fieldAt(fields, 1, 'accountId', location), 'accountId', location),
            amount: parseInteger(fieldAt(fields, 2, 'amount', location), 'amount', location),
            category: fieldAt(fields, 3, 'category', location),
            status: this.parseStatus(fieldAt(fields, 4, 'status', location), location)
        };
    }

    private parseFavorite(fields: string[], location: RecordLocation): Favorite {
        return {
            id: fieldAt(fields, 0, 'id', location),
            accountId: parseInteger(fieldAt(fields, 1, 'accountId', location), 'accountId', location),
            name: '',
            amount: parseInteger(fieldAt(fields, 2, 'amount', location), 'amount', location),
            category: fieldAt(fields, 3, 'category', location)
        };
    }

    private parseStatus(value: string, location: RecordLocation): PaymentStatus {
        if (!isPaymentStatus(value)) {
            throw new RecordParseException(location.file, location.record, {
                field: 'status',
                message: `expected one of ${Object.values(PaymentStatus).join(', ')}`,
                value
            });
        }
        return value;
    }

    private mergeAccount(parsed: Account): void {
        const existing = this.store.accounts.filter(account => account.id === parsed.id);

        for (const account of existing) {
            account.phone = parsed.phone;
            account.balance = parsed.balance;
        }

        if (existing.length === 0) {
            this.store.accounts.push(parsed);
        }
        this.store.reserveAccountId(parsed.id);
    }

    private mergePayment(parsed: Payment): void {
        const existing = this.store.payments.filter(payment => payment.id === parsed.id);

        for (const payment of existing) {
            payment.accountId = parsed.accountId;
            payment.amount = parsed.amount;
            payment.category = parsed.category;
            payment.status = parsed.status;
        }

        if (existing.length === 0) {
            this.store.payments.push(parsed);
        }
    }

    // `name` is not part of the dump, so merged favorites keep theirs
    private mergeFavorite(parsed: Favorite): void {
        const existing = this.store.favorites.filter(favorite => favorite.id === parsed.id);

        for (const favorite of existing) {
            favorite.accountId = parsed.accountId;
            favorite.amount = parsed.amount;
            favorite.category = parsed.category;
        }

        if (existing.length === 0) {
            this.store.favorites.push(parsed);
        }
    }
}
