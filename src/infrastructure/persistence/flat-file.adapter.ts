// src/infrastructure/persistence/flat-file.adapter.ts
import { Account } from '../../core/domain/entities/account.entity';
import { LedgerStore } from '../../core/domain/services/ledger.store';
import { logger } from '../monitoring/logger.service';
import { readFileContent, writeFileContent } from './file-io';
import { fieldAt, joinFields, parseInteger, splitFields, splitRecords } from './record-parser';

export const RECORD_TERMINATOR = '|';

/**
 * Single-file account snapshot: `id;phone;balance|` per account, no newline.
 *
 * Import always appends. It neither merges with accounts already in the
 * store nor checks for duplicate IDs, and a malformed record stops the
 * import with the earlier records already appended.
 */
export class FlatFileAdapter {
    constructor(private readonly store: LedgerStore) {}

    async exportToFile(path: string): Promise<void> {
        const content = this.store.accounts
            .map(account => joinFields([account.id, account.phone, account.balance]) + RECORD_TERMINATOR)
            .join('');

        await writeFileContent(path, content);

        logger.persistence('Accounts exported to file', {
            path,
            accounts: this.store.accounts.length
        });
    }

    async importFromFile(path: string): Promise<void> {
        const content = await readFileContent(path);
        const records = splitRecords(content, RECORD_TERMINATOR);

        records.forEach((record, index) => {
            const location = { file: path, record: index + 1 };
            const fields = splitFields(record);

            const account: Account = {
                id: parseInteger(fieldAt(fields, 0, 'id', location), 'id', location),
                phone: fieldAt(fields, 1, 'phone', location),
                balance: parseInteger(fieldAt(fields, 2, 'balance', location), 'balance', location)
            };

            this.store.accounts.push(account);
            this.store.reserveAccountId(account.id);
        });

        logger.persistence('Accounts imported from file', {
            path,
            accounts: records.length
        });
    }
}
