// src/main.ts
import { config as loadEnv } from 'dotenv';
import path from 'path';

// Load environment variables
const envFile = process.env.NODE_ENV === 'production'
    ? '.env.production'
    : process.env.NODE_ENV === 'test'
        ? '.env.test'
        : '.env.development';

loadEnv({ path: path.join(__dirname, '..', envFile) });
loadEnv(); // Fallback to the default .env

import { ConfigService } from './config/environment';
import { LedgerService } from './core/domain/services/ledger.service';
import { BaseException } from './shared/exceptions/base.exception';
import { logger } from './infrastructure/monitoring/logger.service';

/**
 * Loads the dump directory, registers the phones given as arguments,
 * then writes both snapshot formats back.
 */
async function main(phones: string[]): Promise<void> {
    const config = ConfigService.getInstance();
    const dumpDir = config.get('LEDGER_DUMP_DIR');
    const exportFile = config.get('LEDGER_EXPORT_FILE');

    const ledger = new LedgerService();
    await ledger.import(dumpDir);

    for (const phone of phones) {
        ledger.registerAccount(phone);
    }

    await ledger.exportToFile(exportFile);
    await ledger.export(dumpDir);

    const total = await ledger.sumPayments(config.get('LEDGER_SUM_WORKERS'));

    logger.info('Ledger snapshot written', {
        accounts: ledger.listAccounts().length,
        payments: ledger.listPayments().length,
        favorites: ledger.listFavorites().length,
        paymentsTotal: total,
        exportFile,
        dumpDir
    });
}

main(process.argv.slice(2)).catch((error: unknown) => {
    if (error instanceof BaseException) {
        logger.error('Ledger run failed', error, { code: error.code, details: error.details });
    } else {
        logger.fatal('Unexpected failure', error instanceof Error ? error : new Error(String(error)));
    }
    process.exitCode = 1;
});
