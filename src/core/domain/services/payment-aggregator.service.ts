// src/core/domain/services/payment-aggregator.service.ts
import { setImmediate as yieldToEventLoop } from 'timers/promises';
import { Money } from '../entities/account.entity';
import { Payment } from '../entities/payment.entity';
import { LedgerStore } from './ledger.store';
import { Mutex } from '../../../shared/utils/mutex';
import { ValidationException } from '../../../shared/exceptions/validation.exception';
import { ERROR_CODES, ERROR_MESSAGES } from '../../../shared/constants/error-codes';
import { logger } from '../../../infrastructure/monitoring/logger.service';

export interface ChunkRange {
    start: number;
    end: number;
}

/**
 * Splits `length` items into contiguous chunks, one per worker.
 * Every worker but the last takes floor(length / workerCount) items,
 * the last one takes whatever remains. Zero workers means one chunk.
 */
export function partition(length: number, workerCount: number): ChunkRange[] {
    const chunkSize = workerCount === 0 ? length : Math.floor(length / workerCount);
    const workers = Math.max(1, workerCount);
    const ranges: ChunkRange[] = [];

    for (let index = 0; index < workers; index++) {
        const start = index * chunkSize;
        const end = index === workers - 1 ? length : start + chunkSize;
        ranges.push({ start, end });
    }

    return ranges;
}

export class PaymentAggregator {
    constructor(private readonly store: LedgerStore) {}

    /**
     * Sums every payment amount with `max(1, workerCount)` concurrent workers.
     * Resolves once all workers have added their subtotal.
     */
    async sumPayments(workerCount: number): Promise<Money> {
        if (!Number.isInteger(workerCount) || workerCount < 0) {
            throw new ValidationException(
                ERROR_MESSAGES[ERROR_CODES.INVALID_WORKER_COUNT],
                [{ field: 'workerCount', message: 'must be a non-negative integer', value: workerCount }],
                ERROR_CODES.INVALID_WORKER_COUNT
            );
        }

        const startedAt = Date.now();
        const payments = [...this.store.payments];
        const ranges = partition(payments.length, workerCount);
        const mutex = new Mutex();
        let total = 0;

        const workers = ranges.map(async (range) => {
            const subtotal = await this.sumChunk(payments, range);
            await mutex.runExclusive(() => {
                total += subtotal;
            });
        });

        await Promise.all(workers);

        logger.performance('Payments summed', Date.now() - startedAt, {
            workers: ranges.length,
            payments: payments.length,
            total
        });

        return total;
    }

    private async sumChunk(payments: readonly Payment[], range: ChunkRange): Promise<Money> {
        await yieldToEventLoop();

        let subtotal = 0;
        for (const payment of payments.slice(range.start, range.end)) {
            subtotal += payment.amount;
        }
        return subtotal;
    }
}
