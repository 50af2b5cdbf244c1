// src/shared/utils/mutex.ts

/**
 * Promise-based mutual exclusion. Callers queue in FIFO order;
 * the critical section may be sync or async.
 */
export class Mutex {
    private tail: Promise<void> = Promise.resolve();

    async runExclusive<T>(critical: () => T | Promise<T>): Promise<T> {
        let release: () => void = () => undefined;
        const acquired = new Promise<void>(resolve => {
            release = resolve;
        });

        const previous = this.tail;
        this.tail = previous.then(() => acquired);

        await previous;
        try {
            return await critical();
        } finally {
            release();
        }
    }
}
