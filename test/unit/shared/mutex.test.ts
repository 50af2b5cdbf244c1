// test/unit/shared/mutex.test.ts
import { Mutex } from '@/shared/utils/mutex';

describe('Mutex', () => {
    it('should run critical sections one at a time in call order', async () => {
        const mutex = new Mutex();
        const events: string[] = [];

        const section = (name: string, delayMs: number) => mutex.runExclusive(async () => {
            events.push(`${name}:start`);
            await new Promise(resolve => setTimeout(resolve, delayMs));
            events.push(`${name}:end`);
            return name;
        });

        const results = await Promise.all([section('a', 20), section('b', 0), section('c', 5)]);

        expect(results).toEqual(['a', 'b', 'c']);
        expect(events).toEqual(['a:start', 'a:end', 'b:start', 'b:end', 'c:start', 'c:end']);
    });

    it('should release the lock when a section throws', async () => {
        const mutex = new Mutex();

        await expect(mutex.runExclusive(() => {
            throw new Error('boom');
        })).rejects.toThrow('boom');

        await expect(mutex.runExclusive(() => 'next')).resolves.toBe('next');
    });
});
