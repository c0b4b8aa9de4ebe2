import { Mutex } from '../../src/infrastructure/sync/Mutex.js';

describe('Mutex', () => {
    it('grants the lock in arrival order, one holder at a time', async () => {
        const mutex = new Mutex();
        const events: string[] = [];

        const task = (label: string) => mutex.runExclusive(async () => {
            events.push(`${label}:start`);
            await new Promise(resolve => setTimeout(resolve, 5));
            events.push(`${label}:end`);
        });

        await Promise.all([task('a'), task('b'), task('c')]);

        expect(events).toEqual(['a:start', 'a:end', 'b:start', 'b:end', 'c:start', 'c:end']);
    });

    it('releases the lock when the critical section throws', async () => {
        const mutex = new Mutex();

        await expect(mutex.runExclusive(() => {
            throw new Error('boom');
        })).rejects.toThrow('boom');

        await expect(mutex.runExclusive(() => 'after')).resolves.toBe('after');
    });

    it('keeps waiters out while the current holder has the lock', async () => {
        const mutex = new Mutex();
        const first = await mutex.acquire();
        const second = mutex.acquire();

        first();
        first();
        const releaseSecond = await second;

        let thirdAcquired = false;
        const third = mutex.acquire().then(release => {
            thirdAcquired = true;
            return release;
        });
        await new Promise(resolve => setTimeout(resolve, 0));
        expect(thirdAcquired).toBe(false);

        releaseSecond();
        (await third)();
        expect(thirdAcquired).toBe(true);
    });

    it('returns the value of the critical section', async () => {
        const mutex = new Mutex();

        await expect(mutex.runExclusive(async () => 42)).resolves.toBe(42);
    });
});
