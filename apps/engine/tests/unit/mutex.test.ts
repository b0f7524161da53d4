import { Mutex } from '../../src/utils/mutex';
import { sleep } from '../helpers/poll';

describe('Mutex', () => {
    it('runs critical sections one at a time in call order', async () => {
        const mutex = new Mutex();
        const events: string[] = [];

        const section = (name: string, ms: number) =>
            mutex.runExclusive(async () => {
                events.push(`${name}:start`);
                await sleep(ms);
                events.push(`${name}:end`);
                return name;
            });

        const results = await Promise.all([section('a', 30), section('b', 1), section('c', 10)]);

        expect(results).toEqual(['a', 'b', 'c']);
        expect(events).toEqual(['a:start', 'a:end', 'b:start', 'b:end', 'c:start', 'c:end']);
    });

    it('releases the lock when a section throws', async () => {
        const mutex = new Mutex();
        await expect(mutex.runExclusive(() => {
            throw new Error('boom');
        })).rejects.toThrow('boom');

        await expect(mutex.runExclusive(() => 'next')).resolves.toBe('next');
        expect(mutex.isLocked).toBe(false);
    });

    it('reports whether a section is held or queued', async () => {
        const mutex = new Mutex();
        const held = mutex.runExclusive(() => sleep(10));
        expect(mutex.isLocked).toBe(true);
        await held;
        expect(mutex.isLocked).toBe(false);
    });
});
