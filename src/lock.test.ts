import { KeyedMutex } from './lock';

const tick = () => new Promise<void>((resolve) => setImmediate(resolve));

describe('KeyedMutex', () => {
    it('runs tasks for the same key one at a time, in order', async () => {
        const mutex = new KeyedMutex();
        const events: string[] = [];
        const task = (name: string) => async () => {
            events.push(`${name}:start`);
            await tick();
            events.push(`${name}:end`);
            return name;
        };

        const results = await Promise.all([
            mutex.runExclusive('k', task('a')),
            mutex.runExclusive('k', task('b')),
            mutex.runExclusive('k', task('c')),
        ]);

        expect(results).toEqual(['a', 'b', 'c']);
        expect(events).toEqual(['a:start', 'a:end', 'b:start', 'b:end', 'c:start', 'c:end']);
        expect(mutex.size).toBe(0);
    });

    it('does not make different keys wait on each other', async () => {
        const mutex = new KeyedMutex();
        const events: string[] = [];
        let releaseA: () => void = () => undefined;
        const blockA = new Promise<void>((resolve) => {
            releaseA = resolve;
        });

        const a = mutex.runExclusive('a', async () => {
            await blockA;
            events.push('a');
        });
        await mutex.runExclusive('b', async () => {
            events.push('b');
        });
        releaseA();
        await a;

        expect(events).toEqual(['b', 'a']);
    });

    it('passes rejections through and keeps the queue moving', async () => {
        const mutex = new KeyedMutex();
        const failing = mutex.runExclusive('k', async () => {
            throw new Error('boom');
        });
        const next = mutex.runExclusive('k', async () => 'ok');

        await expect(failing).rejects.toThrow('boom');
        await expect(next).resolves.toBe('ok');
    });
});
