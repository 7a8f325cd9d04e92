import { KeyedMutex } from '../../../../src/domain/services/KeyedMutex';

function deferred(): { promise: Promise<void>; resolve: () => void } {
    let resolve: () => void = () => undefined;
    const promise = new Promise<void>((r) => {
        resolve = r;
    });
    return { promise, resolve };
}

describe('KeyedMutex', () => {
    it('runs callers on the same key one at a time, in order', async () => {
        const mutex = new KeyedMutex();
        const events: string[] = [];
        const gate = deferred();

        const first = mutex.runExclusive('shot-0', async () => {
            events.push('first:start');
            await gate.promise;
            events.push('first:end');
        });
        const second = mutex.runExclusive('shot-0', async () => {
            events.push('second');
        });

        await new Promise((resolve) => setImmediate(resolve));
        expect(events).toEqual(['first:start']);
        expect(mutex.isLocked('shot-0')).toBe(true);

        gate.resolve();
        await Promise.all([first, second]);
        expect(events).toEqual(['first:start', 'first:end', 'second']);
        expect(mutex.isLocked('shot-0')).toBe(false);
    });

    it('does not block different keys', async () => {
        const mutex = new KeyedMutex();
        const gate = deferred();

        const held = mutex.runExclusive('a', () => gate.promise);
        await expect(mutex.runExclusive('b', async () => 'done')).resolves.toBe('done');

        gate.resolve();
        await held;
    });

    it('releases the key when the callback throws', async () => {
        const mutex = new KeyedMutex();

        await expect(mutex.runExclusive('k', async () => {
            throw new Error('boom');
        })).rejects.toThrow('boom');
        await expect(mutex.runExclusive('k', async () => 42)).resolves.toBe(42);
        expect(mutex.isLocked('k')).toBe(false);
    });
});
