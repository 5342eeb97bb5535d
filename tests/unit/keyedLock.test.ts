import { KeyedLock } from '../../src/utils/keyedLock';

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((done) => {
    resolve = done;
  });
  return { promise, resolve };
}

describe('KeyedLock', () => {
  it('should run work for the same key one at a time in submission order', async () => {
    const lock = new KeyedLock();
    const events: string[] = [];
    const gate = deferred();

    const first = lock.run('s-1', async () => {
      events.push('first:start');
      await gate.promise;
      events.push('first:end');
    });
    const second = lock.run('s-1', async () => {
      events.push('second:start');
    });

    await new Promise((resolve) => setImmediate(resolve));
    expect(events).toEqual(['first:start']);

    gate.resolve();
    await Promise.all([first, second]);
    expect(events).toEqual(['first:start', 'first:end', 'second:start']);
  });

  it('should not block other keys', async () => {
    const lock = new KeyedLock();
    const gate = deferred();
    const events: string[] = [];

    const blocked = lock.run('s-1', async () => {
      await gate.promise;
      events.push('s-1');
    });
    await lock.run('s-2', async () => {
      events.push('s-2');
    });

    expect(events).toEqual(['s-2']);
    gate.resolve();
    await blocked;
    expect(events).toEqual(['s-2', 's-1']);
  });

  it('should release the key when work throws', async () => {
    const lock = new KeyedLock();

    await expect(
      lock.run('s-1', async () => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');

    await expect(lock.run('s-1', async () => 'next')).resolves.toBe('next');
    expect(lock.size).toBe(0);
  });
});
