import { AsyncMutex, KeyedMutex } from '../../src/storage/keyed-mutex';
import { deferred } from '../helpers/fakes';

describe('AsyncMutex', () => {
  it('serves waiters in FIFO order', async () => {
    const mutex = new AsyncMutex();
    const order: string[] = [];
    const gate = deferred();

    const first = mutex.withLock(async () => {
      order.push('first:start');
      await gate.promise;
      order.push('first:end');
    });
    const second = mutex.withLock(() => {
      order.push('second');
    });
    const third = mutex.withLock(() => {
      order.push('third');
    });

    await new Promise((resolve) => setImmediate(resolve));
    expect(order).toEqual(['first:start']);

    gate.resolve();
    await Promise.all([first, second, third]);

    expect(order).toEqual(['first:start', 'first:end', 'second', 'third']);
  });

  it('releases the lock when the function throws', async () => {
    const mutex = new AsyncMutex();
    await expect(mutex.withLock(() => {
      throw new Error('boom');
    })).rejects.toThrow('boom');

    expect(await mutex.withLock(() => 42)).toBe(42);
  });

  it('a release function only releases once', async () => {
    const mutex = new AsyncMutex();
    const release = await mutex.acquire();
    const second = mutex.acquire();
    let thirdAcquired = false;
    const third = mutex.acquire().then((releaseThird) => {
      thirdAcquired = true;
      return releaseThird;
    });

    release();
    release();
    const releaseSecond = await second;
    await new Promise((resolve) => setImmediate(resolve));
    expect(thirdAcquired).toBe(false);

    releaseSecond();
    const releaseThird = await third;
    expect(thirdAcquired).toBe(true);
    releaseThird();
  });
});

describe('KeyedMutex', () => {
  it('different keys do not block each other', async () => {
    const locks = new KeyedMutex<string>();
    const gate = deferred();
    const order: string[] = [];
    const held = locks.withLock('staging', async () => {
      await gate.promise;
      order.push('staging:first');
    });
    const queued = locks.withLock('staging', () => {
      order.push('staging:second');
    });

    expect(await locks.withLock('production', () => 'ran')).toBe('ran');
    expect(order).toEqual([]);

    gate.resolve();
    await Promise.all([held, queued]);
    expect(order).toEqual(['staging:first', 'staging:second']);
  });
});
