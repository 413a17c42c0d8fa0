import { describe, it, expect } from 'vitest';
import { KeyedMutex, Mutex } from '../src/utils/KeyedMutex';

const tick = () => new Promise<void>((resolve) => setTimeout(resolve, 5));

describe('Mutex', () => {
  it('should hand the lock to waiters in arrival order', async () => {
    const mutex = new Mutex();
    const order: string[] = [];

    const releaseFirst = await mutex.acquire();
    const second = mutex.acquire().then((release) => {
      order.push('second');
      release();
    });
    const third = mutex.acquire().then((release) => {
      order.push('third');
      release();
    });
    expect(mutex.waiting).toBe(2);

    releaseFirst();
    await Promise.all([second, third]);

    expect(order).toEqual(['second', 'third']);
    expect(mutex.isLocked()).toBe(false);
  });
});

describe('KeyedMutex', () => {
  it('should serialize tasks on the same key', async () => {
    const locks = new KeyedMutex();
    const events: string[] = [];

    await Promise.all([
      locks.runExclusive('lm', async () => {
        events.push('a:start');
        await tick();
        events.push('a:end');
      }),
      locks.runExclusive('lm', async () => {
        events.push('b:start');
        events.push('b:end');
      })
    ]);

    expect(events).toEqual(['a:start', 'a:end', 'b:start', 'b:end']);
  });

  it('should not block tasks on different keys', async () => {
    const locks = new KeyedMutex();
    let open: () => void = () => {};
    const gate = new Promise<void>((resolve) => {
      open = resolve;
    });

    await Promise.all([
      locks.runExclusive('x', () => gate),
      locks.runExclusive('y', () => open())
    ]);

    expect(locks.isLocked('x')).toBe(false);
  });

  it('should release the lock when a task throws', async () => {
    const locks = new KeyedMutex();

    await expect(
      locks.runExclusive('lm', () => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');

    expect(locks.isLocked('lm')).toBe(false);
    expect(await locks.runExclusive('lm', () => 42)).toBe(42);
  });
});
