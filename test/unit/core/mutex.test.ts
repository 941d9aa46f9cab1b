import { describe, it, expect } from 'vitest';
import { AsyncMutex, KeyedMutex } from '../../../src/core/mutex.js';

describe('AsyncMutex', () => {
  it('should acquire and release lock', async () => {
    const mutex = new AsyncMutex();
    expect(mutex.isLocked).toBe(false);

    const release = await mutex.acquire();
    expect(mutex.isLocked).toBe(true);

    release();
    expect(mutex.isLocked).toBe(false);
  });

  it('should queue concurrent acquire calls in order', async () => {
    const mutex = new AsyncMutex();
    const order: number[] = [];

    const p1 = mutex.acquire().then(release => {
      order.push(1);
      setTimeout(release, 10);
    });
    const p2 = mutex.acquire().then(release => {
      order.push(2);
      release();
    });
    const p3 = mutex.acquire().then(release => {
      order.push(3);
      release();
    });

    await Promise.all([p1, p2, p3]);
    expect(order).toEqual([1, 2, 3]);
    expect(mutex.isLocked).toBe(false);
  });

  it('should release lock even on error in withLock', async () => {
    const mutex = new AsyncMutex();
    await expect(mutex.withLock(() => { throw new Error('fail'); })).rejects.toThrow('fail');
    expect(mutex.isLocked).toBe(false);
  });

  it('should ignore a second release call', async () => {
    const mutex = new AsyncMutex();
    const release = await mutex.acquire();
    const waiter = mutex.acquire();
    await new Promise(r => setTimeout(r, 0));
    expect(mutex.queueLength).toBe(1);

    release();
    release();
    const second = await waiter;
    expect(mutex.isLocked).toBe(true);
    second();
    expect(mutex.isLocked).toBe(false);
  });
});

describe('KeyedMutex', () => {
  it('should serialize work on the same key', async () => {
    const mutex = new KeyedMutex<string>();
    const order: string[] = [];

    const slow = mutex.withLock('photo', async () => {
      order.push('a:start');
      await new Promise(r => setTimeout(r, 10));
      order.push('a:end');
    });
    const fast = mutex.withLock('photo', () => {
      order.push('b');
    });

    await Promise.all([slow, fast]);
    expect(order).toEqual(['a:start', 'a:end', 'b']);
  });

  it('should let different keys run concurrently', async () => {
    const mutex = new KeyedMutex<string>();
    const order: string[] = [];

    const slow = mutex.withLock('photo', async () => {
      await new Promise(r => setTimeout(r, 10));
      order.push('photo');
    });
    const fast = mutex.withLock('sms', () => {
      order.push('sms');
    });

    await Promise.all([slow, fast]);
    expect(order).toEqual(['sms', 'photo']);
  });

  it('should drop idle keys', async () => {
    const mutex = new KeyedMutex<string>();
    const result = await mutex.withLock('clipboard', () => 7);

    expect(result).toBe(7);
    expect(mutex.size).toBe(0);
    expect(mutex.isLocked('clipboard')).toBe(false);
  });

  it('should report a key as locked while held', async () => {
    const mutex = new KeyedMutex<string>();
    let seen = false;
    await mutex.withLock('photo', () => {
      seen = mutex.isLocked('photo');
    });
    expect(seen).toBe(true);
  });
});
