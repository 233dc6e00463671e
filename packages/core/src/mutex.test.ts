/**
 * @module mutex.test
 * Tests for the FIFO Mutex and the per-key KeyedMutex.
 */

import { describe, it, expect } from 'vitest';
import { KeyedMutex, Mutex } from './mutex.js';

const tick = (ms = 0) => new Promise((resolve) => setTimeout(resolve, ms));

describe('Mutex', () => {
  it('grants the lock in request order', async () => {
    const mutex = new Mutex();
    const order: string[] = [];

    await Promise.all(
      ['a', 'b', 'c'].map((name, i) =>
        mutex.runExclusive(async () => {
          order.push(`${name}:in`);
          await tick(5 - i);
          order.push(`${name}:out`);
        }),
      ),
    );

    expect(order).toEqual(['a:in', 'a:out', 'b:in', 'b:out', 'c:in', 'c:out']);
  });

  it('reports whether it is held', async () => {
    const mutex = new Mutex();
    expect(mutex.locked).toBe(false);
    const release = await mutex.acquire();
    expect(mutex.locked).toBe(true);
    release();
    expect(mutex.locked).toBe(false);
  });

  it('ignores a second release', async () => {
    const mutex = new Mutex();
    const first = await mutex.acquire();
    const waiting = mutex.acquire();
    first();
    first();
    const second = await waiting;
    expect(mutex.locked).toBe(true);
    second();
    expect(mutex.locked).toBe(false);
  });

  it('releases the lock when the task throws', async () => {
    const mutex = new Mutex();
    await expect(
      mutex.runExclusive(async () => {
        throw new Error('boom');
      }),
    ).rejects.toThrow('boom');
    expect(mutex.locked).toBe(false);
    await expect(mutex.runExclusive(async () => 'next')).resolves.toBe('next');
  });
});

describe('KeyedMutex', () => {
  it('serialises work on the same key', async () => {
    const locks = new KeyedMutex();
    let active = 0;
    let peak = 0;
    const task = async () => {
      active += 1;
      peak = Math.max(peak, active);
      await tick(2);
      active -= 1;
    };

    await Promise.all([locks.runExclusive('d1', task), locks.runExclusive('d1', task)]);
    expect(peak).toBe(1);
  });

  it('lets different keys run concurrently', async () => {
    const locks = new KeyedMutex();
    let active = 0;
    let peak = 0;
    const task = async () => {
      active += 1;
      peak = Math.max(peak, active);
      await tick(2);
      active -= 1;
    };

    await Promise.all([locks.runExclusive('d1', task), locks.runExclusive('d2', task)]);
    expect(peak).toBe(2);
  });

  it('evicts idle keys', async () => {
    const locks = new KeyedMutex();
    const release = await locks.acquire('d1');
    expect(locks.size).toBe(1);
    expect(locks.isLocked('d1')).toBe(true);
    release();
    expect(locks.size).toBe(0);
    expect(locks.isLocked('d1')).toBe(false);
  });

  it('keeps a key while a waiter is queued', async () => {
    const locks = new KeyedMutex();
    const first = await locks.acquire('d1');
    const waiting = locks.acquire('d1');
    first();
    expect(locks.size).toBe(1);
    const second = await waiting;
    second();
    expect(locks.size).toBe(0);
  });
});
