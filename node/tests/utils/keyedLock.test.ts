import { describe, expect, it } from 'vitest';
import { KeyedLock } from '@/utils/keyedLock';

const tick = () => new Promise((resolve) => setTimeout(resolve, 5));

describe('KeyedLock', () => {
  it('runs work for one key one at a time, in order', async () => {
    const lock = new KeyedLock();
    const order: string[] = [];
    let active = 0;
    let peak = 0;

    const job = (name: string) =>
      lock.run('host', async () => {
        active++;
        peak = Math.max(peak, active);
        order.push(`start:${name}`);
        await tick();
        order.push(`end:${name}`);
        active--;
      });

    await Promise.all([job('a'), job('b')]);
    expect(peak).toBe(1);
    expect(order).toEqual(['start:a', 'end:a', 'start:b', 'end:b']);
  });

  it('lets different keys run concurrently and forgets idle keys', async () => {
    const lock = new KeyedLock();
    let active = 0;
    let peak = 0;
    const job = (key: string) =>
      lock.run(key, async () => {
        active++;
        peak = Math.max(peak, active);
        await tick();
        active--;
      });

    await Promise.all([job('a'), job('b')]);
    expect(peak).toBe(2);
    expect(lock.size).toBe(0);
  });

  it('propagates failures without blocking the next caller', async () => {
    const lock = new KeyedLock();
    await expect(lock.run('k', async () => Promise.reject(new Error('boom')))).rejects.toThrow('boom');
    await expect(lock.run('k', async () => 'next')).resolves.toBe('next');
  });
});
