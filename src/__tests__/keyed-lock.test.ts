import { describe, it, expect } from 'vitest';
import { KeyedLock } from '../alerts/keyed-lock.js';

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe('KeyedLock', () => {
  it('runs tasks for one key in submission order', async () => {
    const lock = new KeyedLock();
    const order: string[] = [];

    await Promise.all([
      lock.run('a', async () => {
        await delay(20);
        order.push('first');
      }),
      lock.run('a', async () => {
        order.push('second');
      }),
    ]);

    expect(order).toEqual(['first', 'second']);
  });

  it('does not make different keys wait on each other', async () => {
    const lock = new KeyedLock();
    const order: string[] = [];

    await Promise.all([
      lock.run('a', async () => {
        await delay(20);
        order.push('a');
      }),
      lock.run('b', async () => {
        order.push('b');
      }),
    ]);

    expect(order).toEqual(['b', 'a']);
  });

  it('keeps the key usable after a task fails', async () => {
    const lock = new KeyedLock();

    const failed = lock.run('a', async () => {
      throw new Error('boom');
    });
    const next = lock.run('a', async () => 'ok');

    await expect(failed).rejects.toThrow('boom');
    await expect(next).resolves.toBe('ok');
  });
});
