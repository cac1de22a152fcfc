import { describe, expect, it } from 'vitest';

import { AsyncLock } from './AsyncLock';

function deferred<T>() {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((res) => {
    resolve = res;
  });
  return { promise, resolve };
}

describe('AsyncLock', () => {
  it('runs work one at a time in call order', async () => {
    const lock = new AsyncLock();
    const gate = deferred<void>();
    const events: string[] = [];

    const first = lock.inLock(async () => {
      events.push('first-start');
      await gate.promise;
      events.push('first-end');
    });
    const second = lock.inLock(() => {
      events.push('second');
    });

    await new Promise((resolve) => setTimeout(resolve, 0));
    expect(events).toEqual(['first-start']);
    expect(lock.isLocked).toBe(true);

    gate.resolve();
    await Promise.all([first, second]);
    expect(events).toEqual(['first-start', 'first-end', 'second']);
    expect(lock.isLocked).toBe(false);
  });

  it('releases the lock when the work throws', async () => {
    const lock = new AsyncLock();

    await expect(
      lock.inLock(() => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');
    await expect(lock.inLock(() => 'next')).resolves.toBe('next');
    expect(lock.isLocked).toBe(false);
  });
});
