import { describe, it, expect } from '@jest/globals';
import { SessionLock } from '../../../../src/sftp/session/SessionLock.js';

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve = (): void => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('SessionLock', () => {
  it('should run tasks one at a time in FIFO order', async () => {
    const lock = new SessionLock();
    const events: string[] = [];
    const gate = deferred();

    const first = lock.runExclusive(async () => {
      events.push('first:start');
      await gate.promise;
      events.push('first:end');
      return 1;
    });
    const second = lock.runExclusive(async () => {
      events.push('second');
      return 2;
    });

    await Promise.resolve();
    expect(events).toEqual(['first:start']);

    gate.resolve();
    await expect(Promise.all([first, second])).resolves.toEqual([1, 2]);
    expect(events).toEqual(['first:start', 'first:end', 'second']);
  });

  it('should release the lock when a task rejects', async () => {
    const lock = new SessionLock();

    await expect(lock.runExclusive(async () => Promise.reject(new Error('connect failed')))).rejects.toThrow(
      'connect failed'
    );
    await expect(lock.runExclusive(async () => 'next')).resolves.toBe('next');
  });
});
