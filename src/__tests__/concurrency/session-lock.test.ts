import { describe, it, expect } from 'vitest';
import { SessionLock, SessionLocks } from '../../concurrency/session-lock.js';
import { ConcurrentMutationError } from '../../concurrency/errors.js';

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>(done => {
    resolve = done;
  });
  return { promise, resolve };
}

describe('SessionLock', () => {
  it('rejects a second writer instead of queueing it', async () => {
    const lock = new SessionLock('feature-x');
    const release = deferred();

    const first = lock.write(async () => {
      await release.promise;
      return 'first';
    });
    expect(lock.isWriting()).toBe(true);
    await expect(lock.write(async () => 'second')).rejects.toBeInstanceOf(ConcurrentMutationError);

    release.resolve();
    expect(await first).toBe('first');
    expect(lock.isWriting()).toBe(false);
    expect(await lock.write(async () => 'third')).toBe('third');
  });

  it('releases the lock when the mutation throws', async () => {
    const lock = new SessionLock('feature-x');
    await expect(lock.write(async () => {
      throw new Error('boom');
    })).rejects.toThrow('boom');
    expect(lock.isWriting()).toBe(false);
  });

  it('holds readers back while a writer runs', async () => {
    const lock = new SessionLock('feature-x');
    const release = deferred();
    const order: string[] = [];

    const write = lock.write(async () => {
      await release.promise;
      order.push('write');
    });
    const read = lock.read(async () => {
      order.push('read');
    });

    release.resolve();
    await Promise.all([write, read]);
    expect(order).toEqual(['write', 'read']);
  });

  it('lets a writer wait for in-flight readers', async () => {
    const lock = new SessionLock('feature-x');
    const release = deferred();
    const order: string[] = [];

    const read = lock.read(async () => {
      await release.promise;
      order.push('read');
    });
    const write = lock.write(async () => {
      order.push('write');
    });
    expect(lock.isWriting()).toBe(true);

    release.resolve();
    await Promise.all([read, write]);
    expect(order).toEqual(['read', 'write']);
    expect(lock.isWriting()).toBe(false);
  });

  it('lets a mutation wait behind maintenance instead of failing', async () => {
    const lock = new SessionLock('feature-x');
    const release = deferred();
    const order: string[] = [];

    const maintenance = lock.maintain(async () => {
      await release.promise;
      order.push('maintain');
    });
    const mutation = lock.write(async () => {
      order.push('write');
      return 'written';
    });

    release.resolve();
    await maintenance;
    expect(await mutation).toBe('written');
    expect(order).toEqual(['maintain', 'write']);
  });

  it('queues maintenance behind a running mutation', async () => {
    const lock = new SessionLock('feature-x');
    const release = deferred();
    const order: string[] = [];

    const mutation = lock.write(async () => {
      await release.promise;
      order.push('write');
    });
    const maintenance = lock.maintain(async () => {
      order.push('maintain');
    });

    release.resolve();
    await Promise.all([mutation, maintenance]);
    expect(order).toEqual(['write', 'maintain']);
  });
});

describe('SessionLocks', () => {
  it('keeps one lock per change', () => {
    const locks = new SessionLocks();
    expect(locks.for('a')).toBe(locks.for('a'));
    expect(locks.for('a')).not.toBe(locks.for('b'));
  });
});
