import { describe, it, expect } from '@jest/globals';
import { ReadWriteLock } from '../../../services/locking/ReadWriteLock';

const flush = () => new Promise<void>(resolve => setImmediate(resolve));

describe('ReadWriteLock', () => {
  it('should let several readers hold the lock at once', async () => {
    const lock = new ReadWriteLock();

    const first = await lock.acquireRead();
    const second = await lock.acquireRead();

    expect(lock.readers).toBe(2);
    expect(lock.isWriteLocked).toBe(false);

    first();
    second();
    expect(lock.readers).toBe(0);
  });

  it('should make a writer wait for active readers', async () => {
    const lock = new ReadWriteLock();
    const release = await lock.acquireRead();

    let writerAcquired = false;
    const writer = lock.acquireWrite().then(releaseWrite => {
      writerAcquired = true;
      return releaseWrite;
    });

    await flush();
    expect(writerAcquired).toBe(false);
    expect(lock.pending).toBe(1);

    release();
    const releaseWrite = await writer;
    expect(writerAcquired).toBe(true);
    expect(lock.isWriteLocked).toBe(true);
    releaseWrite();
    expect(lock.isWriteLocked).toBe(false);
  });

  it('should hold back readers that arrive after a queued writer', async () => {
    const lock = new ReadWriteLock();
    const order: string[] = [];

    const releaseFirstReader = await lock.acquireRead();
    const writer = lock.withWrite(async () => {
      order.push('writer');
    });
    const lateReader = lock.withRead(async () => {
      order.push('late reader');
    });

    await flush();
    expect(order).toEqual([]);

    releaseFirstReader();
    await Promise.all([writer, lateReader]);

    expect(order).toEqual(['writer', 'late reader']);
  });

  it('should serve writers one at a time in arrival order', async () => {
    const lock = new ReadWriteLock();
    const order: number[] = [];

    await Promise.all(
      [1, 2, 3].map(n =>
        lock.withWrite(async () => {
          order.push(n);
          await flush();
          order.push(-n);
        })
      )
    );

    expect(order).toEqual([1, -1, 2, -2, 3, -3]);
  });

  it('should release the lock when the callback throws', async () => {
    const lock = new ReadWriteLock();

    await expect(
      lock.withWrite(async () => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');

    expect(lock.isWriteLocked).toBe(false);
    await expect(lock.withRead(() => 'still usable')).resolves.toBe('still usable');
  });

  it('should ignore a second call to the same release function', async () => {
    const lock = new ReadWriteLock();
    const first = await lock.acquireRead();
    const second = await lock.acquireRead();

    first();
    first();

    expect(lock.readers).toBe(1);
    second();
    expect(lock.readers).toBe(0);
  });
});
