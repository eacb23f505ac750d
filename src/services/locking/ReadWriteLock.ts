export type LockMode = 'read' | 'write';

export type ReleaseLock = () => void;

interface Waiter {
  mode: LockMode;
  resolve: (release: ReleaseLock) => void;
}

/**
 * Async reader-writer lock. Requests are served in arrival order: a queued
 * writer holds back readers that arrive after it, so a stream of scorers
 * cannot starve a learner and vice versa.
 */
export class ReadWriteLock {
  private activeReaders = 0;
  private writerActive = false;
  private queue: Waiter[] = [];

  acquire(mode: LockMode): Promise<ReleaseLock> {
    return new Promise(resolve => {
      this.queue.push({ mode, resolve });
      this.drain();
    });
  }

  acquireRead(): Promise<ReleaseLock> {
    return this.acquire('read');
  }

  acquireWrite(): Promise<ReleaseLock> {
    return this.acquire('write');
  }

  async withRead<T>(fn: () => Promise<T> | T): Promise<T> {
    const release = await this.acquireRead();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  async withWrite<T>(fn: () => Promise<T> | T): Promise<T> {
    const release = await this.acquireWrite();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  get readers(): number {
    return this.activeReaders;
  }

  get isWriteLocked(): boolean {
    return this.writerActive;
  }

  get pending(): number {
    return this.queue.length;
  }

  private drain(): void {
    while (this.queue.length > 0) {
      const next = this.queue[0];

      if (next.mode === 'write') {
        if (this.writerActive || this.activeReaders > 0) return;
        this.queue.shift();
        this.writerActive = true;
        next.resolve(this.releaser('write'));
        return;
      }

      if (this.writerActive) return;
      this.queue.shift();
      this.activeReaders++;
      next.resolve(this.releaser('read'));
    }
  }

  private releaser(mode: LockMode): ReleaseLock {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      if (mode === 'write') {
        this.writerActive = false;
      } else {
        this.activeReaders--;
      }
      this.drain();
    };
  }
}
