/**
 * Read/write lock
 * queue-based, FIFO: a waiting writer blocks readers that arrive after it
 */

type LockMode = 'shared' | 'exclusive';

interface QueuedWaiter {
  mode: LockMode;
  resolve: () => void;
}

export class ReadWriteLock {
  private readers = 0;
  private writer = false;
  private queue: QueuedWaiter[] = [];

  async acquireShared(): Promise<void> {
    if (!this.writer && this.queue.length === 0) {
      this.readers++;
      return;
    }
    return new Promise<void>(resolve => {
      this.queue.push({ mode: 'shared', resolve });
    });
  }

  async acquireExclusive(): Promise<void> {
    if (!this.writer && this.readers === 0 && this.queue.length === 0) {
      this.writer = true;
      return;
    }
    return new Promise<void>(resolve => {
      this.queue.push({ mode: 'exclusive', resolve });
    });
  }

  releaseShared(): void {
    if (this.readers === 0) {
      throw new Error('releaseShared called without a shared hold');
    }
    this.readers--;
    this.drain();
  }

  releaseExclusive(): void {
    if (!this.writer) {
      throw new Error('releaseExclusive called without an exclusive hold');
    }
    this.writer = false;
    this.drain();
  }

  private drain(): void {
    while (this.queue.length > 0) {
      const next = this.queue[0];
      if (next.mode === 'exclusive') {
        if (this.writer || this.readers > 0) {
          return;
        }
        this.queue.shift();
        this.writer = true;
        next.resolve();
        return;
      }
      if (this.writer) {
        return;
      }
      this.queue.shift();
      this.readers++;
      next.resolve();
    }
  }

  // for testing/observability
  getStats(): { readers: number; writer: boolean; queued: number } {
    return {
      readers: this.readers,
      writer: this.writer,
      queued: this.queue.length
    };
  }
}

export async function withShared<T>(lock: ReadWriteLock, fn: () => Promise<T>): Promise<T> {
  await lock.acquireShared();
  try {
    return await fn();
  } finally {
    lock.releaseShared();
  }
}

export async function withExclusive<T>(lock: ReadWriteLock, fn: () => Promise<T>): Promise<T> {
  await lock.acquireExclusive();
  try {
    return await fn();
  } finally {
    lock.releaseExclusive();
  }
}
