// KeyedLock: FIFO mutual exclusion per key (one key per backend instance)

interface LockQueue {
  tail: Promise<void>;
  waiting: number;
}

export class KeyedLock {
  private queues = new Map<string, LockQueue>();

  /**
   * Acquire the lock for `key`. Resolves with a release function once every
   * earlier holder has released. Releasing twice is a no-op.
   */
  async acquire(key: string): Promise<() => void> {
    const queue = this.queues.get(key) ?? { tail: Promise.resolve(), waiting: 0 };
    const previous = queue.tail;

    let signal: () => void = () => {};
    const current = new Promise<void>((resolve) => {
      signal = resolve;
    });
    queue.tail = previous.then(() => current);
    queue.waiting += 1;
    this.queues.set(key, queue);

    await previous;

    let released = false;
    return () => {
      if (released) { return; }
      released = true;
      queue.waiting -= 1;
      if (queue.waiting === 0 && this.queues.get(key) === queue) {
        this.queues.delete(key);
      }
      signal();
    };
  }

  /** Holders plus waiters for `key`. */
  queueLength(key: string): number {
    return this.queues.get(key)?.waiting ?? 0;
  }
}
