/**
 * Mutual exclusion per key. Work on different keys runs concurrently; work on
 * the same key runs one at a time in submission order.
 */
export class KeyedMutex<K> {
  private readonly queues = new Map<K, Promise<void>>();

  /** Number of keys with queued or running work */
  get activeKeys(): number {
    return this.queues.size;
  }

  isLocked(key: K): boolean {
    return this.queues.has(key);
  }

  runExclusive<T>(key: K, op: () => Promise<T> | T): Promise<T> {
    const previous = this.queues.get(key) ?? Promise.resolve();
    const result = previous.then(op, op);
    const tail: Promise<void> = result.then(
      () => undefined,
      () => undefined
    );
    const wrapped = tail.finally(() => {
      if (this.queues.get(key) === wrapped) {
        this.queues.delete(key);
      }
    });
    this.queues.set(key, wrapped);
    return result;
  }
}
