import pLimit from "p-limit";

type Limit = ReturnType<typeof pLimit>;

/**
 * Runs tasks one at a time per key; different keys run concurrently.
 * A key's limiter is dropped once its queue drains.
 */
export class KeyedQueue<K> {
  private readonly limits = new Map<K, Limit>();

  run<T>(key: K, task: () => Promise<T>): Promise<T> {
    let limit = this.limits.get(key);
    if (!limit) {
      limit = pLimit(1);
      this.limits.set(key, limit);
    }
    const current = limit;
    return current(task).finally(() => {
      if (current.activeCount === 0 && current.pendingCount === 0) {
        this.limits.delete(key);
      }
    });
  }

  get size(): number {
    return this.limits.size;
  }
}
