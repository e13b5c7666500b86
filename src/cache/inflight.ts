/**
 * Single-flight helper: concurrent calls for the same key share one pending
 * promise. The key is forgotten as soon as that promise settles.
 */
export class Inflight<T> {
  private pending = new Map<string, Promise<T>>();

  run(key: string, fn: () => Promise<T>): Promise<T> {
    const existing = this.pending.get(key);
    if (existing) return existing;

    const promise = fn().finally(() => {
      this.pending.delete(key);
    });
    this.pending.set(key, promise);
    return promise;
  }

  get size(): number {
    return this.pending.size;
  }
}
