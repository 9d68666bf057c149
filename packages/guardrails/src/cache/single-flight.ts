/**
 * FILE PURPOSE: Per-key in-process execution lock
 *
 * Concurrent callers with the same key share one in-flight promise. The entry
 * is removed once it settles, so a later call runs fresh (and normally hits
 * the decision cache written by the first run).
 */

export class SingleFlight<T> {
  private readonly inFlight = new Map<string, Promise<T>>();

  run(key: string, fn: () => Promise<T>): Promise<T> {
    const existing = this.inFlight.get(key);
    if (existing) return existing;

    const promise = fn().finally(() => {
      this.inFlight.delete(key);
    });
    this.inFlight.set(key, promise);
    return promise;
  }

  get pending(): number {
    return this.inFlight.size;
  }
}
