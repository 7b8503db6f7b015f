type Entry<T> = { value: T; expiresAt: number };

export type LoadedValue<T> = { value: T; ttlMs: number };

/**
 * Keyed values that lapse after a per-entry TTL. Concurrent loads of the
 * same key share one in-flight promise.
 */
export class ExpiringValueCache<T> {
  private readonly entries = new Map<string, Entry<T>>();
  private readonly pending = new Map<string, Promise<T>>();

  constructor(private readonly now: () => number = Date.now) {}

  get(key: string): T | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    if (this.now() >= entry.expiresAt) {
      this.entries.delete(key);
      return undefined;
    }
    return entry.value;
  }

  set(key: string, value: T, ttlMs: number): void {
    this.entries.set(key, { value, expiresAt: this.now() + ttlMs });
  }

  delete(key: string): void {
    this.entries.delete(key);
  }

  getOrLoad(key: string, load: () => Promise<LoadedValue<T>>): Promise<T> {
    const cached = this.get(key);
    if (cached !== undefined) return Promise.resolve(cached);

    const inFlight = this.pending.get(key);
    if (inFlight) return inFlight;

    const promise = load()
      .then(({ value, ttlMs }) => {
        this.set(key, value, ttlMs);
        return value;
      })
      .finally(() => {
        this.pending.delete(key);
      });
    this.pending.set(key, promise);
    return promise;
  }
}
