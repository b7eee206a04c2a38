/**
 * Expiring key-value map. A stale entry is dropped when it is read, and every
 * write sweeps out the entries that have expired since.
 */
export class TtlCache<V> {
  private readonly entries = new Map<string, { value: V; storedAt: number }>();

  constructor(
    private readonly ttlMs: number,
    private readonly now: () => number = Date.now
  ) {}

  get(key: string): V | undefined {
    const entry = this.entries.get(key);
    if (!entry) {
      return undefined;
    }
    if (this.isExpired(entry.storedAt, this.now())) {
      this.entries.delete(key);
      return undefined;
    }
    return entry.value;
  }

  set(key: string, value: V): void {
    const now = this.now();
    this.prune(now);
    this.entries.set(key, { value, storedAt: now });
  }

  get size(): number {
    return this.entries.size;
  }

  private prune(now: number): void {
    for (const [key, entry] of this.entries) {
      if (this.isExpired(entry.storedAt, now)) {
        this.entries.delete(key);
      }
    }
  }

  private isExpired(storedAt: number, now: number): boolean {
    return now - storedAt >= this.ttlMs;
  }
}
