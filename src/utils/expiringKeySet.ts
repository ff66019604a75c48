/**
 * Set of string keys that forget entries older than a fixed horizon.
 *
 * Each key carries the time it refers to (for trades: the trade timestamp,
 * not the time it was observed). `prune(now)` drops every key whose time is
 * before `now - horizonMs`.
 */
export class ExpiringKeySet {
  private entries = new Map<string, number>();

  constructor(private readonly horizonMs: number) {
    if (!(horizonMs > 0)) {
      throw new Error(`horizonMs must be positive, got ${horizonMs}`);
    }
  }

  get size(): number {
    return this.entries.size;
  }

  get horizon(): number {
    return this.horizonMs;
  }

  has(key: string): boolean {
    return this.entries.has(key);
  }

  /**
   * Returns false if the key was already present (its time is left untouched)
   */
  add(key: string, atMs: number): boolean {
    if (this.entries.has(key)) return false;
    this.entries.set(key, atMs);
    return true;
  }

  /**
   * True when a key stamped `atMs` would already be expired at `nowMs`
   */
  isExpired(atMs: number, nowMs: number): boolean {
    return atMs < nowMs - this.horizonMs;
  }

  prune(nowMs: number): number {
    let removed = 0;
    for (const [key, atMs] of this.entries) {
      if (this.isExpired(atMs, nowMs)) {
        this.entries.delete(key);
        removed++;
      }
    }
    return removed;
  }

  clear(): void {
    this.entries.clear();
  }
}
