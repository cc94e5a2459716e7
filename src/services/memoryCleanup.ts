// src/services/memoryCleanup.ts

/**
 * TTL-based cleanup for in-memory Maps keyed by client input.
 * Entries idle longer than `ttlMs` are swept on an interval, and the
 * least recently seen entries give way once `maxEntries` is reached.
 */

export interface CleanupOptions {
  ttlMs: number;           // Idle time-to-live in milliseconds
  intervalMs?: number;     // Sweep interval (default: ttlMs / 2)
  maxEntries?: number;     // Hard cap, enforced on every insert
  onCleanup?: (removed: number) => void;
  clock?: () => number;
}

export interface CleanableEntry {
  lastSeenAt: number;
}

export class CleanableMap<K, V extends CleanableEntry> {
  private readonly map = new Map<K, V>();
  private readonly ttlMs: number;
  private readonly maxEntries: number;
  private readonly onCleanup?: (removed: number) => void;
  private readonly clock: () => number;

  constructor(options: CleanupOptions) {
    const { ttlMs, intervalMs = ttlMs / 2, maxEntries = 10000, onCleanup, clock = Date.now } = options;
    this.ttlMs = ttlMs;
    this.maxEntries = maxEntries;
    this.onCleanup = onCleanup;
    this.clock = clock;

    // Never keep the process alive just for cleanup
    setInterval(() => this.cleanup(), intervalMs).unref();
  }

  get size(): number {
    return this.map.size;
  }

  now(): number {
    return this.clock();
  }

  /** Returns the entry and marks it as seen. */
  touch(key: K): V | undefined {
    const entry = this.map.get(key);
    if (entry) entry.lastSeenAt = this.clock();
    return entry;
  }

  set(key: K, value: V): void {
    this.map.set(key, value);
    if (this.map.size > this.maxEntries) {
      this.report(this.evictOldest(this.map.size - this.maxEntries));
    }
  }

  cleanup(): number {
    const now = this.clock();
    let removed = 0;

    for (const [key, value] of this.map.entries()) {
      if (now - value.lastSeenAt > this.ttlMs) {
        this.map.delete(key);
        removed++;
      }
    }

    if (this.map.size > this.maxEntries) {
      removed += this.evictOldest(this.map.size - this.maxEntries);
    }

    this.report(removed);
    return removed;
  }

  private evictOldest(count: number): number {
    const oldest = [...this.map.entries()]
      .sort((a, b) => a[1].lastSeenAt - b[1].lastSeenAt)
      .slice(0, count);
    for (const [key] of oldest) this.map.delete(key);
    return oldest.length;
  }

  private report(removed: number): void {
    if (removed > 0 && this.onCleanup) {
      this.onCleanup(removed);
    }
  }
}
