import { Clock, systemClock } from './clock';

interface CacheEntry<V> {
  value: V;
  storedAt: number;
}

/**
 * Size-capped cache with per-entry expiry.
 * Expired entries are dropped when touched; when full, the oldest insertion goes first.
 * Values are stored as deep-frozen copies, so every hit returns the same immutable object.
 */
export class TtlCache<V> {
  private readonly entries = new Map<string, CacheEntry<V>>();

  constructor(
    private readonly ttlMs: number,
    private readonly maxEntries: number,
    private readonly clock: Clock = systemClock
  ) {}

  get(key: string): V | undefined {
    const entry = this.entries.get(key);
    if (!entry) {
      return undefined;
    }

    if (this.isExpired(entry)) {
      this.entries.delete(key);
      return undefined;
    }

    return entry.value;
  }

  /**
   * Store a frozen copy of the value and return that copy
   */
  set<T extends V>(key: string, value: T): T {
    // Re-inserting moves the key to the newest position
    this.entries.delete(key);
    this.purgeExpired();

    while (this.entries.size >= this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) {
        break;
      }
      this.entries.delete(oldest.value);
    }

    const stored = deepFreeze(structuredClone(value));
    this.entries.set(key, { value: stored, storedAt: this.clock().getTime() });
    return stored;
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    this.purgeExpired();
    return this.entries.size;
  }

  private isExpired(entry: CacheEntry<V>): boolean {
    return this.clock().getTime() - entry.storedAt >= this.ttlMs;
  }

  private purgeExpired(): void {
    for (const [key, entry] of this.entries) {
      if (this.isExpired(entry)) {
        this.entries.delete(key);
      }
    }
  }
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    const children: unknown[] = Object.values(value);
    for (const child of children) {
      deepFreeze(child);
    }
  }
  return value;
}
