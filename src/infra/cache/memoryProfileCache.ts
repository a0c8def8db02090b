import type { UserIdentity } from '../../domain/auth/user.js';
import { MAX_TIMER_MS } from '../../application/deadline.js';
import type { CacheLookup, ProfileCache } from '../../application/ports.js';

export interface CacheEntry {
  key: string;
  value: UserIdentity;
  insertedAt: number;
}

interface Slot {
  entry: CacheEntry;
  timer: NodeJS.Timeout;
}

/**
 * Degraded-mode tier: a process-local map whose entries each carry their
 * own expiry timer. Approximate TTL only; nothing survives a restart and
 * other processes never see these entries.
 *
 * `get` also checks the entry's age against the clock, so an entry is never
 * served past its TTL even if its timer has not fired yet.
 */
export class MemoryProfileCache implements ProfileCache {
  readonly mode = 'degraded' as const;
  private readonly slots = new Map<string, Slot>();

  constructor(
    private readonly ttlMs: number,
    private readonly clock: () => number = Date.now
  ) {
    if (!Number.isInteger(ttlMs) || ttlMs <= 0 || ttlMs > MAX_TIMER_MS) {
      throw new RangeError(`Profile cache TTL must be between 1 and ${MAX_TIMER_MS} ms, got ${ttlMs}`);
    }
  }

  get size(): number {
    return this.slots.size;
  }

  async get(key: string): Promise<CacheLookup> {
    const slot = this.slots.get(key);
    if (!slot) {
      return { found: false };
    }
    if (this.clock() - slot.entry.insertedAt >= this.ttlMs) {
      this.evict(key, slot);
      return { found: false };
    }
    return { found: true, value: slot.entry.value };
  }

  async put(key: string, value: UserIdentity): Promise<void> {
    const previous = this.slots.get(key);
    if (previous) {
      clearTimeout(previous.timer);
    }

    const entry: CacheEntry = { key, value, insertedAt: this.clock() };
    const timer = setTimeout(() => {
      // Only remove the entry this timer was armed for
      const current = this.slots.get(key);
      if (current?.entry === entry) {
        this.slots.delete(key);
      }
    }, this.ttlMs);
    timer.unref();

    this.slots.set(key, { entry, timer });
  }

  async invalidate(key: string): Promise<void> {
    const slot = this.slots.get(key);
    if (slot) {
      this.evict(key, slot);
    }
  }

  clear(): void {
    for (const slot of this.slots.values()) {
      clearTimeout(slot.timer);
    }
    this.slots.clear();
  }

  private evict(key: string, slot: Slot): void {
    clearTimeout(slot.timer);
    this.slots.delete(key);
  }
}
