/**
 * Exchange Cache
 *
 * Holds downstream credentials keyed by (subject, target scope). An entry is
 * live until `expiresAt - safetyMargin`; a stale entry is evicted the first
 * time it is looked up. Entries are never shared between subjects.
 *
 * Reads and writes are synchronous Map operations on the event loop, so a
 * lookup never observes a half-written entry.
 */

import type { Clock } from '../core/types.js';
import type { ExchangeCacheEntry, ExchangeCacheOptions } from './types.js';

const KEY_SEPARATOR = '\u0000';

export class ExchangeCache {
  private readonly entries = new Map<string, ExchangeCacheEntry>();
  private readonly clock: Clock;

  constructor(private readonly options: ExchangeCacheOptions) {
    if (options.safetyMarginMs < 0) {
      throw new Error('Exchange cache safety margin must not be negative');
    }
    if (options.maxEntries < 1) {
      throw new Error('Exchange cache must allow at least one entry');
    }
    this.clock = options.clock ?? Date.now;
  }

  static key(subject: string, targetScope: string): string {
    return `${subject}${KEY_SEPARATOR}${targetScope}`;
  }

  /**
   * True while `now` is before the entry's expiry minus the safety margin
   */
  isLive(entry: ExchangeCacheEntry): boolean {
    return this.clock() < entry.expiresAt - this.options.safetyMarginMs;
  }

  get(subject: string, targetScope: string): ExchangeCacheEntry | undefined {
    const key = ExchangeCache.key(subject, targetScope);
    const entry = this.entries.get(key);
    if (!entry) {
      return undefined;
    }
    if (!this.isLive(entry)) {
      this.entries.delete(key);
      return undefined;
    }
    return entry;
  }

  set(subject: string, targetScope: string, entry: ExchangeCacheEntry): void {
    const key = ExchangeCache.key(subject, targetScope);

    // Re-insert so the Map's insertion order tracks recency
    this.entries.delete(key);
    this.entries.set(key, entry);

    while (this.entries.size > this.options.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) {
        break;
      }
      this.entries.delete(oldest.value);
    }
  }

  /**
   * Drop every entry belonging to a subject
   *
   * @returns number of entries removed
   */
  clearSubject(subject: string): number {
    const prefix = `${subject}${KEY_SEPARATOR}`;
    let removed = 0;
    for (const key of Array.from(this.entries.keys())) {
      if (key.startsWith(prefix)) {
        this.entries.delete(key);
        removed++;
      }
    }
    return removed;
  }

  get size(): number {
    return this.entries.size;
  }

  clear(): void {
    this.entries.clear();
  }
}
