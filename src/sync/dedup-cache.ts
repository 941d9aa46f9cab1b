/**
 * DedupCache — time-windowed record of recently relayed item ids.
 *
 * An id admitted at time T is rejected until T + windowMs. Expired entries
 * are not removed by a timer: once the map grows past the high-water mark,
 * the next admission sweeps everything older than the window. Entries below
 * the mark may outlive their window; tryAdmit() re-checks age, so a stale
 * entry never blocks an admission.
 */

import type { ItemId } from './types.js';

export interface DedupCacheOptions {
  /** Rejection window in ms. Default: 5000 */
  windowMs?: number;
  /** Map size above which an admission triggers a sweep. Default: 100 */
  highWaterMark?: number;
}

export const DEFAULT_DEDUP_WINDOW_MS = 5000;
export const DEFAULT_DEDUP_HIGH_WATER_MARK = 100;

export class DedupCache {
  private entries: Map<ItemId, number> = new Map();
  private readonly windowMs: number;
  private readonly highWaterMark: number;

  constructor(options: DedupCacheOptions = {}) {
    this.windowMs = options.windowMs ?? DEFAULT_DEDUP_WINDOW_MS;
    this.highWaterMark = options.highWaterMark ?? DEFAULT_DEDUP_HIGH_WATER_MARK;
    if (this.windowMs < 1) throw new Error('DedupCache windowMs must be >= 1');
    if (this.highWaterMark < 1) throw new Error('DedupCache highWaterMark must be >= 1');
  }

  /**
   * Admit an item if it has not been seen within the window.
   * Check and insert happen in one synchronous step.
   */
  tryAdmit(itemId: ItemId, now: number = Date.now()): boolean {
    if (this.isFresh(itemId, now)) {
      return false;
    }

    this.entries.set(itemId, now);

    if (this.entries.size > this.highWaterMark) {
      this.sweep(now);
    }
    return true;
  }

  /**
   * Whether the item was admitted less than windowMs ago. Does not mutate.
   */
  isFresh(itemId: ItemId, now: number = Date.now()): boolean {
    const firstSeen = this.entries.get(itemId);
    return firstSeen !== undefined && now - firstSeen < this.windowMs;
  }

  /**
   * Remove every entry older than the window. Returns how many were removed.
   */
  sweep(now: number = Date.now()): number {
    let removed = 0;
    for (const [itemId, firstSeen] of this.entries) {
      if (now - firstSeen > this.windowMs) {
        this.entries.delete(itemId);
        removed++;
      }
    }
    return removed;
  }

  get size(): number {
    return this.entries.size;
  }

  get window(): number {
    return this.windowMs;
  }

  clear(): void {
    this.entries.clear();
  }
}
