/**
 * Debouncer — per-source coalescing of change signals.
 *
 * Every notify() restarts the quiet-period timer of the signal's source and
 * replaces the signal waiting there, so a burst collapses into one settle
 * carrying its last signal. Sources have independent timers. Settles of one
 * source run one at a time; a burst that settles while the previous handler
 * is still busy waits for it.
 */

import type pino from 'pino';
import { KeyedMutex } from '../core/mutex.js';
import { getLogger } from '../core/logger.js';

export type SettleHandler<T> = (signal: T) => void | Promise<void>;

export interface DebouncerOptions {
  /** Quiet period in ms. Default: 500 */
  delayMs?: number;
  logger?: pino.Logger;
}

interface PendingSignal<T> {
  signal: T;
  timer: ReturnType<typeof setTimeout>;
  generation: number;
}

export const DEFAULT_DEBOUNCE_MS = 500;

export class Debouncer<T extends { source: string }> {
  private pending: Map<T['source'], PendingSignal<T>> = new Map();
  private settling = new KeyedMutex<T['source']>();
  private inFlight: Set<Promise<void>> = new Set();
  private generation = 0;
  private disposed = false;
  private readonly delayMs: number;
  private readonly logger: pino.Logger;

  constructor(
    private readonly handler: SettleHandler<T>,
    options: DebouncerOptions = {},
  ) {
    this.delayMs = options.delayMs ?? DEFAULT_DEBOUNCE_MS;
    this.logger = (options.logger ?? getLogger()).child({ component: 'debouncer' });
  }

  /**
   * Record a signal and restart its source's quiet period.
   * Never blocks; ignored once the debouncer is disposed.
   */
  notify(signal: T): void {
    if (this.disposed) return;

    const key: T['source'] = signal.source;
    const existing = this.pending.get(key);
    if (existing) {
      clearTimeout(existing.timer);
    }

    const generation = ++this.generation;
    const timer = setTimeout(() => this.fire(key, generation), this.delayMs);
    this.pending.set(key, { signal, timer, generation });
  }

  /**
   * Settle pending signals now instead of waiting for their timers.
   * Resolves when the handlers have finished.
   */
  async flush(source?: T['source']): Promise<void> {
    const settles: Promise<void>[] = [];
    for (const [key, entry] of [...this.pending]) {
      if (source !== undefined && key !== source) continue;
      clearTimeout(entry.timer);
      this.pending.delete(key);
      settles.push(this.track(this.settle(key, entry.signal)));
    }
    await Promise.all(settles);
  }

  /**
   * Drop the pending signal of a source without settling it.
   */
  cancel(source: T['source']): boolean {
    const entry = this.pending.get(source);
    if (!entry) return false;
    clearTimeout(entry.timer);
    this.pending.delete(source);
    return true;
  }

  /**
   * Drop every pending signal. Returns how many were discarded.
   */
  cancelAll(): number {
    const count = this.pending.size;
    for (const entry of this.pending.values()) {
      clearTimeout(entry.timer);
    }
    this.pending.clear();
    return count;
  }

  /**
   * Cancel everything and refuse further signals.
   */
  dispose(): void {
    this.disposed = true;
    const discarded = this.cancelAll();
    if (discarded > 0) {
      this.logger.debug({ discarded }, 'Discarded pending signals on shutdown');
    }
  }

  /**
   * Resolves when no settle handler is running.
   */
  async idle(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all([...this.inFlight]);
    }
  }

  hasPending(source: T['source']): boolean {
    return this.pending.has(source);
  }

  pendingCount(): number {
    return this.pending.size;
  }

  isDisposed(): boolean {
    return this.disposed;
  }

  // ─────────────────────────────────────────────────────────
  // INTERNAL
  // ─────────────────────────────────────────────────────────

  private fire(key: T['source'], generation: number): void {
    const entry = this.pending.get(key);
    // Superseded by a newer notify() or cancelled
    if (!entry || entry.generation !== generation) return;

    this.pending.delete(key);
    this.track(this.settle(key, entry.signal));
  }

  private async settle(key: T['source'], signal: T): Promise<void> {
    await this.settling.withLock(key, async () => {
      if (this.disposed) return;
      try {
        await this.handler(signal);
      } catch (err) {
        this.logger.error({ err, source: key }, 'Settle handler failed');
      }
    });
  }

  private track(task: Promise<void>): Promise<void> {
    this.inFlight.add(task);
    void task.finally(() => this.inFlight.delete(task));
    return task;
  }
}
