/**
 * SyncOrchestrator — one pipeline per source kind.
 *
 *   adapter ─▶ Debouncer ─▶ resolver.locate() ─▶ candidate.load()
 *           ─▶ DedupCache.tryAdmit() ─▶ UploadDispatcher.send()
 *
 * Adapters only reach notify(), which never blocks. Everything after the
 * settle runs in the debouncer's handler, serialized per source. Errors end
 * the current settle and are logged; the pipeline keeps listening.
 */

import type pino from 'pino';
import { nanoid } from 'nanoid';
import { QueryError, ReadError, toError } from '../core/errors.js';
import { getLogger } from '../core/logger.js';
import type { Unsubscribe } from '../adapters/types.js';
import { Debouncer, DEFAULT_DEBOUNCE_MS } from './debouncer.js';
import type { DedupCache } from './dedup-cache.js';
import type { ChangeSignal, ItemId, SourceKind, UploadJob, UploadJobDraft } from './types.js';

/**
 * A concrete item a settled signal points at. `load()` reads the payload;
 * items with an `itemId` go through dedup admission.
 */
export interface Candidate {
  itemId?: ItemId;
  label: string;
  load(): Promise<UploadJobDraft>;
  /** Called once the item has been admitted, before dispatch */
  onAdmitted?(): void;
}

export interface SignalResolver<S extends ChangeSignal> {
  readonly kind: S['source'];
  /** Returns null when there is nothing to relay for this signal */
  locate(signal: S): Promise<Candidate | null>;
}

export type SignalSubscription<S extends ChangeSignal> = (emit: (signal: S) => void) => Unsubscribe;

export interface JobSender {
  send(job: UploadJob): void;
}

export interface SyncOrchestratorOptions<S extends ChangeSignal> {
  resolver: SignalResolver<S>;
  /** Hooks the adapter up; called on start(), undone on stop() */
  subscribe?: SignalSubscription<S>;
  dedup: DedupCache;
  dispatcher: JobSender;
  /** Default: 500 */
  debounceMs?: number;
  logger?: pino.Logger;
  now?: () => number;
}

export interface OrchestratorStats {
  settled: number;
  dispatched: number;
  skipped: number;
  dropped: number;
}

/** The signal-independent face of an orchestrator */
export interface Pipeline {
  readonly kind: SourceKind;
  start(): void;
  stop(): void;
  isRunning(): boolean;
  flush(): Promise<void>;
  idle(): Promise<void>;
  getStats(): OrchestratorStats;
}

export class SyncOrchestrator<S extends ChangeSignal> implements Pipeline {
  readonly kind: S['source'];
  private readonly resolver: SignalResolver<S>;
  private readonly subscribe?: SignalSubscription<S>;
  private readonly dedup: DedupCache;
  private readonly dispatcher: JobSender;
  private readonly debounceMs: number;
  private readonly logger: pino.Logger;
  private readonly baseLogger?: pino.Logger;
  private readonly now: () => number;
  private debouncer: Debouncer<S>;
  private unsubscribe: Unsubscribe | null = null;
  private running = false;
  private stats: OrchestratorStats = { settled: 0, dispatched: 0, skipped: 0, dropped: 0 };

  constructor(options: SyncOrchestratorOptions<S>) {
    this.resolver = options.resolver;
    this.kind = options.resolver.kind;
    this.subscribe = options.subscribe;
    this.dedup = options.dedup;
    this.dispatcher = options.dispatcher;
    this.debounceMs = options.debounceMs ?? DEFAULT_DEBOUNCE_MS;
    this.now = options.now ?? Date.now;
    this.baseLogger = options.logger;
    this.logger = (options.logger ?? getLogger()).child({ component: 'orchestrator', source: this.kind });
    this.debouncer = this.createDebouncer();
  }

  // ─────────────────────────────────────────────────────────
  // LIFECYCLE
  // ─────────────────────────────────────────────────────────

  start(): void {
    if (this.running) return;
    if (this.debouncer.isDisposed()) {
      this.debouncer = this.createDebouncer();
    }
    if (this.subscribe) {
      this.unsubscribe = this.subscribe((signal) => this.notify(signal));
    }
    this.running = true;
    this.logger.debug('Pipeline started');
  }

  /**
   * Detach from the adapter and discard any signal still waiting to settle.
   * A settle already in progress finishes; see idle().
   */
  stop(): void {
    if (!this.running) return;
    this.running = false;
    if (this.unsubscribe) {
      try {
        this.unsubscribe();
      } catch (err) {
        this.logger.warn({ err }, 'Adapter unsubscribe failed');
      }
      this.unsubscribe = null;
    }
    this.debouncer.dispose();
    this.logger.debug('Pipeline stopped');
  }

  isRunning(): boolean {
    return this.running;
  }

  // ─────────────────────────────────────────────────────────
  // SIGNALS
  // ─────────────────────────────────────────────────────────

  /**
   * Feed a signal into the debouncer. Ignored while stopped.
   */
  notify(signal: S): void {
    if (!this.running) return;
    this.debouncer.notify(signal);
  }

  /**
   * Settle the pending signal now and wait for its handler.
   */
  async flush(): Promise<void> {
    await this.debouncer.flush();
  }

  /**
   * Resolves when no settle is running.
   */
  async idle(): Promise<void> {
    await this.debouncer.idle();
  }

  getStats(): OrchestratorStats {
    return { ...this.stats };
  }

  // ─────────────────────────────────────────────────────────
  // INTERNAL
  // ─────────────────────────────────────────────────────────

  private createDebouncer(): Debouncer<S> {
    return new Debouncer<S>((signal) => this.onSettled(signal), {
      delayMs: this.debounceMs,
      logger: this.baseLogger,
    });
  }

  private async onSettled(signal: S): Promise<void> {
    this.stats.settled++;

    let candidate: Candidate | null;
    try {
      candidate = await this.resolver.locate(signal);
    } catch (err) {
      const error = err instanceof QueryError ? err : new QueryError(toError(err).message, this.kind, toError(err));
      this.logger.error({ err: error }, 'Query failed; dropping signal');
      this.stats.dropped++;
      return;
    }

    if (!candidate) {
      this.stats.skipped++;
      return;
    }

    const { itemId, label } = candidate;
    if (itemId !== undefined && this.dedup.isFresh(itemId, this.now())) {
      this.logger.debug({ itemId, label }, 'Recently sent; skipping');
      this.stats.skipped++;
      return;
    }

    let draft: UploadJobDraft;
    try {
      draft = await candidate.load();
    } catch (err) {
      const error = err instanceof ReadError ? err : new ReadError(`Failed to read ${label}`, itemId, toError(err));
      this.logger.error({ err: error, itemId }, 'Read failed; item left eligible for retry');
      this.stats.dropped++;
      return;
    }

    // A concurrent pipeline may have admitted the same id while we were reading
    if (itemId !== undefined && !this.dedup.tryAdmit(itemId, this.now())) {
      this.logger.debug({ itemId, label }, 'Admitted elsewhere; skipping');
      this.stats.skipped++;
      return;
    }
    candidate.onAdmitted?.();

    const job = this.stamp(draft);
    this.logger.info({ jobId: job.id, itemId, label }, 'Dispatching');
    this.dispatcher.send(job);
    this.stats.dispatched++;
  }

  private stamp(draft: UploadJobDraft): UploadJob {
    const meta = { id: nanoid(12), source: this.kind, createdAt: this.now() };
    if (draft.contentKind === 'raw-binary') {
      return { ...draft, ...meta };
    }
    return { ...draft, ...meta };
  }
}
