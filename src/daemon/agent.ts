/**
 * RelayAgent — lifecycle owner of the sync pipeline.
 *
 * Builds the shared parts (endpoint resolver, dedup cache, upload
 * dispatcher) and one orchestrator per adapter it is given, starts and stops
 * them together, and answers "is it running" through an instance method
 * rather than a process-wide flag.
 *
 * Lifecycle:
 * 1. start() — opens discovery, subscribes every pipeline
 * 2. adapters push signals; pipelines settle, dedup and dispatch
 * 3. stop() — unsubscribes, discards pending debounces, tears down
 *    discovery, waits for in-flight uploads
 */

import type pino from 'pino';
import { EventBus } from '../core/events.js';
import { getLogger } from '../core/logger.js';
import type { AgentState, LanRelayConfig } from '../core/types.js';
import type { DiscoveryBackend } from '../discovery/backend.js';
import { DedupCache } from '../sync/dedup-cache.js';
import { EndpointResolver, formatEndpointUrl } from '../sync/endpoint-resolver.js';
import type { OrchestratorStats, Pipeline } from '../sync/orchestrator.js';
import {
  createClipboardPipeline,
  createPhotoPipeline,
  createSmsPipeline,
  type SharedPipelineParts,
} from '../sync/pipelines.js';
import type {
  DispatchOutcome,
  Endpoint,
  ManualEndpointUpdate,
  SourceKind,
} from '../sync/types.js';
import { UploadDispatcher, type FetchLike } from '../sync/upload-dispatcher.js';
import type { AgentAdapters, AgentStatus } from './types.js';

export interface RelayAgentOptions {
  config: LanRelayConfig;
  adapters: AgentAdapters;
  /** Omit to run without discovery; ignored when config disables it */
  discovery?: DiscoveryBackend;
  events?: EventBus;
  fetch?: FetchLike;
  logger?: pino.Logger;
  now?: () => number;
}

export class RelayAgent {
  private state: AgentState = 'idle';
  private readonly config: LanRelayConfig;
  private readonly events: EventBus;
  private readonly logger: pino.Logger;
  private readonly dedup: DedupCache;
  private readonly resolver: EndpointResolver;
  private readonly dispatcher: UploadDispatcher;
  private readonly pipelines: Map<SourceKind, Pipeline> = new Map();
  private startedAt = 0;

  constructor(options: RelayAgentOptions) {
    this.config = options.config;
    this.events = options.events ?? new EventBus();
    const baseLogger = options.logger ?? getLogger();
    this.logger = baseLogger.child({ component: 'agent' });

    const { endpoint, discovery, pipeline, dispatch } = this.config;

    this.resolver = new EndpointResolver({
      defaultEndpoint: { host: endpoint.host, port: endpoint.port, pathTemplate: endpoint.pathTemplate },
      serviceType: discovery.serviceType,
      backend: discovery.enabled ? options.discovery : undefined,
      onEndpointChange: (change) =>
        this.events.emit('endpoint:changed', { ...change, url: formatEndpointUrl(change.endpoint) }),
      logger: baseLogger,
    });

    this.dedup = new DedupCache({
      windowMs: pipeline.dedupWindowMs,
      highWaterMark: pipeline.dedupHighWaterMark,
    });

    this.dispatcher = new UploadDispatcher({
      endpoint: () => this.resolver.getEndpoint(),
      sink: (outcome: DispatchOutcome) => this.events.emit('dispatch:completed', outcome),
      timeoutMs: dispatch.timeoutMs,
      fetch: options.fetch,
      logger: baseLogger,
    });

    const parts: SharedPipelineParts = {
      dedup: this.dedup,
      dispatcher: this.dispatcher,
      debounceMs: pipeline.debounceMs,
      logger: baseLogger,
      now: options.now,
    };

    const { photos, sms, clipboard } = options.adapters;
    if (photos) this.pipelines.set('photo', createPhotoPipeline(photos, parts));
    if (sms) this.pipelines.set('sms', createSmsPipeline(sms, parts));
    if (clipboard) this.pipelines.set('clipboard', createClipboardPipeline(clipboard, parts));
  }

  // ─────────────────────────────────────────────────────────
  // LIFECYCLE
  // ─────────────────────────────────────────────────────────

  start(): void {
    if (this.state === 'running' || this.state === 'stopping') return;

    this.startedAt = Date.now();
    this.resolver.start();
    const started: Pipeline[] = [];
    try {
      for (const orchestrator of this.pipelines.values()) {
        orchestrator.start();
        started.push(orchestrator);
      }
    } catch (err) {
      for (const orchestrator of started) {
        orchestrator.stop();
      }
      this.resolver.shutdown();
      this.logger.error({ err }, 'Relay agent failed to start');
      throw err;
    }
    this.state = 'running';

    const sources = this.getSources();
    this.logger.info({ sources, endpoint: this.resolver.currentEndpoint() }, 'Relay agent started');
    this.events.emit('agent:started', { timestamp: this.startedAt, sources });
  }

  /**
   * Stop every pipeline and wait for uploads already in flight.
   */
  async stop(): Promise<void> {
    if (this.state !== 'running') return;
    this.state = 'stopping';

    for (const orchestrator of this.pipelines.values()) {
      orchestrator.stop();
    }
    this.resolver.shutdown();

    await Promise.all([...this.pipelines.values()].map((orchestrator) => orchestrator.idle()));
    await this.dispatcher.drain();

    this.state = 'stopped';
    this.logger.info('Relay agent stopped');
    this.events.emit('agent:stopped', { timestamp: Date.now() });
  }

  /**
   * Settle every pending signal now and wait until resulting uploads finish.
   */
  async flush(): Promise<void> {
    await Promise.all([...this.pipelines.values()].map((orchestrator) => orchestrator.flush()));
    await this.dispatcher.drain();
  }

  isRunning(): boolean {
    return this.state === 'running';
  }

  getState(): AgentState {
    return this.state;
  }

  // ─────────────────────────────────────────────────────────
  // ENDPOINT
  // ─────────────────────────────────────────────────────────

  updateEndpoint(update: ManualEndpointUpdate): Endpoint {
    return this.resolver.updateManual(update);
  }

  currentEndpoint(): string | null {
    return this.resolver.currentEndpoint();
  }

  // ─────────────────────────────────────────────────────────
  // INSPECTION
  // ─────────────────────────────────────────────────────────

  getEvents(): EventBus {
    return this.events;
  }

  getResolver(): EndpointResolver {
    return this.resolver;
  }

  getSources(): SourceKind[] {
    return [...this.pipelines.keys()];
  }

  getStatus(): AgentStatus {
    const pipelines: Partial<Record<SourceKind, OrchestratorStats>> = {};
    for (const [kind, orchestrator] of this.pipelines) {
      pipelines[kind] = orchestrator.getStats();
    }

    return {
      state: this.state,
      uptimeMs: this.state === 'running' ? Date.now() - this.startedAt : 0,
      endpoint: this.resolver.currentEndpoint(),
      endpointOrigin: this.resolver.getOrigin(),
      resolverState: this.resolver.getState(),
      discovery: this.resolver.getSession(),
      dedupEntries: this.dedup.size,
      inFlightUploads: this.dispatcher.inFlight,
      pipelines,
    };
  }
}
