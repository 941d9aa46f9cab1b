/**
 * EndpointResolver — owns the address of the receiving peer.
 *
 * A fallback endpoint is in place from construction, so pipelines never wait
 * for discovery. Discovery results and manual overrides replace it whole;
 * the last writer wins. Results from a discovery session that has been shut
 * down are dropped.
 */

import type pino from 'pino';
import { nanoid } from 'nanoid';
import type { DiscoveryBackend, DiscoveryListener, ResolveListener } from '../discovery/backend.js';
import { ConfigError, DiscoveryError, toError } from '../core/errors.js';
import { getLogger } from '../core/logger.js';
import {
  DEFAULT_PATH_TEMPLATE,
  INITIAL_SNAPSHOT,
  isValidPort,
  reduce,
  type DiscoveryEffect,
  type DiscoveryEvent,
  type ResolverSnapshot,
} from './discovery-machine.js';
import type {
  DiscoverySession,
  Endpoint,
  EndpointChange,
  EndpointOrigin,
  ManualEndpointUpdate,
  ResolverState,
  ServiceDescriptor,
} from './types.js';

export const DEFAULT_SERVICE_TYPE = '_photosync._tcp';
export const DEFAULT_MANUAL_PORT = 3000;

export interface EndpointResolverOptions {
  /** Fallback endpoint applied immediately. Omit to start unresolved. */
  defaultEndpoint?: Endpoint;
  /** Default: '_photosync._tcp' */
  serviceType?: string;
  /** Without a backend, discovery is disabled */
  backend?: DiscoveryBackend;
  onEndpointChange?: (change: EndpointChange) => void;
  logger?: pino.Logger;
}

/**
 * Base URL of an endpoint. IPv6 literals are bracketed.
 */
export function formatEndpointUrl(endpoint: Endpoint): string {
  const host = endpoint.host.includes(':') && !endpoint.host.startsWith('[')
    ? `[${endpoint.host}]`
    : endpoint.host;
  return `http://${host}:${endpoint.port}${endpoint.pathTemplate}`;
}

export class EndpointResolver {
  private snapshot: ResolverSnapshot = INITIAL_SNAPSHOT;
  private active: { sessionId: string; listener: DiscoveryListener } | null = null;
  private readonly serviceType: string;
  private readonly backend: DiscoveryBackend | null;
  private readonly onEndpointChange?: (change: EndpointChange) => void;
  private readonly logger: pino.Logger;

  constructor(options: EndpointResolverOptions = {}) {
    this.serviceType = options.serviceType ?? DEFAULT_SERVICE_TYPE;
    this.backend = options.backend ?? null;
    this.onEndpointChange = options.onEndpointChange;
    this.logger = (options.logger ?? getLogger()).child({ component: 'endpoint-resolver' });

    if (options.defaultEndpoint) {
      this.dispatch({ type: 'default-applied', endpoint: { ...options.defaultEndpoint } });
    }
  }

  // ─────────────────────────────────────────────────────────
  // LIFECYCLE
  // ─────────────────────────────────────────────────────────

  /**
   * Open a discovery session. No-op while one is starting or browsing.
   */
  start(): void {
    if (!this.backend) {
      this.logger.info('Discovery disabled; using configured endpoint only');
      return;
    }
    const session = this.snapshot.session;
    if (session && (session.state === 'starting' || session.state === 'browsing')) {
      return;
    }

    const sessionId = nanoid(10);
    const listener = this.createDiscoveryListener(sessionId);
    this.active = { sessionId, listener };
    this.dispatch({ type: 'session-opened', sessionId, serviceType: this.serviceType });

    try {
      this.backend.discoverServices(this.serviceType, listener);
    } catch (err) {
      this.reportFailure('Failed to start discovery', err);
      this.dispatch({ type: 'start-failed', sessionId, errorCode: -1 });
    }
  }

  /**
   * Tear down the discovery session. Safe to call any number of times.
   */
  shutdown(): void {
    const active = this.active;
    if (!active || !this.backend) return;
    this.active = null;

    this.dispatch({ type: 'session-closing', sessionId: active.sessionId });
    try {
      this.backend.stopServiceDiscovery(active.listener);
    } catch (err) {
      this.reportFailure('Failed to stop discovery', err);
    }
  }

  // ─────────────────────────────────────────────────────────
  // ENDPOINT ACCESS
  // ─────────────────────────────────────────────────────────

  /**
   * Replace the endpoint with an explicit address. Takes effect for the next
   * dispatch. Reachability is not checked.
   */
  updateManual(update: ManualEndpointUpdate): Endpoint {
    const ip = update.ip.trim();
    const port = update.port ?? DEFAULT_MANUAL_PORT;
    if (!ip || /\s/.test(ip)) {
      throw new ConfigError(`Invalid endpoint address "${update.ip}"`);
    }
    if (!isValidPort(port)) {
      throw new ConfigError(`Invalid endpoint port ${port}`);
    }

    const endpoint: Endpoint = {
      host: ip,
      port,
      pathTemplate: this.snapshot.endpoint?.pathTemplate ?? DEFAULT_PATH_TEMPLATE,
    };
    this.dispatch({ type: 'manual-override', endpoint });
    return { ...endpoint };
  }

  /**
   * Base URL of the current endpoint, or null if none was ever set.
   */
  currentEndpoint(): string | null {
    const endpoint = this.snapshot.endpoint;
    return endpoint ? formatEndpointUrl(endpoint) : null;
  }

  getEndpoint(): Endpoint | null {
    const endpoint = this.snapshot.endpoint;
    return endpoint ? { ...endpoint } : null;
  }

  getOrigin(): EndpointOrigin | null {
    return this.snapshot.origin;
  }

  getState(): ResolverState {
    return this.snapshot.state;
  }

  getSession(): DiscoverySession | null {
    const session = this.snapshot.session;
    return session ? { ...session } : null;
  }

  isDiscoveryEnabled(): boolean {
    return this.backend !== null;
  }

  // ─────────────────────────────────────────────────────────
  // INTERNAL
  // ─────────────────────────────────────────────────────────

  private dispatch(event: DiscoveryEvent): void {
    const { snapshot, effects } = reduce(this.snapshot, event);
    this.snapshot = snapshot;
    for (const effect of effects) {
      this.apply(effect);
    }
  }

  private apply(effect: DiscoveryEffect): void {
    switch (effect.kind) {
      case 'resolve':
        this.resolve(effect.sessionId, effect.descriptor);
        break;

      case 'stop-discovery': {
        const active = this.active;
        if (!active || active.sessionId !== effect.sessionId || !this.backend) break;
        this.active = null;
        try {
          this.backend.stopServiceDiscovery(active.listener);
        } catch (err) {
          this.reportFailure('Failed to stop discovery', err);
        }
        break;
      }

      case 'endpoint-changed': {
        const url = formatEndpointUrl(effect.endpoint);
        this.logger.info({ url, origin: effect.origin }, 'Endpoint updated');
        if (!this.onEndpointChange) break;
        try {
          this.onEndpointChange({ endpoint: { ...effect.endpoint }, origin: effect.origin });
        } catch (err) {
          this.logger.error({ err }, 'Endpoint change listener failed');
        }
        break;
      }

      case 'stale':
        this.logger.debug({ event: effect.event, sessionId: effect.sessionId }, 'Ignored event from stale discovery session');
        break;

      case 'rejected':
        this.logger.debug({ reason: effect.reason }, 'Discovery event ignored');
        break;
    }
  }

  private resolve(sessionId: string, descriptor: ServiceDescriptor): void {
    if (!this.backend) return;

    const listener: ResolveListener = {
      onResolved: (host, port) => {
        this.logger.debug({ host, port, service: descriptor.serviceName }, 'Resolve succeeded');
        this.dispatch({ type: 'service-resolved', sessionId, host, port });
      },
      onResolveFailed: (failed, errorCode) => {
        this.logger.warn(
          { err: new DiscoveryError(`Resolve failed for ${failed.serviceName}`, this.serviceType, errorCode) },
          'Resolve failed',
        );
        this.dispatch({ type: 'resolve-failed', sessionId, descriptor: failed, errorCode });
      },
    };

    try {
      this.backend.resolveService(descriptor, listener);
    } catch (err) {
      this.reportFailure(`Failed to resolve ${descriptor.serviceName}`, err);
    }
  }

  private createDiscoveryListener(sessionId: string): DiscoveryListener {
    return {
      onStarted: (serviceType) => {
        this.logger.debug({ serviceType, sessionId }, 'Service discovery started');
        this.dispatch({ type: 'discovery-started', sessionId });
      },
      onFound: (descriptor) => {
        this.logger.debug({ service: descriptor.serviceName, type: descriptor.serviceType }, 'Service found');
        this.dispatch({ type: 'service-found', sessionId, descriptor });
      },
      onLost: (descriptor) => {
        this.logger.warn({ service: descriptor.serviceName }, 'Service lost; keeping current endpoint');
        this.dispatch({ type: 'service-lost', sessionId, descriptor });
      },
      onStopped: (serviceType) => {
        this.logger.info({ serviceType, sessionId }, 'Discovery stopped');
        this.dispatch({ type: 'discovery-stopped', sessionId });
      },
      onStartFailed: (serviceType, errorCode) => {
        this.logger.error(
          { err: new DiscoveryError('Start discovery failed', serviceType, errorCode) },
          'Start discovery failed',
        );
        this.dispatch({ type: 'start-failed', sessionId, errorCode });
      },
      onStopFailed: (serviceType, errorCode) => {
        this.logger.error(
          { err: new DiscoveryError('Stop discovery failed', serviceType, errorCode) },
          'Stop discovery failed',
        );
        this.dispatch({ type: 'stop-failed', sessionId, errorCode });
      },
    };
  }

  private reportFailure(message: string, err: unknown): void {
    this.logger.error({ err: new DiscoveryError(message, this.serviceType, undefined, toError(err)) }, message);
  }
}
