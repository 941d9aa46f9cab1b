/**
 * Discovery state machine.
 *
 * `reduce(snapshot, event)` is pure: it returns the next snapshot plus the
 * effects the EndpointResolver must carry out (issue a resolve, stop the
 * browse, publish an endpoint change). No I/O happens here, so every
 * transition can be exercised without a network.
 */

import type {
  DiscoverySession,
  Endpoint,
  EndpointOrigin,
  ResolverState,
  ServiceDescriptor,
} from './types.js';

export interface ResolverSnapshot {
  state: ResolverState;
  endpoint: Endpoint | null;
  origin: EndpointOrigin | null;
  session: DiscoverySession | null;
}

export type DiscoveryEvent =
  | { type: 'default-applied'; endpoint: Endpoint }
  | { type: 'manual-override'; endpoint: Endpoint }
  | { type: 'session-opened'; sessionId: string; serviceType: string }
  | { type: 'discovery-started'; sessionId: string }
  | { type: 'service-found'; sessionId: string; descriptor: ServiceDescriptor }
  | { type: 'service-resolved'; sessionId: string; host: string; port: number }
  | { type: 'resolve-failed'; sessionId: string; descriptor: ServiceDescriptor; errorCode: number }
  | { type: 'service-lost'; sessionId: string; descriptor: ServiceDescriptor }
  | { type: 'start-failed'; sessionId: string; errorCode: number }
  | { type: 'stop-failed'; sessionId: string; errorCode: number }
  | { type: 'session-closing'; sessionId: string }
  | { type: 'discovery-stopped'; sessionId: string };

export type DiscoveryEffect =
  | { kind: 'resolve'; sessionId: string; descriptor: ServiceDescriptor }
  | { kind: 'stop-discovery'; sessionId: string }
  | { kind: 'endpoint-changed'; endpoint: Endpoint; origin: EndpointOrigin }
  | { kind: 'stale'; event: DiscoveryEvent['type']; sessionId: string }
  | { kind: 'rejected'; reason: string };

export interface Transition {
  snapshot: ResolverSnapshot;
  effects: DiscoveryEffect[];
}

export const INITIAL_SNAPSHOT: ResolverSnapshot = {
  state: 'unresolved',
  endpoint: null,
  origin: null,
  session: null,
};

export const DEFAULT_PATH_TEMPLATE = '/upload';

/**
 * Strip the trailing dot and `.local` domain so `_photosync._tcp.local.`
 * and `_photosync._tcp` compare equal.
 */
export function normalizeServiceType(serviceType: string): string {
  return serviceType.replace(/\.$/, '').replace(/\.local$/, '');
}

export function isValidPort(port: number): boolean {
  return Number.isInteger(port) && port >= 1 && port <= 65535;
}

type SessionEvent = Exclude<Extract<DiscoveryEvent, { sessionId: string }>, { type: 'session-opened' }>;

function hasSession(event: DiscoveryEvent): event is SessionEvent {
  return 'sessionId' in event && event.type !== 'session-opened';
}

/**
 * Results are only accepted from the session currently browsing. Anything
 * tagged with a closed or replaced session is stale. Stop notifications are
 * accepted for the current session in any state.
 */
function isStale(snapshot: ResolverSnapshot, event: SessionEvent): boolean {
  const session = snapshot.session;
  if (!session || session.id !== event.sessionId) return true;
  if (event.type === 'discovery-stopped' || event.type === 'stop-failed') return false;
  return session.state !== 'starting' && session.state !== 'browsing';
}

function withSession(snapshot: ResolverSnapshot, state: DiscoverySession['state']): ResolverSnapshot {
  if (!snapshot.session) return snapshot;
  return { ...snapshot, session: { ...snapshot.session, state } };
}

function replaceEndpoint(
  snapshot: ResolverSnapshot,
  endpoint: Endpoint,
  origin: EndpointOrigin,
  state: ResolverState,
): Transition {
  return {
    snapshot: { ...snapshot, state, endpoint, origin },
    effects: [{ kind: 'endpoint-changed', endpoint, origin }],
  };
}

export function reduce(snapshot: ResolverSnapshot, event: DiscoveryEvent): Transition {
  if (hasSession(event) && isStale(snapshot, event)) {
    return { snapshot, effects: [{ kind: 'stale', event: event.type, sessionId: event.sessionId }] };
  }

  switch (event.type) {
    case 'default-applied':
      if (snapshot.state !== 'unresolved') {
        return { snapshot, effects: [{ kind: 'rejected', reason: 'default already applied' }] };
      }
      return replaceEndpoint(snapshot, event.endpoint, 'default', 'default-set');

    case 'manual-override':
      return replaceEndpoint(snapshot, event.endpoint, 'manual', 'manual-override');

    case 'session-opened':
      return {
        snapshot: {
          ...snapshot,
          session: { id: event.sessionId, serviceType: event.serviceType, state: 'starting' },
        },
        effects: [],
      };

    case 'discovery-started': {
      const next = withSession(snapshot, 'browsing');
      const state = next.state === 'default-set' || next.state === 'unresolved' ? 'discovering' : next.state;
      return { snapshot: { ...next, state }, effects: [] };
    }

    case 'service-found': {
      const wanted = normalizeServiceType(snapshot.session?.serviceType ?? '');
      if (!wanted || !event.descriptor.serviceType.includes(wanted)) {
        return {
          snapshot,
          effects: [{ kind: 'rejected', reason: `service type ${event.descriptor.serviceType} does not match ${wanted}` }],
        };
      }
      return {
        snapshot,
        effects: [{ kind: 'resolve', sessionId: event.sessionId, descriptor: event.descriptor }],
      };
    }

    case 'service-resolved': {
      if (!event.host || !isValidPort(event.port)) {
        return {
          snapshot,
          effects: [{ kind: 'rejected', reason: `unusable resolution ${event.host}:${event.port}` }],
        };
      }
      // Last resolution to complete wins, manual override included
      const endpoint: Endpoint = {
        host: event.host,
        port: event.port,
        pathTemplate: snapshot.endpoint?.pathTemplate ?? DEFAULT_PATH_TEMPLATE,
      };
      return replaceEndpoint(snapshot, endpoint, 'discovery', 'resolved');
    }

    case 'resolve-failed':
    case 'service-lost':
      // The current endpoint stays; there is no guarantee another peer announces
      return { snapshot, effects: [] };

    case 'start-failed': {
      const next = withSession(snapshot, 'failed');
      const state = next.state === 'discovering' ? 'default-set' : next.state;
      return {
        snapshot: { ...next, state },
        effects: [{ kind: 'stop-discovery', sessionId: event.sessionId }],
      };
    }

    case 'stop-failed':
      return { snapshot: withSession(snapshot, 'failed'), effects: [] };

    case 'session-closing': {
      const next = withSession(snapshot, 'stopping');
      const state = next.state === 'discovering' ? 'default-set' : next.state;
      return { snapshot: { ...next, state }, effects: [] };
    }

    case 'discovery-stopped':
      return { snapshot: withSession(snapshot, 'stopped'), effects: [] };
  }
}
