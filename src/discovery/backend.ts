/**
 * Discovery backend contract.
 *
 * The platform's service-discovery mechanism is consumed, not reimplemented:
 * a backend browses for one service type and reports what it sees through a
 * listener. EndpointResolver drives it; tests drive it with a fake.
 */

import type { ServiceDescriptor } from '../sync/types.js';

export interface DiscoveryListener {
  onStarted(serviceType: string): void;
  onFound(descriptor: ServiceDescriptor): void;
  onLost(descriptor: ServiceDescriptor): void;
  onStopped(serviceType: string): void;
  onStartFailed(serviceType: string, errorCode: number): void;
  onStopFailed(serviceType: string, errorCode: number): void;
}

export interface ResolveListener {
  onResolved(host: string, port: number): void;
  onResolveFailed(descriptor: ServiceDescriptor, errorCode: number): void;
}

export interface DiscoveryBackend {
  discoverServices(serviceType: string, listener: DiscoveryListener): void;
  resolveService(descriptor: ServiceDescriptor, listener: ResolveListener): void;
  stopServiceDiscovery(listener: DiscoveryListener): void;
}
