/**
 * DiscoveryBackend over mDNS / DNS-SD using bonjour-service.
 *
 * bonjour-service resolves records as part of browsing, so a found service
 * already carries its addresses and port; resolveService() answers from the
 * descriptor without another network round trip.
 */

import type pino from 'pino';
import { getLogger } from '../core/logger.js';
import { normalizeServiceType } from '../sync/discovery-machine.js';
import type { ServiceDescriptor } from '../sync/types.js';
import type { DiscoveryBackend, DiscoveryListener, ResolveListener } from './backend.js';
import { openBonjour } from './mdns.js';

/** Fields of a bonjour-service record this backend reads */
export interface BonjourRecord {
  name: string;
  type: string;
  protocol?: string;
  host: string;
  port: number;
  addresses?: string[];
}

/** The part of a bonjour-service Browser this backend drives */
export interface BonjourBrowser {
  on(event: 'up' | 'down', listener: (record: BonjourRecord) => void): unknown;
  stop(): void;
}

/** The part of a bonjour-service instance this backend drives */
export interface BonjourClient {
  find(query: { type: string; protocol: 'tcp' | 'udp' }): BonjourBrowser;
  destroy(): void;
}

/**
 * Builds the mDNS client. `onError` must receive every socket failure,
 * including a failed bind of port 5353.
 */
export type BonjourFactory = (onError: (err: Error) => void) => BonjourClient;

export interface BonjourDiscoveryBackendOptions {
  createBonjour?: BonjourFactory;
  logger?: pino.Logger;
}

export const RESOLVE_NO_ADDRESS = 1;
export const STOP_UNKNOWN_LISTENER = 2;
export const START_SOCKET_ERROR = 3;

export const createBonjour: BonjourFactory = openBonjour;

/**
 * `_photosync._tcp` -> { type: 'photosync', protocol: 'tcp' }
 */
export function toBonjourQuery(serviceType: string): { type: string; protocol: 'tcp' | 'udp' } {
  const [name = '', proto = '_tcp'] = normalizeServiceType(serviceType).split('.');
  return {
    type: name.replace(/^_/, ''),
    protocol: proto.replace(/^_/, '') === 'udp' ? 'udp' : 'tcp',
  };
}

export function toDescriptor(record: BonjourRecord): ServiceDescriptor {
  return {
    serviceName: record.name,
    serviceType: `_${record.type}._${record.protocol ?? 'tcp'}`,
    host: record.host,
    port: record.port,
    addresses: record.addresses ?? [],
  };
}

/**
 * Address to dial: first IPv4 address, else the first address, else the
 * advertised host name.
 */
export function pickAddress(descriptor: ServiceDescriptor): string | null {
  const addresses = descriptor.addresses ?? [];
  const ipv4 = addresses.find((address) => !address.includes(':'));
  return ipv4 ?? addresses[0] ?? descriptor.host?.replace(/\.$/, '') ?? null;
}

export class BonjourDiscoveryBackend implements DiscoveryBackend {
  private readonly createBonjour: BonjourFactory;
  private readonly logger: pino.Logger;
  private bonjour: BonjourClient | null = null;
  private browsers: Map<DiscoveryListener, { browser: BonjourBrowser; serviceType: string }> = new Map();

  constructor(options: BonjourDiscoveryBackendOptions = {}) {
    this.createBonjour = options.createBonjour ?? createBonjour;
    this.logger = (options.logger ?? getLogger()).child({ component: 'bonjour' });
  }

  discoverServices(serviceType: string, listener: DiscoveryListener): void {
    const browser = this.instance().find(toBonjourQuery(serviceType));

    browser.on('up', (record) => listener.onFound(toDescriptor(record)));
    browser.on('down', (record) => listener.onLost(toDescriptor(record)));

    this.browsers.set(listener, { browser, serviceType });
    listener.onStarted(serviceType);
  }

  resolveService(descriptor: ServiceDescriptor, listener: ResolveListener): void {
    const host = pickAddress(descriptor);
    if (!host || descriptor.port === undefined) {
      listener.onResolveFailed(descriptor, RESOLVE_NO_ADDRESS);
      return;
    }
    listener.onResolved(host, descriptor.port);
  }

  stopServiceDiscovery(listener: DiscoveryListener): void {
    const entry = this.browsers.get(listener);
    if (!entry) {
      listener.onStopFailed('', STOP_UNKNOWN_LISTENER);
      return;
    }

    entry.browser.stop();
    this.browsers.delete(listener);
    listener.onStopped(entry.serviceType);

    if (this.browsers.size === 0) {
      this.destroy();
    }
  }

  destroy(): void {
    for (const { browser } of this.browsers.values()) {
      browser.stop();
    }
    this.browsers.clear();
    if (this.bonjour) {
      this.bonjour.destroy();
      this.bonjour = null;
    }
  }

  private instance(): BonjourClient {
    if (!this.bonjour) {
      this.bonjour = this.createBonjour((err) => this.handleSocketError(err));
    }
    return this.bonjour;
  }

  /**
   * Every browse shares the socket, so a socket failure fails them all.
   * Listeners may stop discovery from inside onStartFailed.
   */
  private handleSocketError(err: Error): void {
    const active = [...this.browsers.entries()];
    if (active.length === 0) {
      this.logger.warn({ err }, 'mDNS socket error with no browse in progress');
      return;
    }
    this.logger.error({ err, browses: active.length }, 'mDNS socket failed');
    for (const [listener, { serviceType }] of active) {
      listener.onStartFailed(serviceType, START_SOCKET_ERROR);
    }
  }
}
