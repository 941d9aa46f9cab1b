/**
 * ServiceAdvertiser — publishes the receiver over mDNS so agents can find it.
 *
 * Advertising is best effort: a name conflict or a socket that cannot bind
 * is logged and announced, and the receiver keeps serving for agents that
 * were given its address.
 */

import { hostname } from 'node:os';
import type pino from 'pino';
import { DiscoveryError } from '../core/errors.js';
import { EventBus } from '../core/events.js';
import { getLogger } from '../core/logger.js';
import { toBonjourQuery } from '../discovery/bonjour-backend.js';
import { openBonjour } from '../discovery/mdns.js';

export interface PublishedService {
  on(event: 'error', listener: (err: Error) => void): unknown;
}

/** The part of a bonjour-service instance the advertiser drives */
export interface BonjourPublisher {
  publish(options: { name: string; type: string; protocol: 'tcp' | 'udp'; port: number }): PublishedService;
  unpublishAll(callback: () => void): void;
  destroy(): void;
}

export type PublisherFactory = (onError: (err: Error) => void) => BonjourPublisher;

export type AdvertiserState = 'idle' | 'advertising' | 'failed' | 'stopped';

export interface ServiceAdvertiserOptions {
  serviceType: string;
  port: number;
  /** mDNS instance name; default `<hostname>_lanrelay` */
  name?: string;
  createBonjour?: PublisherFactory;
  events?: EventBus;
  logger?: pino.Logger;
}

export function defaultInstanceName(host: string = hostname()): string {
  const base = host.split('.')[0] || 'lanrelay-receiver';
  return `${base}_lanrelay`;
}

export class ServiceAdvertiser {
  private readonly serviceType: string;
  private readonly port: number;
  private readonly name: string;
  private readonly createBonjour: PublisherFactory;
  private readonly events: EventBus;
  private readonly logger: pino.Logger;
  private bonjour: BonjourPublisher | null = null;
  private state: AdvertiserState = 'idle';

  constructor(options: ServiceAdvertiserOptions) {
    this.serviceType = options.serviceType;
    this.port = options.port;
    this.name = options.name ?? defaultInstanceName();
    this.createBonjour = options.createBonjour ?? openBonjour;
    this.events = options.events ?? new EventBus();
    this.logger = (options.logger ?? getLogger()).child({ component: 'advertiser' });
  }

  start(): void {
    if (this.bonjour) return;

    const bonjour = this.createBonjour((err) => this.handleError(err));
    this.bonjour = bonjour;

    const { type, protocol } = toBonjourQuery(this.serviceType);
    const service = bonjour.publish({ name: this.name, type, protocol, port: this.port });
    service.on('error', (err) => this.handleError(err));

    this.state = 'advertising';
    this.logger.info({ name: this.name, serviceType: this.serviceType, port: this.port }, 'Advertising receiver');
    this.events.emit('advertiser:up', { name: this.name, serviceType: this.serviceType, port: this.port });
  }

  /** Send goodbye packets unless advertising already failed, then close the socket */
  async stop(): Promise<void> {
    const bonjour = this.bonjour;
    if (!bonjour) return;
    this.bonjour = null;

    if (this.state === 'advertising') {
      await new Promise<void>((resolve) => bonjour.unpublishAll(resolve));
    }
    bonjour.destroy();
    this.state = 'stopped';
  }

  getState(): AdvertiserState {
    return this.state;
  }

  getEvents(): EventBus {
    return this.events;
  }

  getName(): string {
    return this.name;
  }

  private handleError(err: Error): void {
    const error = new DiscoveryError(`Advertising ${this.name} failed: ${err.message}`, this.serviceType, undefined, err);
    this.state = 'failed';
    this.logger.error({ err: error }, 'Advertising failed');
    this.events.emit('advertiser:failed', { error });
  }
}
