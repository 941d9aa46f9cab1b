import { EventEmitter } from 'eventemitter3';
import type { LanRelayEvents } from './types.js';

export class EventBus {
  private emitter = new EventEmitter();

  on<K extends keyof LanRelayEvents>(event: K, listener: (data: LanRelayEvents[K]) => void): void {
    this.emitter.on(event, listener);
  }

  off<K extends keyof LanRelayEvents>(event: K, listener: (data: LanRelayEvents[K]) => void): void {
    this.emitter.off(event, listener);
  }

  once<K extends keyof LanRelayEvents>(event: K, listener: (data: LanRelayEvents[K]) => void): void {
    this.emitter.once(event, listener);
  }

  emit<K extends keyof LanRelayEvents>(event: K, data: LanRelayEvents[K]): void {
    this.emitter.emit(event, data);
  }

  listenerCount(event: keyof LanRelayEvents): number {
    return this.emitter.listenerCount(event);
  }

  removeAllListeners(): void {
    this.emitter.removeAllListeners();
  }
}
