import { describe, it, expect, vi } from 'vitest';
import { EventBus } from '../../../src/core/events.js';

describe('EventBus', () => {
  it('should deliver typed payloads to listeners', () => {
    const bus = new EventBus();
    const listener = vi.fn();

    bus.on('agent:started', listener);
    bus.emit('agent:started', { timestamp: 1000, sources: ['photo', 'sms'] });

    expect(listener).toHaveBeenCalledWith({ timestamp: 1000, sources: ['photo', 'sms'] });
    expect(bus.listenerCount('agent:started')).toBe(1);
  });

  it('should fire once listeners a single time', () => {
    const bus = new EventBus();
    const listener = vi.fn();

    bus.once('agent:stopped', listener);
    bus.emit('agent:stopped', { timestamp: 1 });
    bus.emit('agent:stopped', { timestamp: 2 });

    expect(listener).toHaveBeenCalledTimes(1);
  });

  it('should detach listeners', () => {
    const bus = new EventBus();
    const listener = vi.fn();

    bus.on('agent:stopped', listener);
    bus.off('agent:stopped', listener);
    bus.emit('agent:stopped', { timestamp: 1 });
    bus.on('agent:stopped', listener);
    bus.removeAllListeners();
    bus.emit('agent:stopped', { timestamp: 2 });

    expect(listener).not.toHaveBeenCalled();
  });
});
