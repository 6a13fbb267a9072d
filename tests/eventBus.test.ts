import { afterEach, describe, it, expect, vi } from 'vitest';
import { EventBus } from '../src/core/EventBus';
import { Logger } from '../src/core/Logger';

describe('EventBus', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('delivers payloads until a listener unsubscribes', () => {
    const bus = new EventBus();
    const counts: number[] = [];
    const off = bus.on('fireworksReaped', (e) => counts.push(e.count));
    bus.emit('fireworksReaped', { count: 2, tick: 1 });
    off();
    bus.emit('fireworksReaped', { count: 3, tick: 2 });
    expect(counts).toEqual([2]);
  });

  it('logs a failing listener and keeps notifying the rest', () => {
    const warn = vi.spyOn(Logger, 'warn').mockImplementation(() => {});
    const bus = new EventBus();
    const seen: number[] = [];
    bus.on('fireworkDetonated', () => { throw new Error('listener broke'); });
    bus.on('fireworkDetonated', (e) => seen.push(e.particles));
    bus.emit('fireworkDetonated', { x: 1, y: 2, particles: 25 });
    expect(seen).toEqual([25]);
    expect(warn).toHaveBeenCalledWith('[EventBus] fireworkDetonated listener failed: listener broke');
  });
});
