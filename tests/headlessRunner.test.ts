import { describe, it, expect } from 'vitest';
import { runHeadless } from '../src/sim/HeadlessRunner';

describe('runHeadless', () => {
  it('is reproducible for a seed', () => {
    const a = runHeadless({ ticks: 600, width: 80, height: 48, seed: 7 });
    const b = runHeadless({ ticks: 600, width: 80, height: 48, seed: 7 });
    expect(a).toEqual(b);
    expect(a.ticks).toBe(600);
    expect(a.launched).toBeGreaterThan(0);
  });

  it('accounts for every launched firework', () => {
    const s = runHeadless({ ticks: 1500, width: 80, height: 48, seed: 3, spawnProbability: 0.2 });
    expect(s.launched).toBe(s.finalFireworks + s.reaped);
    expect(s.detonated).toBeLessThanOrEqual(s.launched);
    expect(s.reaped).toBeLessThanOrEqual(s.detonated);
    expect(s.peakParticles).toBeGreaterThanOrEqual(25);
  });

  it('stays empty without spawns', () => {
    const s = runHeadless({ ticks: 1000, width: 40, height: 20, seed: 1, spawnProbability: 0 });
    expect(s).toEqual({
      ticks: 1000, launched: 0, detonated: 0, reaped: 0,
      peakFireworks: 0, peakParticles: 0, finalFireworks: 0, finalParticles: 0,
    });
  });

  it('launches one rocket per tick with probability 1', () => {
    const s = runHeadless({ ticks: 10, width: 40, height: 20, seed: 1, spawnProbability: 1 });
    expect(s.launched).toBe(10);
    expect(s.finalFireworks).toBe(10);
    expect(s.finalParticles).toBe(10);
    expect(s.detonated).toBe(0);
  });
});
