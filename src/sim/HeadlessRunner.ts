/**
 * Headless simulation for tuning and smoke tests.
 * - Fixed number of ticks, no timers: one update and one render per tick
 * - Seeded LCG so a run can be repeated exactly
 * - Renders into an off-screen TerminalCanvas whose output is discarded
 */
import { eventBus } from '../core/EventBus';
import { Logger } from '../core/Logger';
import { LcgRandom, type RandomSource } from '../core/Random';
import { SimulationState } from '../game/SimulationState';
import { renderFrame } from '../render/renderFrame';
import { TerminalCanvas } from '../render/TerminalCanvas';

export interface HeadlessConfig {
  ticks: number;
  width: number;
  height: number;
  seed?: number;
  spawnProbability?: number;
  /** Overrides `seed` */
  rand?: RandomSource;
}

export interface SimStats {
  ticks: number;
  launched: number;
  detonated: number;
  reaped: number;
  peakFireworks: number;
  peakParticles: number;
  finalFireworks: number;
  finalParticles: number;
}

export function runHeadless(cfg: HeadlessConfig): SimStats {
  const rand = cfg.rand ?? new LcgRandom(cfg.seed ?? 1);
  const state = new SimulationState({ spawnProbability: cfg.spawnProbability });
  const canvas = new TerminalCanvas(cfg.width, cfg.height, { write: () => true });
  const stats: SimStats = {
    ticks: 0, launched: 0, detonated: 0, reaped: 0,
    peakFireworks: 0, peakParticles: 0, finalFireworks: 0, finalParticles: 0,
  };

  const unsubscribe = [
    eventBus.on('fireworkLaunched', () => { stats.launched++; }),
    eventBus.on('fireworkDetonated', () => { stats.detonated++; }),
    eventBus.on('fireworksReaped', (e) => { stats.reaped += e.count; }),
  ];
  try {
    for (let t = 0; t < cfg.ticks; t++) {
      state.update(rand, canvas);
      renderFrame(state, canvas);
      canvas.render(t);
      stats.ticks++;
      const fireworks = state.fireworks.length;
      const particles = state.particleCount();
      if (fireworks > stats.peakFireworks) stats.peakFireworks = fireworks;
      if (particles > stats.peakParticles) stats.peakParticles = particles;
    }
  } finally {
    unsubscribe.forEach(off => off());
  }
  stats.finalFireworks = state.fireworks.length;
  stats.finalParticles = state.particleCount();
  Logger.debug(`[Sim] ${stats.ticks} ticks: launched=${stats.launched} detonated=${stats.detonated} reaped=${stats.reaped}`);
  return stats;
}
