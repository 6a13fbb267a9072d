import { describe, it, expect } from 'vitest';
import { Color } from '../src/core/Color';
import { eventBus, type EventMap } from '../src/core/EventBus';
import { LcgRandom, type RandomSource } from '../src/core/Random';
import { Firework } from '../src/game/Firework';
import { SimulationState } from '../src/game/SimulationState';
import { ScriptedRandom } from './helpers/fakes';

const DIMS = { width: 100, height: 40 };

function deadFirework(): Firework {
  const fw = new Firework(5, 50, -1.5, Color.fromRgb(0, 0, 255));
  const rand = new ScriptedRandom();
  for (let i = 0; i < 400 && !fw.isDead(); i++) fw.update(rand);
  if (!fw.isDead()) throw new Error('firework did not die');
  return fw;
}

describe('SimulationState', () => {
  it('never spawns with probability 0', () => {
    const state = new SimulationState({ spawnProbability: 0 });
    const rand = new LcgRandom(7);
    for (let i = 0; i < 1000; i++) state.update(rand, DIMS);
    expect(state.fireworks).toHaveLength(0);
    expect(state.tick).toBe(1000);
  });

  it('spawns exactly one firework per tick with probability 1', () => {
    const state = new SimulationState({ spawnProbability: 1 });
    const rand = new LcgRandom(3);
    for (let i = 0; i < 10; i++) state.update(rand, DIMS);
    expect(state.fireworks).toHaveLength(10);
    expect(state.fireworks.every(f => f.phase.kind === 'ascending')).toBe(true);
    expect(state.particleCount()).toBe(10);
  });

  it('launches from odd and even columns on a seeded run', () => {
    const state = new SimulationState({ spawnProbability: 1 });
    const rand = new LcgRandom(3);
    const columns = new Set<number>();
    const off = eventBus.on('fireworkLaunched', (e) => columns.add(e.x));
    for (let i = 0; i < 2000; i++) state.update(rand, { width: 80, height: 40 });
    off();
    expect([...columns].some(x => x % 2 === 1)).toBe(true);
    expect([...columns].some(x => x % 2 === 0)).toBe(true);
    expect([...columns].every(x => Number.isInteger(x) && x >= 0 && x < 80)).toBe(true);
  });

  it('uses the default probability of 0.1 as a strict threshold', () => {
    const state = new SimulationState();
    expect(state.spawnProbability).toBe(0.1);
    state.update(new ScriptedRandom([0.1]), DIMS);
    expect(state.fireworks).toHaveLength(0);
    state.update(new ScriptedRandom([0.0999]), DIMS);
    expect(state.fireworks).toHaveLength(1);
  });

  it('launches from the bottom edge with a random column, speed and seed colour', () => {
    const launches: EventMap['fireworkLaunched'][] = [];
    const off = eventBus.on('fireworkLaunched', (e) => launches.push(e));
    const state = new SimulationState();
    // trial, then speed
    state.update(new ScriptedRandom([0.05, 0.25], 0.5, [1234], [10, 20, 30]), DIMS);
    off();

    expect(launches).toEqual([{ x: 34, y: 40, speed: -1.25, tick: 1 }]);
    const fw = state.fireworks[0];
    expect(fw.phase.kind).toBe('ascending');
    if (fw.phase.kind !== 'ascending') return;
    // advanced once in the tick it was launched
    expect(fw.phase.rocket.position.x).toBe(34);
    expect(fw.phase.rocket.position.y).toBeCloseTo(40 - 1.23, 10);
    const expected = Color.fromRgb(10, 20, 30).asHsl();
    expect(fw.baseColor.h).toBeCloseTo(expected.h, 10);
    expect(fw.baseColor.s).toBeCloseTo(expected.s, 10);
    expect(fw.baseColor.l).toBeCloseTo(expected.l, 10);
  });

  it('reaps dead fireworks before the spawn trial', () => {
    const state = new SimulationState({ spawnProbability: 1 });
    const live = new Firework(1, 40, -1.5, Color.WHITE);
    state.add(deadFirework());
    state.add(live);

    let countAtTrial = -1;
    const order: string[] = [];
    const offs = [
      eventBus.on('fireworksReaped', (e) => order.push(`reaped:${e.count}`)),
      eventBus.on('fireworkLaunched', () => order.push('launched')),
    ];
    const base = new ScriptedRandom();
    const rand: RandomSource = {
      nextFloat: () => {
        if (countAtTrial < 0) countAtTrial = state.fireworks.length;
        return base.nextFloat();
      },
      nextU32: () => base.nextU32(),
      nextByte: () => base.nextByte(),
    };
    state.update(rand, DIMS);
    offs.forEach(off => off());

    expect(countAtTrial).toBe(1);
    expect(order).toEqual(['reaped:1', 'launched']);
    expect(state.fireworks).toHaveLength(2);
    expect(state.fireworks[0]).toBe(live);
    expect(state.fireworks.some(f => f.isDead())).toBe(false);
  });

  it('leaves no dead firework behind over a long run', () => {
    const state = new SimulationState({ spawnProbability: 0.3 });
    const rand = new LcgRandom(11);
    let reaped = 0;
    const off = eventBus.on('fireworksReaped', (e) => { reaped += e.count; });
    for (let i = 0; i < 2000; i++) {
      state.update(rand, DIMS);
      // anything dead now dies only during this tick's advance, and goes next tick
      const dead = state.fireworks.filter(f => f.isDead());
      state.update(new ScriptedRandom([1]), DIMS);
      for (const f of dead) expect(state.fireworks).not.toContain(f);
    }
    off();
    expect(reaped).toBeGreaterThan(0);
  });

  it('clears every firework', () => {
    const state = new SimulationState({ spawnProbability: 1 });
    state.update(new LcgRandom(1), DIMS);
    state.clear();
    expect(state.fireworks).toHaveLength(0);
    expect(state.particleCount()).toBe(0);
  });
});
