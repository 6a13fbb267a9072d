import { Color } from '../core/Color';
import { eventBus } from '../core/EventBus';
import type { RandomSource } from '../core/Random';
import type { SurfaceDimensions } from '../render/Surface';
import { Firework } from './Firework';
import { GameConstants } from './GameConstants';

/**
 * Owns every live firework. Each tick runs reap -> spawn -> advance, in that order,
 * so no dead firework survives a tick and a new launch is advanced the tick it spawns.
 */
export class SimulationState {
  public spawnProbability: number;
  private readonly _fireworks: Firework[] = [];
  private _tick = 0;

  constructor(opts?: { spawnProbability?: number }) {
    this.spawnProbability = opts?.spawnProbability ?? GameConstants.SPAWN.PROBABILITY;
  }

  /** Draw order: later entries are drawn on top. */
  public get fireworks(): ReadonlyArray<Firework> {
    return this._fireworks;
  }

  public get tick(): number {
    return this._tick;
  }

  public update(rand: RandomSource, dims: SurfaceDimensions): void {
    this._tick++;
    this.reap();
    if (rand.nextFloat() < this.spawnProbability) this.launch(rand, dims);
    for (const firework of this._fireworks) firework.update(rand);
  }

  /** Append a firework directly, bypassing the spawn policy. */
  public add(firework: Firework): void {
    this._fireworks.push(firework);
  }

  public clear(): void {
    this._fireworks.length = 0;
  }

  /** Rockets plus live burst particles. */
  public particleCount(): number {
    let n = 0;
    for (const f of this._fireworks) n += f.liveParticleCount();
    return n;
  }

  /** Single-pass in-place compaction; keeps survivors in their original order. */
  private reap(): void {
    const list = this._fireworks;
    let write = 0;
    for (let read = 0; read < list.length; read++) {
      const f = list[read];
      if (!f.isDead()) list[write++] = f;
    }
    const removed = list.length - write;
    if (removed === 0) return;
    list.length = write;
    eventBus.emit('fireworksReaped', { count: removed, tick: this._tick });
  }

  private launch(rand: RandomSource, dims: SurfaceDimensions): void {
    const { BASE_SPEED, SPEED_RANGE } = GameConstants.SPAWN;
    const x = dims.width > 0 ? rand.nextU32() % dims.width : 0;
    const y = dims.height;
    const speed = BASE_SPEED + rand.nextFloat() * SPEED_RANGE;
    const seed = Color.fromRgb(rand.nextByte(), rand.nextByte(), rand.nextByte());
    this._fireworks.push(new Firework(x, y, speed, seed));
    eventBus.emit('fireworkLaunched', { x, y, speed, tick: this._tick });
  }
}
