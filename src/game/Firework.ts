import { Color, HslColor } from '../core/Color';
import { clamp, snapToPixel } from '../core/coords';
import { eventBus } from '../core/EventBus';
import type { RandomSource } from '../core/Random';
import type { Surface } from '../render/Surface';
import { GameConstants } from './GameConstants';
import { Particle } from './Particle';

export type FireworkPhase =
  | { kind: 'ascending'; rocket: Particle }
  | { kind: 'exploded' };

const { ROCKET, BURST } = GameConstants;

/**
 * A rocket that climbs until gravity slows it past the detonation threshold, then
 * bursts into a fixed number of fading particles coloured around one base hue.
 */
export class Firework {
  public readonly baseColor: HslColor;
  private _phase: FireworkPhase;
  private readonly particles: Particle[] = [];

  constructor(x: number, y: number, initialYSpeed: number, seedColor: Color) {
    this._phase = {
      kind: 'ascending',
      rocket: new Particle(x, y, ROCKET.WIDTH, ROCKET.HEIGHT, Color.WHITE, {
        fading: 0,
        velocity: { x: 0, y: initialYSpeed },
        acceleration: { x: 0, y: ROCKET.GRAVITY },
      }),
    };
    this.baseColor = seedColor.asHsl();
  }

  public get phase(): FireworkPhase {
    return this._phase;
  }

  public get effect(): ReadonlyArray<Particle> {
    return this.particles;
  }

  public update(rand: RandomSource): void {
    if (this._phase.kind === 'ascending') {
      const rocket = this._phase.rocket;
      rocket.update();
      if (rocket.velocity.y > ROCKET.DETONATION_VELOCITY_Y) {
        this.detonate(rocket, rand);
      }
    }

    for (const particle of this.particles) particle.update();
  }

  public draw(surface: Surface): void {
    if (this._phase.kind === 'ascending') this._phase.rocket.draw(surface);
    for (const particle of this.particles) particle.draw(surface);
  }

  public isDead(): boolean {
    return this._phase.kind === 'exploded' && this.particles.every(p => p.isDead());
  }

  public liveParticleCount(): number {
    let n = this._phase.kind === 'ascending' ? 1 : 0;
    for (const p of this.particles) if (!p.isDead()) n++;
    return n;
  }

  private detonate(rocket: Particle, rand: RandomSource): void {
    const at = snapToPixel(rocket.position.x, rocket.position.y);
    const base = this.baseColor;
    for (let i = 0; i < BURST.PARTICLE_COUNT; i++) {
      const s = clamp(base.s + (rand.nextFloat() - 0.5) * 2 * BURST.SATURATION_JITTER, 0, 100);
      const l = clamp(base.l + (rand.nextFloat() - 0.5) * 2 * BURST.LIGHTNESS_JITTER, 0, 100);
      const vx = BURST.SPREAD_X * (rand.nextFloat() - BURST.BIAS_X);
      const vy = BURST.SPREAD_Y * (rand.nextFloat() - BURST.BIAS_Y);
      this.particles.push(
        new Particle(at.x, at.y, BURST.PARTICLE_SIZE, BURST.PARTICLE_SIZE, new HslColor(base.h, s, l).toRgb(), {
          velocity: { x: vx, y: vy },
          acceleration: { x: 0, y: BURST.GRAVITY },
        }),
      );
    }
    this._phase = { kind: 'exploded' };
    eventBus.emit('fireworkDetonated', { x: at.x, y: at.y, particles: BURST.PARTICLE_COUNT });
  }
}
