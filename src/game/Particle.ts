import { Color } from '../core/Color';
import { snapToPixel } from '../core/coords';
import type { Surface } from '../render/Surface';
import { GameConstants } from './GameConstants';

export type Vec2 = { x: number; y: number };

export interface ParticleOptions {
  /** Lifetime lost per tick; 0 makes the particle immortal. */
  fading?: number;
  velocity?: Vec2;
  acceleration?: Vec2;
}

/**
 * Filled rectangle with simple constant-acceleration motion and a fading lifetime in [0, 1].
 * A particle whose lifetime has reached zero is frozen: update() and draw() do nothing.
 */
export class Particle {
  public readonly position: Vec2;
  public readonly velocity: Vec2;
  public readonly acceleration: Readonly<Vec2>;
  public readonly width: number;
  public readonly height: number;
  public readonly fading: number;
  public readonly color: Color;
  private life = 1;

  constructor(x: number, y: number, width: number, height: number, color: Color, opts?: ParticleOptions) {
    this.position = { x, y };
    this.width = width;
    this.height = height;
    this.color = color;
    this.fading = opts?.fading ?? GameConstants.PARTICLE.DEFAULT_FADING;
    this.velocity = { x: opts?.velocity?.x ?? 0, y: opts?.velocity?.y ?? 0 };
    this.acceleration = { x: opts?.acceleration?.x ?? 0, y: opts?.acceleration?.y ?? 0 };
  }

  public get lifetime(): number {
    return this.life;
  }

  public isDead(): boolean {
    return this.life <= 0;
  }

  /** Semi-implicit Euler: the new velocity moves the particle this tick. */
  public update(): void {
    if (this.isDead()) return;
    this.velocity.x += this.acceleration.x;
    this.velocity.y += this.acceleration.y;
    this.life -= this.fading;
    this.position.x += this.velocity.x;
    this.position.y += this.velocity.y;
  }

  public draw(surface: Surface): void {
    if (this.isDead()) return;
    const p = snapToPixel(this.position.x, this.position.y);
    surface.filledRect(p.x, p.y, this.width, this.height, this.color.scaled(this.life));
  }
}
