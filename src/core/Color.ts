import { clamp, roundHalfAwayFromZero } from './coords';

/**
 * Additive colour with integer channels in 0..255.
 * Channels are clamped and rounded on construction so every instance is a valid byte triple.
 */
export class Color {
  public static readonly BLACK = new Color(0, 0, 0);
  public static readonly WHITE = new Color(255, 255, 255);

  public readonly r: number;
  public readonly g: number;
  public readonly b: number;

  constructor(r: number, g: number, b: number) {
    this.r = toByte(r);
    this.g = toByte(g);
    this.b = toByte(b);
  }

  public static fromRgb(r: number, g: number, b: number): Color {
    return new Color(r, g, b);
  }

  /** Channel-wise multiply, e.g. by a particle's remaining lifetime. */
  public scaled(factor: number): Color {
    return new Color(this.r * factor, this.g * factor, this.b * factor);
  }

  public equals(other: Color): boolean {
    return this.r === other.r && this.g === other.g && this.b === other.b;
  }

  /**
   * Convert to hue/saturation/lightness.
   * Hue is in degrees [0, 360), saturation and lightness in percent [0, 100]; no rounding is applied.
   */
  public asHsl(): HslColor {
    const r = this.r / 255;
    const g = this.g / 255;
    const b = this.b / 255;
    const max = Math.max(r, g, b);
    const min = Math.min(r, g, b);
    const l = (max + min) / 2;
    if (max === min) return new HslColor(0, 0, l * 100);

    const d = max - min;
    const s = l > 0.5 ? d / (2 - max - min) : d / (max + min);
    let h: number;
    if (max === r) h = (g - b) / d + (g < b ? 6 : 0);
    else if (max === g) h = (b - r) / d + 2;
    else h = (r - g) / d + 4;
    return new HslColor(h * 60, s * 100, l * 100);
  }
}

/** Perceptual colour: hue in degrees, saturation and lightness in percent. */
export class HslColor {
  constructor(
    public readonly h: number,
    public readonly s: number,
    public readonly l: number,
  ) {}

  public toRgb(): Color {
    const s = clamp(this.s, 0, 100) / 100;
    const l = clamp(this.l, 0, 100) / 100;
    const c = (1 - Math.abs(2 * l - 1)) * s;
    const hp = (((this.h % 360) + 360) % 360) / 60;
    const x = c * (1 - Math.abs((hp % 2) - 1));
    const m = l - c / 2;

    let r = 0, g = 0, b = 0;
    switch (Math.floor(hp)) {
      case 0: r = c; g = x; break;
      case 1: r = x; g = c; break;
      case 2: g = c; b = x; break;
      case 3: g = x; b = c; break;
      case 4: r = x; b = c; break;
      default: r = c; b = x; break;
    }
    return new Color((r + m) * 255, (g + m) * 255, (b + m) * 255);
  }
}

function toByte(v: number): number {
  return clamp(roundHalfAwayFromZero(v), 0, 255);
}
