/**
 * Entropy provider handed to every piece of the simulation that needs randomness.
 * Nothing in the simulation reads Math.random directly, so tests and the headless
 * runner can substitute a reproducible source.
 */
export interface RandomSource {
  /** Uniform float in [0, 1). */
  nextFloat(): number;
  /** Uniform unsigned 32-bit integer. */
  nextU32(): number;
  /** Uniform integer in 0..255. */
  nextByte(): number;
}

/** Unseeded source backed by Math.random (the interactive default). */
export class MathRandom implements RandomSource {
  public nextFloat(): number {
    return Math.random();
  }

  public nextU32(): number {
    return Math.floor(Math.random() * 0x100000000) >>> 0;
  }

  public nextByte(): number {
    return Math.floor(Math.random() * 256);
  }
}

/**
 * Reproducible linear congruential source.
 * Same constants as the classic ANSI C rand(); period 2^31.
 */
export class LcgRandom implements RandomSource {
  private state: number;

  constructor(seed: number) {
    this.state = (seed >>> 0) & 0x7fffffff || 1;
  }

  public nextFloat(): number {
    return this.advance() / 0x80000000;
  }

  /** Two steps, high 16 bits of each; the low bits of a power-of-two LCG cycle too quickly. */
  public nextU32(): number {
    const hi = this.advance() >>> 15;
    const lo = this.advance() >>> 15;
    return ((hi << 16) | lo) >>> 0;
  }

  public nextByte(): number {
    return Math.floor(this.nextFloat() * 256);
  }

  private advance(): number {
    this.state = (Math.imul(1103515245, this.state) + 12345) & 0x7fffffff;
    return this.state;
  }
}
