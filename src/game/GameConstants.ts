/**
 * Tuning constants for the firework simulation.
 * Values are per tick at the fixed update rate; the look of the bursts depends on them exactly.
 */
export const GameConstants = {
  PARTICLE: {
    /** Lifetime lost per tick unless overridden */
    DEFAULT_FADING: 0.01,
  },

  ROCKET: {
    WIDTH: 1,
    HEIGHT: 3,
    /** Downward pull (positive y is down) */
    GRAVITY: 0.02,
    /** Detonate once vertical velocity rises above this */
    DETONATION_VELOCITY_Y: -0.3,
  },

  BURST: {
    PARTICLE_COUNT: 25,
    PARTICLE_SIZE: 1,
    GRAVITY: 0.02,
    /** Max +/- saturation offset, percent */
    SATURATION_JITTER: 20,
    /** Max +/- lightness offset, percent */
    LIGHTNESS_JITTER: 40,
    SPREAD_X: 1.5,
    SPREAD_Y: 1.5,
    /** vx = SPREAD_X * (U - BIAS_X) */
    BIAS_X: 0.5,
    /** vy = SPREAD_Y * (U - BIAS_Y); biased upward */
    BIAS_Y: 0.9,
  },

  SPAWN: {
    /** One Bernoulli trial per tick */
    PROBABILITY: 0.1,
    /** Launch speed = BASE_SPEED + U * SPEED_RANGE, so in (-2, -1] */
    BASE_SPEED: -1.0,
    SPEED_RANGE: -1.0,
  },
} as const;
