/** Round to nearest, ties away from zero (Math.round ties toward +Infinity). */
export function roundHalfAwayFromZero(v: number): number {
  return v < 0 ? -Math.round(-v) : Math.round(v);
}

/** Snap a sub-pixel position to the surface pixel grid. */
export function snapToPixel(x: number, y: number) {
  return { x: roundHalfAwayFromZero(x), y: roundHalfAwayFromZero(y) };
}

export function clamp(v: number, min: number, max: number): number {
  return v < min ? min : v > max ? max : v;
}
