import type { Color } from '../core/Color';

/**
 * Pixel surface the simulation draws into. Coordinates are integer pixels;
 * implementations clip rectangles that fall partly or wholly outside.
 */
export interface Surface {
  readonly width: number;
  readonly height: number;
  filledRect(x: number, y: number, width: number, height: number, color: Color): void;
  clear(color: Color): void;
}

export type SurfaceDimensions = Pick<Surface, 'width' | 'height'>;
