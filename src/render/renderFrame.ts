import { Color } from '../core/Color';
import type { SimulationState } from '../game/SimulationState';
import type { Surface } from './Surface';

/** Clear to black and draw every firework in collection order. */
export function renderFrame(state: SimulationState, surface: Surface): void {
  surface.clear(Color.BLACK);
  for (const firework of state.fireworks) firework.draw(surface);
}
