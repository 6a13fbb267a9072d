import { Color } from '../core/Color';
import type { Surface } from './Surface';

export interface TextSink {
  write(chunk: string): unknown;
}

const ESC = '\x1b[';
const UPPER_HALF_BLOCK = '▀';

/**
 * Pixel buffer shown on a truecolor terminal. Every cell holds two stacked pixels:
 * the glyph's foreground is the top pixel, its background the bottom one, so a
 * terminal of R rows shows 2R pixel rows.
 *
 * render() only emits cells that changed since the last flush and can be rate-limited
 * independently of how often the simulation draws.
 */
export class TerminalCanvas implements Surface {
  public readonly width: number;
  public readonly height: number;
  private readonly pixels: Uint8Array;
  private flushed: Uint8Array | null = null;
  private minFrameMs = 0;
  private lastFlush = Number.NEGATIVE_INFINITY;

  constructor(width: number, height: number, private readonly out: TextSink = process.stdout) {
    this.width = Math.max(0, Math.floor(width));
    this.height = Math.max(0, Math.floor(height));
    this.pixels = new Uint8Array(this.width * this.height * 3);
  }

  /** Cap flushes to `hz` per second; 0 disables the limit. */
  public setRefreshLimit(hz: number): void {
    this.minFrameMs = hz > 0 ? 1000 / hz : 0;
  }

  public filledRect(x: number, y: number, width: number, height: number, color: Color): void {
    const x0 = Math.max(0, x);
    const y0 = Math.max(0, y);
    const x1 = Math.min(this.width, x + width);
    const y1 = Math.min(this.height, y + height);
    for (let py = y0; py < y1; py++) {
      for (let px = x0; px < x1; px++) this.set((py * this.width + px) * 3, color);
    }
  }

  public clear(color: Color): void {
    for (let i = 0; i < this.pixels.length; i += 3) this.set(i, color);
  }

  public getPixel(x: number, y: number): Color {
    const i = (y * this.width + x) * 3;
    return new Color(this.pixels[i], this.pixels[i + 1], this.pixels[i + 2]);
  }

  /**
   * Flush the buffer to the terminal.
   * @returns false when skipped by the refresh limit.
   */
  public render(now: number = performance.now()): boolean {
    if (now - this.lastFlush < this.minFrameMs) return false;
    this.lastFlush = now;
    const chunk = this.encodeChanges();
    if (chunk.length > 0) this.out.write(chunk);
    this.flushed = this.pixels.slice();
    return true;
  }

  /** Switch to the alternate screen and hide the cursor; forces a full redraw. */
  public enterScreen(): void {
    this.flushed = null;
    this.out.write(`${ESC}?1049h${ESC}?25l${ESC}2J`);
  }

  public leaveScreen(): void {
    this.out.write(`${ESC}0m${ESC}?25h${ESC}?1049l`);
  }

  private set(i: number, color: Color): void {
    this.pixels[i] = color.r;
    this.pixels[i + 1] = color.g;
    this.pixels[i + 2] = color.b;
  }

  private encodeChanges(): string {
    const parts: string[] = [];
    const rows = Math.ceil(this.height / 2);
    const px = this.pixels;
    let cursorRow = -1;
    let cursorCol = -1;
    for (let row = 0; row < rows; row++) {
      const hasBottom = row * 2 + 1 < this.height;
      for (let col = 0; col < this.width; col++) {
        const top = (row * 2 * this.width + col) * 3;
        const bottom = top + this.width * 3;
        if (!this.cellChanged(top, hasBottom ? bottom : -1)) continue;
        if (row !== cursorRow || col !== cursorCol) parts.push(`${ESC}${row + 1};${col + 1}H`);
        const bg = hasBottom ? `${px[bottom]};${px[bottom + 1]};${px[bottom + 2]}` : '0;0;0';
        parts.push(`${ESC}38;2;${px[top]};${px[top + 1]};${px[top + 2]};48;2;${bg}m${UPPER_HALF_BLOCK}`);
        cursorRow = row;
        cursorCol = col + 1;
      }
    }
    if (parts.length > 0) parts.push(`${ESC}0m`);
    return parts.join('');
  }

  private cellChanged(top: number, bottom: number): boolean {
    const prev = this.flushed;
    if (prev === null) return true;
    const cur = this.pixels;
    for (let k = 0; k < 3; k++) {
      if (cur[top + k] !== prev[top + k]) return true;
      if (bottom >= 0 && cur[bottom + k] !== prev[bottom + k]) return true;
    }
    return false;
  }
}
