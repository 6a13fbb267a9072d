import { describe, it, expect } from 'vitest';
import { Color } from '../src/core/Color';
import { TerminalCanvas } from '../src/render/TerminalCanvas';

const RED = Color.fromRgb(255, 0, 0);
const BLACK_CELL = '\x1b[38;2;0;0;0;48;2;0;0;0m▀';

function sink() {
  const writes: string[] = [];
  return { writes, out: { write: (chunk: string) => { writes.push(chunk); return true; } } };
}

describe('TerminalCanvas', () => {
  it('packs two pixel rows into one half-block cell', () => {
    const { writes, out } = sink();
    const canvas = new TerminalCanvas(1, 2, out);
    canvas.clear(Color.BLACK);
    canvas.filledRect(0, 0, 1, 1, RED);
    expect(canvas.render(0)).toBe(true);
    expect(writes).toEqual(['\x1b[1;1H\x1b[38;2;255;0;0;48;2;0;0;0m▀\x1b[0m']);
  });

  it('writes only cells that changed since the last flush', () => {
    const { writes, out } = sink();
    const canvas = new TerminalCanvas(3, 2, out);
    canvas.clear(Color.BLACK);
    canvas.render(0);
    expect(writes[0]).toBe(`\x1b[1;1H${BLACK_CELL}${BLACK_CELL}${BLACK_CELL}\x1b[0m`);

    canvas.render(10);
    expect(writes).toHaveLength(1);

    canvas.filledRect(2, 1, 1, 1, Color.fromRgb(0, 0, 255));
    canvas.render(20);
    expect(writes[1]).toBe('\x1b[1;3H\x1b[38;2;0;0;0;48;2;0;0;255m▀\x1b[0m');
  });

  it('pads an odd last row with a black background', () => {
    const { writes, out } = sink();
    const canvas = new TerminalCanvas(1, 3, out);
    canvas.filledRect(0, 2, 1, 1, Color.fromRgb(0, 255, 0));
    canvas.render(0);
    expect(writes[0]).toBe(`\x1b[1;1H${BLACK_CELL}\x1b[2;1H\x1b[38;2;0;255;0;48;2;0;0;0m▀\x1b[0m`);
  });

  it('clips rectangles to the buffer', () => {
    const canvas = new TerminalCanvas(4, 4, { write: () => true });
    canvas.filledRect(-1, -1, 3, 3, Color.WHITE);
    canvas.filledRect(10, 10, 5, 5, RED);
    expect(canvas.getPixel(0, 0)).toEqual(Color.WHITE);
    expect(canvas.getPixel(1, 1)).toEqual(Color.WHITE);
    expect(canvas.getPixel(2, 2)).toEqual(Color.BLACK);
    expect(canvas.getPixel(3, 3)).toEqual(Color.BLACK);
  });

  it('skips flushes faster than the refresh limit', () => {
    const { writes, out } = sink();
    const canvas = new TerminalCanvas(1, 2, out);
    canvas.setRefreshLimit(10);
    expect(canvas.render(0)).toBe(true);
    canvas.clear(RED);
    expect(canvas.render(50)).toBe(false);
    expect(writes).toHaveLength(1);
    expect(canvas.render(100)).toBe(true);
    expect(writes).toHaveLength(2);
  });

  it('redraws everything after entering the alternate screen', () => {
    const { writes, out } = sink();
    const canvas = new TerminalCanvas(1, 2, out);
    canvas.render(0);
    canvas.enterScreen();
    canvas.render(10);
    expect(writes).toEqual([
      `\x1b[1;1H${BLACK_CELL}\x1b[0m`,
      '\x1b[?1049h\x1b[?25l\x1b[2J',
      `\x1b[1;1H${BLACK_CELL}\x1b[0m`,
    ]);
    canvas.leaveScreen();
    expect(writes[3]).toBe('\x1b[0m\x1b[?25h\x1b[?1049l');
  });
});
