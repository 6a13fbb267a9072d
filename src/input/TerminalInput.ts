/**
 * Raw-mode keyboard state for the terminal. Keys pressed since the last endTick() are
 * reported by isKeyPressed(); the quit request is sticky once seen.
 */
export interface KeySource {
  on(event: 'data', listener: (chunk: Buffer | string) => void): unknown;
  off(event: 'data', listener: (chunk: Buffer | string) => void): unknown;
  isTTY?: boolean;
  setRawMode?(mode: boolean): unknown;
  setEncoding?(encoding: BufferEncoding): unknown;
  resume?(): unknown;
  pause?(): unknown;
}

export type KeyState = { [key: string]: boolean };

const CTRL_C = '\u0003';
const ESCAPE = '\u001b';
const QUIT_KEYS = new Set(['q', 'Q', ESCAPE, CTRL_C]);

export class TerminalInput {
  private keyState: KeyState = {};
  private quit = false;
  private detach: (() => void) | null = null;

  constructor(private readonly source: KeySource) {}

  /** Start listening. Calling start() twice is a no-op. */
  public start(): void {
    if (this.detach) return;
    const src = this.source;
    const onData = (chunk: Buffer | string) => this.feed(typeof chunk === 'string' ? chunk : chunk.toString('utf8'));
    if (src.isTTY && src.setRawMode) src.setRawMode(true);
    src.setEncoding?.('utf8');
    src.on('data', onData);
    src.resume?.();
    this.detach = () => {
      src.off('data', onData);
      if (src.isTTY && src.setRawMode) src.setRawMode(false);
      src.pause?.();
    };
  }

  public stop(): void {
    this.detach?.();
    this.detach = null;
  }

  /** Record raw input. A lone escape byte counts as Esc; longer escape sequences are ignored. */
  public feed(data: string): void {
    if (data.startsWith(ESCAPE) && data.length > 1) return;
    for (const ch of data) {
      this.keyState[ch] = true;
      if (QUIT_KEYS.has(ch)) this.quit = true;
    }
  }

  public isKeyPressed(key: string): boolean {
    return this.keyState[key] === true;
  }

  public quitRequested(): boolean {
    return this.quit;
  }

  /** Forget per-tick key presses; the quit request survives. */
  public endTick(): void {
    this.keyState = {};
  }
}
