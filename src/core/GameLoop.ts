/**
 * Drives the simulation with a fixed timestep, decoupled from how often frames are rendered.
 * Logic always advances in whole ticks of 1000/fixedHz ms; rendering happens once per frame.
 */
export interface GameLoopOptions {
    /** Logic ticks per second (default 60). */
    fixedHz?: number;
    /** Frames scheduled per second (default 120). */
    frameHz?: number;
    /** Called with any error thrown by a callback; the loop is stopped first. */
    onError?: (err: unknown) => void;
}

export class GameLoop {
    private lastTime = -1;
    private accumulatedTime = 0;
    /** Fixed update interval in ms (logic tick). */
    private readonly fixedUpdateInterval: number;
    private readonly frameInterval: number;
    /** Update callback receives fixed delta (ms). */
    private update: (deltaMs: number) => void;
    /** Render callback receives the raw frame delta (ms), for diagnostics only. */
    private render: (frameDeltaMs: number) => void;
    private timer: ReturnType<typeof setTimeout> | null = null;
    private active = false;
    private frameHook?: (rawDeltaMs: number) => void; // Optional per-frame listener (FPS counter)
    private readonly onError?: (err: unknown) => void;
    private maxCatchUpFrames = 5; // spiral-of-death guard
    private loopBound: () => void;
    private maxDeltaClamp = 1000; // clamp huge stalls (suspended process, debugger)

    constructor(updateCallback: (deltaMs: number) => void, renderCallback: (frameDeltaMs: number) => void, opts?: GameLoopOptions) {
        this.update = updateCallback;
        this.render = renderCallback;
        const hz = opts?.fixedHz && opts.fixedHz > 0 ? opts.fixedHz : 60;
        const frameHz = opts?.frameHz && opts.frameHz > 0 ? opts.frameHz : 120;
        this.fixedUpdateInterval = 1000 / hz;
        this.frameInterval = 1000 / frameHz;
        this.onError = opts?.onError;
        this.loopBound = () => this.tickFromTimer();
    }

    public get running(): boolean {
        return this.active;
    }

    public start(): void {
        if (this.active) return; // already running
        this.active = true;
        this.timer = setTimeout(this.loopBound, 0);
    }

    /** Safe to call from inside update() or render(). */
    public stop(): void {
        this.active = false;
        if (this.timer !== null) {
            clearTimeout(this.timer);
            this.timer = null;
        }
    }

    /**
     * Reset internal timers so that after a pause we don't process a huge delta.
     */
    public resetTiming(): void {
        this.lastTime = -1;
        this.accumulatedTime = 0;
    }

    /**
     * Registers a lightweight callback invoked once per frame after logic & render.
     */
    public setFrameHook(cb: (rawDeltaMs: number) => void): void {
        this.frameHook = cb;
    }

    /**
     * Advance to `currentTime` (ms): run every whole tick that fits, then render once.
     * @returns Number of logic ticks executed.
     */
    public step(currentTime: number): number {
        if (this.lastTime < 0) this.lastTime = currentTime;
        let deltaMs = currentTime - this.lastTime;
        this.lastTime = currentTime;
        if (deltaMs < 0) deltaMs = 0;
        if (deltaMs > this.maxDeltaClamp) deltaMs = this.fixedUpdateInterval; // huge spike -> treat as single tick

        this.accumulatedTime += deltaMs;
        const cap = this.fixedUpdateInterval * this.maxCatchUpFrames;
        if (this.accumulatedTime > cap) this.accumulatedTime = cap; // drop excess backlog
        let ticks = 0;
        while (this.accumulatedTime >= this.fixedUpdateInterval) {
            this.update(this.fixedUpdateInterval);
            this.accumulatedTime -= this.fixedUpdateInterval;
            ticks++;
        }
        this.render(deltaMs);
        this.frameHook?.(deltaMs);
        return ticks;
    }

    private tickFromTimer(): void {
        this.timer = null;
        try {
            this.step(performance.now());
        } catch (err) {
            this.stop();
            if (this.onError) {
                this.onError(err);
                return;
            }
            throw err;
        }
        if (this.active) this.timer = setTimeout(this.loopBound, this.frameInterval);
    }
}
