// Frame-rate bookkeeping fed from GameLoop.setFrameHook. No output of its own:
// the bootstrap logs getStats() on exit.

export interface FpsStats {
  fps: number;
  minFps: number;
  maxFps: number;
  frames: number;
  droppedFrames: number;
}

export class FPSCounter {
  private frameCount = 0;
  private totalFrames = 0;
  private sampleElapsed = 0;
  private fps = 0;
  private minFps = Infinity;
  private maxFps = 0;
  private droppedFrames = 0; // frames whose delta exceeds 2x target
  private readonly dropThresholdMs: number;
  private readonly sampleWindowMs = 1000;

  constructor(targetHz = 120) {
    this.dropThresholdMs = 2000 / targetHz;
  }

  public frame(deltaMs: number): void {
    this.frameCount++;
    this.totalFrames++;
    this.sampleElapsed += deltaMs;
    if (deltaMs > this.dropThresholdMs) this.droppedFrames++;
    if (this.sampleElapsed >= this.sampleWindowMs) {
      this.fps = (this.frameCount * 1000) / this.sampleElapsed;
      if (this.fps < this.minFps) this.minFps = this.fps;
      if (this.fps > this.maxFps) this.maxFps = this.fps;
      this.frameCount = 0;
      this.sampleElapsed = 0;
    }
  }

  public getStats(): FpsStats {
    return {
      fps: this.fps,
      minFps: isFinite(this.minFps) ? this.minFps : 0,
      maxFps: this.maxFps,
      frames: this.totalFrames,
      droppedFrames: this.droppedFrames,
    };
  }
}
