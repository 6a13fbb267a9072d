// Entry point: fireworks in the terminal until q, Esc or Ctrl-C.
import { appendFileSync } from 'fs';
import { ConfigError, parseArgs, resolveConfig, type SimConfig } from './config/simConfig';
import { FPSCounter } from './core/FPSCounter';
import { GameLoop } from './core/GameLoop';
import { Logger } from './core/Logger';
import { LcgRandom, MathRandom, type RandomSource } from './core/Random';
import { SimulationState } from './game/SimulationState';
import { TerminalInput } from './input/TerminalInput';
import { renderFrame } from './render/renderFrame';
import { TerminalCanvas } from './render/TerminalCanvas';

const USAGE = `Usage: npm start -- [options]

Options:
  --hz=<n>             Logic ticks per second (default 60)
  --refresh=<n>        Max screen refreshes per second (default 120)
  --spawn=<p>          Launch probability per tick, 0..1 (default 0.1)
  --seed=<n>           Reproducible random sequence
  --log=<path>         Append log lines to a file
  --log-level=<level>  debug | info | warn | error | silent (default warn)
  --config=<path>      JSON file with any of the above (field names)
  --help               Show this help

Keys: q / Esc / Ctrl-C to quit`;

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function main(): void {
  const argv = process.argv.slice(2);
  if (parseArgs(argv).help !== undefined) {
    console.log(USAGE);
    return;
  }

  let cfg: SimConfig;
  try {
    cfg = resolveConfig(argv);
  } catch (err) {
    if (err instanceof ConfigError) {
      Logger.error(`[Main] ${err.message}`);
      process.exitCode = 2;
      return;
    }
    throw err;
  }

  Logger.setLogLevel(cfg.logLevel);
  const logFile = cfg.logFile;
  if (logFile) {
    Logger.addTelemetryHook((level, message) => {
      appendFileSync(logFile, `${new Date().toISOString()} [${level.toUpperCase()}] ${message}\n`, 'utf-8');
    });
  }

  const { columns, rows, isTTY } = process.stdout;
  if (!isTTY || !columns || !rows) {
    Logger.error('[Main] stdout is not a terminal; use `npm run sim` for headless runs');
    process.exitCode = 1;
    return;
  }

  // Two pixel rows per terminal row (half-block cells)
  const canvas = new TerminalCanvas(columns, rows * 2);
  canvas.setRefreshLimit(cfg.refreshLimitHz);
  const input = new TerminalInput(process.stdin);
  const state = new SimulationState({ spawnProbability: cfg.spawnProbability });
  const rand: RandomSource = cfg.seed === null ? new MathRandom() : new LcgRandom(cfg.seed);
  const fps = new FPSCounter(cfg.refreshLimitHz);
  const consoleLevel = Logger.getLogLevel();
  let finished = false;

  const shutdown = (code: number, err?: unknown) => {
    if (finished) return;
    finished = true;
    loop.stop();
    input.stop();
    canvas.leaveScreen();
    Logger.setLogLevel(consoleLevel);
    if (err !== undefined) Logger.error(`[Main] fatal: ${errorMessage(err)}`, err);
    const s = fps.getStats();
    Logger.info(`[Main] ${state.tick} ticks, ${s.frames} frames, ${s.fps.toFixed(1)} fps (min ${s.minFps.toFixed(1)}, dropped ${s.droppedFrames})`);
    process.exit(code);
  };

  const loop = new GameLoop(
    () => {
      if (input.quitRequested()) {
        shutdown(0);
        return;
      }
      state.update(rand, canvas);
      input.endTick();
    },
    () => {
      renderFrame(state, canvas);
      canvas.render();
    },
    { fixedHz: cfg.updateHz, frameHz: cfg.refreshLimitHz, onError: (err) => shutdown(1, err) },
  );
  loop.setFrameHook((deltaMs) => fps.frame(deltaMs));

  process.once('SIGINT', () => shutdown(0));
  process.once('SIGTERM', () => shutdown(0));

  Logger.info(`[Main] ${canvas.width}x${canvas.height} px, ${cfg.updateHz} Hz, spawn p=${cfg.spawnProbability}`);
  // The canvas owns the screen from here on; console output would tear it
  Logger.setLogLevel('silent');
  canvas.enterScreen();
  input.start();
  loop.start();
}

main();
