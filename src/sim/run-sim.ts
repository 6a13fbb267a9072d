import { writeFileSync } from 'fs';
import { ConfigError, resolveConfig, type SimConfig } from '../config/simConfig';
import { Logger } from '../core/Logger';
import { runHeadless } from './HeadlessRunner';

// Args: --ticks=3600 --seed=1 --spawn=0.1 --width=120 --height=60 [--out=summary.json] [--log-level=info]
function main(): number {
  let cfg: SimConfig;
  try {
    cfg = resolveConfig(process.argv.slice(2));
  } catch (err) {
    if (err instanceof ConfigError) {
      Logger.error(`[Sim] ${err.message}`);
      return 2;
    }
    throw err;
  }
  Logger.setLogLevel(cfg.logLevel);
  const seed = cfg.seed ?? 1;

  const stats = runHeadless({
    ticks: cfg.ticks,
    width: cfg.width,
    height: cfg.height,
    seed,
    spawnProbability: cfg.spawnProbability,
  });

  if (cfg.out) {
    writeFileSync(cfg.out, JSON.stringify({ generatedAt: new Date().toISOString(), seed, config: cfg, stats }, null, 2), 'utf-8');
    Logger.info(`[Sim] summary written to ${cfg.out}`);
  }

  console.log('ticks,launched,detonated,reaped,peakFireworks,peakParticles,finalFireworks,finalParticles');
  console.log([
    stats.ticks, stats.launched, stats.detonated, stats.reaped,
    stats.peakFireworks, stats.peakParticles, stats.finalFireworks, stats.finalParticles,
  ].join(','));
  return 0;
}

process.exitCode = main();
