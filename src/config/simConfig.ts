/**
 * Runtime configuration: defaults, then an optional JSON file (--config=path),
 * then --key=value arguments. Firework physics constants are not configurable;
 * see game/GameConstants.ts.
 */
import { readFileSync } from 'fs';
import { isLogLevel, type LogLevel } from '../core/Logger';

export interface SimConfig {
  /** Logic ticks per second */
  updateHz: number;
  /** Max terminal flushes per second */
  refreshLimitHz: number;
  /** Chance of one launch per tick, 0..1 */
  spawnProbability: number;
  /** Seed for a reproducible random source; null uses Math.random */
  seed: number | null;
  logLevel: LogLevel | 'silent';
  /** Append every log line here when set */
  logFile: string | null;
  /** Headless runner only: ticks to simulate */
  ticks: number;
  /** Headless runner only: JSON summary path */
  out: string | null;
  /** Headless runner only: off-screen surface size */
  width: number;
  height: number;
}

export const SimDefaults: Readonly<SimConfig> = Object.freeze({
  updateHz: 60,
  refreshLimitHz: 120,
  spawnProbability: 0.1,
  seed: null,
  logLevel: 'warn',
  logFile: null,
  ticks: 3600,
  out: null,
  width: 120,
  height: 60,
});

export class ConfigError extends Error {
  constructor(public readonly key: string, message: string) {
    super(`${key}: ${message}`);
    this.name = 'ConfigError';
  }
}

/** Command-line spellings accepted in addition to the field names. */
const ALIASES: Record<string, keyof SimConfig> = {
  hz: 'updateHz',
  refresh: 'refreshLimitHz',
  spawn: 'spawnProbability',
  log: 'logFile',
  'log-level': 'logLevel',
};

/** Parse `--key=value` pairs; a bare `--flag` becomes "true". Positional arguments are ignored. */
export function parseArgs(argv: string[]): Record<string, string> {
  return argv.reduce<Record<string, string>>((m, a) => {
    if (!a.startsWith('--')) return m;
    const eq = a.indexOf('=');
    if (eq < 0) m[a.slice(2)] = 'true';
    else m[a.slice(2, eq)] = a.slice(eq + 1);
    return m;
  }, {});
}

export function loadConfigFile(path: string): Record<string, unknown> {
  let text: string;
  try {
    text = readFileSync(path, 'utf-8');
  } catch (err) {
    throw new ConfigError('config', `cannot read ${path}: ${err instanceof Error ? err.message : String(err)}`);
  }
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new ConfigError('config', `invalid JSON in ${path}: ${err instanceof Error ? err.message : String(err)}`);
  }
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw new ConfigError('config', `${path} must contain a JSON object`);
  }
  return { ...raw };
}

/**
 * Build the effective configuration from process arguments.
 * Unknown keys are rejected so that typos do not silently fall back to defaults.
 */
export function resolveConfig(argv: string[], defaults: Readonly<SimConfig> = SimDefaults): SimConfig {
  const args = parseArgs(argv);
  const cfg: SimConfig = { ...defaults };
  if (args.config !== undefined) {
    for (const [k, v] of Object.entries(loadConfigFile(args.config))) applyValue(cfg, k, v);
  }
  for (const [k, v] of Object.entries(args)) {
    if (k === 'config' || k === 'help') continue;
    applyValue(cfg, k, v);
  }
  return cfg;
}

function applyValue(cfg: SimConfig, rawKey: string, value: unknown): void {
  const key = ALIASES[rawKey] ?? rawKey;
  switch (key) {
    case 'updateHz':
    case 'refreshLimitHz':
      cfg[key] = positive(key, toNumber(key, value));
      break;
    case 'ticks':
    case 'width':
    case 'height':
      cfg[key] = positiveInt(key, toNumber(key, value));
      break;
    case 'spawnProbability': {
      const p = toNumber(key, value);
      if (p < 0 || p > 1) throw new ConfigError(key, `must be between 0 and 1, got ${p}`);
      cfg.spawnProbability = p;
      break;
    }
    case 'seed':
      cfg.seed = value === null ? null : Math.trunc(toNumber(key, value));
      break;
    case 'logLevel': {
      const level = String(value);
      if (!isLogLevel(level)) throw new ConfigError(key, `unknown log level "${level}"`);
      cfg.logLevel = level;
      break;
    }
    case 'logFile':
    case 'out':
      cfg[key] = value === null ? null : nonEmpty(key, value);
      break;
    default:
      throw new ConfigError(rawKey, 'unknown option');
  }
}

function toNumber(key: string, value: unknown): number {
  const n = typeof value === 'number' ? value : typeof value === 'string' && value.trim() !== '' ? Number(value) : NaN;
  if (!Number.isFinite(n)) throw new ConfigError(key, `expected a number, got ${JSON.stringify(value)}`);
  return n;
}

function positive(key: string, n: number): number {
  if (n <= 0) throw new ConfigError(key, `must be positive, got ${n}`);
  return n;
}

function positiveInt(key: string, n: number): number {
  if (!Number.isInteger(n) || n <= 0) throw new ConfigError(key, `must be a positive integer, got ${n}`);
  return n;
}

function nonEmpty(key: string, value: unknown): string {
  if (typeof value !== 'string' || value === '' || value === 'true') throw new ConfigError(key, 'expected a path');
  return value;
}
