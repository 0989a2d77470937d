/**
 * Viewer configuration: built-in defaults, overridden by VIEWPANE_*
 * environment variables, overridden by command-line flags.
 */

import { MAX_ENCODABLE_PAIRS } from '../render/attr.js';
import { DEFAULT_MAX_COLOR_PAIRS } from '../render/color-pair-registry.js';

export type ViewerConfig = {
  /** Seconds between runs of the watched command. */
  interval: number;
  /** Seconds to wait for a key before checking the redraw clock again. */
  pollInterval: number;
  maxColorPairs: number;
  showStatus: boolean;
  errexit: boolean;
  logFile?: string;
};

export type ConfigOverrides = Partial<ViewerConfig>;

export const DEFAULT_CONFIG: ViewerConfig = {
  interval: 2,
  pollInterval: 0.05,
  maxColorPairs: DEFAULT_MAX_COLOR_PAIRS,
  showStatus: false,
  errexit: false,
};

/** Shortest accepted interval; anything lower would spin the command. */
const MIN_INTERVAL = 0.1;

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function parseInterval(value: string, source: string): number {
  const seconds = Number(value.trim());
  if (value.trim() === '' || !Number.isFinite(seconds) || seconds <= 0) {
    throw new ConfigError(`${source} must be a positive number of seconds, got "${value}"`);
  }
  return Math.max(MIN_INTERVAL, seconds);
}

export function parsePollInterval(value: string, source: string): number {
  const seconds = Number(value.trim());
  if (value.trim() === '' || !Number.isFinite(seconds) || seconds <= 0) {
    throw new ConfigError(`${source} must be a positive number of seconds, got "${value}"`);
  }
  return seconds;
}

export function parseMaxColorPairs(value: string, source: string): number {
  const count = Number(value.trim());
  if (!Number.isInteger(count) || count < 1 || count > MAX_ENCODABLE_PAIRS) {
    throw new ConfigError(`${source} must be an integer between 1 and ${MAX_ENCODABLE_PAIRS}, got "${value}"`);
  }
  return count;
}

export function configFromEnv(env: NodeJS.ProcessEnv): ConfigOverrides {
  const overrides: ConfigOverrides = {};
  if (env.VIEWPANE_INTERVAL) {
    overrides.interval = parseInterval(env.VIEWPANE_INTERVAL, 'VIEWPANE_INTERVAL');
  }
  if (env.VIEWPANE_POLL_INTERVAL) {
    overrides.pollInterval = parsePollInterval(env.VIEWPANE_POLL_INTERVAL, 'VIEWPANE_POLL_INTERVAL');
  }
  if (env.VIEWPANE_MAX_COLOR_PAIRS) {
    overrides.maxColorPairs = parseMaxColorPairs(env.VIEWPANE_MAX_COLOR_PAIRS, 'VIEWPANE_MAX_COLOR_PAIRS');
  }
  if (env.VIEWPANE_LOG_FILE) {
    overrides.logFile = env.VIEWPANE_LOG_FILE;
  }
  return overrides;
}

const CONFIG_KEYS: Array<keyof ViewerConfig> = [
  'interval',
  'pollInterval',
  'maxColorPairs',
  'showStatus',
  'errexit',
  'logFile',
];

function assignDefined<K extends keyof ViewerConfig>(target: ViewerConfig, layer: ConfigOverrides, key: K): void {
  const value = layer[key];
  if (value !== undefined) target[key] = value;
}

export function resolveConfig(
  cli: ConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env,
): ViewerConfig {
  const config: ViewerConfig = { ...DEFAULT_CONFIG };
  for (const layer of [configFromEnv(env), cli]) {
    for (const key of CONFIG_KEYS) assignDefined(config, layer, key);
  }
  return config;
}
