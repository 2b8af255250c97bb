import { config } from 'dotenv';
import { availableParallelism } from 'node:os';
import { ConfigError } from './errors.js';
import type { StressConfig } from './types.js';

config();

/** Raw values as they arrive from the command line or environment. */
export type ConfigSource = Partial<Record<keyof StressConfig, string | number | undefined>>;

const ENV_KEYS: Record<keyof StressConfig, string> = {
  serverUri: 'STRESS_SERVER_URI',
  concurrency: 'STRESS_CONCURRENCY',
  requestTimeoutMs: 'STRESS_REQUEST_TIMEOUT_MS',
  randomSeed: 'STRESS_RANDOM_SEED',
  displayIntervalMs: 'STRESS_DISPLAY_INTERVAL_MS',
  maxContentLength: 'STRESS_MAX_CONTENT_LENGTH',
  maxParameters: 'STRESS_MAX_PARAMETERS',
  probeRetries: 'STRESS_PROBE_RETRIES',
  probeTimeoutMs: 'STRESS_PROBE_TIMEOUT_MS',
};

export function parseInteger(option: string, raw: string | number, min: number): number {
  const value = typeof raw === 'number' ? raw : Number(raw.trim());
  if (!Number.isInteger(value)) {
    throw new ConfigError(option, `expected an integer, got "${raw}"`);
  }
  if (value < min) {
    throw new ConfigError(option, `must be at least ${min}, got ${value}`);
  }
  return value;
}

export function parseServerUri(raw: string): string {
  let url: URL;
  try {
    url = new URL(raw);
  } catch {
    throw new ConfigError('serverUri', `"${raw}" is not a valid URL`);
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new ConfigError('serverUri', `unsupported protocol ${url.protocol}`);
  }
  return url.toString().replace(/\/+$/, '');
}

function randomSeed(): number {
  return Math.floor(Math.random() * 0x7fffffff);
}

/**
 * Builds the run configuration. Explicit `source` values win over environment
 * variables, which win over defaults. The result is frozen.
 */
export function loadConfig(
  source: ConfigSource = {},
  env: NodeJS.ProcessEnv = process.env
): Readonly<StressConfig> {
  const pick = (key: keyof StressConfig): string | number | undefined => {
    const explicit = source[key];
    if (explicit !== undefined && explicit !== '') return explicit;
    const fromEnv = env[ENV_KEYS[key]];
    return fromEnv !== undefined && fromEnv !== '' ? fromEnv : undefined;
  };
  const int = (key: keyof StressConfig, fallback: number, min: number): number => {
    const raw = pick(key);
    return raw === undefined ? fallback : parseInteger(key, raw, min);
  };

  const serverUri = pick('serverUri');
  const seed = pick('randomSeed');

  return Object.freeze({
    serverUri: parseServerUri(serverUri === undefined ? 'http://localhost:5001' : String(serverUri)),
    concurrency: int('concurrency', availableParallelism(), 1),
    requestTimeoutMs: int('requestTimeoutMs', 10_000, 1),
    randomSeed: seed === undefined ? randomSeed() : parseInteger('randomSeed', seed, -0x80000000) | 0,
    displayIntervalMs: int('displayIntervalMs', 5_000, 1),
    maxContentLength: int('maxContentLength', 1_000, 0),
    maxParameters: int('maxParameters', 1, 1),
    probeRetries: int('probeRetries', 10, 0),
    probeTimeoutMs: int('probeTimeoutMs', 5_000, 1),
  });
}
