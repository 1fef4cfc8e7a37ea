import { existsSync, readFileSync, writeFileSync, mkdirSync } from 'fs';
import { dirname, join } from 'path';
import { homedir } from 'os';
import * as dotenv from 'dotenv';
import { UsageError } from './errors.js';

dotenv.config();

type ValueKind = 'string' | 'count' | 'seconds' | 'millis';

// Node timers take at most 2^31-1 ms; longer delays fire after 1 ms.
const MAX_TIMER_MS = 2_147_483_647;
const MAX_TIMER_SECONDS = Math.floor(MAX_TIMER_MS / 1000);

interface KeySpec {
  env: string;
  kind: ValueKind;
  fallback?: string | number;
  description: string;
}

export const CONFIG_KEYS = {
  'targets-file': { env: 'RUNBENCH_TARGETS', kind: 'string', description: 'JSON file listing targets' },
  'outputs-file': { env: 'RUNBENCH_OUTPUTS', kind: 'string', description: 'terraform output -json file with <name>_url keys' },
  'requests': { env: 'RUNBENCH_REQUESTS', kind: 'count', fallback: 10, description: 'Probe requests per target' },
  'timeout': { env: 'RUNBENCH_TIMEOUT', kind: 'seconds', fallback: 30, description: 'Per-request probe timeout (s)' },
  'metrics-timeout': { env: 'RUNBENCH_METRICS_TIMEOUT', kind: 'seconds', fallback: 60, description: 'Metrics request timeout (s)' },
  'probe-path': { env: 'RUNBENCH_PROBE_PATH', kind: 'string', fallback: 'messages', description: 'Path probed for latency' },
  'delay': { env: 'RUNBENCH_DELAY_MS', kind: 'millis', fallback: 0, description: 'Pause between probe requests (ms)' },
  'project': { env: 'GCP_PROJECT_ID', kind: 'string', description: 'Cloud project for scaling' },
  'region': { env: 'GCP_REGION', kind: 'string', fallback: 'asia-southeast1', description: 'Cloud region for scaling' },
} satisfies Record<string, KeySpec>;

export type ConfigKey = keyof typeof CONFIG_KEYS;
type Config = Partial<Record<ConfigKey, string | number>>;

export function isConfigKey(key: string): key is ConfigKey {
  return Object.prototype.hasOwnProperty.call(CONFIG_KEYS, key);
}

export function getConfigPath(): string {
  const dir = process.env.RUNBENCH_CONFIG_DIR || join(homedir(), '.config', 'runbench');
  return join(dir, 'config.json');
}

function loadConfig(): Config {
  const file = getConfigPath();
  if (!existsSync(file)) return {};
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(file, 'utf-8'));
  } catch {
    return {};
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) return {};

  const config: Config = {};
  for (const [key, value] of Object.entries(parsed)) {
    if (isConfigKey(key) && (typeof value === 'string' || typeof value === 'number')) {
      config[key] = value;
    }
  }
  return config;
}

function saveConfig(config: Config): void {
  const file = getConfigPath();
  mkdirSync(dirname(file), { recursive: true });
  writeFileSync(file, JSON.stringify(config, null, 2));
}

function parseValue(key: ConfigKey, raw: string | number): string | number {
  const kind: ValueKind = CONFIG_KEYS[key].kind;
  if (kind === 'string') return String(raw);

  const value = typeof raw === 'number' ? raw : Number(raw.trim());
  const text = String(raw).trim();
  if (text === '' || !Number.isFinite(value)) {
    throw new UsageError(`${key} must be a number, got "${raw}"`);
  }
  if (kind === 'count' && (!Number.isInteger(value) || value <= 0)) {
    throw new UsageError(`${key} must be a positive integer, got "${raw}"`);
  }
  if (kind === 'seconds' && value <= 0) {
    throw new UsageError(`${key} must be greater than 0, got "${raw}"`);
  }
  if (kind === 'seconds' && value > MAX_TIMER_SECONDS) {
    throw new UsageError(`${key} must be at most ${MAX_TIMER_SECONDS} seconds, got "${raw}"`);
  }
  if (kind === 'millis' && value < 0) {
    throw new UsageError(`${key} must not be negative, got "${raw}"`);
  }
  if (kind === 'millis' && value > MAX_TIMER_MS) {
    throw new UsageError(`${key} must be at most ${MAX_TIMER_MS} ms, got "${raw}"`);
  }
  return value;
}

/**
 * Resolution order:
 * 1. command-line flag (passed as argument)
 * 2. environment variable
 * 3. config file
 * 4. built-in default
 */
function resolveRaw(key: ConfigKey, flagValue?: string | number, fallback?: string | number): string | number | undefined {
  if (flagValue !== undefined && flagValue !== '') return flagValue;
  const spec: KeySpec = CONFIG_KEYS[key];
  const fromEnv = process.env[spec.env];
  if (fromEnv) return fromEnv;
  return loadConfig()[key] ?? fallback ?? spec.fallback;
}

/** `fallback` replaces the built-in default, for commands with their own. */
export function resolveString(key: ConfigKey, flagValue?: string, fallback?: string): string | undefined {
  const raw = resolveRaw(key, flagValue, fallback);
  return raw === undefined ? undefined : String(raw);
}

export function resolveNumber(key: ConfigKey, flagValue?: string | number, fallback?: number): number {
  const raw = resolveRaw(key, flagValue, fallback);
  if (raw === undefined) {
    throw new UsageError(`${key} is not configured`);
  }
  const value = parseValue(key, raw);
  if (typeof value !== 'number') {
    throw new UsageError(`${key} is not numeric`);
  }
  return value;
}

export function setConfigValue(key: string, value: string): void {
  if (!isConfigKey(key)) {
    throw new UsageError(`Unknown config key: ${key}. Supported: ${Object.keys(CONFIG_KEYS).join(', ')}`);
  }
  const config = loadConfig();
  config[key] = parseValue(key, value);
  saveConfig(config);
}

export function unsetConfigValue(key: string): void {
  if (!isConfigKey(key)) {
    throw new UsageError(`Unknown config key: ${key}. Supported: ${Object.keys(CONFIG_KEYS).join(', ')}`);
  }
  const config = loadConfig();
  delete config[key];
  saveConfig(config);
}

export function isDebug(flagValue?: boolean): boolean {
  return Boolean(flagValue || process.env.RUNBENCH_DEBUG);
}
