import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { parse as parseToml } from 'smol-toml';
import { z } from 'zod';
import { defaultPolicyFor } from '../resilience/reconnection-policy.js';
import type { BackoffProfile, ReconnectionPolicySettings } from '../resilience/reconnection-policy.js';
import type { EnginePlatform } from '../vpn-client/types.js';

/**
 * Reconnection behaviour: backoff policy plus the settle window that decides
 * when a re-established tunnel counts as stable.
 */
export interface ReconnectionSettings extends ReconnectionPolicySettings {
  autoReconnect: boolean;
  /** Consecutive stable checks before the attempt counter resets. */
  settleConfirmations: number;
  settleIntervalMs: number;
  /** Fire a pending retry early when connectivity comes back. */
  retryOnNetworkRestore: boolean;
}

export interface EngineSettings {
  platform: EnginePlatform;
  /** Control endpoint of the engine daemon (http platform only). */
  baseUrl: string;
  startTimeoutMs: number;
  stopTimeoutMs: number;
}

/**
 * Complete coordinator configuration.
 */
export interface Settings {
  reconnection: ReconnectionSettings;
  killSwitch: { enabled: boolean };
  statistics: { sampleIntervalMs: number };
  network: { debounceMs: number; pollIntervalMs: number };
  engine: EngineSettings;
}

export const DEFAULT_CONFIG_PATH = path.join(os.homedir(), '.tunnelward', 'config.toml');

const positiveMs = z.number().int().positive();

/**
 * TOML structure as written on disk (snake_case). Policy numbers are optional
 * so that an unset value falls back to the chosen profile's default.
 */
const rawSchema = z.object({
  reconnection: z
    .object({
      profile: z.enum(['linear', 'exponential']).default('exponential'),
      base_delay_ms: positiveMs.optional(),
      max_delay_ms: positiveMs.optional(),
      multiplier: z.number().min(1).optional(),
      max_attempts: z.number().int().min(1).optional(),
      auto_reconnect: z.boolean().default(true),
      settle_confirmations: z.number().int().min(1).default(2),
      settle_interval_ms: positiveMs.default(1000),
      retry_on_network_restore: z.boolean().default(true),
    })
    .default({}),
  kill_switch: z
    .object({
      enabled: z.boolean().default(true),
    })
    .default({}),
  statistics: z
    .object({
      sample_interval_ms: positiveMs.default(1000),
    })
    .default({}),
  network: z
    .object({
      debounce_ms: z.number().int().min(0).default(500),
      poll_interval_ms: positiveMs.default(2000),
    })
    .default({}),
  engine: z
    .object({
      platform: z.enum(['http', 'native', 'mock']).default('http'),
      base_url: z.string().url().default('http://127.0.0.1:9090'),
      start_timeout_ms: positiveMs.default(30_000),
      stop_timeout_ms: positiveMs.default(10_000),
    })
    .default({}),
});

type RawSettings = z.input<typeof rawSchema>;

/** Environment overrides: env var → [section, key, kind]. */
const ENV_OVERRIDES: ReadonlyArray<[string, string, string, 'string' | 'number' | 'boolean']> = [
  ['TUNNELWARD_RECONNECT_PROFILE', 'reconnection', 'profile', 'string'],
  ['TUNNELWARD_MAX_ATTEMPTS', 'reconnection', 'max_attempts', 'number'],
  ['TUNNELWARD_AUTO_RECONNECT', 'reconnection', 'auto_reconnect', 'boolean'],
  ['TUNNELWARD_KILL_SWITCH', 'kill_switch', 'enabled', 'boolean'],
  ['TUNNELWARD_ENGINE', 'engine', 'platform', 'string'],
  ['TUNNELWARD_ENGINE_URL', 'engine', 'base_url', 'string'],
];

function coerceEnv(value: string, kind: 'string' | 'number' | 'boolean'): unknown {
  if (kind === 'number') {
    const n = Number(value);
    return value.trim() !== '' && Number.isFinite(n) ? n : value;
  }
  if (kind === 'boolean') {
    const v = value.toLowerCase();
    if (v === 'true' || v === '1') return true;
    if (v === 'false' || v === '0') return false;
    return value;
  }
  return value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

function applyEnvOverrides(raw: Record<string, unknown>, env: NodeJS.ProcessEnv): Record<string, unknown> {
  const merged: Record<string, unknown> = { ...raw };
  for (const [name, section, key, kind] of ENV_OVERRIDES) {
    const value = env[name];
    if (value === undefined || value === '') continue;
    const existing = merged[section];
    const target: Record<string, unknown> = isRecord(existing) ? { ...existing } : {};
    target[key] = coerceEnv(value, kind);
    merged[section] = target;
  }
  return merged;
}

function toSettings(raw: z.output<typeof rawSchema>): Settings {
  const r = raw.reconnection;
  const profile: BackoffProfile = r.profile;
  const defaults = defaultPolicyFor(profile);
  return {
    reconnection: {
      profile,
      baseDelayMs: r.base_delay_ms ?? defaults.baseDelayMs,
      maxDelayMs: r.max_delay_ms ?? defaults.maxDelayMs,
      multiplier: r.multiplier ?? defaults.multiplier,
      maxAttempts: r.max_attempts ?? defaults.maxAttempts,
      autoReconnect: r.auto_reconnect,
      settleConfirmations: r.settle_confirmations,
      settleIntervalMs: r.settle_interval_ms,
      retryOnNetworkRestore: r.retry_on_network_restore,
    },
    killSwitch: { enabled: raw.kill_switch.enabled },
    statistics: { sampleIntervalMs: raw.statistics.sample_interval_ms },
    network: {
      debounceMs: raw.network.debounce_ms,
      pollIntervalMs: raw.network.poll_interval_ms,
    },
    engine: {
      platform: raw.engine.platform,
      baseUrl: raw.engine.base_url,
      startTimeoutMs: raw.engine.start_timeout_ms,
      stopTimeoutMs: raw.engine.stop_timeout_ms,
    },
  };
}

/**
 * Validates a raw (snake_case) settings object and applies defaults.
 * @throws {Error} listing every invalid field
 */
export function resolveSettings(raw: RawSettings | Record<string, unknown> = {}): Settings {
  const result = rawSchema.safeParse(raw);
  if (!result.success) {
    const problems = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new Error(`Configuration invalid:\n${problems.map((p) => `  - ${p}`).join('\n')}`);
  }
  const settings = toSettings(result.data);
  if (settings.reconnection.maxDelayMs < settings.reconnection.baseDelayMs) {
    throw new Error(
      'Configuration invalid:\n  - reconnection.max_delay_ms: must be >= base_delay_ms'
    );
  }
  return settings;
}

export function defaultSettings(): Settings {
  return resolveSettings({});
}

/**
 * Loads settings from a TOML file with environment variable overrides.
 *
 * Resolution order (highest priority first):
 * - TUNNELWARD_* env vars (see ENV_OVERRIDES)
 * - values from the TOML file at configPath
 * - built-in defaults; unset backoff numbers follow the chosen profile
 *
 * A missing file is fine: defaults and env vars apply.
 *
 * @throws {Error} If the file cannot be parsed, or a value is invalid.
 */
export async function loadSettings(
  configPath: string = DEFAULT_CONFIG_PATH,
  env: NodeJS.ProcessEnv = process.env
): Promise<Settings> {
  let toml: Record<string, unknown> = {};
  try {
    const content = fs.readFileSync(configPath, 'utf-8');
    toml = parseToml(content);
  } catch (err) {
    if (!isMissingFile(err)) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new Error(`Failed to parse config file at ${configPath}: ${reason}`);
    }
  }
  return resolveSettings(applyEnvOverrides(toml, env));
}
