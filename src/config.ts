/**
 * Configuration for the announce proxy
 *
 * Read once at startup from an optional ini file (`CONFIG_FILE`, default
 * ./config.ini) whose `[DEFAULT]` section uses snake_case keys such as
 * `listen_port`, overlaid by environment variables. Empty variables count as unset.
 */

import fs from 'fs';
import ini from 'ini';
import { z } from 'zod';
import { ConfigInvalidError } from './domain/errors';
import { MultiplierSettings } from './domain/entities';

const number = (fallback: number) =>
  z.preprocess(blankToUndefined, z.coerce.number().finite().default(fallback));

const int = (fallback: number) =>
  z.preprocess(blankToUndefined, z.coerce.number().int().default(fallback));

const ConfigSchema = z.object({
  LISTEN_PORT: int(3456).pipe(z.number().min(0).max(65535)),
  LISTEN_HOST: z.preprocess(blankToUndefined, z.string().default('0.0.0.0')),

  // Multiplier policy
  MAX_UPLOAD_MULTIPLIER: number(5.0).pipe(z.number().min(1)),
  SEEDING_MULTIPLIER: number(1.5).pipe(z.number().min(1)),
  RAMP_UP_SECONDS: number(3600).pipe(z.number().min(0)),
  RANDOMIZATION_FACTOR: number(0.1).pipe(z.number().min(0).lt(1)),
  MAX_SIMULATED_SPEED_MBPS: number(100).pipe(z.number().positive()),
  GLOBAL_RATIO_LIMIT: number(3.0).pipe(z.number().positive()),
  COOLDOWN_DURATION_MINUTES: number(30).pipe(z.number().min(0)),

  // Logging
  LOG_FILE: z.preprocess(blankToUndefined, z.string().default('./logs/announce-proxy.log')),
  LOG_RETENTION_DAYS: int(7).pipe(z.number().min(1)),

  UPSTREAM_TIMEOUT_SECONDS: number(15).pipe(z.number().positive()),
  // Bound of the per-torrent LRU state cache
  MAX_TRACKED_TORRENTS: int(10000).pipe(z.number().min(1)),

  // JSON release feed polled once at startup; unset disables the check
  UPDATE_CHECK_URL: z.preprocess(blankToUndefined, z.string().url().optional()),
});

export type Config = Readonly<z.infer<typeof ConfigSchema>>;

const DEFAULT_CONFIG_FILE = './config.ini';
const CONFIG_KEYS: ReadonlySet<string> = new Set(Object.keys(ConfigSchema.shape));

function blankToUndefined(value: unknown): unknown {
  return typeof value === 'string' && value.trim() === '' ? undefined : value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parses an ini file into schema keys: `max_upload_multiplier = 3` becomes
 * `MAX_UPLOAD_MULTIPLIER: '3'`. Keys outside any section count as `[DEFAULT]`;
 * unknown keys and other sections are ignored.
 */
export function parseConfigFile(text: string): Record<string, string> {
  const parsed: unknown = ini.parse(text);
  const values: Record<string, string> = {};
  if (!isRecord(parsed)) {
    return values;
  }

  const defaults: Record<string, unknown> = isRecord(parsed.DEFAULT) ? parsed.DEFAULT : {};
  for (const [key, value] of [...Object.entries(parsed), ...Object.entries(defaults)]) {
    const name = key.trim().toUpperCase();
    if (CONFIG_KEYS.has(name) && (typeof value === 'string' || typeof value === 'boolean')) {
      values[name] = String(value);
    }
  }
  return values;
}

function readConfigFile(filePath: string, required: boolean): Record<string, string> {
  let text: string;
  try {
    text = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    const code = error instanceof Error && 'code' in error ? error.code : undefined;
    if (code === 'ENOENT' && !required) {
      return {};
    }
    const reason = error instanceof Error ? error.message : 'Unknown error';
    throw new ConfigInvalidError([`CONFIG_FILE: cannot read ${filePath}: ${reason}`]);
  }
  return parseConfigFile(text);
}

function setValues(env: NodeJS.ProcessEnv): Record<string, string> {
  const values: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') {
      values[key] = value;
    }
  }
  return values;
}

/**
 * Builds a validated config snapshot
 * @throws ConfigInvalidError listing every offending variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const configFile = env.CONFIG_FILE?.trim() ? env.CONFIG_FILE : undefined;
  const fileValues = readConfigFile(configFile ?? DEFAULT_CONFIG_FILE, configFile !== undefined);

  const result = ConfigSchema.safeParse({ ...fileValues, ...setValues(env) });
  if (!result.success) {
    throw new ConfigInvalidError(
      result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }
  return Object.freeze(result.data);
}

export function toMultiplierSettings(config: Config): MultiplierSettings {
  return {
    maxUploadMultiplier: config.MAX_UPLOAD_MULTIPLIER,
    seedingMultiplier: config.SEEDING_MULTIPLIER,
    rampUpSeconds: config.RAMP_UP_SECONDS,
    randomizationFactor: config.RANDOMIZATION_FACTOR,
    maxSimulatedSpeedMbps: config.MAX_SIMULATED_SPEED_MBPS,
    globalRatioLimit: config.GLOBAL_RATIO_LIMIT,
    cooldownDurationMinutes: config.COOLDOWN_DURATION_MINUTES,
  };
}
