import { readFileSync, existsSync } from 'node:fs';
import { join, resolve } from 'node:path';

import { ConfigSchema, type Config } from './schema.js';
import { ConfigMissingError, ConfigParseError, ConfigInvalidError } from '../errors/index.js';

export type { Config } from './schema.js';

export type ConfigEnv = Readonly<Record<string, string | undefined>>;

export interface LoadConfigOptions {
  /** Defaults to DRIVE_CONFIG_PATH, then config/config.json under the working directory. */
  path?: string;
  env?: ConfigEnv;
  /** Use the schema defaults when the file does not exist. Workers usually ship no config file. */
  optional?: boolean;
}

interface EnvOverride {
  variable: string;
  path: readonly string[];
  value: (raw: string) => unknown;
}

// Applied in order; a later entry wins over an earlier one on the same path.
const ENV_OVERRIDES: readonly EnvOverride[] = [
  { variable: 'DRIVE_DATA_DIR', path: ['storage', 'fs', 'dataDir'], value: (raw) => raw },
  { variable: 'DRIVE_STORAGE_URL', path: ['storage', 'http', 'baseUrl'], value: (raw) => raw },
  { variable: 'DRIVE_STORAGE_URL', path: ['storage', 'backend'], value: () => 'http' },
  { variable: 'DRIVE_POLL_INTERVAL_MS', path: ['drive', 'pollIntervalMs'], value: Number },
  { variable: 'LOG_LEVEL', path: ['logging', 'level'], value: (raw) => raw },
];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function withValue(target: unknown, [key, ...rest]: readonly string[], value: unknown): unknown {
  if (key === undefined) return value;
  const record = isRecord(target) ? target : {};
  return { ...record, [key]: withValue(record[key], rest, value) };
}

export function resolveConfigPath(env: ConfigEnv = process.env): string {
  return resolve(process.cwd(), env.DRIVE_CONFIG_PATH || join('config', 'config.json'));
}

/** Layer the DRIVE_* variables over the file contents, before validation. */
export function applyEnvOverrides(rawConfig: unknown, env: ConfigEnv): unknown {
  if (!isRecord(rawConfig)) return rawConfig;

  let merged: unknown = rawConfig;
  for (const override of ENV_OVERRIDES) {
    const raw = env[override.variable];
    if (!raw) continue;
    merged = withValue(merged, override.path, override.value(raw));
  }
  return merged;
}

function readConfigFile(configPath: string): unknown {
  try {
    return JSON.parse(readFileSync(configPath, 'utf-8'));
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown parse error';
    throw new ConfigParseError(message);
  }
}

export function loadConfig(options: LoadConfigOptions = {}): Config {
  const env = options.env ?? process.env;
  const configPath = options.path ?? resolveConfigPath(env);

  let rawConfig: unknown = {};
  if (existsSync(configPath)) {
    rawConfig = readConfigFile(configPath);
  } else if (!options.optional) {
    throw new ConfigMissingError(configPath);
  }

  const result = ConfigSchema.safeParse(applyEnvOverrides(rawConfig, env));
  if (!result.success) {
    const errors = result.error.issues.map((e) => `${e.path.join('.')}: ${e.message}`).join(', ');
    throw new ConfigInvalidError(errors);
  }

  return result.data;
}
