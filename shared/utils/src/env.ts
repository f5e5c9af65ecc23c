import { ConfigurationError } from './errors';

/**
 * Environment variable helpers.
 *
 * Each helper takes the variable source as its last argument so callers can
 * pass a plain object instead of `process.env`.
 */
export type EnvSource = Record<string, string | undefined>;

function missing(key: string): ConfigurationError {
  return new ConfigurationError(`Environment variable ${key} is required but not set`, 'autopilot', {
    key,
  });
}

function read(key: string, env: EnvSource): string | undefined {
  const value = env[key];
  return value === undefined || value.trim() === '' ? undefined : value.trim();
}

export function getEnv(key: string, defaultValue?: string, env: EnvSource = process.env): string {
  const value = read(key, env);
  if (value === undefined) {
    if (defaultValue !== undefined) {
      return defaultValue;
    }
    throw missing(key);
  }
  return value;
}

export function getEnvOptional(key: string, env: EnvSource = process.env): string | undefined {
  return read(key, env);
}

export function getEnvNumber(key: string, defaultValue?: number, env: EnvSource = process.env): number {
  const value = read(key, env);
  if (value === undefined) {
    if (defaultValue !== undefined) {
      return defaultValue;
    }
    throw missing(key);
  }
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new ConfigurationError(`Environment variable ${key} must be a valid number`, 'autopilot', {
      key,
      value,
    });
  }
  return parsed;
}

export function getEnvBoolean(key: string, defaultValue: boolean = false, env: EnvSource = process.env): boolean {
  const value = read(key, env);
  if (value === undefined) {
    return defaultValue;
  }
  const lowered = value.toLowerCase();
  return lowered === 'true' || lowered === '1' || lowered === 'yes';
}
