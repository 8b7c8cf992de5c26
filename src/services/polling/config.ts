import { ValidationError } from '../../utils/errors';
import type { PollerConfig } from './types';

// 1.5s flat for the first five retries, then doubling up to 24s.
export const DEFAULT_POLLER_CONFIG: Readonly<PollerConfig> = {
  initialDelayMs: 1500,
  backoffFactor: 2,
  fixedAttempts: 5,
  maxDelayMs: 24000,
  maxAttempts: 50,
};

// setTimeout fires after 1ms for anything longer than this.
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

const CONFIG_FIELDS: readonly (keyof PollerConfig)[] = [
  'initialDelayMs',
  'backoffFactor',
  'fixedAttempts',
  'maxDelayMs',
  'maxAttempts',
];

export const POLLER_ENV_KEYS: Readonly<Record<keyof PollerConfig, string>> = {
  initialDelayMs: 'POLLER_INITIAL_DELAY_MS',
  backoffFactor: 'POLLER_BACKOFF_FACTOR',
  fixedAttempts: 'POLLER_FIXED_ATTEMPTS',
  maxDelayMs: 'POLLER_MAX_DELAY_MS',
  maxAttempts: 'POLLER_MAX_ATTEMPTS',
};

function requireFinite(config: PollerConfig, field: keyof PollerConfig): void {
  if (typeof config[field] !== 'number' || !Number.isFinite(config[field])) {
    throw new ValidationError(`${field} must be a finite number`, field);
  }
}

function requireInteger(config: PollerConfig, field: 'fixedAttempts' | 'maxAttempts', min: number): void {
  if (!Number.isInteger(config[field]) || config[field] < min) {
    throw new ValidationError(`${field} must be an integer >= ${min}`, field);
  }
}

/**
 * Merge overrides onto the defaults and validate the result.
 * @throws ValidationError naming the first offending field
 */
export function resolvePollerConfig(overrides: Partial<PollerConfig> = {}): PollerConfig {
  const config: PollerConfig = { ...DEFAULT_POLLER_CONFIG };
  for (const key of CONFIG_FIELDS) {
    const value = overrides[key];
    if (value !== undefined) {
      config[key] = value;
    }
  }

  for (const key of CONFIG_FIELDS) {
    requireFinite(config, key);
  }

  if (config.initialDelayMs < 0) {
    throw new ValidationError('initialDelayMs must be >= 0', 'initialDelayMs');
  }
  if (config.maxDelayMs < config.initialDelayMs) {
    throw new ValidationError('maxDelayMs must be >= initialDelayMs', 'maxDelayMs');
  }
  if (config.maxDelayMs > MAX_TIMER_DELAY_MS) {
    throw new ValidationError(`maxDelayMs must be <= ${MAX_TIMER_DELAY_MS}`, 'maxDelayMs');
  }
  if (config.backoffFactor < 1) {
    throw new ValidationError('backoffFactor must be >= 1', 'backoffFactor');
  }
  requireInteger(config, 'fixedAttempts', 0);
  requireInteger(config, 'maxAttempts', 1);

  return config;
}

/**
 * Build a config from POLLER_* environment variables. Unset or empty
 * variables fall back to the defaults.
 */
export function loadPollerConfig(env: NodeJS.ProcessEnv = process.env): PollerConfig {
  const overrides: Partial<PollerConfig> = {};

  for (const field of CONFIG_FIELDS) {
    const envKey = POLLER_ENV_KEYS[field];
    const raw = env[envKey]?.trim();
    if (!raw) continue;

    const parsed = Number(raw);
    if (!Number.isFinite(parsed)) {
      throw new ValidationError(`${envKey} must be a number, got "${raw}"`, field);
    }
    overrides[field] = parsed;
  }

  return resolvePollerConfig(overrides);
}
