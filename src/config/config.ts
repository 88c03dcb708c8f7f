/**
 * Configuration
 *
 * Defaults, environment overrides and explicit overrides, merged in that order.
 */

import { ConfigError } from '../shared/errors';

export interface LoggingConfig {
  requests: boolean;
  responses: boolean;
  errors: boolean;
}

export interface LimitsConfig {
  /** Largest request body the Node adapter will buffer (bytes) */
  maxBodySize: number;
}

export interface StaticConfig {
  /** Cache-Control max-age for static files (seconds) */
  maxAge: number;
}

export interface SwitchyardConfig {
  host: string;
  port: number;
  debug: boolean;
  logging: LoggingConfig;
  limits: LimitsConfig;
  static: StaticConfig;
}

export interface ConfigOverrides {
  host?: string;
  port?: number;
  debug?: boolean;
  logging?: Partial<LoggingConfig>;
  limits?: Partial<LimitsConfig>;
  static?: Partial<StaticConfig>;
}

export type Environment = Record<string, string | undefined>;

export const DEFAULT_CONFIG: SwitchyardConfig = {
  host: '127.0.0.1',
  port: 3000,
  debug: false,
  logging: { requests: false, responses: false, errors: true },
  limits: { maxBodySize: 10 * 1024 * 1024 },
  static: { maxAge: 3600 },
};

const ENV_PREFIX = 'SWITCHYARD_';

function readFlag(env: Environment, name: string): boolean | undefined {
  const raw = env[ENV_PREFIX + name];
  if (raw === undefined || raw === '') {
    return undefined;
  }

  switch (raw.trim().toLowerCase()) {
    case 'true':
    case '1':
      return true;
    case 'false':
    case '0':
      return false;
    default:
      throw new ConfigError(`${ENV_PREFIX}${name} must be true, false, 1 or 0`, { value: raw });
  }
}

function readNumber(env: Environment, name: string): number | undefined {
  const raw = env[ENV_PREFIX + name];
  if (raw === undefined || raw === '') {
    return undefined;
  }

  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    throw new ConfigError(`${ENV_PREFIX}${name} must be a non-negative integer`, { value: raw });
  }
  return value;
}

/**
 * Overrides read from SWITCHYARD_* variables
 */
export function configFromEnv(env: Environment): ConfigOverrides {
  const overrides: ConfigOverrides = {};

  const host = env[`${ENV_PREFIX}HOST`];
  if (host) overrides.host = host;

  const port = readNumber(env, 'PORT');
  if (port !== undefined) overrides.port = port;

  // Presence alone switches debug on
  if (env[`${ENV_PREFIX}DEBUG`] !== undefined) overrides.debug = true;

  const logging: Partial<LoggingConfig> = {};
  const requests = readFlag(env, 'LOG_REQUESTS');
  if (requests !== undefined) logging.requests = requests;
  const responses = readFlag(env, 'LOG_RESPONSES');
  if (responses !== undefined) logging.responses = responses;
  const errors = readFlag(env, 'LOG_ERRORS');
  if (errors !== undefined) logging.errors = errors;
  if (Object.keys(logging).length > 0) overrides.logging = logging;

  const maxBodySize = readNumber(env, 'MAX_BODY_SIZE');
  if (maxBodySize !== undefined) overrides.limits = { maxBodySize };

  const maxAge = readNumber(env, 'STATIC_MAX_AGE');
  if (maxAge !== undefined) overrides.static = { maxAge };

  return overrides;
}

export function mergeConfig(base: SwitchyardConfig, overrides: ConfigOverrides): SwitchyardConfig {
  return {
    host: overrides.host ?? base.host,
    port: overrides.port ?? base.port,
    debug: overrides.debug ?? base.debug,
    logging: { ...base.logging, ...overrides.logging },
    limits: { ...base.limits, ...overrides.limits },
    static: { ...base.static, ...overrides.static },
  };
}

/**
 * Load configuration
 */
export function loadConfig(env: Environment = process.env, overrides: ConfigOverrides = {}): SwitchyardConfig {
  return mergeConfig(mergeConfig(DEFAULT_CONFIG, configFromEnv(env)), overrides);
}
