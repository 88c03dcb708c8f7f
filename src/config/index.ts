/**
 * Configuration Module
 */

export { DEFAULT_CONFIG, loadConfig, configFromEnv, mergeConfig } from './config';
export type {
  SwitchyardConfig,
  ConfigOverrides,
  LoggingConfig,
  LimitsConfig,
  StaticConfig,
  Environment,
} from './config';
export { loadEnvironment, parseEnvFile, DEFAULT_ENV_FILE } from './env-loader';
