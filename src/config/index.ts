/**
 * Config module - environment schema and bridge configuration
 */

export type { EnvVarDef, EnvCategory } from './env-schema.js';
export { ENV_SCHEMA, getEnvDef, checkEnvValue, validateEnv, getEnvSummary } from './env-schema.js';

export type { BridgeConfig, ConfigOverrides, LoadConfigOptions, LoadedConfig } from './bridge-config.js';
export { loadBridgeConfig, toBridgeOptions } from './bridge-config.js';
