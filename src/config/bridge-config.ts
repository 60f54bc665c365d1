/**
 * Bridge Configuration
 *
 * Resolves the runtime configuration from, in increasing precedence:
 * schema defaults, the environment (a .env file is loaded through dotenv),
 * and explicit overrides such as CLI flags.
 *
 * Invalid values are reported as warnings and replaced by their defaults.
 * A missing plugin id is the only hard error.
 */

import * as dotenv from 'dotenv';
import type { OverflowPolicy } from '../concurrency/message-queue.js';
import { ConfigError } from '../errors/bridge-error.js';
import type { GatewayBridgeOptions } from '../bridge/gateway-bridge.js';
import type { Transport } from '../transport/types.js';
import { isLogLevel, type LogFormat, type LogLevel } from '../utils/logger.js';
import { checkEnvValue, getEnvDef, validateEnv } from './env-schema.js';

export interface BridgeConfig {
  pluginId: string;
  baseUrl: string;
  rendezvousUrl: string;
  handshakeTimeoutMs: number;
  handshakeRetries: number;
  handshakeRetryDelayMs: number;
  pollIntervalMs: number;
  queueCapacity: number;
  queueOverflow: OverflowPolicy;
  logLevel: LogLevel;
  logFormat: LogFormat;
}

/** Values that take precedence over the environment */
export type ConfigOverrides = Partial<Pick<BridgeConfig, 'pluginId' | 'baseUrl' | 'rendezvousUrl' | 'logLevel'>>;

export interface LoadConfigOptions {
  /** Environment to read; process.env (after loading .env) when omitted */
  env?: Record<string, string | undefined>;
  overrides?: ConfigOverrides;
  /** Path of the .env file; false skips it */
  dotenvPath?: string | false;
}

export interface LoadedConfig {
  config: BridgeConfig;
  warnings: string[];
}

type Env = Record<string, string | undefined>;

/**
 * Value of a variable, or its schema default when unset or invalid.
 * validateEnv() reports the invalid ones.
 */
function readString(env: Env, name: string): string {
  const def = getEnvDef(name);
  const fallback = def?.default ?? '';
  const raw = env[name];
  if (raw === undefined || raw === '' || (def && checkEnvValue(def, raw) !== undefined)) {
    return fallback;
  }
  return raw;
}

function readNumber(env: Env, name: string): number {
  const value = Number(readString(env, name));
  return Number.isFinite(value) ? value : Number(getEnvDef(name)?.default ?? 0);
}

function isOverflowPolicy(value: string): value is OverflowPolicy {
  return value === 'reject' || value === 'drop-oldest';
}

/**
 * Build the bridge configuration. Throws a ConfigError when no plugin id
 * is given by either the overrides or BRIDGE_PLUGIN_ID.
 */
export function loadBridgeConfig(options: LoadConfigOptions = {}): LoadedConfig {
  const { overrides = {}, dotenvPath } = options;

  let env: Env;
  if (options.env) {
    env = options.env;
  } else {
    if (dotenvPath !== false) {
      dotenv.config(dotenvPath ? { path: dotenvPath } : undefined);
    }
    env = process.env;
  }

  const warnings = validateEnv(env);

  const pluginId = overrides.pluginId ?? readString(env, 'BRIDGE_PLUGIN_ID');
  if (pluginId.trim() === '') {
    throw new ConfigError('A plugin id is required (--plugin-id or BRIDGE_PLUGIN_ID)');
  }

  const overflow = readString(env, 'BRIDGE_QUEUE_OVERFLOW');
  const level = readString(env, 'LOG_LEVEL').toLowerCase();
  const format = readString(env, 'LOG_FORMAT').toLowerCase();

  const config: BridgeConfig = {
    pluginId,
    baseUrl: overrides.baseUrl ?? readString(env, 'BRIDGE_BASE_URL'),
    rendezvousUrl: overrides.rendezvousUrl ?? readString(env, 'BRIDGE_RENDEZVOUS_URL'),
    handshakeTimeoutMs: readNumber(env, 'BRIDGE_HANDSHAKE_TIMEOUT_MS'),
    handshakeRetries: readNumber(env, 'BRIDGE_HANDSHAKE_RETRIES'),
    handshakeRetryDelayMs: readNumber(env, 'BRIDGE_HANDSHAKE_RETRY_DELAY_MS'),
    pollIntervalMs: readNumber(env, 'BRIDGE_POLL_INTERVAL_MS'),
    queueCapacity: readNumber(env, 'BRIDGE_QUEUE_CAPACITY'),
    queueOverflow: isOverflowPolicy(overflow) ? overflow : 'reject',
    logLevel: overrides.logLevel ?? (isLogLevel(level) ? level : 'info'),
    logFormat: format === 'json' ? 'json' : 'text',
  };

  return { config, warnings };
}

/**
 * Options for GatewayBridge from a resolved configuration
 */
export function toBridgeOptions(config: BridgeConfig, transport?: Transport): GatewayBridgeOptions {
  return {
    pluginId: config.pluginId,
    transport,
    handshake: {
      rendezvousUrl: config.rendezvousUrl,
      baseUrl: config.baseUrl,
      timeoutMs: config.handshakeTimeoutMs,
      retries: config.handshakeRetries,
      retryDelayMs: config.handshakeRetryDelayMs,
    },
    pollIntervalMs: config.pollIntervalMs,
    queueCapacity: config.queueCapacity,
    queueOverflow: config.queueOverflow,
  };
}
