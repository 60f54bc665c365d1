/**
 * plugin-gateway-bridge
 *
 * Plugin-side bridge to the gateway: registration, relay, dispatch and the
 * registry classes adapters are built on.
 */

export * from './bridge/index.js';
export * from './concurrency/index.js';
export * from './config/index.js';
export * from './protocol/index.js';
export * from './registry/index.js';
export * from './transport/index.js';

export {
  BridgeError,
  TransportError,
  ProtocolError,
  LookupError,
  HandshakeError,
  TimeoutError,
  ConfigError,
  isBridgeError,
} from './errors/bridge-error.js';
export type { BridgeErrorCode, LookupEntity } from './errors/bridge-error.js';

export { Logger, logger, createLogger, getLogger, isLogLevel } from './utils/logger.js';
export type { LogLevel, LogFormat, LogContext, LoggerOptions } from './utils/logger.js';
