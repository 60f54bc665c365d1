/**
 * Bridge Module
 *
 * Handshake client, relay loop, dispatcher and the orchestrator tying them
 * together.
 */

export type { HandshakeConfig, Registration } from './handshake.js';
export { HandshakeClient, DEFAULT_HANDSHAKE_CONFIG } from './handshake.js';

export type { RelayExitReason, RelayLoopConfig, RelayLoopStats, RelayLoopEvents } from './relay-loop.js';
export { RelayLoop, DEFAULT_RELAY_CONFIG } from './relay-loop.js';

export type {
  DispatchOutcome,
  DispatcherExitReason,
  DispatcherConfig,
  DispatcherStats,
  DispatcherEvents,
} from './dispatcher.js';
export { Dispatcher, DEFAULT_DISPATCHER_CONFIG } from './dispatcher.js';

export type { BridgeState, GatewayBridgeOptions, BridgeRunResult, GatewayBridgeEvents } from './gateway-bridge.js';
export { GatewayBridge } from './gateway-bridge.js';
