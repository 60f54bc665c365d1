/**
 * Gateway Bridge
 *
 * Process-level orchestrator. Registers the plugin, opens the persistent
 * channel, then runs the relay loop and the dispatcher side by side until
 * the plugin is unloaded or the gateway goes away.
 *
 * unregistered -> registering -> relaying -> shutting-down -> terminated
 */

import { EventEmitter } from 'events';
import { createChannelPair, type ChannelPair, type OverflowPolicy } from '../concurrency/message-queue.js';
import type { GatewayMessage, PluginMessage } from '../protocol/types.js';
import { Plugin } from '../registry/plugin.js';
import type { DuplexChannel, Transport } from '../transport/types.js';
import { WebSocketTransport } from '../transport/ws-transport.js';
import { getErrorMessage } from '../utils/errors.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { Dispatcher, type DispatcherExitReason } from './dispatcher.js';
import { HandshakeClient, type HandshakeConfig, type Registration } from './handshake.js';
import { RelayLoop, type RelayExitReason, type RelayLoopStats } from './relay-loop.js';

// ============================================================================
// Types
// ============================================================================

export type BridgeState = 'unregistered' | 'registering' | 'relaying' | 'shutting-down' | 'terminated';

export interface GatewayBridgeOptions {
  pluginId: string;
  /** WebSocketTransport when not given */
  transport?: Transport;
  handshake?: Partial<HandshakeConfig>;
  /** Idle wait of the relay loop and the dispatcher (ms) */
  pollIntervalMs?: number;
  queueCapacity?: number;
  queueOverflow?: OverflowPolicy;
}

export interface BridgeRunResult {
  relay: RelayExitReason;
  dispatcher: DispatcherExitReason;
}

export interface GatewayBridgeEvents {
  'state': (to: BridgeState, from: BridgeState) => void;
  'registered': (registration: Registration) => void;
}

const DEFAULT_POLL_INTERVAL_MS = 33;

// ============================================================================
// Gateway Bridge
// ============================================================================

export class GatewayBridge extends EventEmitter {
  /** Registry collaborators add their adapters to before run() */
  readonly plugin: Plugin;
  readonly dispatcher: Dispatcher;

  private state: BridgeState = 'unregistered';
  private readonly transport: Transport;
  private readonly handshake: HandshakeClient;
  private readonly queues: ChannelPair<GatewayMessage, PluginMessage>;
  private readonly pollIntervalMs: number;
  private registration: Registration | null = null;
  private relay: RelayLoop | null = null;
  private runPromise: Promise<BridgeRunResult> | null = null;
  private stopRequested = false;
  private logger: Logger;

  constructor(options: GatewayBridgeOptions) {
    super();
    this.logger = createLogger({ source: 'Bridge' });
    this.transport = options.transport ?? new WebSocketTransport();
    this.handshake = new HandshakeClient(this.transport, options.handshake);
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;

    this.queues = createChannelPair<GatewayMessage, PluginMessage>({
      capacity: options.queueCapacity,
      overflow: options.queueOverflow,
    });
    this.plugin = new Plugin(options.pluginId, this.queues.outbound);
    this.dispatcher = new Dispatcher(this.plugin, this.queues.inbound, {
      pollIntervalMs: this.pollIntervalMs,
    });

    this.dispatcher.on('dispatched', (_message, outcome) => {
      if (outcome.status === 'shutdown') {
        this.beginShutdown();
      }
    });
  }

  getState(): BridgeState {
    return this.state;
  }

  getRegistration(): Registration | null {
    return this.registration ? { ...this.registration } : null;
  }

  /**
   * Register, relay and dispatch until termination. Rejects when the
   * handshake or the channel connection fails. Calling again returns the
   * same promise.
   */
  run(): Promise<BridgeRunResult> {
    if (!this.runPromise) {
      this.runPromise = this.execute();
    }
    return this.runPromise;
  }

  /**
   * Post pluginUnloaded on the outbound queue. The relay loop writes it and
   * winds the bridge down. Returns false if the plugin was already unloaded,
   * by an earlier call or by the gateway.
   */
  requestShutdown(): boolean {
    if (this.plugin.isUnloaded) {
      return false;
    }
    if (this.plugin.unload()) {
      this.logger.info(`Shutdown requested for plugin ${this.plugin.id}`);
    } else {
      this.logger.warn(`Shutdown requested for plugin ${this.plugin.id} after the relay loop exited`);
    }
    this.beginShutdown();
    return true;
  }

  /**
   * Stop both loops at once without telling the gateway. run() resolves
   * with 'stopped' reasons once they have returned.
   */
  stop(): void {
    if (this.stopRequested) {
      return;
    }
    this.stopRequested = true;
    this.logger.warn(`Stopping plugin ${this.plugin.id} without unloading`);
    this.relay?.stop();
    this.dispatcher.stop();
    this.beginShutdown();
  }

  private async execute(): Promise<BridgeRunResult> {
    const { inbound, outbound } = this.queues;
    this.transition('registering');

    let channel: DuplexChannel;
    try {
      const registration = await this.handshake.register(this.plugin.id);
      this.registration = registration;
      this.emit('registered', registration);
      channel = await this.transport.connect(registration.channelAddress);
    } catch (error) {
      inbound.close();
      outbound.close();
      this.logger.error(`Startup failed: ${getErrorMessage(error)}`);
      this.transition('terminated');
      throw error;
    }

    const relay = new RelayLoop(channel, inbound, outbound, { pollIntervalMs: this.pollIntervalMs });
    this.relay = relay;
    this.transition(this.plugin.isUnloaded || this.stopRequested ? 'shutting-down' : 'relaying');
    if (this.stopRequested) {
      relay.stop();
    }

    const relayDone = relay.run().finally(() => {
      // The dispatcher drains what is left and returns
      inbound.close();
      this.beginShutdown();
    });

    const [relayReason, dispatcherReason] = await Promise.all([relayDone, this.dispatcher.run()]);

    try {
      await channel.close();
    } catch (error) {
      this.logger.warn(`Failed to close channel: ${getErrorMessage(error)}`);
    }

    this.transition('terminated');
    return { relay: relayReason, dispatcher: dispatcherReason };
  }

  private beginShutdown(): void {
    if (this.state === 'relaying') {
      this.transition('shutting-down');
    }
  }

  private transition(to: BridgeState): void {
    const from = this.state;
    if (from === to || from === 'terminated') {
      return;
    }
    this.state = to;
    this.logger.info(`State ${from} -> ${to}`);
    this.emit('state', to, from);
  }

  /** Undefined until the channel is connected */
  getRelayStats(): RelayLoopStats | undefined {
    return this.relay?.getStats();
  }

  // ============================================================================
  // Type Declarations for EventEmitter
  // ============================================================================

  on<K extends keyof GatewayBridgeEvents>(event: K, listener: GatewayBridgeEvents[K]): this {
    return super.on(event, listener);
  }

  emit<K extends keyof GatewayBridgeEvents>(event: K, ...args: Parameters<GatewayBridgeEvents[K]>): boolean {
    return super.emit(event, ...args);
  }
}
