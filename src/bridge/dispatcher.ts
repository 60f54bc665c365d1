/**
 * Dispatcher
 *
 * Consumes decoded gateway commands from the inbound queue and routes each
 * one to the adapter it names. Commands addressed to another plugin are
 * ignored; unknown adapters and devices become LookupErrors that are logged
 * and never crash the loop.
 *
 * unloadPlugin unloads every adapter, posts pluginUnloaded and ends run().
 */

import { EventEmitter } from 'events';
import type { MessageQueue } from '../concurrency/message-queue.js';
import { LookupError } from '../errors/bridge-error.js';
import type { GatewayData, GatewayMessage } from '../protocol/types.js';
import type { Adapter } from '../registry/adapter.js';
import type { Plugin } from '../registry/plugin.js';
import type { AdapterOutcome } from '../registry/types.js';
import { getErrorMessage, toError } from '../utils/errors.js';
import { createLogger, type Logger } from '../utils/logger.js';

// ============================================================================
// Types
// ============================================================================

export type DispatchOutcome =
  | { status: 'ok' }
  | { status: 'ignored'; reason: 'foreign-plugin' }
  | { status: 'not-found'; error: LookupError }
  | { status: 'rejected'; message: string }
  | { status: 'failed'; error: Error }
  | { status: 'shutdown' };

export type DispatcherExitReason = 'unloaded' | 'inbound-closed' | 'stopped';

export interface DispatcherConfig {
  /** Longest wait on an empty inbound queue before checking for stop (ms) */
  pollIntervalMs: number;
}

export const DEFAULT_DISPATCHER_CONFIG: DispatcherConfig = {
  pollIntervalMs: 33,
};

export interface DispatcherStats {
  dispatched: number;
  ignored: number;
  notFound: number;
  rejected: number;
  failed: number;
}

export interface DispatcherEvents {
  'dispatched': (message: GatewayMessage, outcome: DispatchOutcome) => void;
  'exit': (reason: DispatcherExitReason) => void;
}

const OK_OUTCOME: DispatchOutcome = { status: 'ok' };

// ============================================================================
// Dispatcher
// ============================================================================

export class Dispatcher extends EventEmitter {
  private config: DispatcherConfig;
  private logger: Logger;
  private runPromise: Promise<DispatcherExitReason> | null = null;
  private readonly stopController = new AbortController();
  private stats: DispatcherStats = {
    dispatched: 0,
    ignored: 0,
    notFound: 0,
    rejected: 0,
    failed: 0,
  };

  constructor(
    private readonly plugin: Plugin,
    private readonly inbound: MessageQueue<GatewayMessage>,
    config: Partial<DispatcherConfig> = {}
  ) {
    super();
    this.config = { ...DEFAULT_DISPATCHER_CONFIG, ...config };
    this.logger = createLogger({ source: 'Dispatcher' });
  }

  /**
   * Consume commands until unloadPlugin, a closed inbound queue, or stop().
   * Calling again returns the same promise.
   */
  run(): Promise<DispatcherExitReason> {
    if (!this.runPromise) {
      this.runPromise = this.execute();
    }
    return this.runPromise;
  }

  /** End the loop after the command in progress, if any */
  stop(): void {
    this.stopController.abort();
  }

  getStats(): DispatcherStats {
    return { ...this.stats };
  }

  /**
   * Route a single command and report what happened
   */
  async handleMessage(message: GatewayMessage): Promise<DispatchOutcome> {
    let outcome: DispatchOutcome;

    if (message.data.pluginId !== this.plugin.id) {
      outcome = { status: 'ignored', reason: 'foreign-plugin' };
    } else {
      try {
        outcome = await this.route(message);
      } catch (error) {
        outcome = { status: 'failed', error: toError(error) };
      }
    }

    this.record(message, outcome);
    this.emit('dispatched', message, outcome);
    return outcome;
  }

  private async execute(): Promise<DispatcherExitReason> {
    const reason = await this.consume(this.stopController.signal);
    this.logger.info(`Dispatcher exited (${reason})`, { ...this.stats });
    this.emit('exit', reason);
    return reason;
  }

  private async consume(signal: AbortSignal): Promise<DispatcherExitReason> {
    while (!signal.aborted) {
      const message = await this.inbound.receive(this.config.pollIntervalMs, signal);
      if (message === undefined) {
        if (this.inbound.isClosed && this.inbound.size === 0) {
          return 'inbound-closed';
        }
        continue;
      }

      const outcome = await this.handleMessage(message);
      if (outcome.status === 'shutdown') {
        return 'unloaded';
      }
    }
    return 'stopped';
  }

  private async route(message: GatewayMessage): Promise<DispatchOutcome> {
    switch (message.messageType) {
      case 'unloadPlugin':
        return this.unloadPlugin();

      case 'unloadAdapter':
        return this.unloadAdapter(message.data);

      case 'setProperty': {
        const { adapterId, deviceId, property } = message.data;
        return this.withAdapter(adapterId, (adapter) => adapter.setProperty(deviceId, property), deviceId);
      }

      case 'startPairing': {
        const { adapterId, timeout } = message.data;
        return this.withAdapter(adapterId, (adapter) => adapter.startPairing(timeout));
      }

      case 'cancelPairing':
        return this.withAdapter(message.data.adapterId, (adapter) => adapter.cancelPairing());

      case 'removeThing': {
        const { adapterId, deviceId } = message.data;
        return this.withAdapter(adapterId, (adapter) => adapter.removeThing(deviceId), deviceId);
      }

      case 'cancelRemoveThing': {
        const { adapterId, deviceId } = message.data;
        return this.withAdapter(adapterId, (adapter) => adapter.cancelRemoveThing(deviceId), deviceId);
      }
    }
  }

  /**
   * Look the adapter up and run the command against it. A missing adapter
   * is a not-found outcome, never an exception.
   */
  private async withAdapter(
    adapterId: string,
    command: (adapter: Adapter) => Promise<AdapterOutcome>,
    deviceId?: string
  ): Promise<DispatchOutcome> {
    const adapter = this.plugin.getAdapter(adapterId);
    if (!adapter) {
      return { status: 'not-found', error: new LookupError('adapter', adapterId) };
    }
    return this.fromAdapterOutcome(await command(adapter), adapterId, deviceId);
  }

  private fromAdapterOutcome(outcome: AdapterOutcome, adapterId: string, deviceId?: string): DispatchOutcome {
    if (outcome.ok) {
      return OK_OUTCOME;
    }
    if (outcome.kind === 'not-found') {
      const error =
        deviceId === undefined
          ? new LookupError('adapter', adapterId, outcome.message)
          : new LookupError('device', deviceId, outcome.message);
      return { status: 'not-found', error };
    }
    return { status: 'rejected', message: outcome.message };
  }

  private async unloadAdapter(data: GatewayData<'unloadAdapter'>): Promise<DispatchOutcome> {
    const adapter = this.plugin.getAdapter(data.adapterId);
    if (!adapter) {
      return { status: 'not-found', error: new LookupError('adapter', data.adapterId) };
    }

    const outcome = await adapter.unload();
    this.plugin.removeAdapter(adapter.id);
    return this.fromAdapterOutcome(outcome, adapter.id);
  }

  private async unloadPlugin(): Promise<DispatchOutcome> {
    for (const adapter of this.plugin.getAdapters()) {
      try {
        const outcome = await adapter.unload();
        if (!outcome.ok) {
          this.logger.warn(`Adapter ${adapter.id} unload reported: ${outcome.message}`);
        }
      } catch (error) {
        this.logger.warn(`Adapter ${adapter.id} failed to unload: ${getErrorMessage(error)}`);
      }
      this.plugin.removeAdapter(adapter.id);
    }

    this.plugin.unload();
    return { status: 'shutdown' };
  }

  private record(message: GatewayMessage, outcome: DispatchOutcome): void {
    const { messageType } = message;
    switch (outcome.status) {
      case 'ok':
      case 'shutdown':
        this.stats.dispatched++;
        this.logger.debug(`Dispatched ${messageType}`);
        break;
      case 'ignored':
        this.stats.ignored++;
        this.logger.debug(`Ignoring ${messageType} for plugin ${message.data.pluginId}`);
        break;
      case 'not-found':
        this.stats.notFound++;
        this.logger.warn(`${messageType}: ${outcome.error.message}`);
        break;
      case 'rejected':
        this.stats.rejected++;
        this.logger.warn(`${messageType} rejected: ${outcome.message}`);
        break;
      case 'failed':
        this.stats.failed++;
        this.logger.error(`${messageType} failed: ${outcome.error.message}`, outcome.error);
        break;
    }
  }

  // ============================================================================
  // Type Declarations for EventEmitter
  // ============================================================================

  on<K extends keyof DispatcherEvents>(event: K, listener: DispatcherEvents[K]): this {
    return super.on(event, listener);
  }

  emit<K extends keyof DispatcherEvents>(event: K, ...args: Parameters<DispatcherEvents[K]>): boolean {
    return super.emit(event, ...args);
  }
}
