/**
 * Relay Loop
 *
 * Sole owner of the persistent channel. Each turn it reads at most one
 * inbound frame onto the inbound queue and writes at most one outbound
 * message from the outbound queue. When a turn finds no work it sleeps until
 * a frame or message arrives, or the poll interval elapses.
 *
 * Writing pluginUnloaded is the graceful exit: the channel is closed and
 * run() resolves 'unloaded'.
 */

import { EventEmitter } from 'events';
import type { MessageQueue } from '../concurrency/message-queue.js';
import { type ProtocolError, TransportError } from '../errors/bridge-error.js';
import { decodeGatewayMessage, encodeMessage, isPluginUnloaded } from '../protocol/codec.js';
import type { GatewayMessage, PluginMessage } from '../protocol/types.js';
import type { DuplexChannel } from '../transport/types.js';
import { getErrorMessage } from '../utils/errors.js';
import { createLogger, type Logger } from '../utils/logger.js';

export type RelayExitReason = 'unloaded' | 'channel-closed' | 'stopped';

export interface RelayLoopConfig {
  /** Longest idle wait between turns (ms) */
  pollIntervalMs: number;
}

export const DEFAULT_RELAY_CONFIG: RelayLoopConfig = {
  pollIntervalMs: 33,
};

export interface RelayLoopStats {
  framesRelayed: number;
  framesDropped: number;
  messagesWritten: number;
  writeErrors: number;
}

export interface RelayLoopEvents {
  'inbound': (message: GatewayMessage) => void;
  'outbound': (message: PluginMessage) => void;
  'frame-dropped': (error: ProtocolError) => void;
  'write-error': (error: TransportError, message: PluginMessage) => void;
  'exit': (reason: RelayExitReason) => void;
}

type WriteResult = 'idle' | 'written' | 'failed' | 'unloaded';

export class RelayLoop extends EventEmitter {
  private config: RelayLoopConfig;
  private logger: Logger;
  private runPromise: Promise<RelayExitReason> | null = null;
  private readonly stopController = new AbortController();
  private stats: RelayLoopStats = {
    framesRelayed: 0,
    framesDropped: 0,
    messagesWritten: 0,
    writeErrors: 0,
  };

  constructor(
    private readonly channel: DuplexChannel,
    private readonly inbound: MessageQueue<GatewayMessage>,
    private readonly outbound: MessageQueue<PluginMessage>,
    config: Partial<RelayLoopConfig> = {}
  ) {
    super();
    this.config = { ...DEFAULT_RELAY_CONFIG, ...config };
    this.logger = createLogger({ source: 'Relay' });
  }

  /**
   * Run until shutdown. Calling again returns the same promise.
   */
  run(): Promise<RelayExitReason> {
    if (!this.runPromise) {
      this.runPromise = this.execute();
    }
    return this.runPromise;
  }

  /**
   * End the loop without sending anything and close the channel.
   * GatewayBridge.stop() calls this.
   */
  stop(): void {
    this.stopController.abort();
  }

  getStats(): RelayLoopStats {
    return { ...this.stats };
  }

  private async execute(): Promise<RelayExitReason> {
    const reason = await this.relay(this.stopController.signal);
    // Nothing may be queued for a channel that no longer exists
    this.outbound.close();
    this.logger.info(`Relay loop exited (${reason})`, { ...this.stats });
    this.emit('exit', reason);
    return reason;
  }

  private async relay(signal: AbortSignal): Promise<RelayExitReason> {
    while (!signal.aborted) {
      const readWork = this.readOnce();
      const writeResult = await this.writeOnce();

      if (writeResult === 'unloaded') {
        await this.closeChannel();
        return 'unloaded';
      }
      if (readWork || writeResult !== 'idle') {
        continue;
      }
      if (!this.channel.isOpen) {
        this.logger.warn('Channel closed by peer');
        return 'channel-closed';
      }
      await this.idle(signal);
    }

    await this.closeChannel();
    return 'stopped';
  }

  /**
   * Move at most one frame from the channel to the inbound queue
   */
  private readOnce(): boolean {
    const frame = this.channel.tryRead();
    if (frame === undefined) {
      return false;
    }

    const result = decodeGatewayMessage(frame);
    if (!result.ok) {
      this.stats.framesDropped++;
      this.logger.debug(`Dropping frame: ${result.error.message}`);
      this.emit('frame-dropped', result.error);
      return true;
    }

    if (!this.inbound.send(result.message)) {
      this.logger.warn(`Inbound queue refused ${result.message.messageType}`);
      return true;
    }
    this.stats.framesRelayed++;
    this.emit('inbound', result.message);
    return true;
  }

  /**
   * Move at most one message from the outbound queue to the channel
   */
  private async writeOnce(): Promise<WriteResult> {
    const message = this.outbound.tryReceive();
    if (message === undefined) {
      return 'idle';
    }

    let result: WriteResult = 'written';
    try {
      await this.channel.send(encodeMessage(message));
      this.stats.messagesWritten++;
      this.emit('outbound', message);
    } catch (error) {
      const transportError =
        error instanceof TransportError
          ? error
          : new TransportError(`Write failed: ${getErrorMessage(error)}`, this.channel.address, { cause: error });
      this.stats.writeErrors++;
      this.logger.error(`Failed to write ${message.messageType}: ${transportError.message}`);
      this.emit('write-error', transportError, message);
      result = 'failed';
    }

    return isPluginUnloaded(message) ? 'unloaded' : result;
  }

  private async idle(stopSignal: AbortSignal): Promise<void> {
    const controller = new AbortController();
    const abort = () => controller.abort();
    stopSignal.addEventListener('abort', abort, { once: true });

    try {
      await Promise.race([
        this.channel.waitReadable(this.config.pollIntervalMs, controller.signal),
        this.outbound.waitForMessage(this.config.pollIntervalMs, controller.signal),
      ]);
    } finally {
      // Release whichever wait lost the race
      controller.abort();
      stopSignal.removeEventListener('abort', abort);
    }
  }

  private async closeChannel(): Promise<void> {
    try {
      await this.channel.close();
    } catch (error) {
      this.logger.warn(`Failed to close channel: ${getErrorMessage(error)}`);
    }
  }

  // ============================================================================
  // Type Declarations for EventEmitter
  // ============================================================================

  on<K extends keyof RelayLoopEvents>(event: K, listener: RelayLoopEvents[K]): this {
    return super.on(event, listener);
  }

  emit<K extends keyof RelayLoopEvents>(event: K, ...args: Parameters<RelayLoopEvents[K]>): boolean {
    return super.emit(event, ...args);
  }
}
