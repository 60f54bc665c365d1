/**
 * WebSocket Transport
 *
 * Carries both exchange patterns over `ws`: the one-shot registration
 * request/reply and the persistent duplex channel. Each WebSocket message is
 * one protocol frame, so no extra framing is layered on top.
 */

import WebSocket, { type RawData } from 'ws';
import { EventEmitter } from 'events';
import { TimeoutError, TransportError } from '../errors/bridge-error.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { getErrorMessage } from '../utils/errors.js';
import { toWebSocketUrl } from './address.js';
import type { DuplexChannel, Transport } from './types.js';

// ============================================================================
// Configuration
// ============================================================================

export interface WebSocketTransportConfig {
  /** Opening handshake timeout for persistent channels (ms) */
  connectTimeoutMs: number;
  /** Time allowed for a graceful close before the socket is terminated (ms) */
  closeTimeoutMs: number;
  /** Maximum frame size */
  maxPayload: number;
  /** Inbound frames held before the oldest is dropped */
  maxPendingFrames: number;
}

export const DEFAULT_WS_TRANSPORT_CONFIG: WebSocketTransportConfig = {
  connectTimeoutMs: 5000,
  closeTimeoutMs: 2000,
  maxPayload: 10 * 1024 * 1024, // 10MB
  maxPendingFrames: 1000,
};

function rawDataToBuffer(data: RawData): Buffer {
  if (Buffer.isBuffer(data)) return data;
  if (Array.isArray(data)) return Buffer.concat(data);
  return Buffer.from(data);
}

// ============================================================================
// Duplex Channel
// ============================================================================

export interface WebSocketChannelEvents {
  'frame': (size: number) => void;
  'frame-dropped': (size: number) => void;
  'close': (code: number, reason: string) => void;
}

/**
 * Persistent channel over an open WebSocket
 */
export class WebSocketChannel extends EventEmitter implements DuplexChannel {
  private frames: Buffer[] = [];
  private readers: Set<() => void> = new Set();
  private closed = false;
  private logger: Logger;

  constructor(
    readonly address: string,
    private readonly socket: WebSocket,
    private readonly config: WebSocketTransportConfig = DEFAULT_WS_TRANSPORT_CONFIG
  ) {
    super();
    this.logger = createLogger({ source: 'Channel' });

    socket.on('message', (data) => {
      this.handleFrame(rawDataToBuffer(data));
    });

    socket.on('close', (code, reason) => {
      this.closed = true;
      this.wakeReaders();
      this.logger.debug(`Channel closed (${code})`, { address: this.address });
      this.emit('close', code, reason.toString());
    });

    socket.on('error', (error) => {
      this.logger.warn(`Channel error: ${error.message}`, { address: this.address });
    });
  }

  get isOpen(): boolean {
    return !this.closed && this.socket.readyState === WebSocket.OPEN;
  }

  /** Frames received but not yet read */
  get pendingFrames(): number {
    return this.frames.length;
  }

  tryRead(): Buffer | undefined {
    return this.frames.shift();
  }

  waitReadable(timeoutMs: number, signal?: AbortSignal): Promise<boolean> {
    if (this.frames.length > 0) {
      return Promise.resolve(true);
    }
    if (this.closed || signal?.aborted) {
      return Promise.resolve(false);
    }

    return new Promise<boolean>((resolve) => {
      const finish = () => {
        clearTimeout(timer);
        this.readers.delete(finish);
        signal?.removeEventListener('abort', finish);
        resolve(this.frames.length > 0);
      };
      const timer = setTimeout(finish, timeoutMs);
      this.readers.add(finish);
      signal?.addEventListener('abort', finish, { once: true });
    });
  }

  send(data: string): Promise<void> {
    if (!this.isOpen) {
      return Promise.reject(
        new TransportError('Channel is closed', this.address, { code: 'CHANNEL_CLOSED' })
      );
    }

    return new Promise<void>((resolve, reject) => {
      this.socket.send(data, (error) => {
        if (error) {
          reject(new TransportError(`Write failed: ${error.message}`, this.address, { cause: error }));
          return;
        }
        resolve();
      });
    });
  }

  close(): Promise<void> {
    if (this.closed || this.socket.readyState === WebSocket.CLOSED) {
      this.closed = true;
      return Promise.resolve();
    }

    return new Promise<void>((resolve) => {
      const timer = setTimeout(() => this.socket.terminate(), this.config.closeTimeoutMs);
      this.socket.once('close', () => {
        clearTimeout(timer);
        resolve();
      });
      this.socket.close(1000, 'closing');
    });
  }

  private handleFrame(frame: Buffer): void {
    if (this.frames.length >= this.config.maxPendingFrames) {
      const dropped = this.frames.shift();
      this.logger.warn('Inbound frame backlog full, dropping oldest frame', { address: this.address });
      this.emit('frame-dropped', dropped?.length ?? 0);
    }
    this.frames.push(frame);
    this.emit('frame', frame.length);
    this.wakeReaders();
  }

  private wakeReaders(): void {
    for (const reader of [...this.readers]) {
      reader();
    }
  }

  // ============================================================================
  // Type Declarations for EventEmitter
  // ============================================================================

  on<K extends keyof WebSocketChannelEvents>(event: K, listener: WebSocketChannelEvents[K]): this {
    return super.on(event, listener);
  }

  emit<K extends keyof WebSocketChannelEvents>(event: K, ...args: Parameters<WebSocketChannelEvents[K]>): boolean {
    return super.emit(event, ...args);
  }
}

// ============================================================================
// Transport
// ============================================================================

export class WebSocketTransport implements Transport {
  private config: WebSocketTransportConfig;

  constructor(config: Partial<WebSocketTransportConfig> = {}) {
    this.config = { ...DEFAULT_WS_TRANSPORT_CONFIG, ...config };
  }

  async request(address: string, payload: string, timeoutMs: number): Promise<string> {
    const url = toWebSocketUrl(address);

    return new Promise<string>((resolve, reject) => {
      const socket = new WebSocket(url, {
        handshakeTimeout: timeoutMs,
        maxPayload: this.config.maxPayload,
      });
      let settled = false;

      const settle = (finish: () => void) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        finish();
        if (socket.readyState === WebSocket.OPEN) {
          socket.close(1000, 'done');
        } else if (socket.readyState === WebSocket.CONNECTING) {
          socket.terminate();
        }
      };

      const timer = setTimeout(() => {
        settle(() => reject(new TimeoutError(`No reply from ${address} within ${timeoutMs}ms`, timeoutMs)));
      }, timeoutMs);

      socket.on('open', () => {
        socket.send(payload, (error) => {
          if (error) {
            settle(() => reject(new TransportError(`Write failed: ${error.message}`, address, { cause: error })));
          }
        });
      });

      socket.once('message', (data) => {
        settle(() => resolve(rawDataToBuffer(data).toString('utf8')));
      });

      socket.on('error', (error) => {
        settle(() =>
          reject(new TransportError(`Request to ${address} failed: ${error.message}`, address, { cause: error }))
        );
      });

      socket.on('close', () => {
        settle(() => reject(new TransportError(`Connection to ${address} closed before a reply`, address)));
      });
    });
  }

  connect(address: string): Promise<DuplexChannel> {
    const url = toWebSocketUrl(address);

    return new Promise<DuplexChannel>((resolve, reject) => {
      const ws = new WebSocket(url, {
        handshakeTimeout: this.config.connectTimeoutMs,
        maxPayload: this.config.maxPayload,
      });

      // The channel attaches its message listener here, in the same tick as
      // 'open', so a frame sent with the upgrade response is buffered.
      const onOpen = () => {
        ws.off('error', onError);
        resolve(new WebSocketChannel(address, ws, this.config));
      };
      const onError = (error: Error) => {
        ws.off('open', onOpen);
        reject(new TransportError(`Failed to connect to ${address}: ${getErrorMessage(error)}`, address, { cause: error }));
      };

      ws.once('open', onOpen);
      ws.once('error', onError);
    });
  }
}
