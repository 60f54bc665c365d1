/**
 * Handshake Client
 *
 * One-shot registration with the gateway's add-on manager. Sends
 * registerPlugin, waits for registerPluginReply and derives the address of
 * the persistent channel from it.
 *
 * Any failure here is fatal to startup: the caller gets a HandshakeError.
 * Transport failures and timeouts are retried with backoff; a malformed
 * reply is not. A reply naming another plugin is logged and its
 * ipcBaseAddr used anyway.
 */

import { HandshakeError, TimeoutError, TransportError } from '../errors/bridge-error.js';
import { createRegisterPlugin, decodeHandshakeReply, encodeMessage } from '../protocol/codec.js';
import { deriveChannelAddress } from '../transport/address.js';
import type { Transport } from '../transport/types.js';
import { getErrorMessage, withRetry } from '../utils/errors.js';
import { createLogger, type Logger } from '../utils/logger.js';

export interface HandshakeConfig {
  /** Well-known address of the gateway's add-on manager */
  rendezvousUrl: string;
  /** Base the reply's ipcBaseAddr is appended to */
  baseUrl: string;
  /** Per-attempt timeout (ms) */
  timeoutMs: number;
  /** Retries after the first attempt */
  retries: number;
  retryDelayMs: number;
  maxRetryDelayMs: number;
}

export const DEFAULT_HANDSHAKE_CONFIG: HandshakeConfig = {
  rendezvousUrl: 'ipc:///tmp/gateway.addonManager',
  baseUrl: 'ipc:///tmp',
  timeoutMs: 5000,
  retries: 3,
  retryDelayMs: 500,
  maxRetryDelayMs: 5000,
};

export interface Registration {
  pluginId: string;
  ipcBaseAddr: string;
  /** `<baseUrl>/<ipcBaseAddr>` */
  channelAddress: string;
}

function isRetryable(error: unknown): boolean {
  return error instanceof TransportError || error instanceof TimeoutError;
}

export class HandshakeClient {
  private config: HandshakeConfig;
  private logger: Logger;

  constructor(
    private readonly transport: Transport,
    config: Partial<HandshakeConfig> = {}
  ) {
    this.config = { ...DEFAULT_HANDSHAKE_CONFIG, ...config };
    this.logger = createLogger({ source: 'Handshake' });
  }

  getConfig(): HandshakeConfig {
    return { ...this.config };
  }

  /**
   * Register the plugin and return the persistent channel's address
   */
  async register(pluginId: string): Promise<Registration> {
    const { rendezvousUrl, baseUrl, timeoutMs, retries, retryDelayMs, maxRetryDelayMs } = this.config;
    const request = encodeMessage(createRegisterPlugin(pluginId));

    this.logger.info(`Registering plugin ${pluginId} with ${rendezvousUrl}`);

    let raw: string;
    try {
      raw = await withRetry(() => this.transport.request(rendezvousUrl, request, timeoutMs), {
        maxRetries: retries,
        initialDelay: retryDelayMs,
        maxDelay: maxRetryDelayMs,
        shouldRetry: isRetryable,
        onRetry: (error, attempt, delayMs) => {
          this.logger.warn(
            `Registration attempt ${attempt} failed: ${getErrorMessage(error)}; retrying in ${delayMs}ms`
          );
        },
      });
    } catch (error) {
      throw new HandshakeError(`Registration with ${rendezvousUrl} failed: ${getErrorMessage(error)}`, {
        cause: error,
        context: { pluginId, rendezvousUrl },
      });
    }

    const result = decodeHandshakeReply(raw);
    if (!result.ok) {
      throw new HandshakeError(`Malformed registration reply: ${result.error.message}`, {
        cause: result.error,
        context: { pluginId },
      });
    }

    const { data } = result.message;
    if (data.pluginId !== pluginId) {
      this.logger.warn(`Registration reply is for plugin ${data.pluginId}, expected ${pluginId}`, {
        replyPluginId: data.pluginId,
      });
    }

    const registration: Registration = {
      pluginId,
      ipcBaseAddr: data.ipcBaseAddr,
      channelAddress: deriveChannelAddress(baseUrl, data.ipcBaseAddr),
    };

    this.logger.info(`Registered plugin ${pluginId}, channel ${registration.channelAddress}`);
    return registration;
  }
}
