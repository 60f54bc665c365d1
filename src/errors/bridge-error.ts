/**
 * Bridge Errors
 *
 * Error taxonomy for the gateway bridge. Transport and handshake errors
 * surface to the top level; protocol and lookup errors stay inside the
 * component that detects them.
 */

export type BridgeErrorCode =
  | 'TRANSPORT_ERROR'
  | 'CHANNEL_CLOSED'
  | 'UNSUPPORTED_ADDRESS'
  | 'INVALID_JSON'
  | 'INVALID_MESSAGE'
  | 'UNKNOWN_MESSAGE_TYPE'
  | 'NOT_FOUND'
  | 'HANDSHAKE_FAILED'
  | 'TIMEOUT'
  | 'INVALID_CONFIG';

export class BridgeError extends Error {
  public readonly code: BridgeErrorCode;
  public readonly timestamp: Date;
  public readonly context?: Record<string, unknown>;

  constructor(
    code: BridgeErrorCode,
    message: string,
    options: {
      cause?: unknown;
      context?: Record<string, unknown>;
    } = {}
  ) {
    super(message);
    this.name = 'BridgeError';
    this.code = code;
    this.timestamp = new Date();
    this.context = options.context;

    if (options.cause !== undefined) {
      this.cause = options.cause;
    }

    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      timestamp: this.timestamp.toISOString(),
      context: this.context,
    };
  }
}

/**
 * Connect, read or write failure on a channel
 */
export class TransportError extends BridgeError {
  constructor(
    message: string,
    public readonly address?: string,
    options: { cause?: unknown; code?: 'TRANSPORT_ERROR' | 'CHANNEL_CLOSED' | 'UNSUPPORTED_ADDRESS' } = {}
  ) {
    super(options.code ?? 'TRANSPORT_ERROR', message, {
      cause: options.cause,
      context: address ? { address } : undefined,
    });
    this.name = 'TransportError';
  }
}

/**
 * Malformed or unrecognized frame
 */
export class ProtocolError extends BridgeError {
  constructor(
    code: 'INVALID_JSON' | 'INVALID_MESSAGE' | 'UNKNOWN_MESSAGE_TYPE',
    message: string,
    options: { cause?: unknown; context?: Record<string, unknown> } = {}
  ) {
    super(code, message, options);
    this.name = 'ProtocolError';
  }
}

export type LookupEntity = 'adapter' | 'device';

/**
 * A command referenced an id the registry does not hold
 */
export class LookupError extends BridgeError {
  constructor(
    public readonly entity: LookupEntity,
    public readonly id: string,
    message = `Unknown ${entity}: ${id}`
  ) {
    super('NOT_FOUND', message, { context: { entity, id } });
    this.name = 'LookupError';
  }
}

export class HandshakeError extends BridgeError {
  constructor(message: string, options: { cause?: unknown; context?: Record<string, unknown> } = {}) {
    super('HANDSHAKE_FAILED', message, options);
    this.name = 'HandshakeError';
  }
}

export class TimeoutError extends BridgeError {
  constructor(message: string, public readonly timeoutMs: number) {
    super('TIMEOUT', message, { context: { timeoutMs } });
    this.name = 'TimeoutError';
  }
}

export class ConfigError extends BridgeError {
  constructor(message: string, context?: Record<string, unknown>) {
    super('INVALID_CONFIG', message, { context });
    this.name = 'ConfigError';
  }
}

/**
 * Check whether an error is a bridge error with the given code
 */
export function isBridgeError(error: unknown, code?: BridgeErrorCode): error is BridgeError {
  return error instanceof BridgeError && (code === undefined || error.code === code);
}
