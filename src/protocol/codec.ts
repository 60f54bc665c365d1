/**
 * Wire Codec
 *
 * JSON text on the wire, validated against the schemas on the way in.
 * Decoding never throws: malformed input comes back as a ProtocolError
 * the caller may log and drop.
 */

import type { ZodError, ZodType, ZodTypeDef } from 'zod';
import { ProtocolError } from '../errors/bridge-error.js';
import {
  GATEWAY_MESSAGE_TYPES,
  GatewayMessageSchema,
  HandshakeReplySchema,
  HandshakeRequestSchema,
  PLUGIN_MESSAGE_TYPES,
  PluginMessageSchema,
} from './schemas.js';
import type {
  AnyMessage,
  GatewayMessage,
  HandshakeReply,
  HandshakeRequest,
  PluginData,
  PluginMessage,
  PluginMessageType,
} from './types.js';

export type DecodeResult<T> = { ok: true; message: T } | { ok: false; error: ProtocolError };

export type RawFrame = string | Buffer;

/**
 * Serialize a message envelope to its wire form
 */
export function encodeMessage(message: AnyMessage): string {
  return JSON.stringify(message);
}

function formatZodError(error: ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
      return `${path}: ${issue.message}`;
    })
    .join('; ');
}

function readMessageType(value: unknown): unknown {
  if (typeof value !== 'object' || value === null || !('messageType' in value)) {
    return undefined;
  }
  return value.messageType;
}

function decodeWith<T>(
  raw: RawFrame,
  schema: ZodType<T, ZodTypeDef, unknown>,
  knownTypes: readonly string[]
): DecodeResult<T> {
  const text = typeof raw === 'string' ? raw : raw.toString('utf8');

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    return {
      ok: false,
      error: new ProtocolError('INVALID_JSON', 'Frame is not valid JSON', { cause: error }),
    };
  }

  const messageType = readMessageType(parsed);
  if (typeof messageType === 'string' && !knownTypes.includes(messageType)) {
    return {
      ok: false,
      error: new ProtocolError('UNKNOWN_MESSAGE_TYPE', `Unknown message type: ${messageType}`, {
        context: { messageType },
      }),
    };
  }

  const result = schema.safeParse(parsed);
  if (!result.success) {
    return {
      ok: false,
      error: new ProtocolError('INVALID_MESSAGE', `Invalid message: ${formatZodError(result.error)}`, {
        cause: result.error,
        context: { messageType },
      }),
    };
  }

  return { ok: true, message: result.data };
}

const HANDSHAKE_REQUEST_TYPES = ['registerPlugin'] as const;
const HANDSHAKE_REPLY_TYPES = ['registerPluginReply'] as const;

export function decodeGatewayMessage(raw: RawFrame): DecodeResult<GatewayMessage> {
  return decodeWith(raw, GatewayMessageSchema, GATEWAY_MESSAGE_TYPES);
}

export function decodePluginMessage(raw: RawFrame): DecodeResult<PluginMessage> {
  return decodeWith(raw, PluginMessageSchema, PLUGIN_MESSAGE_TYPES);
}

export function decodeHandshakeRequest(raw: RawFrame): DecodeResult<HandshakeRequest> {
  return decodeWith(raw, HandshakeRequestSchema, HANDSHAKE_REQUEST_TYPES);
}

export function decodeHandshakeReply(raw: RawFrame): DecodeResult<HandshakeReply> {
  return decodeWith(raw, HandshakeReplySchema, HANDSHAKE_REPLY_TYPES);
}

// ============================================================================
// Builders
// ============================================================================

export function createRegisterPlugin(pluginId: string): HandshakeRequest {
  return { messageType: 'registerPlugin', data: { pluginId } };
}

/**
 * Build an outbound event from its tag and payload
 */
export function createPluginMessage<T extends PluginMessageType>(
  messageType: T,
  data: PluginData<T>
): PluginMessage {
  return buildPluginMessage(messageType, data);
}

/**
 * Validate and assemble an outbound event whose payload was put together
 * from parts. Throws a ZodError when the payload does not fit the tag.
 */
export function buildPluginMessage(messageType: PluginMessageType, data: object): PluginMessage {
  return PluginMessageSchema.parse({ messageType, data });
}

export function isPluginUnloaded(
  message: PluginMessage
): message is Extract<PluginMessage, { messageType: 'pluginUnloaded' }> {
  return message.messageType === 'pluginUnloaded';
}
