/**
 * Protocol Module
 *
 * Wire schemas, message types and the JSON codec.
 */

export type {
  Property,
  HandshakeRequest,
  HandshakeReply,
  GatewayMessage,
  PluginMessage,
  GatewayMessageType,
  PluginMessageType,
  AnyMessage,
  MessageOf,
  GatewayData,
  PluginData,
} from './types.js';

export {
  PropertySchema,
  HandshakeRequestSchema,
  HandshakeReplySchema,
  GatewayMessageSchema,
  PluginMessageSchema,
  GATEWAY_MESSAGE_TYPES,
  PLUGIN_MESSAGE_TYPES,
} from './schemas.js';

export type { DecodeResult, RawFrame } from './codec.js';

export {
  encodeMessage,
  decodeGatewayMessage,
  decodePluginMessage,
  decodeHandshakeRequest,
  decodeHandshakeReply,
  createRegisterPlugin,
  createPluginMessage,
  buildPluginMessage,
  isPluginUnloaded,
} from './codec.js';
