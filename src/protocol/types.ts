/**
 * Protocol Types
 *
 * Inferred from the wire schemas so the two never drift apart.
 */

import type { z } from 'zod';
import type {
  GatewayMessageSchema,
  HandshakeReplySchema,
  HandshakeRequestSchema,
  PluginMessageSchema,
  PropertySchema,
} from './schemas.js';

export type Property = z.infer<typeof PropertySchema>;

export type HandshakeRequest = z.infer<typeof HandshakeRequestSchema>;
export type HandshakeReply = z.infer<typeof HandshakeReplySchema>;

/** Inbound commands, gateway -> plugin */
export type GatewayMessage = z.infer<typeof GatewayMessageSchema>;

/** Outbound events, plugin -> gateway */
export type PluginMessage = z.infer<typeof PluginMessageSchema>;

export type GatewayMessageType = GatewayMessage['messageType'];
export type PluginMessageType = PluginMessage['messageType'];

export type AnyMessage = HandshakeRequest | HandshakeReply | GatewayMessage | PluginMessage;

/**
 * Narrow a message union to the variant carrying the given tag
 */
export type MessageOf<M extends AnyMessage, T extends M['messageType']> = Extract<M, { messageType: T }>;

/** Payload of a gateway command */
export type GatewayData<T extends GatewayMessageType> = MessageOf<GatewayMessage, T>['data'];

/** Payload of a plugin event */
export type PluginData<T extends PluginMessageType> = MessageOf<PluginMessage, T>['data'];
