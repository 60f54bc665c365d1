/**
 * Wire Schemas
 *
 * Every frame is an envelope `{ messageType, data }`. Each message family is
 * a discriminated union on `messageType`; field names are the gateway's.
 */

import { z } from 'zod';

// ============================================================================
// Shared
// ============================================================================

export const PropertySchema = z.object({
  name: z.string(),
  value: z.unknown(),
});

const JsonMapSchema = z.record(z.unknown());

function envelope<T extends string, D extends z.ZodRawShape>(messageType: T, data: D) {
  return z.object({
    messageType: z.literal(messageType),
    data: z.object(data),
  });
}

const pluginId = z.string();
const adapterId = z.string();
const deviceId = z.string();

// ============================================================================
// Handshake
// ============================================================================

export const RegisterPluginSchema = envelope('registerPlugin', { pluginId });

export const RegisterPluginReplySchema = envelope('registerPluginReply', {
  pluginId,
  ipcBaseAddr: z.string().min(1),
});

export const HandshakeRequestSchema = z.discriminatedUnion('messageType', [RegisterPluginSchema]);

export const HandshakeReplySchema = z.discriminatedUnion('messageType', [RegisterPluginReplySchema]);

// ============================================================================
// Gateway -> Plugin
// ============================================================================

export const UnloadPluginSchema = envelope('unloadPlugin', { pluginId });

export const UnloadAdapterSchema = envelope('unloadAdapter', { pluginId, adapterId });

export const SetPropertySchema = envelope('setProperty', {
  pluginId,
  adapterId,
  deviceId,
  property: PropertySchema,
});

export const StartPairingSchema = envelope('startPairing', {
  pluginId,
  adapterId,
  // Advisory seconds, left to the adapter
  timeout: z.number(),
});

export const CancelPairingSchema = envelope('cancelPairing', { pluginId, adapterId });

export const RemoveThingSchema = envelope('removeThing', { pluginId, adapterId, deviceId });

export const CancelRemoveThingSchema = envelope('cancelRemoveThing', { pluginId, adapterId, deviceId });

export const GatewayMessageSchema = z.discriminatedUnion('messageType', [
  UnloadPluginSchema,
  UnloadAdapterSchema,
  SetPropertySchema,
  StartPairingSchema,
  CancelPairingSchema,
  RemoveThingSchema,
  CancelRemoveThingSchema,
]);

// ============================================================================
// Plugin -> Gateway
// ============================================================================

export const PluginUnloadedSchema = envelope('pluginUnloaded', { pluginId });

export const AdapterUnloadedSchema = envelope('adapterUnloaded', { pluginId, adapterId });

export const AddAdapterSchema = envelope('addAdapter', { pluginId, adapterId, name: z.string() });

export const HandleDeviceAddedSchema = envelope('handleDeviceAdded', {
  pluginId,
  adapterId,
  id: z.string(),
  name: z.string(),
  type: z.string(),
  properties: JsonMapSchema,
  actions: JsonMapSchema,
});

export const HandleDeviceRemovedSchema = envelope('handleDeviceRemoved', {
  pluginId,
  adapterId,
  id: z.string(),
});

export const PropertyChangedSchema = envelope('propertyChanged', {
  pluginId,
  adapterId,
  deviceId,
  property: PropertySchema,
});

export const PluginMessageSchema = z.discriminatedUnion('messageType', [
  PluginUnloadedSchema,
  AdapterUnloadedSchema,
  AddAdapterSchema,
  HandleDeviceAddedSchema,
  HandleDeviceRemovedSchema,
  PropertyChangedSchema,
]);

export const GATEWAY_MESSAGE_TYPES = GatewayMessageSchema.options.map(
  (schema) => schema.shape.messageType.value
);

export const PLUGIN_MESSAGE_TYPES = PluginMessageSchema.options.map(
  (schema) => schema.shape.messageType.value
);
