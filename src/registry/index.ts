/**
 * Registry Module
 *
 * Plugin, adapter and device entities collaborators build on.
 */

export type {
  AdapterOutcome,
  MessageSink,
  DeviceDescription,
  DeviceOptions,
} from './types.js';

export { OK, notFound, invalid } from './types.js';

export { Device } from './device.js';

export type { AdapterEventType, AdapterEventData } from './adapter.js';
export { Adapter } from './adapter.js';

export { Plugin } from './plugin.js';
