/**
 * Plugin
 *
 * Owns the adapter registry and the sending end of the outbound queue.
 */

import { buildPluginMessage } from '../protocol/codec.js';
import type { PluginData, PluginMessage, PluginMessageType } from '../protocol/types.js';
import type { Adapter } from './adapter.js';
import type { MessageSink } from './types.js';

export class Plugin {
  private readonly adapters: Map<string, Adapter> = new Map();
  private unloaded = false;

  constructor(
    readonly id: string,
    private readonly outbound: MessageSink<PluginMessage>
  ) {}

  /**
   * Register an adapter and announce it with addAdapter
   */
  addAdapter(adapter: Adapter): boolean {
    if (this.adapters.has(adapter.id)) {
      throw new Error(`Adapter already registered: ${adapter.id}`);
    }
    this.adapters.set(adapter.id, adapter);
    adapter.attach(this);
    return adapter.sendEvent('addAdapter', { name: adapter.name });
  }

  getAdapter(adapterId: string): Adapter | undefined {
    return this.adapters.get(adapterId);
  }

  hasAdapter(adapterId: string): boolean {
    return this.adapters.has(adapterId);
  }

  getAdapters(): Adapter[] {
    return [...this.adapters.values()];
  }

  /**
   * Remove an adapter from the registry and send adapterUnloaded
   */
  removeAdapter(adapterId: string): boolean {
    const adapter = this.adapters.get(adapterId);
    if (!adapter) {
      return false;
    }
    adapter.sendEvent('adapterUnloaded', {});
    adapter.detach();
    this.adapters.delete(adapterId);
    return true;
  }

  sendMessage(message: PluginMessage): boolean {
    return this.outbound.send(message);
  }

  sendEvent<T extends PluginMessageType>(messageType: T, data: Omit<PluginData<T>, 'pluginId'>): boolean {
    return this.sendMessage(buildPluginMessage(messageType, { ...data, pluginId: this.id }));
  }

  get isUnloaded(): boolean {
    return this.unloaded;
  }

  /**
   * Post pluginUnloaded, the relay loop's shutdown signal. It is posted at
   * most once and is never refused for lack of room.
   */
  unload(): boolean {
    if (this.unloaded) {
      return false;
    }
    this.unloaded = true;
    return this.outbound.send(buildPluginMessage('pluginUnloaded', { pluginId: this.id }), { force: true });
  }
}
