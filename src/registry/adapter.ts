/**
 * Adapter
 *
 * Base class for a plugin's device drivers. The dispatcher calls the
 * command hooks below; subclasses override the ones their hardware needs.
 * Every hook reports an AdapterOutcome instead of throwing for ordinary
 * failures such as an unknown device id.
 */

import { buildPluginMessage } from '../protocol/codec.js';
import type { PluginData, PluginMessageType, Property } from '../protocol/types.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { Device } from './device.js';
import type { Plugin } from './plugin.js';
import { OK, notFound, type AdapterOutcome, type DeviceOptions } from './types.js';

/** Outbound events that belong to an adapter */
export type AdapterEventType = Exclude<PluginMessageType, 'pluginUnloaded'>;

/** Event payload without the ids the adapter fills in */
export type AdapterEventData<T extends AdapterEventType> = Omit<PluginData<T>, 'pluginId' | 'adapterId'>;

export class Adapter {
  readonly name: string;
  protected readonly devices: Map<string, Device> = new Map();
  protected readonly logger: Logger;
  private plugin: Plugin | null = null;
  private pairing = false;

  constructor(readonly id: string, name?: string) {
    this.name = name ?? id;
    this.logger = createLogger({ source: `Adapter:${id}` });
  }

  // ============================================================================
  // Registry
  // ============================================================================

  /**
   * Called by Plugin.addAdapter
   */
  attach(plugin: Plugin): void {
    this.plugin = plugin;
  }

  detach(): void {
    this.plugin = null;
  }

  get pluginId(): string | undefined {
    return this.plugin?.id;
  }

  get isPairing(): boolean {
    return this.pairing;
  }

  getDevice(deviceId: string): Device | undefined {
    return this.devices.get(deviceId);
  }

  getDevices(): Device[] {
    return [...this.devices.values()];
  }

  /**
   * Create a device on this adapter and announce it
   */
  createDevice(deviceId: string, options: DeviceOptions = {}): Device {
    const device = new Device(this, deviceId, options);
    this.handleDeviceAdded(device);
    return device;
  }

  /**
   * Register a device and send handleDeviceAdded
   */
  handleDeviceAdded(device: Device): boolean {
    this.devices.set(device.id, device);
    const description = device.toDescription();
    return this.sendEvent('handleDeviceAdded', {
      id: description.id,
      name: description.name,
      type: description.type,
      properties: description.properties,
      actions: description.actions,
    });
  }

  /**
   * Drop a device and send handleDeviceRemoved
   */
  handleDeviceRemoved(deviceId: string): boolean {
    if (!this.devices.delete(deviceId)) {
      return false;
    }
    return this.sendEvent('handleDeviceRemoved', { id: deviceId });
  }

  /**
   * Post an event for this adapter on the plugin's outbound queue
   */
  sendEvent<T extends AdapterEventType>(messageType: T, data: AdapterEventData<T>): boolean {
    if (!this.plugin) {
      this.logger.debug(`Adapter not attached to a plugin, dropping ${messageType}`);
      return false;
    }
    return this.plugin.sendMessage(
      buildPluginMessage(messageType, { ...data, pluginId: this.plugin.id, adapterId: this.id })
    );
  }

  // ============================================================================
  // Command hooks
  // ============================================================================

  async setProperty(deviceId: string, property: Property): Promise<AdapterOutcome> {
    const device = this.devices.get(deviceId);
    if (!device) {
      return notFound(`Unknown device: ${deviceId}`);
    }
    return device.setProperty(property);
  }

  /**
   * Begin looking for new devices. The timeout is advisory, in seconds.
   */
  async startPairing(timeoutSeconds: number): Promise<AdapterOutcome> {
    this.logger.debug(`Pairing started (timeout ${timeoutSeconds}s)`);
    this.pairing = true;
    return OK;
  }

  async cancelPairing(): Promise<AdapterOutcome> {
    this.logger.debug('Pairing cancelled');
    this.pairing = false;
    return OK;
  }

  async removeThing(deviceId: string): Promise<AdapterOutcome> {
    if (!this.devices.has(deviceId)) {
      return notFound(`Unknown device: ${deviceId}`);
    }
    this.handleDeviceRemoved(deviceId);
    return OK;
  }

  async cancelRemoveThing(deviceId: string): Promise<AdapterOutcome> {
    if (!this.devices.has(deviceId)) {
      return notFound(`Unknown device: ${deviceId}`);
    }
    return OK;
  }

  /**
   * Release hardware resources. The plugin removes the adapter afterwards.
   */
  async unload(): Promise<AdapterOutcome> {
    this.pairing = false;
    return OK;
  }
}
