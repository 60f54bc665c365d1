/**
 * Device
 *
 * A controllable endpoint owned by an adapter. Property values are opaque
 * JSON; subclasses override setProperty to drive real hardware and call
 * super (or notifyPropertyChanged) once the value is applied.
 */

import type { Property } from '../protocol/types.js';
import type { Adapter } from './adapter.js';
import { OK, notFound, type AdapterOutcome, type DeviceDescription, type DeviceOptions } from './types.js';

export class Device {
  readonly name: string;
  readonly type: string;
  protected readonly properties: Map<string, unknown> = new Map();
  protected readonly actions: Record<string, unknown>;

  constructor(
    readonly adapter: Adapter,
    readonly id: string,
    options: DeviceOptions = {}
  ) {
    this.name = options.name ?? id;
    this.type = options.type ?? 'thing';
    this.actions = { ...options.actions };
    for (const [name, value] of Object.entries(options.properties ?? {})) {
      this.properties.set(name, value);
    }
  }

  hasProperty(name: string): boolean {
    return this.properties.has(name);
  }

  getProperty(name: string): unknown {
    return this.properties.get(name);
  }

  getPropertyNames(): string[] {
    return [...this.properties.keys()];
  }

  /**
   * Apply a property value requested by the gateway
   */
  async setProperty(property: Property): Promise<AdapterOutcome> {
    if (!this.properties.has(property.name)) {
      return notFound(`Device ${this.id} has no property ${property.name}`);
    }
    this.properties.set(property.name, property.value);
    this.notifyPropertyChanged(property);
    return OK;
  }

  /**
   * Record a value that changed on the device side and report it
   */
  updateProperty(name: string, value: unknown): boolean {
    this.properties.set(name, value);
    return this.notifyPropertyChanged({ name, value });
  }

  notifyPropertyChanged(property: Property): boolean {
    return this.adapter.sendEvent('propertyChanged', {
      deviceId: this.id,
      property: { name: property.name, value: property.value },
    });
  }

  toDescription(): DeviceDescription {
    return {
      id: this.id,
      name: this.name,
      type: this.type,
      properties: Object.fromEntries(this.properties),
      actions: { ...this.actions },
    };
  }
}
