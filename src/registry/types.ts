/**
 * Registry Types
 */

import type { SendOptions } from '../concurrency/message-queue.js';
import type { PluginMessage } from '../protocol/types.js';

/**
 * Result of an adapter or device operation
 */
export type AdapterOutcome =
  | { ok: true }
  | { ok: false; kind: 'not-found' | 'invalid'; message: string };

export const OK: AdapterOutcome = { ok: true };

export function notFound(message: string): AdapterOutcome {
  return { ok: false, kind: 'not-found', message };
}

export function invalid(message: string): AdapterOutcome {
  return { ok: false, kind: 'invalid', message };
}

/**
 * Where registry entities post their outbound events
 */
export interface MessageSink<T = PluginMessage> {
  send(message: T, options?: SendOptions): boolean;
}

export interface DeviceDescription {
  id: string;
  name: string;
  type: string;
  properties: Record<string, unknown>;
  actions: Record<string, unknown>;
}

export interface DeviceOptions {
  name?: string;
  type?: string;
  properties?: Record<string, unknown>;
  actions?: Record<string, unknown>;
}
