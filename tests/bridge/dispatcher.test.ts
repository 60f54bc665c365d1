/**
 * Dispatcher Tests
 */

import { Dispatcher, type DispatchOutcome } from '../../src/bridge/index.js';
import { createChannelPair, type ChannelPair } from '../../src/concurrency/index.js';
import { LookupError } from '../../src/errors/bridge-error.js';
import { decodeGatewayMessage, type GatewayMessage, type PluginMessage, type Property } from '../../src/protocol/index.js';
import { Adapter, Plugin, type AdapterOutcome } from '../../src/registry/index.js';

jest.mock('../../src/utils/logger.js', () => {
  const mockLogger = { debug: jest.fn(), info: jest.fn(), warn: jest.fn(), error: jest.fn() };
  return { logger: mockLogger, createLogger: jest.fn(() => mockLogger) };
});

class RecordingAdapter extends Adapter {
  readonly setPropertyCalls: Array<[string, Property]> = [];
  readonly pairingTimeouts: number[] = [];
  unloadCalls = 0;

  async setProperty(deviceId: string, property: Property): Promise<AdapterOutcome> {
    this.setPropertyCalls.push([deviceId, property]);
    return super.setProperty(deviceId, property);
  }

  async startPairing(timeoutSeconds: number): Promise<AdapterOutcome> {
    this.pairingTimeouts.push(timeoutSeconds);
    return super.startPairing(timeoutSeconds);
  }

  async unload(): Promise<AdapterOutcome> {
    this.unloadCalls++;
    return super.unload();
  }
}

class FaultyAdapter extends Adapter {
  async setProperty(): Promise<AdapterOutcome> {
    throw new Error('bus fault');
  }
}

const setProperty = (pluginId: string, adapterId: string, deviceId: string): GatewayMessage => ({
  messageType: 'setProperty',
  data: { pluginId, adapterId, deviceId, property: { name: 'on', value: true } },
});

describe('Dispatcher', () => {
  let queues: ChannelPair<GatewayMessage, PluginMessage>;
  let plugin: Plugin;
  let adapter: RecordingAdapter;
  let dispatcher: Dispatcher;

  beforeEach(() => {
    queues = createChannelPair<GatewayMessage, PluginMessage>();
    plugin = new Plugin('mqtt', queues.outbound);
    adapter = new RecordingAdapter('a1');
    plugin.addAdapter(adapter);
    adapter.createDevice('d1', { properties: { on: false } });
    queues.outbound.drain();
    dispatcher = new Dispatcher(plugin, queues.inbound, { pollIntervalMs: 5 });
  });

  afterEach(async () => {
    dispatcher.stop();
    await dispatcher.run();
  });

  describe('setProperty', () => {
    it('should call the adapter once with the device id and property', async () => {
      const outcome = await dispatcher.handleMessage(setProperty('mqtt', 'a1', 'd1'));

      expect(outcome).toEqual({ status: 'ok' });
      expect(adapter.setPropertyCalls).toEqual([['d1', { name: 'on', value: true }]]);
      expect(adapter.getDevice('d1')?.getProperty('on')).toBe(true);
      expect(queues.outbound.drain()).toEqual([
        {
          messageType: 'propertyChanged',
          data: { pluginId: 'mqtt', adapterId: 'a1', deviceId: 'd1', property: { name: 'on', value: true } },
        },
      ]);
    });

    it('should ignore a command for another plugin', async () => {
      const outcome = await dispatcher.handleMessage(setProperty('zigbee', 'a1', 'd1'));

      expect(outcome).toEqual({ status: 'ignored', reason: 'foreign-plugin' });
      expect(adapter.setPropertyCalls).toEqual([]);
      expect(adapter.getDevice('d1')?.getProperty('on')).toBe(false);
      expect(queues.outbound.size).toBe(0);
    });

    it('should report an unknown adapter without touching the registry', async () => {
      const outcome = await dispatcher.handleMessage(setProperty('mqtt', 'zz', 'd1'));

      expect(outcome.status).toBe('not-found');
      if (outcome.status === 'not-found') {
        expect(outcome.error).toBeInstanceOf(LookupError);
        expect(outcome.error.entity).toBe('adapter');
        expect(outcome.error.id).toBe('zz');
        expect(outcome.error.message).toBe('Unknown adapter: zz');
      }
      expect(plugin.getAdapters().map((a) => a.id)).toEqual(['a1']);
      expect(adapter.setPropertyCalls).toEqual([]);
      expect(queues.outbound.size).toBe(0);
    });

    it('should report an unknown device', async () => {
      const outcome = await dispatcher.handleMessage(setProperty('mqtt', 'a1', 'd9'));

      expect(outcome.status).toBe('not-found');
      if (outcome.status === 'not-found') {
        expect(outcome.error.entity).toBe('device');
        expect(outcome.error.id).toBe('d9');
      }
      expect(queues.outbound.size).toBe(0);
    });

    it('should turn an adapter exception into a failed outcome', async () => {
      plugin.addAdapter(new FaultyAdapter('bad'));
      queues.outbound.drain();

      const outcome = await dispatcher.handleMessage(setProperty('mqtt', 'bad', 'd1'));

      expect(outcome.status).toBe('failed');
      if (outcome.status === 'failed') {
        expect(outcome.error.message).toBe('bus fault');
      }
      expect(dispatcher.getStats().failed).toBe(1);
    });
  });

  describe('pairing', () => {
    it('should start pairing with the advisory timeout', async () => {
      const outcome = await dispatcher.handleMessage({
        messageType: 'startPairing',
        data: { pluginId: 'mqtt', adapterId: 'a1', timeout: 60 },
      });

      expect(outcome).toEqual({ status: 'ok' });
      expect(adapter.pairingTimeouts).toEqual([60]);
      expect(adapter.isPairing).toBe(true);
    });

    it('should route a decoded pairing frame with a negative timeout', async () => {
      const decoded = decodeGatewayMessage(
        '{"messageType":"startPairing","data":{"pluginId":"mqtt","adapterId":"a1","timeout":-5}}'
      );
      if (!decoded.ok) {
        throw decoded.error;
      }

      const outcome = await dispatcher.handleMessage(decoded.message);

      expect(outcome).toEqual({ status: 'ok' });
      expect(adapter.pairingTimeouts).toEqual([-5]);
    });

    it('should cancel pairing', async () => {
      await adapter.startPairing(30);

      const outcome = await dispatcher.handleMessage({
        messageType: 'cancelPairing',
        data: { pluginId: 'mqtt', adapterId: 'a1' },
      });

      expect(outcome).toEqual({ status: 'ok' });
      expect(adapter.isPairing).toBe(false);
    });

    it('should report pairing on an unknown adapter', async () => {
      const outcome = await dispatcher.handleMessage({
        messageType: 'startPairing',
        data: { pluginId: 'mqtt', adapterId: 'zz', timeout: 60 },
      });

      expect(outcome.status).toBe('not-found');
    });
  });

  describe('things', () => {
    it('should remove a thing', async () => {
      const outcome = await dispatcher.handleMessage({
        messageType: 'removeThing',
        data: { pluginId: 'mqtt', adapterId: 'a1', deviceId: 'd1' },
      });

      expect(outcome).toEqual({ status: 'ok' });
      expect(adapter.getDevice('d1')).toBeUndefined();
      expect(queues.outbound.drain()).toEqual([
        { messageType: 'handleDeviceRemoved', data: { pluginId: 'mqtt', adapterId: 'a1', id: 'd1' } },
      ]);
    });

    it('should report cancelRemoveThing for an unknown device', async () => {
      const outcome = await dispatcher.handleMessage({
        messageType: 'cancelRemoveThing',
        data: { pluginId: 'mqtt', adapterId: 'a1', deviceId: 'd9' },
      });

      expect(outcome.status).toBe('not-found');
    });
  });

  describe('unloading', () => {
    it('should unload one adapter', async () => {
      const outcome = await dispatcher.handleMessage({
        messageType: 'unloadAdapter',
        data: { pluginId: 'mqtt', adapterId: 'a1' },
      });

      expect(outcome).toEqual({ status: 'ok' });
      expect(adapter.unloadCalls).toBe(1);
      expect(plugin.hasAdapter('a1')).toBe(false);
      expect(queues.outbound.drain()).toEqual([
        { messageType: 'adapterUnloaded', data: { pluginId: 'mqtt', adapterId: 'a1' } },
      ]);
    });

    it('should unload every adapter and post pluginUnloaded last', async () => {
      const second = new RecordingAdapter('a2');
      plugin.addAdapter(second);
      queues.outbound.drain();

      const outcome = await dispatcher.handleMessage({ messageType: 'unloadPlugin', data: { pluginId: 'mqtt' } });

      expect(outcome).toEqual({ status: 'shutdown' });
      expect(adapter.unloadCalls).toBe(1);
      expect(second.unloadCalls).toBe(1);
      expect(plugin.getAdapters()).toEqual([]);
      expect(queues.outbound.drain()).toEqual([
        { messageType: 'adapterUnloaded', data: { pluginId: 'mqtt', adapterId: 'a1' } },
        { messageType: 'adapterUnloaded', data: { pluginId: 'mqtt', adapterId: 'a2' } },
        { messageType: 'pluginUnloaded', data: { pluginId: 'mqtt' } },
      ]);
    });

    it('should ignore unloadPlugin for another plugin', async () => {
      const outcome = await dispatcher.handleMessage({ messageType: 'unloadPlugin', data: { pluginId: 'zigbee' } });

      expect(outcome.status).toBe('ignored');
      expect(plugin.isUnloaded).toBe(false);
      expect(queues.outbound.size).toBe(0);
    });
  });

  describe('run', () => {
    it('should consume commands in order and exit after unloadPlugin', async () => {
      const outcomes: Array<[string, DispatchOutcome['status']]> = [];
      dispatcher.on('dispatched', (message, outcome) => outcomes.push([message.messageType, outcome.status]));

      queues.inbound.send(setProperty('mqtt', 'a1', 'd1'));
      queues.inbound.send(setProperty('zigbee', 'a1', 'd1'));
      queues.inbound.send({ messageType: 'unloadPlugin', data: { pluginId: 'mqtt' } });
      queues.inbound.send(setProperty('mqtt', 'a1', 'd1'));

      await expect(dispatcher.run()).resolves.toBe('unloaded');

      expect(outcomes).toEqual([
        ['setProperty', 'ok'],
        ['setProperty', 'ignored'],
        ['unloadPlugin', 'shutdown'],
      ]);
      expect(adapter.setPropertyCalls).toHaveLength(1);
      expect(queues.inbound.size).toBe(1);
    });

    it('should survive not-found commands', async () => {
      queues.inbound.send(setProperty('mqtt', 'zz', 'd1'));
      queues.inbound.send({ messageType: 'unloadPlugin', data: { pluginId: 'mqtt' } });

      await expect(dispatcher.run()).resolves.toBe('unloaded');
      expect(dispatcher.getStats()).toEqual({ dispatched: 1, ignored: 0, notFound: 1, rejected: 0, failed: 0 });
    });

    it('should exit once the inbound queue is closed and drained', async () => {
      queues.inbound.send(setProperty('mqtt', 'a1', 'd1'));
      queues.inbound.close();

      await expect(dispatcher.run()).resolves.toBe('inbound-closed');
      expect(adapter.setPropertyCalls).toHaveLength(1);
    });

    it('should exit on stop', async () => {
      const done = dispatcher.run();
      dispatcher.stop();

      await expect(done).resolves.toBe('stopped');
    });
  });
});
