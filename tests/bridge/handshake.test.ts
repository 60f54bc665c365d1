/**
 * Handshake Client Tests
 */

import { HandshakeClient, DEFAULT_HANDSHAKE_CONFIG } from '../../src/bridge/index.js';
import { HandshakeError, TimeoutError, TransportError } from '../../src/errors/bridge-error.js';
import { logger } from '../../src/utils/logger.js';
import { FakeTransport, replyFor } from '../helpers/fake-transport.js';

jest.mock('../../src/utils/logger.js', () => {
  const mockLogger = { debug: jest.fn(), info: jest.fn(), warn: jest.fn(), error: jest.fn() };
  return { logger: mockLogger, createLogger: jest.fn(() => mockLogger) };
});

describe('HandshakeClient', () => {
  let transport: FakeTransport;
  let client: HandshakeClient;

  beforeEach(() => {
    transport = new FakeTransport();
    client = new HandshakeClient(transport, {
      rendezvousUrl: 'ipc:///tmp/gateway.addonManager',
      baseUrl: 'ipc:///tmp',
      timeoutMs: 250,
      retries: 2,
      retryDelayMs: 1,
      maxRetryDelayMs: 2,
    });
  });

  it('should default to the well-known gateway addresses', () => {
    expect(DEFAULT_HANDSHAKE_CONFIG.rendezvousUrl).toBe('ipc:///tmp/gateway.addonManager');
    expect(DEFAULT_HANDSHAKE_CONFIG.baseUrl).toBe('ipc:///tmp');
    expect(new HandshakeClient(transport).getConfig()).toEqual(DEFAULT_HANDSHAKE_CONFIG);
  });

  it('should register and derive the channel address', async () => {
    transport.replies.push(replyFor('mqtt', 'gateway.plugin.mqtt'));

    const registration = await client.register('mqtt');

    expect(registration).toEqual({
      pluginId: 'mqtt',
      ipcBaseAddr: 'gateway.plugin.mqtt',
      channelAddress: 'ipc:///tmp/gateway.plugin.mqtt',
    });
    expect(transport.requests).toEqual([
      {
        address: 'ipc:///tmp/gateway.addonManager',
        payload: '{"messageType":"registerPlugin","data":{"pluginId":"mqtt"}}',
        timeoutMs: 250,
      },
    ]);
  });

  it('should retry transport failures and timeouts', async () => {
    transport.replies.push(
      new TransportError('connection refused'),
      new TimeoutError('no reply', 250),
      replyFor('mqtt', 'gateway.plugin.mqtt')
    );

    const registration = await client.register('mqtt');

    expect(registration.channelAddress).toBe('ipc:///tmp/gateway.plugin.mqtt');
    expect(transport.requests).toHaveLength(3);
  });

  it('should give up after the configured retries', async () => {
    transport.replies.push(
      new TransportError('refused 1'),
      new TransportError('refused 2'),
      new TransportError('refused 3'),
      replyFor('mqtt', 'never.used')
    );

    const failure = client.register('mqtt');

    await expect(failure).rejects.toBeInstanceOf(HandshakeError);
    await expect(failure).rejects.toMatchObject({
      code: 'HANDSHAKE_FAILED',
      message: 'Registration with ipc:///tmp/gateway.addonManager failed: refused 3',
    });
    expect(transport.requests).toHaveLength(3);
  });

  it('should not retry other failures', async () => {
    transport.replies.push(new Error('boom'), replyFor('mqtt', 'gateway.plugin.mqtt'));

    await expect(client.register('mqtt')).rejects.toBeInstanceOf(HandshakeError);
    expect(transport.requests).toHaveLength(1);
  });

  it('should fail on a malformed reply without retrying', async () => {
    transport.replies.push('{"messageType":"registerPluginReply","data":{"pluginId":"mqtt"}}');

    await expect(client.register('mqtt')).rejects.toThrow(/^Malformed registration reply/);
    expect(transport.requests).toHaveLength(1);
  });

  it('should warn and use the address of a reply for another plugin', async () => {
    transport.replies.push(replyFor('zigbee', 'gateway.plugin.zigbee'));

    const registration = await client.register('mqtt');

    expect(registration).toEqual({
      pluginId: 'mqtt',
      ipcBaseAddr: 'gateway.plugin.zigbee',
      channelAddress: 'ipc:///tmp/gateway.plugin.zigbee',
    });
    expect(logger.warn).toHaveBeenCalledWith('Registration reply is for plugin zigbee, expected mqtt', {
      replyPluginId: 'zigbee',
    });
  });

  it('should carry the transport error as the cause', async () => {
    const cause = new TransportError('refused');
    transport.replies.push(cause, cause, cause);

    try {
      await client.register('mqtt');
      throw new Error('expected register to fail');
    } catch (error) {
      expect(error).toBeInstanceOf(HandshakeError);
      if (error instanceof HandshakeError) {
        expect(error.cause).toBe(cause);
      }
    }
  });
});
