/**
 * Transport Module
 */

export type { DuplexChannel, Transport } from './types.js';

export { IPC_SCHEME, deriveChannelAddress, ipcSocketPath, toWebSocketUrl } from './address.js';

export type { WebSocketTransportConfig, WebSocketChannelEvents } from './ws-transport.js';

export {
  DEFAULT_WS_TRANSPORT_CONFIG,
  WebSocketChannel,
  WebSocketTransport,
} from './ws-transport.js';
